/**
 * Verification Gate
 * Read-only cross-check that both sinks reflect the expected record
 */
import { logger } from '../observability/logger.js';
import { verificationTotal } from '../observability/metrics.js';
import type { CsvStats } from '../storage/csv-store.js';

export interface VerificationReport {
    postgresCount: number;
    csvExists: boolean;
    csvRowCount: number;
    passed: boolean;
}

export interface RelationalCounter {
    countByDate(date: string): Promise<number>;
}

export interface FlatFileInspector {
    stat(): Promise<CsvStats>;
}

export class VerificationGate {
    constructor(
        private readonly relational: RelationalCounter,
        private readonly flatFile: FlatFileInspector
    ) {}

    async verify(expectedDate: string): Promise<VerificationReport> {
        const [postgresCount, csv] = await Promise.all([
            this.relational.countByDate(expectedDate),
            this.flatFile.stat(),
        ]);

        const report: VerificationReport = {
            postgresCount,
            csvExists: csv.exists,
            csvRowCount: csv.rowCount,
            passed: postgresCount > 0 && csv.exists,
        };

        verificationTotal.inc({ result: report.passed ? 'passed' : 'failed' });

        if (report.passed) {
            logger.info('Data verification passed', { date: expectedDate, ...report });
        } else {
            logger.error('Data verification failed', undefined, { date: expectedDate, ...report });
        }

        return report;
    }
}
