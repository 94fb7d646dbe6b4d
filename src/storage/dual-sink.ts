/**
 * Dual sink writer: relational store + flat file
 */
import { logger } from '../observability/logger.js';
import { sinkWritesTotal } from '../observability/metrics.js';
import { SinkWriteError, type SinkName } from '../pipeline/errors.js';
import type { ApodRecord } from '../normalizers/types.js';
import type { CsvRecordStore, CsvWriteResult } from './csv-store.js';
import type { RelationalSink } from './postgres.js';

export interface DualSinkWriter {
    upsert(record: ApodRecord): Promise<void>;
    appendAndDedupe(record: ApodRecord): Promise<CsvWriteResult>;
}

export class DualSink implements DualSinkWriter {
    constructor(
        private readonly relational: RelationalSink,
        private readonly flatFile: CsvRecordStore
    ) {}

    upsert(record: ApodRecord): Promise<void> {
        return this.relational.upsert(record);
    }

    appendAndDedupe(record: ApodRecord): Promise<CsvWriteResult> {
        return this.flatFile.appendAndDedupe(record);
    }
}

/**
 * Write to both sinks concurrently and wait for both to settle
 */
export async function writeToBothSinks(writer: DualSinkWriter, record: ApodRecord): Promise<CsvWriteResult> {
    const [relational, flatFile] = await Promise.allSettled([
        writer.upsert(record),
        writer.appendAndDedupe(record),
    ]);

    const failed: SinkName[] = [];
    const causes: unknown[] = [];

    if (relational.status === 'rejected') {
        failed.push('postgres');
        causes.push(relational.reason);
    }
    sinkWritesTotal.inc({ sink: 'postgres', status: relational.status === 'fulfilled' ? 'ok' : 'failed' });

    if (flatFile.status === 'rejected') {
        failed.push('csv');
        causes.push(flatFile.reason);
    }
    sinkWritesTotal.inc({ sink: 'csv', status: flatFile.status === 'fulfilled' ? 'ok' : 'failed' });

    if (flatFile.status === 'rejected' || failed.length > 0) {
        const error = new SinkWriteError(failed, causes);
        logger.error('Sink write failed', error, { date: record.date, sinks: failed });
        throw error;
    }

    return flatFile.value;
}
