/**
 * Pipeline Runner
 *
 * One run: extract -> normalize -> load -> verify -> prepare -> version -> commit -> publish.
 * Stages are strictly sequential; each stage's duration is observed.
 */
import { v4 as uuidv4 } from 'uuid';
import { createLogger, type Logger, type PipelineStage } from '../observability/logger.js';
import { pipelineRunsTotal, timeStage } from '../observability/metrics.js';
import { VerificationFailure } from './errors.js';
import { writeToBothSinks, type DualSinkWriter } from '../storage/dual-sink.js';
import { commitLabelFor } from '../versioning/repository.js';
import type { ExtractionOutcome, TerminalState } from '../services/extraction.service.js';
import type { VerificationReport } from '../services/verification.service.js';
import type { Provenance } from '../fetchers/types.js';
import type { ApodRecord, Normalizer } from '../normalizers/types.js';
import type { CsvWriteResult } from '../storage/csv-store.js';
import type { MetadataSource, MetadataVersionOutcome } from '../versioning/metadata.js';
import type { CommitResult } from '../versioning/repository.js';
import type { PublishResult } from '../versioning/publish.js';

/**
 * Recomputed on every run
 */
export interface VersioningState {
    csvChecksum: string;
    metadataPresent: boolean;
    metadataSource: MetadataSource;
    repoDirty: boolean;
}

export interface PipelineRunResult {
    runId: string;
    date: string;
    extraction: {
        provenance: Provenance;
        attempts: number;
        finalState: TerminalState['kind'];
    };
    record: ApodRecord;
    csv: CsvWriteResult;
    verification: VerificationReport;
    metadata: MetadataVersionOutcome;
    versioning: VersioningState;
    commit: CommitResult;
    publish: PublishResult;
    durationMs: number;
}

export interface PipelineDependencies {
    extractor: { extract(): Promise<ExtractionOutcome> };
    normalizer: Normalizer;
    sinks: DualSinkWriter;
    verifier: { verify(expectedDate: string): Promise<VerificationReport> };
    versioner: { version(filePath: string): Promise<MetadataVersionOutcome> };
    repository: {
        prepare(): Promise<void>;
        reconcile(commitLabel: string, documentPath: string): Promise<CommitResult>;
    };
    publisher: { publish(branch: string): Promise<PublishResult> };
    now?: () => Date;
}

export interface PipelineSettings {
    csvPath: string;
    branch: string;
    failOnVerificationFailure: boolean;
    publishEnabled: boolean;
}

export interface RunOptions {
    runId?: string;
    jobId?: string;
}

export class PipelineRunner {
    private readonly now: () => Date;

    constructor(
        private readonly deps: PipelineDependencies,
        private readonly settings: PipelineSettings
    ) {
        this.now = deps.now ?? (() => new Date());
    }

    async run(options: RunOptions = {}): Promise<PipelineRunResult> {
        const runId = options.runId ?? uuidv4();
        const log = createLogger({ runId, jobId: options.jobId });
        const startedAt = Date.now();

        log.info('Pipeline run started');

        try {
            const result = await this.execute(runId, log);
            result.durationMs = Date.now() - startedAt;
            pipelineRunsTotal.inc({ status: 'success' });
            log.info('Pipeline run finished', {
                date: result.date,
                provenance: result.extraction.provenance,
                commit: result.commit.hash,
                madeNewCommit: result.commit.madeNewCommit,
                publish: result.publish.reason,
                durationMs: result.durationMs,
            });
            return result;
        } catch (error) {
            pipelineRunsTotal.inc({ status: 'failed' });
            log.error('Pipeline run failed', error, { durationMs: Date.now() - startedAt });
            throw error;
        }
    }

    private stage<T>(log: Logger, stage: PipelineStage, fn: (stageLog: Logger) => Promise<T>): Promise<T> {
        return timeStage(stage, () => fn(log.child({ stage })));
    }

    private async execute(runId: string, log: Logger): Promise<PipelineRunResult> {
        const { deps, settings } = this;

        const extraction = await this.stage(log, 'extract', () => deps.extractor.extract());

        const record = await this.stage(log, 'normalize', async (stageLog) => {
            const normalized = deps.normalizer.normalize(extraction.raw, extraction.provenance, this.now());
            stageLog.info('Record normalized', { date: normalized.date, provenance: normalized.provenance });
            return normalized;
        });

        const csv = await this.stage(log, 'load', () => writeToBothSinks(deps.sinks, record));

        const verification = await this.stage(log, 'verify', async (stageLog) => {
            const report = await deps.verifier.verify(record.date);
            if (!report.passed) {
                if (settings.failOnVerificationFailure) {
                    throw new VerificationFailure(record.date, report);
                }
                stageLog.warn('Continuing after failed verification', { date: record.date });
            }
            return report;
        });

        await this.stage(log, 'prepare', () => deps.repository.prepare());

        const metadata = await this.stage(log, 'version', () => deps.versioner.version(settings.csvPath));

        const commit = await this.stage(log, 'commit', () =>
            deps.repository.reconcile(commitLabelFor(record.date), metadata.documentPath)
        );

        const versioning: VersioningState = {
            csvChecksum: metadata.checksum,
            metadataPresent: true,
            metadataSource: metadata.source,
            repoDirty: commit.changedPaths.length > 0,
        };

        const publish = await this.stage(log, 'publish', async (stageLog): Promise<PublishResult> => {
            if (!settings.publishEnabled) {
                stageLog.info('Publishing disabled');
                return { ok: false, reason: 'disabled', branch: settings.branch };
            }
            return deps.publisher.publish(settings.branch);
        });

        return {
            runId,
            date: record.date,
            extraction: {
                provenance: extraction.provenance,
                attempts: extraction.attempts,
                finalState: extraction.finalState.kind,
            },
            record,
            csv,
            verification,
            metadata,
            versioning,
            commit,
            publish,
            durationMs: 0,
        };
    }
}
