/**
 * Pipeline Worker - runs the APOD pipeline, one job at a time
 */
import { UnrecoverableError, type Job, type Worker } from 'bullmq';
import { createWorker } from './base-worker.js';
import { QUEUE_NAMES, type PipelineJob, type PipelineJobSummary } from '../queues/index.js';
import { isFatalPipelineError } from '../pipeline/errors.js';
import type { PipelineRunner, PipelineRunResult } from '../pipeline/runner.js';

export function summarizeRun(result: PipelineRunResult): PipelineJobSummary {
    return {
        runId: result.runId,
        date: result.date,
        provenance: result.extraction.provenance,
        verificationPassed: result.verification.passed,
        metadataSource: result.metadata.source,
        commitHash: result.commit.hash,
        madeNewCommit: result.commit.madeNewCommit,
        publishReason: result.publish.reason,
        durationMs: result.durationMs,
    };
}

/**
 * Fatal pipeline errors must not be retried by the queue
 */
export function toJobError(error: unknown): Error {
    if (isFatalPipelineError(error) && error instanceof Error) {
        return new UnrecoverableError(`${error.name}: ${error.message}`);
    }
    return error instanceof Error ? error : new Error(String(error));
}

export async function processPipelineJob(
    runner: PipelineRunner,
    job: Job<PipelineJob, PipelineJobSummary>
): Promise<PipelineJobSummary> {
    try {
        const result = await runner.run({ jobId: job.id });
        return summarizeRun(result);
    } catch (error) {
        throw toJobError(error);
    }
}

export function createPipelineWorker(runner: PipelineRunner): Worker<PipelineJob, PipelineJobSummary> {
    return createWorker<PipelineJob, PipelineJobSummary>({
        queueName: QUEUE_NAMES.PIPELINE,
        concurrency: 1,
        processor: async (job, jobLogger) => {
            jobLogger.info('Processing pipeline job', {
                triggeredBy: job.data.triggeredBy,
                triggeredAt: job.data.triggeredAt,
            });
            return processPipelineJob(runner, job);
        },
    });
}
