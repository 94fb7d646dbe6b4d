/**
 * Run Once Script
 * Runs the pipeline in-process without the queue, or enqueues a run with --enqueue
 */
import { createPipelineRunner } from '../pipeline/index.js';
import { closePool } from '../storage/postgres.js';
import { getRedisConnection, closeRedisConnection } from '../queues/redis.js';
import { initializeQueues, closeQueues } from '../queues/index.js';
import { triggerRun } from '../services/scheduler.service.js';
import { logger } from '../observability/logger.js';

async function runInProcess(): Promise<void> {
    try {
        const result = await createPipelineRunner().run();
        logger.info('Run summary', {
            runId: result.runId,
            date: result.date,
            provenance: result.extraction.provenance,
            metadataSource: result.metadata.source,
            commit: result.commit.hash,
            madeNewCommit: result.commit.madeNewCommit,
            publish: result.publish.reason,
            durationMs: result.durationMs,
        });
    } finally {
        await closePool();
    }
}

async function enqueue(): Promise<void> {
    getRedisConnection();
    initializeQueues();

    try {
        const jobId = await triggerRun('cli');
        logger.info('Pipeline run enqueued', { jobId });
    } finally {
        await closeQueues();
        await closeRedisConnection();
    }
}

const task = process.argv.includes('--enqueue') ? enqueue : runInProcess;

task()
    .then(() => {
        console.log('Pipeline run completed successfully');
        process.exit(0);
    })
    .catch((error: unknown) => {
        console.error('Pipeline run failed:', error);
        process.exit(1);
    });
