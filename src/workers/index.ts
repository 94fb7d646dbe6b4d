/**
 * Worker registration and management
 */
import type { Worker } from 'bullmq';
import { logger } from '../observability/logger.js';
import { createPipelineWorker } from './pipeline.worker.js';
import type { PipelineRunner } from '../pipeline/runner.js';

const workers: Worker[] = [];

/**
 * Get all registered workers
 */
export function getAllWorkers(): Worker[] {
    return workers;
}

/**
 * Start all workers
 */
export function startWorkers(runner: PipelineRunner): void {
    logger.info('Starting workers...');
    workers.push(createPipelineWorker(runner));
}

/**
 * Close all workers gracefully
 */
export async function closeWorkers(): Promise<void> {
    logger.info('Closing all workers...');

    await Promise.all(
        workers.map(async (worker) => {
            try {
                await worker.close();
                logger.info(`Worker closed for queue: ${worker.name}`);
            } catch (error) {
                logger.error(`Error closing worker for queue: ${worker.name}`, error);
            }
        })
    );
    workers.length = 0;

    logger.info('All workers closed');
}

export { createWorker, isFinalFailure } from './base-worker.js';
export { createPipelineWorker, processPipelineJob, summarizeRun, toJobError } from './pipeline.worker.js';
