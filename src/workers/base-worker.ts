/**
 * Base worker factory with event handlers, metrics and dead-lettering
 */
import { Worker, UnrecoverableError, type Job } from 'bullmq';
import { getRedisConnection } from '../queues/redis.js';
import { logger, createLogger, type Logger } from '../observability/logger.js';
import { jobsTotal, dlqSize } from '../observability/metrics.js';
import { getQueue, QUEUE_NAMES, type DLQJob } from '../queues/index.js';

export interface WorkerConfig<T, R> {
    queueName: string;
    concurrency?: number;
    processor: (job: Job<T, R>, jobLogger: Logger) => Promise<R>;
}

/**
 * Retries are spent, or the error was marked unrecoverable
 */
export function isFinalFailure(job: Job, error: Error): boolean {
    if (error instanceof UnrecoverableError || error.name === 'UnrecoverableError') {
        return true;
    }
    const attempts = job.opts.attempts ?? 1;
    return job.attemptsMade >= attempts;
}

/**
 * Create a worker with standard event handlers and metrics
 */
export function createWorker<T, R>(workerConfig: WorkerConfig<T, R>): Worker<T, R> {
    const { queueName, concurrency = 1, processor } = workerConfig;

    const worker = new Worker<T, R>(
        queueName,
        async (job: Job<T, R>) => {
            const jobLogger = createLogger({
                jobId: job.id,
                queue: queueName,
            });

            const startTime = Date.now();
            jobLogger.info('Job started', { name: job.name, attempt: job.attemptsMade + 1 });

            try {
                const result = await processor(job, jobLogger);
                jobLogger.info('Job completed', { durationMs: Date.now() - startTime });
                return result;
            } catch (error) {
                jobLogger.error('Job failed', error, { durationMs: Date.now() - startTime });
                throw error; // Re-throw to let BullMQ handle retries
            }
        },
        {
            connection: getRedisConnection(),
            concurrency,
        }
    );

    worker.on('completed', (job: Job<T, R>) => {
        jobsTotal.labels(queueName, 'completed').inc();
        logger.debug(`Job ${job.id} completed in queue ${queueName}`);
    });

    worker.on('failed', (job: Job<T, R> | undefined, error: Error) => {
        jobsTotal.labels(queueName, 'failed').inc();

        if (!job) {
            return;
        }

        logger.warn(`Job ${job.id} failed in queue ${queueName}`, {
            error: error.message,
            attemptsMade: job.attemptsMade,
            maxAttempts: job.opts.attempts,
        });

        if (isFinalFailure(job, error)) {
            moveToDeadLetterQueue(job, queueName, error.message).catch((dlqError: unknown) => {
                logger.error('Failed to move job to DLQ', dlqError, { jobId: job.id });
            });
        }
    });

    worker.on('stalled', (jobId: string) => {
        jobsTotal.labels(queueName, 'stalled').inc();
        logger.warn(`Job ${jobId} stalled in queue ${queueName}`);
    });

    worker.on('error', (error: Error) => {
        logger.error(`Worker error in queue ${queueName}`, error);
    });

    worker.on('ready', () => {
        logger.info(`Worker ready for queue: ${queueName}`);
    });

    return worker;
}

/**
 * Move a failed job to the dead letter queue
 */
async function moveToDeadLetterQueue(job: Job, originalQueue: string, failureReason: string): Promise<void> {
    const dlq = getQueue(QUEUE_NAMES.DLQ);
    if (!dlq) {
        logger.error('DLQ not initialized, cannot move failed job');
        return;
    }

    const dlqJob: DLQJob = {
        originalQueue,
        originalJobId: job.id || 'unknown',
        originalJobData: job.data,
        failureReason,
        failedAt: new Date().toISOString(),
        attemptsMade: job.attemptsMade,
    };

    await dlq.add('dead-letter', dlqJob);
    dlqSize.inc();

    logger.warn('Job moved to DLQ', {
        jobId: job.id,
        originalQueue,
        failureReason,
    });
}
