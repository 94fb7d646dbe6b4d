/**
 * BullMQ queue initialization
 */
import { Queue } from 'bullmq';
import { config } from '../config/index.js';
import { getRedisConnection } from './redis.js';
import { QUEUE_NAMES, type QueueName } from './schemas.js';
import { logger } from '../observability/logger.js';
import { queueDepth, dlqSize } from '../observability/metrics.js';

// Store references to all queues
const queues = new Map<QueueName, Queue>();

/**
 * Initialize the pipeline queue and its dead letter queue
 */
export function initializeQueues(): Map<QueueName, Queue> {
    const connection = getRedisConnection();

    queues.set(QUEUE_NAMES.PIPELINE, new Queue(QUEUE_NAMES.PIPELINE, {
        connection,
        defaultJobOptions: {
            attempts: config.pipelineJobAttempts,
            backoff: {
                type: 'exponential',
                delay: config.pipelineJobBackoffMs,
            },
            removeOnComplete: {
                age: 7 * 86400, // Keep a week of run summaries
                count: 100,
            },
            removeOnFail: {
                age: 30 * 86400,
            },
        },
    }));

    queues.set(QUEUE_NAMES.DLQ, new Queue(QUEUE_NAMES.DLQ, {
        connection,
        defaultJobOptions: {
            removeOnComplete: false,
            removeOnFail: false,
        },
    }));

    for (const name of queues.keys()) {
        logger.info(`Queue initialized: ${name}`);
    }

    return queues;
}

/**
 * Get a specific queue
 */
export function getQueue(name: QueueName): Queue | undefined {
    return queues.get(name);
}

/**
 * Get all queues
 */
export function getAllQueues(): Map<QueueName, Queue> {
    return queues;
}

/**
 * Update queue depth metrics for all queues
 */
export async function updateQueueMetrics(): Promise<void> {
    for (const [queueName, queue] of queues.entries()) {
        try {
            const waiting = await queue.getWaitingCount();
            const active = await queue.getActiveCount();
            const delayed = await queue.getDelayedCount();

            const totalDepth = waiting + active + delayed;
            queueDepth.labels(queueName).set(totalDepth);

            if (queueName === QUEUE_NAMES.DLQ) {
                dlqSize.set(totalDepth);
            }
        } catch (error) {
            logger.error(`Failed to get queue metrics for ${queueName}`, error);
        }
    }
}

/**
 * Close all queues
 */
export async function closeQueues(): Promise<void> {
    for (const [name, queue] of queues.entries()) {
        await queue.close();
        logger.info(`Queue closed: ${name}`);
    }
    queues.clear();
}

// Re-export schemas
export * from './schemas.js';
