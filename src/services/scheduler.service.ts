/**
 * Scheduler Service
 * Manages the BullMQ repeatable job that runs the pipeline daily
 */
import { config } from '../config/index.js';
import { getQueue, QUEUE_NAMES, SCHEDULED_JOB_ID, type PipelineJob } from '../queues/index.js';
import { logger } from '../observability/logger.js';

export interface ScheduledRun {
    key: string;
    name: string;
    pattern: string | null;
    tz: string | null;
    next: number | null;
}

function pipelineQueue() {
    const queue = getQueue(QUEUE_NAMES.PIPELINE);
    if (!queue) {
        throw new Error('Pipeline queue not initialized');
    }
    return queue;
}

/**
 * Register the daily run; replaces any schedule with a different pattern
 */
export async function scheduleDailyRun(
    pattern: string = config.pipelineCron,
    tz: string = config.pipelineTimezone
): Promise<string | undefined> {
    const queue = pipelineQueue();

    // Remove stale schedules so exactly one repeatable job exists
    for (const existing of await queue.getRepeatableJobs()) {
        if (existing.id === SCHEDULED_JOB_ID && (existing.pattern !== pattern || existing.tz !== tz)) {
            await queue.removeRepeatableByKey(existing.key);
            logger.info('Removed stale pipeline schedule', { pattern: existing.pattern, tz: existing.tz });
        }
    }

    const data: PipelineJob = {
        triggeredBy: 'schedule',
        triggeredAt: new Date().toISOString(),
    };

    const job = await queue.add('scheduled-run', data, {
        repeat: { pattern, tz },
        jobId: SCHEDULED_JOB_ID,
    });

    logger.info('Pipeline scheduled', { pattern, tz, jobId: job.id });
    return job.id ?? undefined;
}

/**
 * Enqueue an immediate run
 */
export async function triggerRun(requestedBy?: string): Promise<string | undefined> {
    const queue = pipelineQueue();

    const data: PipelineJob = {
        triggeredBy: 'manual',
        triggeredAt: new Date().toISOString(),
        requestedBy,
    };

    const job = await queue.add(`manual-run-${Date.now()}`, data, {
        priority: 1, // High priority for manual triggers
    });

    logger.info('Manual pipeline run triggered', { jobId: job.id, requestedBy });
    return job.id ?? undefined;
}

/**
 * Get all scheduled jobs
 */
export async function getScheduledJobs(): Promise<ScheduledRun[]> {
    const queue = getQueue(QUEUE_NAMES.PIPELINE);
    if (!queue) {
        return [];
    }

    const repeatableJobs = await queue.getRepeatableJobs();

    return repeatableJobs.map(job => ({
        key: job.key,
        name: job.name,
        pattern: job.pattern ?? null,
        tz: job.tz ?? null,
        next: job.next ?? null,
    }));
}

export const scheduler = {
    scheduleDailyRun,
    triggerRun,
    getScheduledJobs,
};
