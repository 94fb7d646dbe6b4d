/**
 * Admin routes for manual runs and inspection
 */
import type { FastifyInstance } from 'fastify';
import { scheduler, type ScheduledRun } from '../../services/scheduler.service.js';
import { getQueue, QUEUE_NAMES } from '../../queues/index.js';
import { logger } from '../../observability/logger.js';
import { verifyAdminAuth } from '../plugins/admin-auth.js';

interface TriggerResponse {
    success: boolean;
    jobId?: string;
    message: string;
}

interface QueueStatsResponse {
    queue: string;
    waiting: number;
    active: number;
    completed: number;
    failed: number;
    delayed: number;
}

interface RunResponse {
    id: string;
    name: string;
    data: unknown;
    state: string;
    attemptsMade: number;
    failedReason?: string;
    result: unknown;
    processedOn?: number;
    finishedOn?: number;
    timestamp: number;
}

export async function adminRoutes(fastify: FastifyInstance): Promise<void> {
    /**
     * Trigger an immediate pipeline run
     * POST /admin/runs
     */
    fastify.post<{ Reply: TriggerResponse }>(
        '/admin/runs',
        { preHandler: verifyAdminAuth },
        async (_request, reply) => {
            try {
                const jobId = await scheduler.triggerRun('admin-api');
                logger.info('Admin triggered pipeline run', { jobId });
                return reply.status(202).send({
                    success: true,
                    jobId,
                    message: 'Pipeline run enqueued',
                });
            } catch (error) {
                logger.error('Admin trigger failed', error);
                return reply.status(500).send({
                    success: false,
                    message: error instanceof Error ? error.message : 'Unknown error',
                });
            }
        }
    );

    /**
     * Get a pipeline run by job ID
     * GET /admin/runs/:id
     */
    fastify.get<{ Params: { id: string }; Reply: RunResponse | { error: string } }>(
        '/admin/runs/:id',
        { preHandler: verifyAdminAuth },
        async (request, reply) => {
            const { id } = request.params;
            const queue = getQueue(QUEUE_NAMES.PIPELINE);
            const job = queue ? await queue.getJob(id) : undefined;

            if (!job) {
                return reply.status(404).send({ error: `Run '${id}' not found` });
            }

            const state = await job.getState();
            return reply.send({
                id: job.id || id,
                name: job.name,
                data: job.data,
                state,
                attemptsMade: job.attemptsMade,
                failedReason: job.failedReason,
                result: job.returnvalue ?? null,
                processedOn: job.processedOn,
                finishedOn: job.finishedOn,
                timestamp: job.timestamp,
            });
        }
    );

    /**
     * Get the repeatable schedule
     * GET /admin/schedule
     */
    fastify.get<{ Reply: ScheduledRun[] }>(
        '/admin/schedule',
        { preHandler: verifyAdminAuth },
        async (_request, reply) => {
            const jobs = await scheduler.getScheduledJobs();
            return reply.send(jobs);
        }
    );

    /**
     * Pipeline and dead letter queue statistics
     * GET /admin/queue
     */
    fastify.get<{ Reply: QueueStatsResponse[] }>(
        '/admin/queue',
        { preHandler: verifyAdminAuth },
        async (_request, reply) => {
            const stats: QueueStatsResponse[] = [];

            for (const queueName of Object.values(QUEUE_NAMES)) {
                const queue = getQueue(queueName);
                if (!queue) continue;

                const counts = await queue.getJobCounts();

                stats.push({
                    queue: queueName,
                    waiting: counts.waiting || 0,
                    active: counts.active || 0,
                    completed: counts.completed || 0,
                    failed: counts.failed || 0,
                    delayed: counts.delayed || 0,
                });
            }

            return reply.send(stats);
        }
    );
}
