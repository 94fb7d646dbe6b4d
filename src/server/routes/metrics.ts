/**
 * Prometheus scrape endpoint
 * GET /metrics
 */
import type { FastifyInstance } from 'fastify';
import { getMetrics, getContentType } from '../../observability/metrics.js';
import { logger } from '../../observability/logger.js';
import { updateQueueMetrics } from '../../queues/index.js';

export async function metricsRoutes(fastify: FastifyInstance): Promise<void> {
    fastify.get('/metrics', async (_request, reply) => {
        // Queue gauges are refreshed per scrape; pipeline counters still render without Redis
        try {
            await updateQueueMetrics();
        } catch (error) {
            logger.warn('Queue metrics unavailable', {
                error: error instanceof Error ? error.message : String(error),
            });
        }

        const metrics = await getMetrics();

        return reply
            .header('Content-Type', getContentType())
            .send(metrics);
    });
}
