/**
 * Liveness check
 * GET /health
 */
import type { FastifyInstance } from 'fastify';

interface HealthResponse {
    status: 'healthy';
    service: string;
    uptimeSeconds: number;
    timestamp: string;
}

export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
    fastify.get<{ Reply: HealthResponse }>('/health', async (_request, reply) => {
        return reply.send({
            status: 'healthy',
            service: 'apod-pipeline',
            uptimeSeconds: Math.round(process.uptime()),
            timestamp: new Date().toISOString(),
        });
    });
}
