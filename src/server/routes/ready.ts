/**
 * Ready endpoint - readiness check with dependency status
 * GET /ready
 */
import type { FastifyInstance } from 'fastify';
import { isRedisConnected } from '../../queues/redis.js';
import { config } from '../../config/index.js';
import { getPool, PostgresRecordSink } from '../../storage/postgres.js';
import { createToolProbe } from '../../pipeline/index.js';
import { logger } from '../../observability/logger.js';

type DependencyStatus = 'connected' | 'disconnected' | 'reachable' | 'unreachable';

interface ReadyResponse {
    status: 'ready' | 'not_ready';
    dependencies: {
        redis: DependencyStatus;
        postgres: DependencyStatus;
        metadataTool: 'available' | 'simulated';
    };
}

export async function readyRoutes(fastify: FastifyInstance): Promise<void> {
    const probe = createToolProbe();

    fastify.get<{ Reply: ReadyResponse }>('/ready', async (_request, reply) => {
        const redisStatus: DependencyStatus = (await isRedisConnected()) ? 'connected' : 'disconnected';

        const postgresReachable = await new PostgresRecordSink(getPool(config.databaseUrl)).ping();
        const postgresStatus: DependencyStatus = postgresReachable ? 'reachable' : 'unreachable';

        // Tool absence degrades to the simulated path and never blocks readiness
        const availability = await probe.probe();
        if (!availability.externalToolUsable) {
            logger.debug('Metadata tool unavailable during readiness check', { reason: availability.reason });
        }

        const isReady = redisStatus === 'connected' && postgresReachable;

        return reply.status(isReady ? 200 : 503).send({
            status: isReady ? 'ready' : 'not_ready',
            dependencies: {
                redis: redisStatus,
                postgres: postgresStatus,
                metadataTool: availability.externalToolUsable ? 'available' : 'simulated',
            },
        });
    });
}
