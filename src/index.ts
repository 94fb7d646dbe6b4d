/**
 * APOD Pipeline - Main entry point
 *
 * Worker-first service that:
 * - Schedules the daily pipeline run as a BullMQ repeatable job
 * - Runs the pipeline worker (one run at a time)
 * - Exposes internal Fastify endpoints for health/ready/metrics/admin
 */
import { config, getRedactedConfig } from './config/index.js';
import { logger } from './observability/logger.js';
import { getRedisConnection, closeRedisConnection } from './queues/redis.js';
import { initializeQueues, closeQueues } from './queues/index.js';
import { scheduleDailyRun } from './services/scheduler.service.js';
import { startWorkers, closeWorkers } from './workers/index.js';
import { startServer, stopServer } from './server/index.js';
import { createPipelineRunner } from './pipeline/index.js';
import { closePool } from './storage/postgres.js';

async function main(): Promise<void> {
    logger.info('Starting APOD pipeline service...');
    logger.info('Configuration loaded', getRedactedConfig(config));

    try {
        logger.info('Connecting to Redis...');
        getRedisConnection();

        logger.info('Initializing queues...');
        initializeQueues();

        startWorkers(createPipelineRunner());

        await scheduleDailyRun();

        logger.info('Starting HTTP server...');
        await startServer();

        logger.info('APOD pipeline service started successfully');
    } catch (error) {
        logger.error('Failed to start APOD pipeline service', error);
        process.exit(1);
    }
}

// Graceful shutdown handler
async function shutdown(signal: string): Promise<void> {
    logger.info(`Received ${signal}, shutting down gracefully...`);

    try {
        // Stop accepting new work
        await stopServer();

        // Wait for the current run to finish
        await closeWorkers();

        await closeQueues();
        await closeRedisConnection();
        await closePool();

        logger.info('APOD pipeline service stopped gracefully');
        process.exit(0);
    } catch (error) {
        logger.error('Error during shutdown', error);
        process.exit(1);
    }
}

process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
    void shutdown('SIGINT');
});

process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason);
    process.exit(1);
});

void main();
