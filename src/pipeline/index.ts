/**
 * Pipeline composition from configuration
 */
import { resolve, join } from 'path';
import { config } from '../config/index.js';
import { createApodFetcher } from '../fetchers/index.js';
import { apodNormalizer } from '../normalizers/index.js';
import { ExtractionCoordinator } from '../services/extraction.service.js';
import { createFallbackResolver } from '../services/fallback-resolver.js';
import { RetryPolicy } from '../services/retry-policy.js';
import { VerificationGate } from '../services/verification.service.js';
import { CsvRecordStore } from '../storage/csv-store.js';
import { DualSink } from '../storage/dual-sink.js';
import { getPool, PostgresRecordSink } from '../storage/postgres.js';
import {
    DvcMetadataProducer,
    MetadataVersioner,
    PublishAttempt,
    RepositoryReconciler,
    SimulatedMetadataProducer,
    SpawnCommandRunner,
    ToolAvailabilityProbe,
    type CommandRunner,
} from '../versioning/index.js';
import { PipelineRunner } from './runner.js';

export interface PipelineOverrides {
    runner?: CommandRunner;
}

export function getDataPaths(): { repoDir: string; csvPath: string } {
    const repoDir = resolve(config.dataDir);
    return { repoDir, csvPath: join(repoDir, config.csvFileName) };
}

export function createToolProbe(runner: CommandRunner = new SpawnCommandRunner(config.commandTimeoutMs)): ToolAvailabilityProbe {
    return new ToolAvailabilityProbe(runner, {
        binary: config.dvcBinary,
        timeoutMs: config.commandTimeoutMs,
    });
}

/**
 * Wire every stage against configuration
 */
export function createPipelineRunner(overrides: PipelineOverrides = {}): PipelineRunner {
    const runner = overrides.runner ?? new SpawnCommandRunner(config.commandTimeoutMs);
    const { repoDir, csvPath } = getDataPaths();

    const csvStore = new CsvRecordStore(csvPath);
    const postgres = new PostgresRecordSink(getPool(config.databaseUrl));

    const extractor = new ExtractionCoordinator(
        createApodFetcher(),
        new RetryPolicy({
            maxRetries: config.extractionMaxRetries,
            baseBackoffMs: config.extractionBaseBackoffMs,
        }),
        createFallbackResolver(csvStore)
    );

    const versioner = new MetadataVersioner(
        createToolProbe(runner),
        new DvcMetadataProducer(runner, config.dvcBinary, config.commandTimeoutMs),
        new SimulatedMetadataProducer()
    );

    const repository = new RepositoryReconciler(runner, {
        repoDir,
        gitBinary: config.gitBinary,
        branch: config.gitBranch,
        authorName: config.gitAuthorName,
        authorEmail: config.gitAuthorEmail,
        remoteName: config.gitRemoteName,
        remoteUrl: config.gitRemoteUrl,
        timeoutMs: config.commandTimeoutMs,
    });

    const publisher = new PublishAttempt(runner, {
        repoDir,
        gitBinary: config.gitBinary,
        remoteName: config.gitRemoteName,
        timeoutMs: config.commandTimeoutMs,
        pushTimeoutMs: config.pushTimeoutMs,
    });

    return new PipelineRunner(
        {
            extractor,
            normalizer: apodNormalizer,
            sinks: new DualSink(postgres, csvStore),
            verifier: new VerificationGate(postgres, csvStore),
            versioner,
            repository,
            publisher,
        },
        {
            csvPath,
            branch: config.gitBranch,
            failOnVerificationFailure: config.failOnVerificationFailure,
            publishEnabled: config.publishEnabled,
        }
    );
}

export * from './errors.js';
export * from './runner.js';
