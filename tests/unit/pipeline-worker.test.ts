/**
 * Pipeline worker helpers: job summaries and retry classification
 */
import { describe, expect, it, vi } from 'vitest';
import { UnrecoverableError } from 'bullmq';
import { summarizeRun, toJobError } from '../../src/workers/pipeline.worker.js';
import {
    FatalUpstreamError,
    SinkWriteError,
    ValidationError,
    VerificationFailure,
} from '../../src/pipeline/errors.js';
import { makeRecord } from '../helpers/records.js';
import type { PipelineRunResult } from '../../src/pipeline/runner.js';

vi.mock('../../src/observability/logger.js', () => import('../helpers/mock-logger.js'));

function runResult(): PipelineRunResult {
    return {
        runId: 'run-1',
        date: '2024-03-05',
        extraction: { provenance: 'cached', attempts: 5, finalState: 'fallback-cached' },
        record: makeRecord({ provenance: 'cached' }),
        csv: { path: '/data/apod_data.csv', rowCount: 4, replaced: false },
        verification: { postgresCount: 1, csvExists: true, csvRowCount: 4, passed: true },
        metadata: {
            path: '/data/apod_data.csv',
            documentPath: '/data/apod_data.csv.dvc',
            checksum: 'd41d8cd98f00b204e9800998ecf8427e',
            size: 512,
            source: 'simulated',
            toolAvailability: { externalToolUsable: false, binaryPath: null, version: null, reason: 'not-on-path' },
        },
        versioning: {
            csvChecksum: 'd41d8cd98f00b204e9800998ecf8427e',
            metadataPresent: true,
            metadataSource: 'simulated',
            repoDirty: true,
        },
        commit: { hash: 'abc1234', madeNewCommit: true, changedPaths: ['apod_data.csv.dvc'], reason: 'committed' },
        publish: { ok: false, reason: 'no-remote', branch: 'main' },
        durationMs: 1250,
    };
}

describe('summarizeRun', () => {
    it('should keep the fields an operator inspects', () => {
        expect(summarizeRun(runResult())).toEqual({
            runId: 'run-1',
            date: '2024-03-05',
            provenance: 'cached',
            verificationPassed: true,
            metadataSource: 'simulated',
            commitHash: 'abc1234',
            madeNewCommit: true,
            publishReason: 'no-remote',
            durationMs: 1250,
        });
    });
});

describe('toJobError', () => {
    it('should mark fatal upstream errors unrecoverable', () => {
        const error = toJobError(new FatalUpstreamError(403, 'forbidden'));

        expect(error).toBeInstanceOf(UnrecoverableError);
        expect(error.message).toBe('FatalUpstreamError: APOD API responded with non-retryable status 403');
    });

    it('should mark validation errors unrecoverable', () => {
        const error = toJobError(new ValidationError('date', 'Missing required field: date'));

        expect(error).toBeInstanceOf(UnrecoverableError);
        expect(error.message).toBe('ValidationError: Missing required field: date');
    });

    it('should mark verification failures unrecoverable', () => {
        const report = { postgresCount: 0, csvExists: true, csvRowCount: 2, passed: false };
        const error = toJobError(new VerificationFailure('2024-03-05', report));

        expect(error).toBeInstanceOf(UnrecoverableError);
        expect(error.message).toBe(
            'VerificationFailure: Verification failed for 2024-03-05: postgresCount=0, csvExists=true'
        );
    });

    it('should leave infrastructure errors retryable', () => {
        const original = new SinkWriteError(['postgres'], [new Error('connection refused')]);
        const error = toJobError(original);

        expect(error).toBe(original);
        expect(error).not.toBeInstanceOf(UnrecoverableError);
    });

    it('should wrap non-error values', () => {
        const error = toJobError('boom');

        expect(error).toBeInstanceOf(Error);
        expect(error.message).toBe('boom');
    });
});
