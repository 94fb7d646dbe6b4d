/**
 * Pipeline error taxonomy
 *
 * Extraction degrades through fallbacks before failing a run. Later stages
 * either degrade (metadata tool absence) or surface one of these errors so
 * "data looks wrong" stays distinguishable from "infrastructure looks wrong".
 */
import type { VerificationReport } from '../services/verification.service.js';

export type TransientReason = 'rate-limited' | 'unavailable' | 'network' | 'timeout' | 'unparseable';

/**
 * Retryable upstream failure (429/503, network, timeout)
 */
export class TransientUpstreamError extends Error {
    readonly reason: TransientReason;
    readonly status?: number;

    constructor(reason: TransientReason, message: string, status?: number) {
        super(message);
        this.name = 'TransientUpstreamError';
        this.reason = reason;
        this.status = status;
    }
}

/**
 * Non-retryable upstream response: an API contract or client-side problem
 */
export class FatalUpstreamError extends Error {
    readonly status: number;
    readonly body: string;

    constructor(status: number, body: string) {
        super(`APOD API responded with non-retryable status ${status}`);
        this.name = 'FatalUpstreamError';
        this.status = status;
        this.body = body;
    }
}

/**
 * Malformed or missing required field
 */
export class ValidationError extends Error {
    readonly field: string;

    constructor(field: string, message: string) {
        super(message);
        this.name = 'ValidationError';
        this.field = field;
    }
}

export type SinkName = 'postgres' | 'csv';

/**
 * One or both sink writes failed
 */
export class SinkWriteError extends Error {
    readonly sinks: SinkName[];
    readonly causes: unknown[];

    constructor(sinks: SinkName[], causes: unknown[]) {
        const detail = causes
            .map((cause, i) => `${sinks[i]}: ${cause instanceof Error ? cause.message : String(cause)}`)
            .join('; ');
        super(`Sink write failed (${detail})`);
        this.name = 'SinkWriteError';
        this.sinks = sinks;
        this.causes = causes;
    }
}

/**
 * Sinks do not reflect the expected record
 */
export class VerificationFailure extends Error {
    readonly report: VerificationReport;

    constructor(expectedDate: string, report: VerificationReport) {
        super(
            `Verification failed for ${expectedDate}: postgresCount=${report.postgresCount}, csvExists=${report.csvExists}`
        );
        this.name = 'VerificationFailure';
        this.report = report;
    }
}

/**
 * External metadata tool cannot be used; always handled by the simulated path
 */
export class ToolUnavailableError extends Error {
    constructor(tool: string, detail: string) {
        super(`${tool} unavailable: ${detail}`);
        this.name = 'ToolUnavailableError';
    }
}

/**
 * Repository history could not be read after a commit
 */
export class RepositoryQueryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RepositoryQueryError';
    }
}

/**
 * Executable not found on PATH
 */
export class CommandNotFoundError extends Error {
    readonly command: string;

    constructor(command: string) {
        super(`Command not found: ${command}`);
        this.name = 'CommandNotFoundError';
        this.command = command;
    }
}

/**
 * Command exited with a non-zero code
 */
export class CommandFailedError extends Error {
    readonly command: string;
    readonly exitCode: number | null;
    readonly stderr: string;

    constructor(command: string, args: readonly string[], exitCode: number | null, stderr: string) {
        super(`${command} ${args.join(' ')} exited with code ${exitCode}: ${stderr.trim()}`);
        this.name = 'CommandFailedError';
        this.command = command;
        this.exitCode = exitCode;
        this.stderr = stderr;
    }
}

/**
 * Errors the scheduler must not retry
 */
export function isFatalPipelineError(error: unknown): boolean {
    return error instanceof FatalUpstreamError
        || error instanceof ValidationError
        || error instanceof VerificationFailure;
}
