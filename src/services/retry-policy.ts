/**
 * Retry Policy
 * Bounded exponential backoff around a single-call fetch client
 */
import { setTimeout as sleepFor } from 'node:timers/promises';
import { FatalUpstreamError, TransientUpstreamError } from '../pipeline/errors.js';
import type { FetchClient, RawApodRecord } from '../fetchers/types.js';

export interface RetryPolicyConfig {
    maxRetries: number;       // Total attempts, including the first
    baseBackoffMs: number;    // Delay after the first failed attempt
}

export type Sleep = (ms: number) => Promise<void>;

export interface RetryHooks {
    onAttempt?: (attempt: number) => void;
    onRetry?: (attempt: number, delayMs: number, error: TransientUpstreamError) => void;
}

export type RetryResult =
    | { kind: 'success'; payload: RawApodRecord; attempts: number }
    | { kind: 'exhausted'; attempts: number; lastError: TransientUpstreamError };

const DEFAULT_CONFIG: RetryPolicyConfig = {
    maxRetries: 5,
    baseBackoffMs: 5000,
};

const defaultSleep: Sleep = async (ms) => {
    await sleepFor(ms);
};

export class RetryPolicy {
    private readonly config: RetryPolicyConfig;

    constructor(
        config: Partial<RetryPolicyConfig> = {},
        private readonly sleep: Sleep = defaultSleep
    ) {
        this.config = { ...DEFAULT_CONFIG, ...config };
        if (this.config.maxRetries < 1) {
            throw new RangeError('maxRetries must be at least 1');
        }
    }

    get maxRetries(): number {
        return this.config.maxRetries;
    }

    /**
     * Delay before attempt `attempt + 1`: base * 2^(attempt-1)
     */
    delayFor(attempt: number): number {
        return this.config.baseBackoffMs * 2 ** (attempt - 1);
    }

    canRetry(attempt: number): boolean {
        return attempt < this.config.maxRetries;
    }

    /**
     * Run the client until success, a fatal response, or the attempt budget is spent.
     * Fatal responses are thrown immediately as FatalUpstreamError.
     */
    async execute(client: FetchClient, hooks: RetryHooks = {}): Promise<RetryResult> {
        let attempt = 1;

        for (;;) {
            hooks.onAttempt?.(attempt);
            const outcome = await client.fetchOnce();

            if (outcome.kind === 'success') {
                return { kind: 'success', payload: outcome.payload, attempts: attempt };
            }

            if (outcome.kind === 'fatal') {
                throw new FatalUpstreamError(outcome.status, outcome.body);
            }

            const error = new TransientUpstreamError(outcome.reason, outcome.message, outcome.status);

            if (!this.canRetry(attempt)) {
                return { kind: 'exhausted', attempts: attempt, lastError: error };
            }

            const delayMs = this.delayFor(attempt);
            hooks.onRetry?.(attempt, delayMs, error);
            await this.sleep(delayMs);
            attempt++;
        }
    }
}
