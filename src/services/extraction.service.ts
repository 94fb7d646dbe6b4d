/**
 * Extraction Coordinator
 *
 * State machine:
 *   attempting(n) -> success                      (terminal)
 *   attempting(n) -> attempting(n+1)              (retryable, n < maxRetries)
 *   attempting(n) -> exhausted-retries            (retryable, n = maxRetries)
 *   exhausted-retries -> fallback-cached          (terminal)
 *   exhausted-retries -> fallback-placeholder     (terminal)
 *
 * A fatal upstream response is the only path that throws.
 */
import { logger } from '../observability/logger.js';
import { extractionOutcomesTotal } from '../observability/metrics.js';
import type { FetchClient, Provenance, RawApodRecord } from '../fetchers/types.js';
import type { FallbackResolver } from './fallback-resolver.js';
import type { RetryPolicy } from './retry-policy.js';

export type ExtractionState =
    | { kind: 'attempting'; attempt: number }
    | { kind: 'success'; attempts: number }
    | { kind: 'exhausted-retries'; attempts: number; lastError: string }
    | { kind: 'fallback-cached'; attempts: number }
    | { kind: 'fallback-placeholder'; attempts: number };

export type TerminalState = Extract<ExtractionState, { kind: 'success' | 'fallback-cached' | 'fallback-placeholder' }>;

export interface ExtractionOutcome {
    raw: RawApodRecord;
    provenance: Provenance;
    attempts: number;
    finalState: TerminalState;
    transitions: ExtractionState[];
}

export class ExtractionCoordinator {
    constructor(
        private readonly client: FetchClient,
        private readonly retryPolicy: RetryPolicy,
        private readonly fallback: FallbackResolver
    ) {}

    async extract(): Promise<ExtractionOutcome> {
        const transitions: ExtractionState[] = [];
        const enter = (state: ExtractionState): void => {
            transitions.push(state);
            logger.debug('Extraction state', { ...state });
        };

        const result = await this.retryPolicy.execute(this.client, {
            onAttempt: (attempt) => enter({ kind: 'attempting', attempt }),
            onRetry: (attempt, delayMs, error) => {
                logger.warn('APOD API attempt failed, backing off', {
                    attempt,
                    maxRetries: this.retryPolicy.maxRetries,
                    delayMs,
                    reason: error.reason,
                    status: error.status,
                });
            },
        });

        if (result.kind === 'success') {
            const finalState: TerminalState = { kind: 'success', attempts: result.attempts };
            enter(finalState);
            extractionOutcomesTotal.inc({ provenance: 'live' });
            logger.info('Successfully extracted APOD data', {
                date: result.payload.date,
                title: result.payload.title,
                attempts: result.attempts,
            });
            return { raw: result.payload, provenance: 'live', attempts: result.attempts, finalState, transitions };
        }

        enter({ kind: 'exhausted-retries', attempts: result.attempts, lastError: result.lastError.message });
        logger.warn('APOD API retries exhausted, resolving fallback', {
            attempts: result.attempts,
            reason: result.lastError.reason,
        });

        const resolution = await this.fallback.resolve();
        const finalState: TerminalState = resolution.provenance === 'cached'
            ? { kind: 'fallback-cached', attempts: result.attempts }
            : { kind: 'fallback-placeholder', attempts: result.attempts };
        enter(finalState);
        extractionOutcomesTotal.inc({ provenance: resolution.provenance });

        logger.warn('Using fallback APOD record', {
            provenance: resolution.provenance,
            strategy: resolution.strategy,
            date: resolution.raw.date,
        });

        return {
            raw: resolution.raw,
            provenance: resolution.provenance,
            attempts: result.attempts,
            finalState,
            transitions,
        };
    }
}
