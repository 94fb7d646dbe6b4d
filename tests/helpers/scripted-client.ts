import type { FetchClient, FetchOutcome } from '../../src/fetchers/types.js';

/**
 * Fetch client that replays outcomes in order, repeating the last one
 */
export class ScriptedClient implements FetchClient {
    calls = 0;

    constructor(private readonly outcomes: FetchOutcome[]) {}

    async fetchOnce(): Promise<FetchOutcome> {
        const outcome = this.outcomes[Math.min(this.calls, this.outcomes.length - 1)];
        this.calls++;
        return outcome;
    }
}

export const scripted = (...outcomes: FetchOutcome[]): ScriptedClient => new ScriptedClient(outcomes);

export const unavailable: FetchOutcome = {
    kind: 'retryable',
    reason: 'unavailable',
    status: 503,
    message: 'APOD API responded with 503',
};
