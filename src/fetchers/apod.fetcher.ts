/**
 * APOD API Fetcher
 * Issues a single GET against the planetary/apod endpoint and classifies the response
 */
import { logger } from '../observability/logger.js';
import { extractionAttemptsTotal } from '../observability/metrics.js';
import { apodApiResponseSchema } from './types.js';
import type { ApodFetcherOptions, FetchClient, FetchOutcome, RawApodRecord } from './types.js';

const USER_AGENT = 'ApodPipeline/1.0 (Data Versioning Pipeline)';

// Statuses that indicate load, not a broken request
const RETRYABLE_STATUSES: Record<number, 'rate-limited' | 'unavailable'> = {
    429: 'rate-limited',
    503: 'unavailable',
};

/**
 * Build request URL with the API key query parameter
 */
export function buildRequestUrl(options: Pick<ApodFetcherOptions, 'apiUrl' | 'apiKey' | 'date'>): URL {
    const url = new URL(options.apiUrl);
    url.searchParams.set('api_key', options.apiKey);
    if (options.date) {
        url.searchParams.set('date', options.date);
    }
    return url;
}

/**
 * Parse a 2xx body into a raw record, or null when it is not a JSON object
 */
function parseBody(text: string): RawApodRecord | null {
    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch {
        return null;
    }

    const result = apodApiResponseSchema.safeParse(json);
    if (!result.success) {
        return null;
    }

    const { date, title, url, hdurl, media_type, explanation, copyright } = result.data;
    return { date, title, url, hdurl, media_type, explanation, copyright };
}

export class ApodFetcher implements FetchClient {
    constructor(private readonly options: ApodFetcherOptions) {}

    async fetchOnce(): Promise<FetchOutcome> {
        const outcome = await this.request();
        extractionAttemptsTotal.inc({ result: outcome.kind === 'retryable' ? outcome.reason : outcome.kind });
        return outcome;
    }

    private async request(): Promise<FetchOutcome> {
        const url = buildRequestUrl(this.options);
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

        logger.debug('Requesting APOD record', { url: url.origin + url.pathname, date: this.options.date });

        try {
            const response = await fetch(url, {
                method: 'GET',
                headers: {
                    'User-Agent': USER_AGENT,
                    'Accept': 'application/json',
                },
                signal: controller.signal,
            });
            const text = await response.text();

            if (response.ok) {
                const payload = parseBody(text);
                if (!payload) {
                    return {
                        kind: 'retryable',
                        reason: 'unparseable',
                        status: response.status,
                        message: 'Response body is not a JSON object',
                    };
                }
                return { kind: 'success', status: response.status, payload };
            }

            const retryReason = RETRYABLE_STATUSES[response.status];
            if (retryReason) {
                return {
                    kind: 'retryable',
                    reason: retryReason,
                    status: response.status,
                    message: `APOD API responded with ${response.status}`,
                };
            }

            return { kind: 'fatal', status: response.status, body: text.substring(0, 500) };
        } catch (error) {
            if (controller.signal.aborted) {
                return {
                    kind: 'retryable',
                    reason: 'timeout',
                    message: `APOD API request timed out after ${this.options.timeoutMs}ms`,
                };
            }
            return {
                kind: 'retryable',
                reason: 'network',
                message: error instanceof Error ? error.message : String(error),
            };
        } finally {
            clearTimeout(timeout);
        }
    }
}
