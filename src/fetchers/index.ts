/**
 * Fetcher entry point
 */
import { config } from '../config/index.js';
import { ApodFetcher } from './apod.fetcher.js';
import type { ApodFetcherOptions } from './types.js';

/**
 * Create an APOD fetcher from configuration
 */
export function createApodFetcher(overrides: Partial<ApodFetcherOptions> = {}): ApodFetcher {
    return new ApodFetcher({
        apiUrl: config.nasaApiUrl,
        apiKey: config.nasaApiKey,
        timeoutMs: config.apodRequestTimeoutMs,
        ...overrides,
    });
}

export { ApodFetcher, buildRequestUrl } from './apod.fetcher.js';
export * from './types.js';
