/**
 * Fetcher types and interfaces
 */
import { z } from 'zod';
import type { TransientReason } from '../pipeline/errors.js';

/**
 * Where a record came from
 */
export type Provenance = 'live' | 'cached' | 'placeholder';

export const PROVENANCES: readonly Provenance[] = ['live', 'cached', 'placeholder'];

export function isProvenance(value: string | undefined): value is Provenance {
    return PROVENANCES.some(provenance => provenance === value);
}

/**
 * APOD API response body. Only the shape is checked here; required-field
 * validation belongs to the normalizer.
 */
export const apodApiResponseSchema = z
    .object({
        date: z.string().optional(),
        title: z.string().optional(),
        url: z.string().optional(),
        hdurl: z.string().optional(),
        media_type: z.string().optional(),
        explanation: z.string().optional(),
        copyright: z.string().optional(),
    })
    .passthrough();

/**
 * Raw record as it arrives from the API, or as a fallback strategy
 * reconstructs it from the flat file
 */
export interface RawApodRecord {
    date?: string;
    title?: string;
    url?: string;
    hdurl?: string;
    media_type?: string;
    explanation?: string;
    copyright?: string;
    retrieved_at?: string;
    provenance?: string;        // as stored, when read back from the flat file
}

/**
 * Classification of a single upstream call
 */
export type FetchOutcome =
    | { kind: 'success'; status: number; payload: RawApodRecord }
    | { kind: 'retryable'; reason: TransientReason; status?: number; message: string }
    | { kind: 'fatal'; status: number; body: string };

/**
 * Fetch client interface - one HTTP call, classified, never throws
 */
export interface FetchClient {
    fetchOnce(): Promise<FetchOutcome>;
}

export interface ApodFetcherOptions {
    apiUrl: string;
    apiKey: string;
    timeoutMs: number;
    /** Optional `date` query parameter (YYYY-MM-DD) */
    date?: string;
}
