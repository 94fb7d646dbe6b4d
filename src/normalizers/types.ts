/**
 * Normalizer types and interfaces
 */
import type { Provenance, RawApodRecord } from '../fetchers/types.js';

export type MediaType = 'image' | 'video';

export const EXPLANATION_MAX_LENGTH = 1000;
export const ATTRIBUTION_MAX_LENGTH = 255;

/**
 * Canonical record persisted to both sinks
 */
export interface ApodRecord {
    date: string;               // YYYY-MM-DD, primary key
    title: string;
    mediaUrl: string;
    highDefUrl: string | null;
    mediaType: MediaType;
    explanation: string;        // <= EXPLANATION_MAX_LENGTH
    attribution: string;        // <= ATTRIBUTION_MAX_LENGTH
    retrievedAt: string;        // ISO-8601
    provenance: Provenance;
}

/**
 * Normalizer interface
 */
export interface Normalizer {
    normalize(raw: RawApodRecord, provenance: Provenance, now?: Date): ApodRecord;
}
