/**
 * APOD Normalizer
 * Maps a raw API/fallback record to the canonical schema
 */
import { logger } from '../observability/logger.js';
import { ValidationError } from '../pipeline/errors.js';
import { isIsoCalendarDate } from '../utils/date.js';
import { isProvenance } from '../fetchers/types.js';
import { ATTRIBUTION_MAX_LENGTH, EXPLANATION_MAX_LENGTH } from './types.js';
import type { Provenance, RawApodRecord } from '../fetchers/types.js';
import type { ApodRecord, MediaType, Normalizer } from './types.js';

export const DEFAULT_TITLE = 'No Title';
export const DEFAULT_ATTRIBUTION = 'NASA';

const MEDIA_TYPES: readonly MediaType[] = ['image', 'video'];

function isMediaType(value: string): value is MediaType {
    return MEDIA_TYPES.some(type => type === value);
}

function truncate(field: string, value: string, max: number, date: string): string {
    if (value.length <= max) {
        return value;
    }
    logger.debug('Field truncated', { field, date, originalLength: value.length, max });
    return value.substring(0, max);
}

function resolveMediaType(raw: RawApodRecord, date: string): MediaType {
    const value = raw.media_type;
    if (!value) {
        return 'image';
    }
    if (isMediaType(value)) {
        return value;
    }
    logger.warn('Unrecognized media type, defaulting to image', { date, mediaType: value });
    return 'image';
}

/**
 * A cached record keeps the provenance it was stored with
 */
function persistedProvenance(raw: RawApodRecord, provenance: Provenance): Provenance {
    if (provenance === 'cached' && isProvenance(raw.provenance) && raw.provenance !== 'placeholder') {
        return raw.provenance;
    }
    return provenance;
}

export const apodNormalizer: Normalizer = {
    normalize(raw: RawApodRecord, provenance: Provenance, now: Date = new Date()): ApodRecord {
        const date = raw.date?.trim() ?? '';

        if (!date) {
            throw new ValidationError('date', 'Date field is missing from APOD record');
        }
        if (!isIsoCalendarDate(date)) {
            throw new ValidationError('date', `Date field is not a YYYY-MM-DD calendar date: ${date}`);
        }

        return {
            date,
            title: raw.title || DEFAULT_TITLE,
            mediaUrl: raw.url ?? '',
            highDefUrl: raw.hdurl || null,
            mediaType: resolveMediaType(raw, date),
            explanation: truncate('explanation', raw.explanation ?? '', EXPLANATION_MAX_LENGTH, date),
            attribution: truncate('attribution', raw.copyright || DEFAULT_ATTRIBUTION, ATTRIBUTION_MAX_LENGTH, date),
            retrievedAt: raw.retrieved_at || now.toISOString(),
            provenance: persistedProvenance(raw, provenance),
        };
    },
};
