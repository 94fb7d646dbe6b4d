/**
 * Fallback Resolver
 * Ordered strategies tried once retries are exhausted: cached record, then placeholder
 */
import { logger } from '../observability/logger.js';
import { toIsoDate } from '../utils/date.js';
import type { RawApodRecord } from '../fetchers/types.js';
import type { HistoricalRecordSource } from '../storage/csv-store.js';

export type FallbackProvenance = 'cached' | 'placeholder';

export const PLACEHOLDER_TITLE = 'APOD Unavailable';
export const PLACEHOLDER_EXPLANATION =
    'The Astronomy Picture of the Day could not be retrieved from the upstream API. ' +
    'This placeholder was generated so the pipeline run could complete.';

/**
 * A fallback strategy may decline by resolving to null
 */
export interface FallbackStrategy {
    readonly name: string;
    readonly provenance: FallbackProvenance;
    resolve(): Promise<RawApodRecord | null>;
}

export interface FallbackResolution {
    raw: RawApodRecord;
    provenance: FallbackProvenance;
    strategy: string;
}

/**
 * Most recent row of the historical store; placeholder rows are not history
 */
export class CachedRecordStrategy implements FallbackStrategy {
    readonly name = 'cached-record';
    readonly provenance = 'cached' as const;

    constructor(private readonly source: HistoricalRecordSource) {}

    async resolve(): Promise<RawApodRecord | null> {
        let records: RawApodRecord[];
        try {
            records = await this.source.readAll();
        } catch (error) {
            logger.warn('Historical store unreadable, skipping cached fallback', {
                error: error instanceof Error ? error.message : String(error),
            });
            return null;
        }

        let latest: RawApodRecord | null = null;
        for (const record of records) {
            if (!record.date || record.provenance === 'placeholder') continue;
            if (!latest?.date || record.date > latest.date) {
                latest = record;
            }
        }
        return latest;
    }
}

/**
 * Synthetic record for today; never declines
 */
export class PlaceholderStrategy {
    readonly name = 'placeholder';
    readonly provenance = 'placeholder' as const;

    constructor(private readonly now: () => Date = () => new Date()) {}

    async resolve(): Promise<RawApodRecord> {
        return {
            date: toIsoDate(this.now()),
            title: PLACEHOLDER_TITLE,
            url: '',
            media_type: 'image',
            explanation: PLACEHOLDER_EXPLANATION,
            copyright: 'NASA',
        };
    }
}

export class FallbackResolver {
    constructor(
        private readonly strategies: readonly FallbackStrategy[],
        private readonly lastResort: PlaceholderStrategy
    ) {}

    async resolve(): Promise<FallbackResolution> {
        for (const strategy of this.strategies) {
            const raw = await strategy.resolve();
            if (raw) {
                return { raw, provenance: strategy.provenance, strategy: strategy.name };
            }
            logger.debug('Fallback strategy declined', { strategy: strategy.name });
        }

        const raw = await this.lastResort.resolve();
        return { raw, provenance: this.lastResort.provenance, strategy: this.lastResort.name };
    }
}

/**
 * Cached record first, placeholder last
 */
export function createFallbackResolver(
    source: HistoricalRecordSource,
    now: () => Date = () => new Date()
): FallbackResolver {
    return new FallbackResolver([new CachedRecordStrategy(source)], new PlaceholderStrategy(now));
}
