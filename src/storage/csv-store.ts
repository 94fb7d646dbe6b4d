/**
 * CSV Record Store
 * Append-only flat file sink: one row per date, newest first, last write wins
 */
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { logger } from '../observability/logger.js';
import { parseCsv, stringifyCsv } from './csv.js';
import type { RawApodRecord } from '../fetchers/types.js';
import type { ApodRecord } from '../normalizers/types.js';

export const CSV_COLUMNS = [
    'date',
    'title',
    'url',
    'hdurl',
    'media_type',
    'explanation',
    'copyright',
    'retrieved_at',
    'provenance',
] as const;

export type CsvColumn = typeof CSV_COLUMNS[number];
export type CsvRow = Record<CsvColumn, string>;

export interface CsvStats {
    exists: boolean;
    rowCount: number;
}

export interface CsvWriteResult {
    path: string;
    rowCount: number;
    replaced: boolean;
}

/**
 * Anything that can hand back previously written records
 */
export interface HistoricalRecordSource {
    readAll(): Promise<RawApodRecord[]>;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function toRow(record: ApodRecord): CsvRow {
    return {
        date: record.date,
        title: record.title,
        url: record.mediaUrl,
        hdurl: record.highDefUrl ?? '',
        media_type: record.mediaType,
        explanation: record.explanation,
        copyright: record.attribution,
        retrieved_at: record.retrievedAt,
        provenance: record.provenance,
    };
}

function toRawRecord(row: CsvRow): RawApodRecord {
    return {
        date: row.date,
        title: row.title,
        url: row.url,
        hdurl: row.hdurl || undefined,
        media_type: row.media_type || undefined,
        explanation: row.explanation,
        copyright: row.copyright || undefined,
        retrieved_at: row.retrieved_at || undefined,
        provenance: row.provenance || undefined,
    };
}

export class CsvRecordStore implements HistoricalRecordSource {
    constructor(readonly filePath: string) {}

    /**
     * Read every row; a missing file is an empty store
     */
    async readRows(): Promise<CsvRow[] | null> {
        let text: string;
        try {
            text = await readFile(this.filePath, 'utf8');
        } catch (error) {
            if (isMissingFile(error)) {
                return null;
            }
            throw error;
        }

        const [header, ...lines] = parseCsv(text);
        if (!header) {
            return [];
        }

        if (!header.includes('date')) {
            throw new Error(`CSV file ${this.filePath} has no date column`);
        }

        const indexes = CSV_COLUMNS.map(column => header.indexOf(column));

        return lines
            .filter(line => !(line.length === 1 && line[0] === ''))
            .map(line => {
                const row: CsvRow = {
                    date: '',
                    title: '',
                    url: '',
                    hdurl: '',
                    media_type: '',
                    explanation: '',
                    copyright: '',
                    retrieved_at: '',
                    provenance: '',
                };
                CSV_COLUMNS.forEach((column, i) => {
                    const index = indexes[i];
                    row[column] = index >= 0 ? line[index] ?? '' : '';
                });
                return row;
            });
    }

    async readAll(): Promise<RawApodRecord[]> {
        const rows = await this.readRows();
        return (rows ?? []).map(toRawRecord);
    }

    /**
     * Merge one record: drop the row with the same date, add the new one, sort newest first
     */
    async appendAndDedupe(record: ApodRecord): Promise<CsvWriteResult> {
        const existing = (await this.readRows()) ?? [];
        const kept = existing.filter(row => row.date !== record.date);
        const replaced = kept.length !== existing.length;

        const rows = [...kept, toRow(record)].sort((a, b) => b.date.localeCompare(a.date));

        const text = stringifyCsv([
            [...CSV_COLUMNS],
            ...rows.map(row => CSV_COLUMNS.map(column => row[column])),
        ]);

        await mkdir(dirname(this.filePath), { recursive: true });
        const tempPath = `${this.filePath}.tmp-${process.pid}`;
        await writeFile(tempPath, text, 'utf8');
        await rename(tempPath, this.filePath);

        logger.info('CSV saved', {
            path: this.filePath,
            date: record.date,
            totalRows: rows.length,
            replaced,
        });

        return { path: this.filePath, rowCount: rows.length, replaced };
    }

    async stat(): Promise<CsvStats> {
        const rows = await this.readRows();
        if (rows === null) {
            return { exists: false, rowCount: 0 };
        }
        return { exists: true, rowCount: rows.length };
    }
}
