/**
 * PostgreSQL record sink
 * Idempotent upsert keyed on date
 */
import pg from 'pg';
import { logger } from '../observability/logger.js';
import type { ApodRecord } from '../normalizers/types.js';

const { Pool } = pg;

const CREATE_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS apod_data (
    id SERIAL PRIMARY KEY,
    date DATE UNIQUE NOT NULL,
    title TEXT NOT NULL,
    url TEXT,
    hdurl TEXT,
    media_type VARCHAR(50),
    explanation TEXT,
    copyright VARCHAR(255),
    retrieved_at TIMESTAMP,
    provenance VARCHAR(20),
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
)`;

const UPSERT_SQL = `
INSERT INTO apod_data
    (date, title, url, hdurl, media_type, explanation, copyright, retrieved_at, provenance)
VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
ON CONFLICT (date) DO UPDATE SET
    title = EXCLUDED.title,
    url = EXCLUDED.url,
    hdurl = EXCLUDED.hdurl,
    media_type = EXCLUDED.media_type,
    explanation = EXCLUDED.explanation,
    copyright = EXCLUDED.copyright,
    retrieved_at = EXCLUDED.retrieved_at,
    provenance = EXCLUDED.provenance`;

const COUNT_SQL = 'SELECT COUNT(*)::int AS count FROM apod_data WHERE date = $1';

/**
 * Relational sink interface
 */
export interface RelationalSink {
    upsert(record: ApodRecord): Promise<void>;
    countByDate(date: string): Promise<number>;
    ping(): Promise<boolean>;
}

export class PostgresRecordSink implements RelationalSink {
    private schemaReady = false;

    constructor(private readonly pool: pg.Pool) {}

    async ensureSchema(): Promise<void> {
        if (this.schemaReady) {
            return;
        }
        await this.pool.query(CREATE_TABLE_SQL);
        this.schemaReady = true;
        logger.info('Table apod_data created/verified');
    }

    async upsert(record: ApodRecord): Promise<void> {
        await this.ensureSchema();
        await this.pool.query(UPSERT_SQL, [
            record.date,
            record.title,
            record.mediaUrl,
            record.highDefUrl,
            record.mediaType,
            record.explanation,
            record.attribution,
            record.retrievedAt,
            record.provenance,
        ]);

        const count = await this.countByDate(record.date);
        logger.info('Record upserted to PostgreSQL', { date: record.date, recordsForDate: count });
    }

    async countByDate(date: string): Promise<number> {
        const result = await this.pool.query<{ count: number }>(COUNT_SQL, [date]);
        return result.rows[0]?.count ?? 0;
    }

    async ping(): Promise<boolean> {
        try {
            await this.pool.query('SELECT 1');
            return true;
        } catch (error) {
            logger.debug('PostgreSQL ping failed', { error });
            return false;
        }
    }
}

let pool: pg.Pool | null = null;

export function getPool(databaseUrl: string): pg.Pool {
    if (!pool) {
        const created = new Pool({
            connectionString: databaseUrl,
            max: 4,
            idleTimeoutMillis: 30000,
            connectionTimeoutMillis: 5000,
        });

        created.on('error', (error: Error) => {
            logger.error('Unexpected PostgreSQL pool error', error);
        });

        pool = created;
    }
    return pool;
}

export async function closePool(): Promise<void> {
    if (pool) {
        await pool.end();
        pool = null;
        logger.info('PostgreSQL pool closed');
    }
}
