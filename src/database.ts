/**
 * PostgreSQL backend for the paper store
 * Handles all database interactions for stored papers
 */

import { Pool, PoolClient } from 'pg';
import { EvictionCandidate, PaperRow, StorageSummary } from './types';
import {
    PaperRepository,
    PaperTransaction,
    PaperUpdate,
    RecentQuery,
    TransactionMode
} from './store/paper-repository';

// Key for pg_advisory_xact_lock; every writer in every process takes the same one
const WRITER_LOCK_KEY = 7_314_002;

const SCHEMA_STATEMENTS = [
    `CREATE TABLE IF NOT EXISTS papers (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        summary TEXT NOT NULL,
        authors TEXT[] NOT NULL,
        categories TEXT[] NOT NULL,
        published TIMESTAMPTZ NOT NULL,
        link TEXT NOT NULL,
        pdf_link TEXT,
        relevance_score DOUBLE PRECISION,
        relevance_reason TEXT,
        sent BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMPTZ NOT NULL,
        last_accessed TIMESTAMPTZ
    )`,
    'CREATE INDEX IF NOT EXISTS idx_papers_published ON papers (published)',
    'CREATE INDEX IF NOT EXISTS idx_papers_last_accessed ON papers (last_accessed)'
];

interface CountRow {
    count: string;
}

interface SummaryRow {
    total: string;
    sent: string;
    never_accessed: string;
}

/**
 * Queries for one transaction, bound to a checked-out client
 */
class PgPaperTransaction implements PaperTransaction {
    constructor(private client: PoolClient) {}

    async exists(id: string): Promise<boolean> {
        const result = await this.client.query('SELECT 1 FROM papers WHERE id = $1', [id]);
        return (result.rowCount ?? 0) > 0;
    }

    async count(): Promise<number> {
        const result = await this.client.query<CountRow>('SELECT COUNT(*) AS count FROM papers');
        return parseInt(result.rows[0].count);
    }

    async touch(ids: string[], at: Date): Promise<void> {
        if (ids.length === 0) return;

        // GREATEST ignores NULL, so a never-accessed row takes `at`
        await this.client.query(
            'UPDATE papers SET last_accessed = GREATEST(last_accessed, $2) WHERE id = ANY($1::text[])',
            [ids, at]
        );
    }

    async selectEvictionCandidates(limit: number): Promise<EvictionCandidate[]> {
        const query = `
      SELECT id, title, last_accessed, created_at
      FROM papers
      ORDER BY last_accessed ASC NULLS FIRST, created_at ASC, id ASC
      LIMIT $1
    `;

        const result = await this.client.query<EvictionCandidate>(query, [limit]);
        return result.rows;
    }

    async deleteByIds(ids: string[]): Promise<number> {
        if (ids.length === 0) return 0;

        const result = await this.client.query('DELETE FROM papers WHERE id = ANY($1::text[])', [ids]);
        return result.rowCount ?? 0;
    }

    async insert(row: PaperRow): Promise<void> {
        const query = `
      INSERT INTO papers
        (id, title, summary, authors, categories, published, link, pdf_link,
         relevance_score, relevance_reason, sent, created_at, last_accessed)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
    `;

        await this.client.query(query, [
            row.id,
            row.title,
            row.summary,
            row.authors,
            row.categories,
            row.published,
            row.link,
            row.pdf_link,
            row.relevance_score,
            row.relevance_reason,
            row.sent,
            row.created_at,
            row.last_accessed
        ]);
    }

    async update(id: string, changes: PaperUpdate, at: Date): Promise<void> {
        const query = `
      UPDATE papers SET
        sent = $2,
        relevance_score = COALESCE($3, relevance_score),
        relevance_reason = COALESCE($4, relevance_reason),
        last_accessed = GREATEST(last_accessed, $5)
      WHERE id = $1
    `;

        await this.client.query(query, [
            id,
            changes.sent,
            changes.relevance_score,
            changes.relevance_reason,
            at
        ]);
    }

    async listRecent(recent: RecentQuery): Promise<PaperRow[]> {
        // LIMIT NULL means no limit in PostgreSQL
        const query = `
      SELECT * FROM papers
      WHERE $1::timestamptz IS NULL OR published >= $1::timestamptz
      ORDER BY published DESC, id ASC
      LIMIT $2
    `;

        const result = await this.client.query<PaperRow>(query, [recent.since, recent.limit]);
        return result.rows;
    }

    async summarize(): Promise<StorageSummary> {
        const query = `
      SELECT
        COUNT(*) AS total,
        COUNT(*) FILTER (WHERE sent) AS sent,
        COUNT(*) FILTER (WHERE last_accessed IS NULL) AS never_accessed
      FROM papers
    `;

        const result = await this.client.query<SummaryRow>(query);
        const row = result.rows[0];

        return {
            total: parseInt(row.total),
            sent: parseInt(row.sent),
            never_accessed: parseInt(row.never_accessed)
        };
    }
}

export class PaperDatabase implements PaperRepository {
    private pool: Pool;

    constructor(connectionString: string) {
        this.pool = new Pool({
            connectionString,
            max: 10,
            idleTimeoutMillis: 60000,
            connectionTimeoutMillis: 10000,
            query_timeout: 30000,
            statement_timeout: 30000
        });

        // Handle connection errors
        this.pool.on('error', (err) => {
            console.error('Unexpected database error:', err);
        });
    }

    /**
     * Test database connection
     */
    async testConnection(): Promise<boolean> {
        try {
            const result = await this.pool.query<{ now: Date }>('SELECT NOW() AS now');
            console.log('✅ Database connected successfully at:', result.rows[0].now);
            return true;
        } catch (error) {
            console.error('❌ Database connection failed:', error);
            return false;
        }
    }

    /**
     * Create the papers table and its indexes if missing
     */
    async ensureSchema(): Promise<void> {
        for (const statement of SCHEMA_STATEMENTS) {
            await this.pool.query(statement);
        }
    }

    /**
     * Run `work` inside BEGIN/COMMIT on one client, rolling back on any error.
     * Write transactions first take the shared advisory lock.
     */
    async transaction<T>(mode: TransactionMode, work: (tx: PaperTransaction) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');
            if (mode === 'write') {
                await client.query('SELECT pg_advisory_xact_lock($1)', [WRITER_LOCK_KEY]);
            }

            const result = await work(new PgPaperTransaction(client));
            await client.query('COMMIT');
            return result;

        } catch (error) {
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                console.error('❌ Rollback failed:', rollbackError);
            }
            throw error;

        } finally {
            client.release();
        }
    }

    /**
     * Close database connection pool
     */
    async close(): Promise<void> {
        await this.pool.end();
        console.log('🔌 Database connection closed');
    }
}
