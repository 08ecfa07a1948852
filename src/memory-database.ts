/**
 * In-process backend for the paper store, used by dry runs and tests.
 *
 * A transaction works on a copy of the rows and swaps it in on success,
 * so a failed transaction leaves nothing behind.
 */

import { EvictionCandidate, PaperRow, StorageSummary } from './types';
import {
    compareEvictionPriority,
    PaperRepository,
    PaperTransaction,
    PaperUpdate,
    RecentQuery,
    TransactionMode
} from './store/paper-repository';

function copyRow(row: PaperRow): PaperRow {
    return { ...row, authors: [...row.authors], categories: [...row.categories] };
}

export class MemoryPaperTransaction implements PaperTransaction {
    constructor(private rows: Map<string, PaperRow>) {}

    async exists(id: string): Promise<boolean> {
        return this.rows.has(id);
    }

    async count(): Promise<number> {
        return this.rows.size;
    }

    async touch(ids: string[], at: Date): Promise<void> {
        for (const id of ids) {
            const row = this.rows.get(id);
            if (!row) continue;
            if (row.last_accessed === null || row.last_accessed.getTime() < at.getTime()) {
                row.last_accessed = at;
            }
        }
    }

    async selectEvictionCandidates(limit: number): Promise<EvictionCandidate[]> {
        return [...this.rows.values()]
            .map(row => ({
                id: row.id,
                title: row.title,
                last_accessed: row.last_accessed,
                created_at: row.created_at
            }))
            .sort(compareEvictionPriority)
            .slice(0, limit);
    }

    async deleteByIds(ids: string[]): Promise<number> {
        let deleted = 0;
        for (const id of ids) {
            if (this.rows.delete(id)) deleted++;
        }
        return deleted;
    }

    async insert(row: PaperRow): Promise<void> {
        if (this.rows.has(row.id)) {
            throw new Error(`duplicate key value violates unique constraint: id=${row.id}`);
        }
        this.rows.set(row.id, copyRow(row));
    }

    async update(id: string, changes: PaperUpdate, at: Date): Promise<void> {
        const row = this.rows.get(id);
        if (!row) return;

        row.sent = changes.sent;
        if (changes.relevance_score !== null) row.relevance_score = changes.relevance_score;
        if (changes.relevance_reason !== null) row.relevance_reason = changes.relevance_reason;
        await this.touch([id], at);
    }

    async listRecent(query: RecentQuery): Promise<PaperRow[]> {
        const since = query.since;
        const matching = [...this.rows.values()]
            .filter(row => since === null || row.published.getTime() >= since.getTime())
            .sort((a, b) => {
                const published = b.published.getTime() - a.published.getTime();
                if (published !== 0) return published;
                return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
            });

        const limited = query.limit === null ? matching : matching.slice(0, query.limit);
        return limited.map(copyRow);
    }

    async summarize(): Promise<StorageSummary> {
        const rows = [...this.rows.values()];
        return {
            total: rows.length,
            sent: rows.filter(row => row.sent).length,
            never_accessed: rows.filter(row => row.last_accessed === null).length
        };
    }
}

export class MemoryPaperRepository implements PaperRepository {
    private rows = new Map<string, PaperRow>();

    async transaction<T>(mode: TransactionMode, work: (tx: PaperTransaction) => Promise<T>): Promise<T> {
        const draft = new Map<string, PaperRow>();
        for (const [id, row] of this.rows) {
            draft.set(id, copyRow(row));
        }

        const result = await work(new MemoryPaperTransaction(draft));
        if (mode === 'write') {
            this.rows = draft;
        }
        return result;
    }

    async close(): Promise<void> {
        this.rows.clear();
    }
}
