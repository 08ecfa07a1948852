/**
 * Persistence contract behind the PaperStore.
 *
 * Every call on a PaperTransaction runs inside the unit of work opened by
 * PaperRepository.transaction: either all of its writes become visible or none do.
 */

import { EvictionCandidate, PaperRow, StorageSummary } from '../types';

/**
 * `write` transactions may mutate rows and are serialized against each other
 */
export type TransactionMode = 'read' | 'write';

export interface RecentQuery {
    since: Date | null;
    limit: number | null;
}

export interface PaperUpdate {
    sent: boolean;
    relevance_score: number | null;
    relevance_reason: string | null;
}

export interface PaperTransaction {
    exists(id: string): Promise<boolean>;
    count(): Promise<number>;

    /**
     * Moves last_accessed forward to `at`. A later value already stored is kept.
     */
    touch(ids: string[], at: Date): Promise<void>;

    /**
     * Returns up to `limit` records in eviction order (see compareEvictionPriority)
     */
    selectEvictionCandidates(limit: number): Promise<EvictionCandidate[]>;

    deleteByIds(ids: string[]): Promise<number>;
    insert(row: PaperRow): Promise<void>;

    /**
     * Overwrites `sent`, overwrites score and reason when non-null, and touches the record
     */
    update(id: string, changes: PaperUpdate, at: Date): Promise<void>;

    /**
     * Most recently published first
     */
    listRecent(query: RecentQuery): Promise<PaperRow[]>;

    summarize(): Promise<StorageSummary>;
}

export interface PaperRepository {
    transaction<T>(mode: TransactionMode, work: (tx: PaperTransaction) => Promise<T>): Promise<T>;
    close(): Promise<void>;
}

/**
 * Eviction order: never-accessed records first, then oldest last_accessed,
 * then oldest created_at, then id.
 */
export function compareEvictionPriority(a: EvictionCandidate, b: EvictionCandidate): number {
    if (a.last_accessed === null || b.last_accessed === null) {
        if (a.last_accessed !== null) return 1;
        if (b.last_accessed !== null) return -1;
    } else {
        const accessed = a.last_accessed.getTime() - b.last_accessed.getTime();
        if (accessed !== 0) return accessed;
    }

    const created = a.created_at.getTime() - b.created_at.getTime();
    if (created !== 0) return created;

    if (a.id === b.id) return 0;
    return a.id < b.id ? -1 : 1;
}
