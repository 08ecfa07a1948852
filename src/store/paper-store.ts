/**
 * Paper Store
 *
 * Capacity-bounded, keyed persistence of papers with last-access tracking
 * and LRU eviction. Every public operation is one repository transaction,
 * serialized against the store's other operations.
 */

import { errorMessage, StorageError } from '../errors';
import { Mutex } from '../utils/mutex';
import { EvictionCandidate, PaperInput, PaperRow, StorageStats } from '../types';
import { PaperRepository, PaperTransaction, TransactionMode } from './paper-repository';

export interface PaperStoreOptions {
    /** 0 or less disables eviction */
    maxStorageSize: number;
    clock?: () => Date;
}

export interface ListRecentOptions {
    since?: Date;
    limit?: number;
}

const OLDEST_PAPERS_SHOWN = 5;

export class PaperStore {
    private readonly maxStorageSize: number;
    private readonly clock: () => Date;
    private readonly lock = new Mutex();

    constructor(private repository: PaperRepository, options: PaperStoreOptions) {
        this.maxStorageSize = options.maxStorageSize;
        this.clock = options.clock ?? (() => new Date());
    }

    get capacity(): number {
        return this.maxStorageSize;
    }

    /**
     * Whether a record with `id` is stored. A hit refreshes its last_accessed.
     */
    async exists(id: string): Promise<boolean> {
        return this.run('exists', 'write', async (tx) => {
            const found = await tx.exists(id);
            if (found) {
                await tx.touch([id], this.clock());
            }
            return found;
        });
    }

    /**
     * Upsert one paper. Inserting into a full store first evicts enough
     * records to make room; eviction and insert commit together.
     */
    async addOrUpdate(paper: PaperInput, sent: boolean): Promise<void> {
        const evicted = await this.run('addOrUpdate', 'write', async (tx) => {
            const now = this.clock();

            if (await tx.exists(paper.id)) {
                await tx.update(paper.id, {
                    sent,
                    relevance_score: paper.relevance_score ?? null,
                    relevance_reason: paper.relevance_reason ?? null
                }, now);
                return [];
            }

            const victims = await this.evictForInsert(tx);
            await tx.insert(this.toRow(paper, sent, now));
            return victims;
        });

        if (evicted.length > 0) {
            this.logEviction(evicted);
        }
    }

    /**
     * Upsert each paper in its own transaction
     */
    async addPapers(papers: PaperInput[], sent: boolean): Promise<void> {
        for (const paper of papers) {
            await this.addOrUpdate(paper, sent);
        }
    }

    /**
     * Stored papers, most recently published first. Every returned record is touched.
     */
    async listRecent(options: ListRecentOptions = {}): Promise<PaperRow[]> {
        return this.run('listRecent', 'write', async (tx) => {
            const rows = await tx.listRecent({
                since: options.since ?? null,
                limit: options.limit ?? null
            });

            if (rows.length > 0) {
                const now = this.clock();
                await tx.touch(rows.map(row => row.id), now);
                for (const row of rows) {
                    if (row.last_accessed === null || row.last_accessed.getTime() < now.getTime()) {
                        row.last_accessed = now;
                    }
                }
            }
            return rows;
        });
    }

    async getStorageStats(): Promise<StorageStats> {
        return this.run('getStorageStats', 'read', async (tx) => {
            const summary = await tx.summarize();
            const oldest = await tx.selectEvictionCandidates(OLDEST_PAPERS_SHOWN);

            return {
                total: summary.total,
                sent: summary.sent,
                unsent: summary.total - summary.sent,
                never_accessed: summary.never_accessed,
                max_storage_size: this.maxStorageSize,
                oldest_papers: oldest
            };
        });
    }

    /**
     * Administrative removal of one record
     */
    async delete(id: string): Promise<boolean> {
        const deleted = await this.run('delete', 'write', tx => tx.deleteByIds([id]));
        return deleted > 0;
    }

    async close(): Promise<void> {
        await this.lock.runExclusive(() => this.repository.close());
    }

    private async evictForInsert(tx: PaperTransaction): Promise<EvictionCandidate[]> {
        if (this.maxStorageSize <= 0) return [];

        const count = await tx.count();
        const deficit = Math.max(0, count + 1 - this.maxStorageSize);
        if (deficit === 0) return [];

        const victims = await tx.selectEvictionCandidates(deficit);
        await tx.deleteByIds(victims.map(victim => victim.id));
        return victims;
    }

    private toRow(paper: PaperInput, sent: boolean, now: Date): PaperRow {
        return {
            id: paper.id,
            title: paper.title,
            summary: paper.summary,
            authors: [...paper.authors],
            categories: [...paper.categories],
            published: paper.published,
            link: paper.link,
            pdf_link: paper.pdf_link,
            relevance_score: paper.relevance_score ?? null,
            relevance_reason: paper.relevance_reason ?? null,
            sent,
            created_at: now,
            last_accessed: null
        };
    }

    private logEviction(evicted: EvictionCandidate[]): void {
        const titles = evicted.slice(0, OLDEST_PAPERS_SHOWN).map(paper => paper.title);
        const more = evicted.length > OLDEST_PAPERS_SHOWN ? ', ...' : '';

        console.log(`🧹 LRU eviction: removed ${evicted.length} least recently accessed paper(s)`);
        console.log(`   Removed: ${titles.join(', ')}${more}`);
    }

    private async run<T>(
        operation: string,
        mode: TransactionMode,
        work: (tx: PaperTransaction) => Promise<T>
    ): Promise<T> {
        return this.lock.runExclusive(async () => {
            try {
                return await this.repository.transaction(mode, work);
            } catch (error) {
                if (error instanceof StorageError) throw error;
                throw new StorageError(`${operation} failed: ${errorMessage(error)}`, { cause: error });
            }
        });
    }
}
