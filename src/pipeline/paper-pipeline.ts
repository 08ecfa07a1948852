/**
 * One pipeline run: dedup → two-stage filter → store → notify.
 *
 * StorageError aborts the run (papers already written stay written).
 * Cancelling through the signal stops the run between papers.
 */

import { errorMessage, RunCancelledError } from '../errors';
import { FilterPipeline } from '../filters/filter-pipeline';
import { DedupGate } from '../store/dedup-gate';
import { PaperStore } from '../store/paper-store';
import { CandidatePaper, ClassifiedPaper, FilterMetrics } from '../types';
import { Notifier } from './collaborators';

export interface PaperPipelineDeps {
    store: PaperStore;
    dedupGate: DedupGate;
    filterPipeline: FilterPipeline;
    notifiers?: Notifier[];
}

export interface RunOptions {
    signal?: AbortSignal;
}

export interface PipelineRunResult {
    fetched: number;
    seen: number;
    stored: number;
    relevant: ClassifiedPaper[];
    metrics: FilterMetrics | null;
    notified: boolean;
    cancelled: boolean;
}

export class PaperPipeline {
    private store: PaperStore;
    private dedupGate: DedupGate;
    private filterPipeline: FilterPipeline;
    private notifiers: Notifier[];

    constructor(deps: PaperPipelineDeps) {
        this.store = deps.store;
        this.dedupGate = deps.dedupGate;
        this.filterPipeline = deps.filterPipeline;
        this.notifiers = deps.notifiers ?? [];
    }

    async run(candidates: CandidatePaper[], options: RunOptions = {}): Promise<PipelineRunResult> {
        const { signal } = options;
        const result: PipelineRunResult = {
            fetched: candidates.length,
            seen: 0,
            stored: 0,
            relevant: [],
            metrics: null,
            notified: false,
            cancelled: false
        };

        console.log('\n' + '='.repeat(80));
        console.log(`🚀 Starting pipeline run for ${candidates.length} candidate papers`);
        console.log('='.repeat(80));

        if (signal?.aborted) {
            return this.cancel(result);
        }

        // Step 1: drop papers the store already holds
        const { fresh, seen } = await this.dedupGate.partition(candidates);
        result.seen = seen.length;

        if (fresh.length === 0) {
            console.log('\n✅ No new papers in this batch');
            return result;
        }

        // Step 2: classify
        let classified: ClassifiedPaper[];
        try {
            const filtered = await this.filterPipeline.run(fresh, { signal });
            classified = filtered.classified;
            result.metrics = filtered.metrics;
        } catch (error) {
            if (error instanceof RunCancelledError) return this.cancel(result);
            throw error;
        }

        // Step 3: store every classified paper, relevant or not, unsent
        for (const paper of classified) {
            if (signal?.aborted) return this.cancel(result);

            await this.store.addOrUpdate(paper, false);
            result.stored++;
            if (paper.is_relevant) {
                result.relevant.push(paper);
            }
        }
        console.log(`\n💾 Stored ${result.stored} papers (${result.relevant.length} relevant)`);

        // Step 4: notify
        if (result.relevant.length > 0) {
            if (signal?.aborted) return this.cancel(result);
            result.notified = await this.notify(result.relevant);
        }

        this.logRunSummary(result);
        return result;
    }

    /**
     * Hand relevant papers to every notifier; mark them sent if any delivery succeeded
     */
    private async notify(relevant: ClassifiedPaper[]): Promise<boolean> {
        if (this.notifiers.length === 0) {
            console.warn('⚠️  No notifier configured: relevant papers were stored but not sent');
            return false;
        }

        let delivered = false;
        for (const notifier of this.notifiers) {
            try {
                const ok = await notifier.send(relevant);
                if (ok) {
                    delivered = true;
                    console.log(`📨 ${notifier.name}: delivered ${relevant.length} papers`);
                } else {
                    console.error(`❌ ${notifier.name}: delivery failed`);
                }
            } catch (error) {
                console.error(`❌ ${notifier.name}: delivery failed:`, errorMessage(error));
            }
        }

        if (delivered) {
            await this.store.addPapers(relevant, true);
        }
        return delivered;
    }

    private cancel(result: PipelineRunResult): PipelineRunResult {
        console.warn(`\n⚠️  Run cancelled after storing ${result.stored} papers`);
        result.cancelled = true;
        return result;
    }

    private logRunSummary(result: PipelineRunResult): void {
        console.log('\n' + '='.repeat(80));
        console.log('📊 RUN SUMMARY');
        console.log('='.repeat(80));
        console.log(`Candidates: ${result.fetched}`);
        console.log(`Already seen: ${result.seen}`);
        console.log(`Stored: ${result.stored}`);
        console.log(`Relevant: ${result.relevant.length}`);
        console.log(`Notified: ${result.notified ? 'yes' : 'no'}`);
        console.log('='.repeat(80));
    }

    /**
     * Show current storage statistics
     */
    async showStats(): Promise<void> {
        const stats = await this.store.getStorageStats();

        console.log('\n' + '='.repeat(80));
        console.log('📊 STORAGE STATISTICS');
        console.log('='.repeat(80));
        console.log(`Total papers: ${stats.total}`);
        console.log(`Sent: ${stats.sent}`);
        console.log(`Unsent: ${stats.unsent}`);
        console.log(`Never accessed: ${stats.never_accessed}`);
        console.log(`Capacity: ${stats.max_storage_size > 0 ? stats.max_storage_size : 'unbounded'}`);

        if (stats.oldest_papers.length > 0) {
            console.log('Next in line for eviction:');
            for (const paper of stats.oldest_papers) {
                const accessed = paper.last_accessed ? paper.last_accessed.toISOString() : 'never';
                console.log(`   - ${paper.title} (last accessed: ${accessed})`);
            }
        }
        console.log('='.repeat(80));
    }
}
