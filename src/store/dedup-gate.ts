/**
 * Dedup Gate
 *
 * Splits a candidate batch into papers the store has never seen and papers
 * it already holds. Checking a seen paper refreshes its last_accessed
 * through PaperStore.exists.
 */

import { CandidatePaper } from '../types';
import { PaperStore } from './paper-store';

export interface DedupResult {
    fresh: CandidatePaper[];
    seen: CandidatePaper[];
}

export class DedupGate {
    constructor(private store: PaperStore) {}

    async partition(batch: CandidatePaper[]): Promise<DedupResult> {
        const fresh: CandidatePaper[] = [];
        const seen: CandidatePaper[] = [];
        const batchIds = new Set<string>();

        for (const paper of batch) {
            // A repeated id inside the batch counts as seen without another lookup
            if (batchIds.has(paper.id)) {
                seen.push(paper);
                continue;
            }
            batchIds.add(paper.id);

            if (await this.store.exists(paper.id)) {
                seen.push(paper);
            } else {
                fresh.push(paper);
            }
        }

        console.log(`🔁 Dedup: ${fresh.length}/${batch.length} new papers (${seen.length} already seen)`);
        return { fresh, seen };
    }

    /**
     * Only the papers that should go on to the filter pipeline
     */
    async filterNew(batch: CandidatePaper[]): Promise<CandidatePaper[]> {
        const { fresh } = await this.partition(batch);
        return fresh;
    }
}
