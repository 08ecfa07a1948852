/**
 * Filter Pipeline
 *
 * Stage 1: keyword coarse filter. A paper that fails it is irrelevant and
 * never reaches the provider, which is where the token savings come from.
 * Stage 2: fine filter, with provider calls fanned out up to `concurrency`.
 */

import { mapWithConcurrency } from '../utils/worker-pool';
import { CandidatePaper, ClassifiedPaper, CoarseFilterResult, FilterMetrics } from '../types';
import { coarseFilter } from './coarse-filter';
import { FineFilter } from './fine-filter';

export interface FilterPipelineOptions {
    keywords: string[];
    coarseFilterThreshold: number;
    enableCoarseFilter: boolean;
    concurrency: number;
}

export interface FilterRunResult {
    classified: ClassifiedPaper[];
    relevant: ClassifiedPaper[];
    irrelevant: ClassifiedPaper[];
    metrics: FilterMetrics;
}

export interface FilterRunOptions {
    signal?: AbortSignal;
}

/**
 * 1 - fine_filter_calls / total_candidates; 0 for an empty batch
 */
export function tokenSavingsRatio(totalCandidates: number, fineFilterCalls: number): number {
    if (totalCandidates === 0) return 0;
    return 1 - fineFilterCalls / totalCandidates;
}

function classify(
    paper: CandidatePaper,
    isRelevant: boolean,
    score: number,
    reason: string,
    decidedBy: ClassifiedPaper['decided_by']
): ClassifiedPaper {
    return {
        ...paper,
        is_relevant: isRelevant,
        relevance_score: score,
        relevance_reason: reason,
        decided_by: decidedBy
    };
}

export class FilterPipeline {
    constructor(private fineFilter: FineFilter, private options: FilterPipelineOptions) {}

    async run(candidates: CandidatePaper[], runOptions: FilterRunOptions = {}): Promise<FilterRunResult> {
        const { keywords, coarseFilterThreshold, enableCoarseFilter } = this.options;
        const classified = new Array<ClassifiedPaper>(candidates.length);
        const fineQueue: Array<{ index: number; paper: CandidatePaper; coarse: CoarseFilterResult }> = [];

        // Stage 1: coarse filter. The score is computed even when gating is off,
        // because the fine filter falls back to it.
        if (enableCoarseFilter) {
            console.log(`\n🔎 Stage 1: keyword coarse filter (threshold: ${coarseFilterThreshold.toFixed(2)})`);
        } else {
            console.log('\n🔎 Stage 1: coarse filter disabled, every paper goes to the fine filter');
        }

        candidates.forEach((paper, index) => {
            const coarse = coarseFilter(paper, keywords, coarseFilterThreshold);

            if (enableCoarseFilter && !coarse.passed) {
                classified[index] = classify(paper, false, coarse.score, coarse.reason, 'coarse');
                console.log(`   ⏭️  Rejected "${paper.title}": ${coarse.reason}`);
                return;
            }
            fineQueue.push({ index, paper, coarse });
        });

        const coarseRejected = candidates.length - fineQueue.length;
        if (enableCoarseFilter) {
            console.log(`   ${fineQueue.length}/${candidates.length} papers passed the coarse filter`);
        }

        // Stage 2: fine filter
        console.log(`\n🤖 Stage 2: ${this.fineFilter.providerName} fine filter on ${fineQueue.length} papers`);

        let degraded = 0;
        await mapWithConcurrency(
            fineQueue,
            this.options.concurrency,
            async ({ index, paper, coarse }) => {
                const decision = await this.fineFilter.evaluate(paper, coarse.score);
                if (decision.degraded) degraded++;

                classified[index] = classify(
                    paper,
                    decision.passed,
                    decision.score,
                    decision.reason,
                    decision.degraded ? 'degraded' : 'fine'
                );

                if (decision.passed) {
                    console.log(`   ✅ Relevant "${paper.title}" (score: ${decision.score.toFixed(2)})`);
                } else if (!decision.degraded) {
                    console.log(`   ⏭️  Rejected "${paper.title}" (score: ${decision.score.toFixed(2)}): ${decision.reason}`);
                }
            },
            runOptions.signal
        );

        const relevant = classified.filter(paper => paper.is_relevant);
        const irrelevant = classified.filter(paper => !paper.is_relevant);

        const metrics: FilterMetrics = {
            total_candidates: candidates.length,
            coarse_rejected: coarseRejected,
            fine_filter_calls: fineQueue.length,
            degraded_decisions: degraded,
            relevant: relevant.length,
            token_savings_ratio: tokenSavingsRatio(candidates.length, fineQueue.length)
        };

        this.logSummary(metrics);
        return { classified, relevant, irrelevant, metrics };
    }

    private logSummary(metrics: FilterMetrics): void {
        console.log('\n' + '='.repeat(80));
        console.log('📊 FILTER SUMMARY');
        console.log('='.repeat(80));
        console.log(`Candidates: ${metrics.total_candidates}`);
        console.log(`Rejected by keyword filter (no LLM call): ${metrics.coarse_rejected}`);
        console.log(`Fine filter calls: ${metrics.fine_filter_calls}`);
        console.log(`Degraded decisions: ${metrics.degraded_decisions}`);
        console.log(`Relevant: ${metrics.relevant}`);
        console.log(`Estimated token savings: ${(metrics.token_savings_ratio * 100).toFixed(1)}%`);
        console.log('='.repeat(80));
    }
}
