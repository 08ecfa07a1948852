/**
 * Fine Filter
 *
 * Asks the classifier provider for a verdict and applies the threshold policy:
 * a paper passes only when the provider says it is relevant AND its score
 * reaches the threshold. A provider failure (including a timeout) degrades to
 * the coarse score instead of failing the run.
 */

import { ProviderError } from '../errors';
import { ClassifierProvider } from '../providers/classifier-provider';
import { CandidatePaper, ClassifierVerdict, FilterDecision } from '../types';

export interface FineFilterOptions {
    relevanceThreshold: number;
    timeoutMs: number;
}

export class FineFilter {
    constructor(private provider: ClassifierProvider, private options: FineFilterOptions) {}

    get providerName(): string {
        return this.provider.name;
    }

    async evaluate(paper: CandidatePaper, coarseScore: number): Promise<FilterDecision> {
        const threshold = this.options.relevanceThreshold;

        try {
            const verdict = await this.classifyWithTimeout(paper);
            return {
                passed: verdict.is_relevant && verdict.score >= threshold,
                score: verdict.score,
                reason: verdict.reason,
                degraded: false
            };

        } catch (error) {
            if (!(error instanceof ProviderError)) throw error;

            const reason =
                `Degraded: ${this.provider.name} unavailable (${error.kind}: ${error.message}); ` +
                `used keyword score ${coarseScore.toFixed(2)} against threshold ${threshold.toFixed(2)}`;

            console.warn(`   ⚠️  "${paper.title}": ${reason}`);

            return {
                passed: coarseScore >= threshold,
                score: coarseScore,
                reason,
                degraded: true
            };
        }
    }

    private async classifyWithTimeout(paper: CandidatePaper): Promise<ClassifierVerdict> {
        const controller = new AbortController();
        const timeoutMs = this.options.timeoutMs;
        let timer: NodeJS.Timeout | undefined;

        const deadline = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                controller.abort();
                reject(new ProviderError('timeout', `no response within ${timeoutMs}ms`));
            }, timeoutMs);
        });

        try {
            return await Promise.race([
                this.provider.classify(paper, { signal: controller.signal }),
                deadline
            ]);
        } finally {
            clearTimeout(timer);
        }
    }
}
