import { ClassifyOptions, ClassifierProvider } from '../providers/classifier-provider';
import { CandidatePaper, ClassifierVerdict, ProviderName } from '../types';

export function makePaper(id: string, overrides: Partial<CandidatePaper> = {}): CandidatePaper {
    return {
        id,
        title: `Paper ${id}`,
        summary: `Summary of paper ${id}.`,
        authors: ['A. Author'],
        categories: ['cs.DC'],
        published: new Date('2026-03-01T00:00:00Z'),
        link: `https://example.org/abs/${id}`,
        pdf_link: null,
        ...overrides
    };
}

/**
 * Clock that advances one second on every call, starting at `start`
 */
export function steppingClock(start = '2026-01-01T00:00:00Z'): () => Date {
    let tick = 0;
    const base = new Date(start).getTime();
    return () => new Date(base + 1000 * tick++);
}

type Answer = ClassifierVerdict | Error | ((paper: CandidatePaper, options: ClassifyOptions) => Promise<ClassifierVerdict>);

/**
 * Provider double: answers from a per-id table, falling back to `fallback`
 */
export class FakeProvider implements ClassifierProvider {
    readonly name: ProviderName = 'deepseek';
    readonly model = 'fake-model';
    readonly calls: string[] = [];
    inFlight = 0;
    maxInFlight = 0;

    constructor(
        private fallback: Answer = { is_relevant: true, score: 0.9, reason: 'fake verdict' },
        private answers: Record<string, Answer> = {}
    ) {}

    async classify(paper: CandidatePaper, options: ClassifyOptions = {}): Promise<ClassifierVerdict> {
        this.calls.push(paper.id);
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

        try {
            // Let other workers start before answering
            await new Promise(resolve => setTimeout(resolve, 1));
            const answer = this.answers[paper.id] ?? this.fallback;
            if (answer instanceof Error) throw answer;
            if (typeof answer === 'function') return await answer(paper, options);
            return answer;
        } finally {
            this.inFlight--;
        }
    }
}
