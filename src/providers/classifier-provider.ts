/**
 * Classifier Provider contract, plus the prompt and response format every
 * provider shares. Variants differ only in how they reach the model.
 */

import { ProviderError } from '../errors';
import { CandidatePaper, ClassifierVerdict, ProviderName } from '../types';

export interface ClassifyOptions {
    signal?: AbortSignal;
}

export interface ClassifierProvider {
    readonly name: ProviderName;
    readonly model: string;

    /**
     * Rejects only with ProviderError
     */
    classify(paper: CandidatePaper, options?: ClassifyOptions): Promise<ClassifierVerdict>;
}

export interface ClassifierSettings {
    apiKey: string;
    model: string;
    keywords: string[];
    maxTokens: number;
    temperature: number;
}

const MAX_SUMMARY_CHARS = 2000;

export const RELEVANCE_SYSTEM_PROMPT =
    'You are an expert research analyst who screens new research papers for a reader. ' +
    'You answer with a single JSON object and nothing else.';

/**
 * Build the relevance prompt for one paper
 */
export function buildRelevancePrompt(paper: CandidatePaper, keywords: readonly string[]): string {
    const categories = paper.categories.length > 0 ? paper.categories.join(', ') : 'none';
    const topics = keywords.length > 0 ? keywords.join(', ') : 'none given';

    return `Decide whether the following paper is relevant to the reader's topics of interest.

**Topics of interest:** ${topics}

**Paper Title:** ${paper.title}
**Categories:** ${categories}

**Abstract:**
${paper.summary.slice(0, MAX_SUMMARY_CHARS)}

---

**INSTRUCTIONS:**
- "relevant": true only if the paper's core contribution concerns one of the topics
- "score": 0.0-1.0, how strongly the paper matches the topics
  - 0.8-1.0 = central contribution on a topic
  - 0.5-0.7 = solid but partial overlap
  - 0.0-0.4 = passing mention or unrelated
- "reason": one or two sentences explaining the decision

**OUTPUT FORMAT:**

\`\`\`json
{"relevant": true, "score": 0.85, "reason": "Proposes a communication-avoiding scheme for distributed GPU training."}
\`\`\`

Return ONLY valid JSON, no other text before or after.`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Body of the first ```json (or bare ```) fence; the whole reply when there is none
 */
function extractFencedBody(responseText: string): string {
    for (const marker of ['```json', '```']) {
        const start = responseText.indexOf(marker);
        if (start === -1) continue;

        const bodyStart = start + marker.length;
        const end = responseText.indexOf('```', bodyStart);
        return responseText.slice(bodyStart, end === -1 ? undefined : end).trim();
    }
    return responseText.trim();
}

/**
 * Parse a model reply into a verdict. When the reply has a code fence only its
 * body is parsed. Anything that does not carry a boolean `relevant` and a numeric `score` is malformed.
 */
export function parseClassifierResponse(responseText: string): ClassifierVerdict {
    const jsonText = extractFencedBody(responseText);

    let parsed: unknown;
    try {
        parsed = JSON.parse(jsonText);
    } catch (error) {
        throw new ProviderError(
            'malformed_response',
            `Classifier reply is not JSON: ${responseText.slice(0, 200)}`,
            { cause: error }
        );
    }

    if (!isRecord(parsed)) {
        throw new ProviderError('malformed_response', 'Classifier reply is not a JSON object');
    }

    const relevant = parsed.relevant;
    const reason = parsed.reason;
    const score = parsed.score;
    // Number('') is 0, so a blank string is not a score
    const rawScore = typeof score === 'string' ? (score.trim() ? Number(score) : NaN) : score;

    if (typeof relevant !== 'boolean') {
        throw new ProviderError('malformed_response', 'Classifier reply has no boolean "relevant" field');
    }
    if (typeof rawScore !== 'number' || Number.isNaN(rawScore)) {
        throw new ProviderError('malformed_response', 'Classifier reply has no numeric "score" field');
    }

    return {
        is_relevant: relevant,
        score: Math.max(0, Math.min(1, rawScore)), // Clamp 0-1
        reason: typeof reason === 'string' && reason.trim() ? reason.trim() : 'No reason given'
    };
}
