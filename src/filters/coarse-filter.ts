/**
 * Coarse Filter
 *
 * Keyword-overlap pre-screen. Deterministic, no external calls:
 * score = matched keywords / keyword count, matched case-insensitively
 * as substrings of title + summary.
 */

import { CandidatePaper, CoarseFilterResult } from '../types';

/**
 * Trim, drop blanks and drop case-insensitive duplicates, keeping first occurrence order
 */
export function normalizeKeywords(keywords: readonly string[]): string[] {
    const seen = new Set<string>();
    const normalized: string[] = [];

    for (const keyword of keywords) {
        const trimmed = keyword.trim();
        const key = trimmed.toLowerCase();
        if (!trimmed || seen.has(key)) continue;
        seen.add(key);
        normalized.push(trimmed);
    }
    return normalized;
}

export function coarseFilter(
    paper: Pick<CandidatePaper, 'title' | 'summary'>,
    keywords: readonly string[],
    threshold: number
): CoarseFilterResult {
    if (keywords.length === 0) {
        return { passed: false, score: 0, matched_keywords: [], reason: 'Coarse filter: no keywords configured' };
    }

    const text = `${paper.title} ${paper.summary}`.toLowerCase();
    const matched = keywords.filter(keyword => {
        const needle = keyword.trim().toLowerCase();
        return needle.length > 0 && text.includes(needle);
    });

    const score = matched.length / keywords.length;
    const passed = score >= threshold;
    const reason = matched.length > 0
        ? `Coarse filter matched keywords: ${matched.join(', ')} (score: ${score.toFixed(2)})`
        : 'Coarse filter matched no keywords (score: 0.00)';

    return { passed, score, matched_keywords: matched, reason };
}
