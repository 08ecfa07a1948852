import { describe, expect, it } from 'vitest';
import { coarseFilter, normalizeKeywords } from '../filters/coarse-filter';

describe('coarseFilter', () => {
    const keywords = ['HPC', 'GPU'];

    it('scores the share of matched keywords', () => {
        const result = coarseFilter({ title: 'Scaling GPU kernels', summary: 'We tune kernels.' }, keywords, 0.5);

        expect(result.score).toBe(0.5);
        expect(result.passed).toBe(true);
        expect(result.matched_keywords).toEqual(['GPU']);
        expect(result.reason).toBe('Coarse filter matched keywords: GPU (score: 0.50)');
    });

    it('rejects a paper that matches no keyword', () => {
        const result = coarseFilter({ title: 'Protein folding', summary: 'A biology study.' }, keywords, 0.5);

        expect(result.score).toBe(0);
        expect(result.passed).toBe(false);
        expect(result.matched_keywords).toEqual([]);
        expect(result.reason).toBe('Coarse filter matched no keywords (score: 0.00)');
    });

    it('matches case-insensitively across title and summary', () => {
        const result = coarseFilter({ title: 'hpc scheduling', summary: 'Runs on gpu clusters.' }, keywords, 0.5);

        expect(result.score).toBe(1);
        expect(result.matched_keywords).toEqual(['HPC', 'GPU']);
    });

    it('passes a score equal to the threshold', () => {
        const result = coarseFilter({ title: 'GPU', summary: '' }, ['GPU', 'MPI', 'CUDA', 'OpenMP'], 0.25);

        expect(result.score).toBe(0.25);
        expect(result.passed).toBe(true);
    });

    it('never scores lower when a keyword is added to the text', () => {
        const base = coarseFilter({ title: 'MPI collectives', summary: '' }, ['MPI', 'GPU', 'CUDA'], 0.3);
        const more = coarseFilter({ title: 'MPI collectives on GPU', summary: '' }, ['MPI', 'GPU', 'CUDA'], 0.3);

        expect(more.score).toBeGreaterThanOrEqual(base.score);
        expect(more.score).toBeCloseTo(2 / 3, 10);
    });

    it('never passes more papers when the threshold rises', () => {
        const papers = [
            { title: 'MPI on GPU clusters', summary: 'CUDA kernels.' },
            { title: 'MPI collectives', summary: '' },
            { title: 'GPU ray tracing', summary: 'Uses CUDA.' },
            { title: 'Soil survey', summary: '' }
        ];
        const terms = ['MPI', 'GPU', 'CUDA'];
        const passing = (threshold: number) =>
            papers.filter(paper => coarseFilter(paper, terms, threshold).passed).map(paper => paper.title);

        let previous = passing(0);
        for (const threshold of [0.2, 0.4, 0.6, 0.8, 1]) {
            const current = passing(threshold);
            expect(current.every(title => previous.includes(title))).toBe(true);
            previous = current;
        }
        expect(previous).toEqual(['MPI on GPU clusters']);
    });

    it('fails every paper when no keywords are configured', () => {
        const result = coarseFilter({ title: 'GPU HPC', summary: 'Everything.' }, [], 0);

        expect(result).toEqual({
            passed: false,
            score: 0,
            matched_keywords: [],
            reason: 'Coarse filter: no keywords configured'
        });
    });
});

describe('normalizeKeywords', () => {
    it('trims, drops blanks and case-insensitive duplicates', () => {
        expect(normalizeKeywords([' HPC ', '', 'gpu', 'hpc', '  ', 'GPU', 'MPI'])).toEqual(['HPC', 'gpu', 'MPI']);
    });
});
