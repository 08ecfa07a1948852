import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as path from 'path';
import { JsonFilePaperSource, toCandidatePaper } from '../pipeline/json-paper-source';

const fixture = path.join(__dirname, 'fixtures', 'candidates.json');

describe('toCandidatePaper', () => {
    it('accepts a minimal entry and fills optional fields', () => {
        expect(toCandidatePaper({
            id: ' p1 ',
            title: 'Title',
            summary: 'Summary',
            published: '2026-03-01T00:00:00Z',
            link: 'https://example.org/abs/p1'
        })).toEqual({
            id: 'p1',
            title: 'Title',
            summary: 'Summary',
            authors: [],
            categories: [],
            published: new Date('2026-03-01T00:00:00Z'),
            link: 'https://example.org/abs/p1',
            pdf_link: null
        });
    });

    it('rejects entries with missing or mistyped fields', () => {
        expect(toCandidatePaper(null)).toBeNull();
        expect(toCandidatePaper(['p1'])).toBeNull();
        expect(toCandidatePaper({ id: '', title: 'T', summary: '', published: '2026-03-01', link: 'x' })).toBeNull();
        expect(toCandidatePaper({ id: 'p1', title: 'T', summary: '', published: 42, link: 'x' })).toBeNull();
    });
});

describe('JsonFilePaperSource', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('reads valid entries and skips invalid ones', async () => {
        const source = new JsonFilePaperSource(fixture);

        const papers = await source.fetchCandidates();

        expect(papers.map(paper => paper.id)).toEqual(['2603.00101', '2603.00102']);
        expect(papers[0].title).toBe('Communication-Avoiding Solvers on GPU Clusters');
        expect(papers[0].authors).toEqual(['R. Fenwick', 'L. Osei']);
        expect(papers[0].pdf_link).toBe('https://example.org/pdf/2603.00101');
        expect(papers[1].published).toEqual(new Date('2026-03-03T08:30:00Z'));
        expect(console.warn).toHaveBeenCalledTimes(2);
    });

    it('names itself after the file', () => {
        expect(new JsonFilePaperSource(fixture).name).toBe(`json:${fixture}`);
    });
});
