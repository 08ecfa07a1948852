/**
 * Reads a candidate batch from a JSON file: an array of paper objects with
 * `published` as an ISO date string. Invalid entries are reported and skipped.
 */

import { readFile } from 'fs/promises';
import { CandidatePaper } from '../types';
import { PaperSource } from './collaborators';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Validate one raw entry, returning null when a required field is missing or mistyped
 */
export function toCandidatePaper(raw: unknown): CandidatePaper | null {
    if (!isRecord(raw)) return null;

    const { id, title, summary, authors, categories, published, link, pdf_link } = raw;

    if (typeof id !== 'string' || !id.trim()) return null;
    if (typeof title !== 'string' || !title.trim()) return null;
    if (typeof summary !== 'string') return null;
    if (typeof link !== 'string') return null;
    if (typeof published !== 'string') return null;

    const publishedAt = new Date(published);
    if (Number.isNaN(publishedAt.getTime())) return null;

    return {
        id: id.trim(),
        title: title.trim(),
        summary: summary.trim(),
        authors: isStringArray(authors) ? authors : [],
        categories: isStringArray(categories) ? categories : [],
        published: publishedAt,
        link,
        pdf_link: typeof pdf_link === 'string' ? pdf_link : null
    };
}

export class JsonFilePaperSource implements PaperSource {
    readonly name: string;

    constructor(private path: string) {
        this.name = `json:${path}`;
    }

    async fetchCandidates(): Promise<CandidatePaper[]> {
        const content = await readFile(this.path, 'utf-8');
        const parsed: unknown = JSON.parse(content);

        if (!Array.isArray(parsed)) {
            throw new Error(`${this.path} must contain a JSON array of papers`);
        }

        const papers: CandidatePaper[] = [];
        parsed.forEach((entry: unknown, index) => {
            const paper = toCandidatePaper(entry);
            if (paper) {
                papers.push(paper);
            } else {
                console.warn(`⚠️  Skipping entry #${index} in ${this.path}: missing or invalid fields`);
            }
        });

        return papers;
    }
}
