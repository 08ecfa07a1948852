/**
 * Interfaces for the collaborators around the core: where candidates come
 * from and where relevant papers go.
 */

import { CandidatePaper, ClassifiedPaper } from '../types';

export interface PaperSource {
    readonly name: string;
    fetchCandidates(): Promise<CandidatePaper[]>;
}

/**
 * Delivers relevant papers (email, webhook, ...). Resolves true when the
 * delivery went through; the pipeline then marks the papers as sent.
 */
export interface Notifier {
    readonly name: string;
    send(papers: ClassifiedPaper[]): Promise<boolean>;
}
