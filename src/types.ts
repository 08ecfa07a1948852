/**
 * TypeScript types for the paper store, the filter pipeline and their configuration
 */

// ============================================================================
// Paper Types
// ============================================================================

/**
 * A candidate paper as supplied by a feed, before dedup or classification
 */
export interface CandidatePaper {
    id: string;
    title: string;
    summary: string;
    authors: string[];
    categories: string[];
    published: Date;
    link: string;
    pdf_link: string | null;
}

/**
 * Input accepted by the store's upsert. Relevance fields are optional:
 * an absent or null score/reason leaves the stored value untouched on update.
 */
export interface PaperInput extends CandidatePaper {
    relevance_score?: number | null;
    relevance_reason?: string | null;
}

/**
 * A stored paper record (what comes from the database)
 */
export interface PaperRow extends CandidatePaper {
    relevance_score: number | null;
    relevance_reason: string | null;
    sent: boolean;
    created_at: Date;
    last_accessed: Date | null;
}

/**
 * Fields needed to rank records for eviction
 */
export interface EvictionCandidate {
    id: string;
    title: string;
    last_accessed: Date | null;
    created_at: Date;
}

export interface StorageSummary {
    total: number;
    sent: number;
    never_accessed: number;
}

export interface StorageStats {
    total: number;
    sent: number;
    unsent: number;
    never_accessed: number;
    max_storage_size: number;
    oldest_papers: EvictionCandidate[];
}

// ============================================================================
// Filter Types
// ============================================================================

export type ProviderName = 'anthropic' | 'deepseek' | 'qwen';

export const PROVIDER_NAMES: readonly ProviderName[] = ['anthropic', 'deepseek', 'qwen'];

/**
 * What a classifier provider answers for one paper
 */
export interface ClassifierVerdict {
    is_relevant: boolean;
    score: number;
    reason: string;
}

export interface CoarseFilterResult {
    passed: boolean;
    score: number;
    matched_keywords: string[];
    reason: string;
}

/**
 * Outcome of the fine filter. `degraded` is set when the provider failed
 * and the coarse score was used instead.
 */
export interface FilterDecision {
    passed: boolean;
    score: number;
    reason: string;
    degraded: boolean;
}

/**
 * Which stage produced the final decision
 */
export type DecisionStage = 'coarse' | 'fine' | 'degraded';

export interface ClassifiedPaper extends CandidatePaper {
    is_relevant: boolean;
    relevance_score: number;
    relevance_reason: string;
    decided_by: DecisionStage;
}

export interface FilterMetrics {
    total_candidates: number;
    coarse_rejected: number;
    fine_filter_calls: number;
    degraded_decisions: number;
    relevant: number;
    token_savings_ratio: number;
}

// ============================================================================
// Configuration
// ============================================================================

export interface FilterConfig {
    provider: ProviderName;
    api_key: string;
    model: string;
    base_url: string | null;
    relevance_threshold: number;
    coarse_filter_threshold: number;
    enable_coarse_filter: boolean;
    keywords: string[];
    concurrency: number;
    timeout_ms: number;
    max_tokens: number;
    temperature: number;
}

export interface StorageConfig {
    database_url: string | null;
    max_storage_size: number;
}

export interface AppConfig {
    storage: StorageConfig;
    filter: FilterConfig;
}
