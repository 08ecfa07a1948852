/**
 * Wires the core from configuration
 */

import { FilterPipeline } from '../filters/filter-pipeline';
import { FineFilter } from '../filters/fine-filter';
import { ClassifierProvider } from '../providers/classifier-provider';
import { createClassifierProvider } from '../providers/provider-factory';
import { DedupGate } from '../store/dedup-gate';
import { PaperRepository } from '../store/paper-repository';
import { PaperStore } from '../store/paper-store';
import { AppConfig } from '../types';
import { Notifier } from './collaborators';
import { PaperPipeline } from './paper-pipeline';

export interface CreatePipelineOptions {
    notifiers?: Notifier[];
    /** Overrides the provider chosen by config.filter.provider */
    provider?: ClassifierProvider;
    clock?: () => Date;
}

export interface PipelineComponents {
    store: PaperStore;
    pipeline: PaperPipeline;
    provider: ClassifierProvider;
}

export function createPipeline(
    config: AppConfig,
    repository: PaperRepository,
    options: CreatePipelineOptions = {}
): PipelineComponents {
    const { filter } = config;
    const provider = options.provider ?? createClassifierProvider(filter);

    const store = new PaperStore(repository, {
        maxStorageSize: config.storage.max_storage_size,
        clock: options.clock
    });

    const fineFilter = new FineFilter(provider, {
        relevanceThreshold: filter.relevance_threshold,
        timeoutMs: filter.timeout_ms
    });

    const filterPipeline = new FilterPipeline(fineFilter, {
        keywords: filter.keywords,
        coarseFilterThreshold: filter.coarse_filter_threshold,
        enableCoarseFilter: filter.enable_coarse_filter,
        concurrency: filter.concurrency
    });

    const pipeline = new PaperPipeline({
        store,
        dedupGate: new DedupGate(store),
        filterPipeline,
        notifiers: options.notifiers
    });

    return { store, pipeline, provider };
}
