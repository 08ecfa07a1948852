import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { StorageError } from '../errors';
import { MemoryPaperRepository, MemoryPaperTransaction } from '../memory-database';
import { Notifier } from '../pipeline/collaborators';
import { createPipeline } from '../pipeline/create-pipeline';
import { AppConfig, ClassifiedPaper } from '../types';
import { FakeProvider, makePaper, steppingClock } from './helpers';

function testConfig(maxStorageSize = 0): AppConfig {
    return {
        storage: { database_url: null, max_storage_size: maxStorageSize },
        filter: {
            provider: 'deepseek',
            api_key: 'test-secret',
            model: 'fake-model',
            base_url: null,
            relevance_threshold: 0.7,
            coarse_filter_threshold: 0.5,
            enable_coarse_filter: true,
            keywords: ['HPC'],
            concurrency: 2,
            timeout_ms: 1000,
            max_tokens: 256,
            temperature: 0.1
        }
    };
}

class RecordingNotifier implements Notifier {
    readonly batches: ClassifiedPaper[][] = [];

    constructor(readonly name: string, private outcome: boolean | Error = true) {}

    async send(papers: ClassifiedPaper[]): Promise<boolean> {
        this.batches.push(papers);
        if (this.outcome instanceof Error) throw this.outcome;
        return this.outcome;
    }
}

function setup(options: { notifiers?: Notifier[]; provider?: FakeProvider; maxStorageSize?: number } = {}) {
    const provider = options.provider ?? new FakeProvider();
    const { store, pipeline } = createPipeline(testConfig(options.maxStorageSize), new MemoryPaperRepository(), {
        provider,
        notifiers: options.notifiers,
        clock: steppingClock()
    });
    return { store, pipeline, provider };
}

const hpcPaper = (id: string) => makePaper(id, { title: `HPC workloads ${id}` });
const bioPaper = (id: string) => makePaper(id, { title: `Soil survey ${id}` });

describe('PaperPipeline', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('dedups, classifies, stores every paper and marks delivered ones sent', async () => {
        const notifier = new RecordingNotifier('email');
        const { store, pipeline, provider } = setup({ notifiers: [notifier] });
        await store.addOrUpdate(hpcPaper('old'), true);

        const result = await pipeline.run([hpcPaper('old'), hpcPaper('hpc1'), bioPaper('bio1')]);

        expect(result).toMatchObject({ fetched: 3, seen: 1, stored: 2, notified: true, cancelled: false });
        expect(result.relevant.map(paper => paper.id)).toEqual(['hpc1']);
        expect(result.metrics?.fine_filter_calls).toBe(1);
        expect(provider.calls).toEqual(['hpc1']);
        expect(notifier.batches.map(batch => batch.map(paper => paper.id))).toEqual([['hpc1']]);

        const rows = await store.listRecent();
        const byId = new Map(rows.map(row => [row.id, row]));
        expect(byId.get('hpc1')).toMatchObject({ sent: true, relevance_score: 0.9, relevance_reason: 'fake verdict' });
        expect(byId.get('bio1')).toMatchObject({
            sent: false,
            relevance_score: 0,
            relevance_reason: 'Coarse filter matched no keywords (score: 0.00)'
        });
        expect(rows).toHaveLength(3);
    });

    it('leaves relevant papers unsent when every notifier fails', async () => {
        const failing = new RecordingNotifier('webhook', false);
        const throwing = new RecordingNotifier('email', new Error('SMTP down'));
        const { store, pipeline } = setup({ notifiers: [failing, throwing] });

        const result = await pipeline.run([hpcPaper('hpc1')]);

        expect(result.notified).toBe(false);
        expect(throwing.batches).toHaveLength(1);
        expect((await store.getStorageStats()).sent).toBe(0);
    });

    it('marks papers sent when at least one notifier succeeds', async () => {
        const { store, pipeline } = setup({
            notifiers: [new RecordingNotifier('webhook', false), new RecordingNotifier('email', true)]
        });

        const result = await pipeline.run([hpcPaper('hpc1'), hpcPaper('hpc2')]);

        expect(result.notified).toBe(true);
        expect((await store.getStorageStats()).sent).toBe(2);
    });

    it('stores relevant papers unsent when no notifier is configured', async () => {
        const { store, pipeline } = setup();

        const result = await pipeline.run([hpcPaper('hpc1')]);

        expect(result.notified).toBe(false);
        expect(result.stored).toBe(1);
        expect((await store.getStorageStats()).unsent).toBe(1);
    });

    it('returns early when every candidate was already seen', async () => {
        const { store, pipeline, provider } = setup();
        await store.addOrUpdate(hpcPaper('hpc1'), false);

        const result = await pipeline.run([hpcPaper('hpc1')]);

        expect(result).toMatchObject({ fetched: 1, seen: 1, stored: 0, metrics: null });
        expect(provider.calls).toEqual([]);
    });

    it('keeps the store within capacity across a run', async () => {
        const { store, pipeline } = setup({ maxStorageSize: 2 });

        await pipeline.run([hpcPaper('a'), bioPaper('b'), hpcPaper('c')]);

        expect((await store.getStorageStats()).total).toBe(2);
    });

    it('aborts the run on a storage failure', async () => {
        const { pipeline } = setup();
        vi.spyOn(MemoryPaperTransaction.prototype, 'insert').mockRejectedValueOnce(new Error('disk full'));

        await expect(pipeline.run([hpcPaper('hpc1')])).rejects.toBeInstanceOf(StorageError);
    });

    it('does nothing when cancelled before it starts', async () => {
        const { store, pipeline, provider } = setup();
        const controller = new AbortController();
        controller.abort();

        const result = await pipeline.run([hpcPaper('hpc1')], { signal: controller.signal });

        expect(result.cancelled).toBe(true);
        expect(result.stored).toBe(0);
        expect(provider.calls).toEqual([]);
        expect((await store.getStorageStats()).total).toBe(0);
    });

    it('stops without storing when cancelled during classification', async () => {
        const controller = new AbortController();
        const provider = new FakeProvider(async () => {
            controller.abort();
            return { is_relevant: true, score: 0.9, reason: 'fake verdict' };
        });
        const { store, pipeline } = setup({ provider });

        const result = await pipeline.run([hpcPaper('a'), hpcPaper('b'), hpcPaper('c')], { signal: controller.signal });

        expect(result.cancelled).toBe(true);
        expect(result.stored).toBe(0);
        expect((await store.getStorageStats()).total).toBe(0);
    });
});
