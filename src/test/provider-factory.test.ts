import { describe, expect, it } from 'vitest';
import { AnthropicClassifier } from '../providers/anthropic-classifier';
import { OpenAICompatibleClassifier } from '../providers/openai-compatible-classifier';
import { createClassifierProvider } from '../providers/provider-factory';
import { FilterConfig } from '../types';

const filter: FilterConfig = {
    provider: 'deepseek',
    api_key: 'test-secret',
    model: 'deepseek-chat',
    base_url: null,
    relevance_threshold: 0.7,
    coarse_filter_threshold: 0.3,
    enable_coarse_filter: true,
    keywords: ['HPC'],
    concurrency: 1,
    timeout_ms: 1000,
    max_tokens: 256,
    temperature: 0.1
};

describe('createClassifierProvider', () => {
    it('builds an OpenAI-compatible client for deepseek on its default endpoint', () => {
        const provider = createClassifierProvider(filter);

        expect(provider).toBeInstanceOf(OpenAICompatibleClassifier);
        expect(provider.name).toBe('deepseek');
        expect(provider.model).toBe('deepseek-chat');
        if (provider instanceof OpenAICompatibleClassifier) {
            expect(provider.endpoint).toBe('https://api.deepseek.com/chat/completions');
        }
    });

    it('honours a custom endpoint for qwen', () => {
        const provider = createClassifierProvider({
            ...filter,
            provider: 'qwen',
            model: 'qwen-turbo',
            base_url: 'https://proxy.example.test/v1'
        });

        expect(provider.name).toBe('qwen');
        if (!(provider instanceof OpenAICompatibleClassifier)) throw new Error('expected an OpenAI-compatible provider');
        expect(provider.endpoint).toBe('https://proxy.example.test/v1/chat/completions');
    });

    it('builds an Anthropic client, falling back to the default model', () => {
        const provider = createClassifierProvider({ ...filter, provider: 'anthropic', model: '' });

        expect(provider).toBeInstanceOf(AnthropicClassifier);
        expect(provider.name).toBe('anthropic');
        expect(provider.model).toBe('claude-sonnet-4-20250514');
    });
});
