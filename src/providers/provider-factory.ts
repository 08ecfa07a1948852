/**
 * Selects the classifier variant once, from configuration
 */

import { FilterConfig, ProviderName } from '../types';
import { AnthropicClassifier } from './anthropic-classifier';
import { ClassifierProvider } from './classifier-provider';
import { OpenAICompatibleClassifier } from './openai-compatible-classifier';

export interface ProviderDefaults {
    model: string;
    baseUrl: string | null;
}

export const PROVIDER_DEFAULTS: Record<ProviderName, ProviderDefaults> = {
    anthropic: { model: 'claude-sonnet-4-20250514', baseUrl: null },
    deepseek: { model: 'deepseek-chat', baseUrl: 'https://api.deepseek.com' },
    qwen: { model: 'qwen-turbo', baseUrl: 'https://dashscope.aliyuncs.com/compatible-mode/v1' }
};

export function createClassifierProvider(config: FilterConfig): ClassifierProvider {
    const defaults = PROVIDER_DEFAULTS[config.provider];
    const common = {
        apiKey: config.api_key,
        model: config.model || defaults.model,
        keywords: config.keywords,
        maxTokens: config.max_tokens,
        temperature: config.temperature
    };

    switch (config.provider) {
        case 'anthropic':
            return new AnthropicClassifier({ ...common, baseUrl: config.base_url ?? defaults.baseUrl });

        case 'deepseek':
        case 'qwen':
            return new OpenAICompatibleClassifier({
                ...common,
                name: config.provider,
                baseUrl: config.base_url ?? defaults.baseUrl ?? ''
            });

        default: {
            const unsupported: never = config.provider;
            throw new Error(`Unsupported classifier provider: ${String(unsupported)}`);
        }
    }
}
