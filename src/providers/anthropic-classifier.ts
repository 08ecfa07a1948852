/**
 * Relevance classification through the Anthropic Messages API
 */

import Anthropic, { ClientOptions } from '@anthropic-ai/sdk';
import { errorMessage, ProviderError } from '../errors';
import { CandidatePaper, ClassifierVerdict } from '../types';
import {
    buildRelevancePrompt,
    ClassifierProvider,
    ClassifierSettings,
    ClassifyOptions,
    parseClassifierResponse,
    RELEVANCE_SYSTEM_PROMPT
} from './classifier-provider';

export interface AnthropicClassifierSettings extends ClassifierSettings {
    baseUrl: string | null;
    /** Replaces the SDK's HTTP transport */
    fetch?: ClientOptions['fetch'];
}

/**
 * Map an SDK failure onto the provider error taxonomy
 */
export function toProviderError(error: unknown): ProviderError {
    if (error instanceof ProviderError) return error;

    if (error instanceof Anthropic.APIUserAbortError) {
        return new ProviderError('timeout', 'Anthropic request aborted', { cause: error });
    }
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
        return new ProviderError('timeout', 'Anthropic request timed out', { cause: error });
    }
    if (error instanceof Anthropic.APIConnectionError) {
        return new ProviderError('network', `Anthropic connection failed: ${error.message}`, { cause: error });
    }
    if (error instanceof Anthropic.AuthenticationError || error instanceof Anthropic.PermissionDeniedError) {
        return new ProviderError('auth', `Anthropic rejected the credentials: ${error.message}`, { cause: error });
    }
    if (error instanceof Anthropic.RateLimitError) {
        return new ProviderError('quota', `Anthropic rate limit or quota reached: ${error.message}`, { cause: error });
    }
    if (error instanceof Anthropic.APIError) {
        return new ProviderError('http', `Anthropic API error: ${error.message}`, { cause: error });
    }
    return new ProviderError('network', `Anthropic request failed: ${errorMessage(error)}`, { cause: error });
}

export class AnthropicClassifier implements ClassifierProvider {
    readonly name = 'anthropic' as const;
    readonly model: string;
    private client: Anthropic;
    private settings: AnthropicClassifierSettings;

    constructor(settings: AnthropicClassifierSettings) {
        this.settings = settings;
        this.model = settings.model;
        this.client = new Anthropic({
            apiKey: settings.apiKey,
            baseURL: settings.baseUrl ?? undefined,
            fetch: settings.fetch,
            // The fine filter owns retries and the deadline
            maxRetries: 0
        });
    }

    async classify(paper: CandidatePaper, options: ClassifyOptions = {}): Promise<ClassifierVerdict> {
        let responseText: string;

        try {
            const response = await this.client.messages.create(
                {
                    model: this.settings.model,
                    max_tokens: this.settings.maxTokens,
                    temperature: this.settings.temperature,
                    system: RELEVANCE_SYSTEM_PROMPT,
                    messages: [
                        {
                            role: 'user',
                            content: buildRelevancePrompt(paper, this.settings.keywords)
                        }
                    ]
                },
                { signal: options.signal }
            );

            const textBlock = response.content.find(block => block.type === 'text');
            responseText = textBlock?.type === 'text' ? textBlock.text : '';

        } catch (error) {
            throw toProviderError(error);
        }

        return parseClassifierResponse(responseText);
    }
}
