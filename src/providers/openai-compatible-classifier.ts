/**
 * Relevance classification through an OpenAI-compatible /chat/completions
 * endpoint (DeepSeek, Qwen via DashScope compatible mode).
 */

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

export interface OpenAICompatibleSettings extends ClassifierSettings {
    name: 'deepseek' | 'qwen';
    baseUrl: string;
}

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull choices[0].message.content out of a chat completion body
 */
function extractMessageContent(body: unknown): string | null {
    if (!isRecord(body) || !Array.isArray(body.choices)) return null;

    const choice: unknown = body.choices[0];
    if (!isRecord(choice) || !isRecord(choice.message)) return null;

    const content = choice.message.content;
    return typeof content === 'string' ? content : null;
}

function statusError(provider: string, status: number, detail: string): ProviderError {
    const message = `${provider} responded with HTTP ${status}: ${detail.slice(0, 200)}`;

    if (status === 401 || status === 403) return new ProviderError('auth', message);
    // 402 is DeepSeek's "insufficient balance"
    if (status === 402 || status === 429) return new ProviderError('quota', message);
    return new ProviderError('http', message);
}

export class OpenAICompatibleClassifier implements ClassifierProvider {
    readonly name: 'deepseek' | 'qwen';
    readonly model: string;
    private settings: OpenAICompatibleSettings;
    private fetchImpl: FetchLike;

    constructor(settings: OpenAICompatibleSettings, fetchImpl: FetchLike = fetch) {
        this.settings = settings;
        this.name = settings.name;
        this.model = settings.model;
        this.fetchImpl = fetchImpl;
    }

    get endpoint(): string {
        return this.settings.baseUrl.replace(/\/+$/, '') + '/chat/completions';
    }

    async classify(paper: CandidatePaper, options: ClassifyOptions = {}): Promise<ClassifierVerdict> {
        const body = {
            model: this.settings.model,
            messages: [
                { role: 'system', content: RELEVANCE_SYSTEM_PROMPT },
                { role: 'user', content: buildRelevancePrompt(paper, this.settings.keywords) }
            ],
            temperature: this.settings.temperature,
            max_tokens: this.settings.maxTokens
        };

        let response: Response;
        try {
            response = await this.fetchImpl(this.endpoint, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    'Authorization': `Bearer ${this.settings.apiKey}`
                },
                body: JSON.stringify(body),
                signal: options.signal
            });
        } catch (error) {
            if (options.signal?.aborted) {
                throw new ProviderError('timeout', `${this.name} request aborted`, { cause: error });
            }
            throw new ProviderError('network', `${this.name} request failed: ${errorMessage(error)}`, { cause: error });
        }

        if (!response.ok) {
            const detail = await response.text().catch(() => response.statusText);
            throw statusError(this.name, response.status, detail);
        }

        let json: unknown;
        try {
            json = await response.json();
        } catch (error) {
            throw new ProviderError('malformed_response', `${this.name} returned a non-JSON body`, { cause: error });
        }

        const content = extractMessageContent(json);
        if (content === null) {
            throw new ProviderError('malformed_response', `${this.name} response has no message content`);
        }

        return parseClassifierResponse(content);
    }
}
