/**
 * Configuration from environment variables (loaded from .env by each entry point)
 */

import { ConfigError } from './errors';
import { normalizeKeywords } from './filters/coarse-filter';
import { PROVIDER_DEFAULTS } from './providers/provider-factory';
import { AppConfig, PROVIDER_NAMES, ProviderName, StorageConfig } from './types';

export const DEFAULT_KEYWORDS = [
    'high performance computing',
    'HPC',
    'distributed computing',
    'parallel computing',
    'GPU computing',
    'supercomputing',
    'cluster computing',
    'MPI',
    'OpenMP',
    'CUDA'
];

export interface LoadConfigOptions {
    /** Dry runs keep papers in memory and need no DATABASE_URL */
    requireDatabase?: boolean;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | null {
    const value = env[name]?.trim();
    return value ? value : null;
}

function readNumber(
    env: Env,
    name: string,
    fallback: number,
    bounds: { min?: number; max?: number; integer?: boolean } = {}
): number {
    const raw = readString(env, name);
    if (raw === null) return fallback;

    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new ConfigError(name, `expected a number, got "${raw}"`);
    }
    if (bounds.integer && !Number.isInteger(value)) {
        throw new ConfigError(name, `expected an integer, got "${raw}"`);
    }
    if (bounds.min !== undefined && value < bounds.min) {
        throw new ConfigError(name, `must be >= ${bounds.min}, got ${value}`);
    }
    if (bounds.max !== undefined && value > bounds.max) {
        throw new ConfigError(name, `must be <= ${bounds.max}, got ${value}`);
    }
    return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
    const raw = readString(env, name);
    if (raw === null) return fallback;

    switch (raw.toLowerCase()) {
        case 'true':
        case '1':
        case 'yes':
        case 'on':
            return true;
        case 'false':
        case '0':
        case 'no':
        case 'off':
            return false;
        default:
            throw new ConfigError(name, `expected true or false, got "${raw}"`);
    }
}

function isProviderName(value: string): value is ProviderName {
    return PROVIDER_NAMES.some(name => name === value);
}

function readProvider(env: Env): ProviderName {
    const raw = (readString(env, 'FILTER_PROVIDER') ?? 'deepseek').toLowerCase();
    if (!isProviderName(raw)) {
        throw new ConfigError('FILTER_PROVIDER', `unsupported provider "${raw}" (expected one of: ${PROVIDER_NAMES.join(', ')})`);
    }
    return raw;
}

function readApiKey(env: Env, provider: ProviderName): string {
    const apiKey =
        readString(env, 'LLM_API_KEY') ??
        readString(env, 'FILTER_API_KEY') ??
        (provider === 'anthropic' ? readString(env, 'ANTHROPIC_API_KEY') : null);

    if (!apiKey) {
        throw new ConfigError('LLM_API_KEY', `no API key for provider "${provider}"`);
    }
    return apiKey;
}

function readKeywords(env: Env): string[] {
    const raw = readString(env, 'FILTER_KEYWORDS');
    return normalizeKeywords(raw === null ? DEFAULT_KEYWORDS : raw.split(','));
}

/**
 * Storage settings only, for tools that never talk to a classifier
 */
export function loadStorageConfig(env: Env = process.env, options: LoadConfigOptions = {}): StorageConfig {
    const requireDatabase = options.requireDatabase ?? true;

    const databaseUrl = readString(env, 'DATABASE_URL');
    if (requireDatabase && !databaseUrl) {
        throw new ConfigError('DATABASE_URL', 'not set');
    }

    return {
        database_url: databaseUrl,
        max_storage_size: readNumber(env, 'MAX_STORAGE_SIZE', 0, { min: 0, integer: true })
    };
}

/**
 * Build and validate the application configuration. Throws ConfigError on the first problem.
 */
export function loadConfig(env: Env = process.env, options: LoadConfigOptions = {}): AppConfig {
    const storage = loadStorageConfig(env, options);
    const provider = readProvider(env);
    const defaults = PROVIDER_DEFAULTS[provider];

    return {
        storage,
        filter: {
            provider,
            api_key: readApiKey(env, provider),
            model: readString(env, 'FILTER_MODEL') ?? defaults.model,
            base_url: readString(env, 'FILTER_BASE_URL') ?? defaults.baseUrl,
            relevance_threshold: readNumber(env, 'RELEVANCE_THRESHOLD', 0.7, { min: 0, max: 1 }),
            coarse_filter_threshold: readNumber(env, 'COARSE_FILTER_THRESHOLD', 0.3, { min: 0, max: 1 }),
            enable_coarse_filter: readBoolean(env, 'ENABLE_COARSE_FILTER', true),
            keywords: readKeywords(env),
            concurrency: readNumber(env, 'FILTER_CONCURRENCY', 4, { min: 1, integer: true }),
            timeout_ms: readNumber(env, 'FILTER_TIMEOUT_MS', 30000, { min: 1, integer: true }),
            max_tokens: readNumber(env, 'MAX_TOKENS', 1024, { min: 1, integer: true }),
            temperature: readNumber(env, 'TEMPERATURE', 0.1, { min: 0, max: 2 })
        }
    };
}
