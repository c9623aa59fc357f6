import dotenv from 'dotenv';
import * as path from 'path';
import type { ChunkMode } from './types';

dotenv.config();

export type AnalyzerProvider = 'ollama' | 'openrouter';

export const THRESHOLD_PRESETS: Record<ChunkMode, number> = {
    exploratory: 0.3,
    live: 0.7
};

export interface AppConfig {
    port: number;
    frontendUrl: string;
    dataDir: string;
    analyzerProvider: AnalyzerProvider;
    ollama: {
        url: string;
        model: string;
        embeddingModel: string;
        embeddingCacheSize: number;
    };
    openRouter: {
        apiKey: string;
    };
    chunking: {
        threshold: number;
        windowSize: number;
    };
    timeouts: {
        embeddingMs: number;
        analyzerMs: number;
    };
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        console.warn(`⚠️  ${key}="${raw}" is not a number, using ${fallback}`);
        return fallback;
    }
    return value;
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
    const value = readNumber(env, key, fallback);
    if (!Number.isInteger(value) || value <= 0) {
        console.warn(`⚠️  ${key} must be a positive integer, using ${fallback}`);
        return fallback;
    }
    return value;
}

export function assertThreshold(threshold: number): number {
    if (!(threshold > 0 && threshold < 1)) {
        throw new RangeError(`Similarity threshold must be between 0 and 1 (exclusive), got ${threshold}`);
    }
    return threshold;
}

function readThreshold(env: Env): number {
    if (env.CHUNK_THRESHOLD !== undefined && env.CHUNK_THRESHOLD.trim() !== '') {
        return assertThreshold(Number(env.CHUNK_THRESHOLD));
    }
    const mode = env.CHUNK_MODE;
    if (mode === 'exploratory' || mode === 'live') {
        return THRESHOLD_PRESETS[mode];
    }
    if (mode !== undefined) {
        console.warn(`⚠️  Unknown CHUNK_MODE "${mode}", using live`);
    }
    return THRESHOLD_PRESETS.live;
}

function readProvider(env: Env): AnalyzerProvider {
    const provider = env.ANALYZER_PROVIDER;
    if (provider === undefined || provider === 'ollama') {
        return 'ollama';
    }
    if (provider === 'openrouter') {
        return 'openrouter';
    }
    console.warn(`⚠️  Unknown ANALYZER_PROVIDER "${provider}", using ollama`);
    return 'ollama';
}

/**
 * Build the application config from environment variables
 */
export function loadConfig(env: Env = process.env): AppConfig {
    return {
        port: readPositiveInt(env, 'PORT', 5001),
        frontendUrl: env.FRONTEND_URL || 'http://localhost:3000',
        dataDir: path.resolve(env.DATA_DIR || path.join(process.cwd(), 'data')),
        analyzerProvider: readProvider(env),
        ollama: {
            url: env.OLLAMA_URL || 'http://localhost:11434',
            model: env.OLLAMA_MODEL || 'llama3.2:3b',
            embeddingModel: env.EMBEDDING_MODEL || 'all-minilm',
            embeddingCacheSize: readPositiveInt(env, 'EMBEDDING_CACHE_SIZE', 1000)
        },
        openRouter: {
            apiKey: env.OPENROUTER_API_KEY || ''
        },
        chunking: {
            threshold: readThreshold(env),
            windowSize: readPositiveInt(env, 'CHUNK_WINDOW', 10)
        },
        timeouts: {
            embeddingMs: readPositiveInt(env, 'EMBEDDING_TIMEOUT_MS', 10000),
            analyzerMs: readPositiveInt(env, 'ANALYZER_TIMEOUT_MS', 30000)
        }
    };
}
