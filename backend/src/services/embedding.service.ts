import axios, { AxiosResponse } from 'axios';
import type { OllamaEmbedRequest, OllamaEmbedResponse } from '../types';

/**
 * Maps texts to vectors, same order and same length as the input.
 * Must be deterministic for a fixed model.
 */
export interface EmbeddingProvider {
    readonly name: string;
    embed(texts: string[]): Promise<number[][]>;
}

export interface OllamaEmbeddingOptions {
    baseUrl: string;
    model: string;
    timeoutMs?: number;
    cacheSize?: number;
}

/**
 * Embeddings from a local Ollama server (`/api/embed`, batched). Vectors are
 * kept in a least-recently-used cache shared by every caller.
 */
export class OllamaEmbeddingService implements EmbeddingProvider {
    readonly name = 'ollama-embeddings';
    private baseUrl: string;
    private model: string;
    private timeoutMs: number;
    private cacheSize: number;
    private cache: Map<string, number[]> = new Map();

    constructor(options: OllamaEmbeddingOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.model = options.model;
        this.timeoutMs = options.timeoutMs ?? 10000;
        this.cacheSize = options.cacheSize ?? 1000;
    }

    async embed(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) return [];

        const found = new Map<string, number[]>();
        for (const text of texts) {
            const cached = this.cache.get(text);
            if (cached) found.set(text, cached);
        }

        const missing = [...new Set(texts.filter(text => !found.has(text)))];
        if (missing.length > 0) {
            const vectors = await this.fetchEmbeddings(missing);
            missing.forEach((text, i) => found.set(text, vectors[i]));
        }

        for (const [text, vector] of found) {
            this.remember(text, vector);
        }

        return texts.map(text => {
            const vector = found.get(text);
            if (!vector) {
                throw new Error(`No embedding returned for "${text.substring(0, 40)}"`);
            }
            return vector;
        });
    }

    private remember(text: string, vector: number[]): void {
        this.cache.delete(text);
        this.cache.set(text, vector);
        while (this.cache.size > this.cacheSize) {
            const oldest = this.cache.keys().next();
            if (oldest.done) break;
            this.cache.delete(oldest.value);
        }
    }

    private async fetchEmbeddings(texts: string[]): Promise<number[][]> {
        const body: OllamaEmbedRequest = { model: this.model, input: texts };
        const response: AxiosResponse<OllamaEmbedResponse> = await axios.post(
            `${this.baseUrl}/api/embed`,
            body,
            {
                headers: { 'Content-Type': 'application/json' },
                timeout: this.timeoutMs
            }
        );

        const embeddings = response.data?.embeddings;
        if (!Array.isArray(embeddings) || embeddings.length !== texts.length) {
            throw new Error('Invalid embedding response from Ollama');
        }
        return embeddings;
    }
}
