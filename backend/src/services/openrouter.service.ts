import axios, { AxiosResponse } from 'axios';
import type { ChatMessage, OpenRouterChatRequest, OpenRouterResponse, StructuredAnalyzer } from '../types';
import { buildAnalysisPrompt } from './analysis.service';

export interface OpenRouterOptions {
    apiKey: string;
    models?: string[];
    minRequestInterval?: number;
    timeoutMs?: number;
}

const DEFAULT_MODELS = [
    'google/gemini-flash-1.5',
    'anthropic/claude-3-haiku',
    'openai/gpt-3.5-turbo',
    'meta-llama/llama-3.2-3b-instruct:free'
];

/**
 * Structured analysis through OpenRouter. Walks the model list until one
 * answers, and spaces requests out to stay under rate limits.
 */
export class OpenRouterService implements StructuredAnalyzer {
    readonly name = 'openrouter';
    private apiKey: string;
    private baseUrl: string = 'https://openrouter.ai/api/v1';
    private models: string[];
    private lastRequestTime: number = 0;
    private minRequestInterval: number;
    private timeoutMs: number;

    constructor(options: OpenRouterOptions) {
        this.apiKey = options.apiKey;
        this.models = options.models ?? DEFAULT_MODELS;
        this.minRequestInterval = options.minRequestInterval ?? 3000;
        this.timeoutMs = options.timeoutMs ?? 30000;
        if (!this.apiKey) {
            console.warn('⚠️  OPENROUTER_API_KEY not found in environment variables');
        }
    }

    /**
     * Throttle requests to prevent rate limiting
     */
    private async throttle(): Promise<void> {
        const now = Date.now();
        const timeSinceLastRequest = now - this.lastRequestTime;

        if (timeSinceLastRequest < this.minRequestInterval) {
            const waitTime = this.minRequestInterval - timeSinceLastRequest;
            console.log(`⏳ Throttling: waiting ${waitTime}ms before next request`);
            await new Promise(resolve => setTimeout(resolve, waitTime));
        }

        this.lastRequestTime = Date.now();
    }

    async analyze(text: string): Promise<string> {
        return this.chat([{ role: 'user', content: buildAnalysisPrompt(text) }]);
    }

    async chat(messages: ChatMessage[]): Promise<string> {
        if (!this.apiKey) {
            throw new Error('OpenRouter API key not configured');
        }

        // One budget covers the whole walk down the model list
        const deadline = Date.now() + this.timeoutMs;

        for (const model of this.models) {
            try {
                await this.throttle();
                const remaining = deadline - Date.now();
                if (remaining <= 0) {
                    break;
                }

                const body: OpenRouterChatRequest = {
                    model,
                    messages,
                    temperature: 0.2,
                    max_tokens: 600
                };
                const response: AxiosResponse<OpenRouterResponse> = await axios.post(
                    `${this.baseUrl}/chat/completions`,
                    body,
                    {
                        headers: {
                            'Authorization': `Bearer ${this.apiKey}`,
                            'Content-Type': 'application/json'
                        },
                        timeout: remaining
                    }
                );

                const content = response.data?.choices?.[0]?.message?.content;
                if (content) {
                    return content;
                }
                console.warn(`⚠️ Model ${model} returned no content, trying next model...`);
            } catch (error) {
                if (axios.isAxiosError(error)) {
                    const status = error.response?.status;
                    console.warn(`⚠️ Model ${model} failed${status ? ` (${status})` : ''}, trying next model...`);
                    continue;
                }
                console.error(`❌ Unexpected error with model ${model}:`, error);
            }
        }

        if (Date.now() >= deadline) {
            throw new Error(`OpenRouter gave up after ${this.timeoutMs}ms`);
        }
        throw new Error('All models failed. Please try again later.');
    }
}
