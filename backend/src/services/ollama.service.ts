import axios, { AxiosResponse } from 'axios';
import type { OllamaGenerateRequest, OllamaGenerateResponse, OllamaTagsResponse, StructuredAnalyzer } from '../types';
import { buildAnalysisPrompt } from './analysis.service';
import { errorMessage } from '../errors';

export interface OllamaOptions {
    baseUrl: string;
    model: string;
    timeoutMs?: number;
}

/**
 * Structured analysis through a local Ollama model
 */
export class OllamaService implements StructuredAnalyzer {
    readonly name = 'ollama';
    private baseUrl: string;
    private model: string;
    private timeoutMs: number;

    constructor(options: OllamaOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.model = options.model;
        this.timeoutMs = options.timeoutMs ?? 30000;
    }

    async analyze(text: string): Promise<string> {
        return this.generate(buildAnalysisPrompt(text));
    }

    async generate(prompt: string): Promise<string> {
        const body: OllamaGenerateRequest = {
            model: this.model,
            prompt,
            stream: false
        };

        try {
            const response: AxiosResponse<OllamaGenerateResponse> = await axios.post(
                `${this.baseUrl}/api/generate`,
                body,
                {
                    headers: { 'Content-Type': 'application/json' },
                    timeout: this.timeoutMs
                }
            );
            return typeof response.data?.response === 'string' ? response.data.response : '';
        } catch (error) {
            if (axios.isAxiosError(error)) {
                const status = error.response?.status;
                throw new Error(`Ollama API Error${status ? ` (${status})` : ''}: ${error.message}`);
            }
            throw error;
        }
    }

    /**
     * True when the server answers and has the configured model pulled
     */
    async isAvailable(): Promise<boolean> {
        try {
            const response: AxiosResponse<OllamaTagsResponse> = await axios.get(`${this.baseUrl}/api/tags`, {
                timeout: 5000
            });
            const models = response.data?.models ?? [];
            const found = models.some(model => model.name === this.model);
            if (!found) {
                console.warn(`⚠️  Ollama is running but ${this.model} is not pulled (ollama pull ${this.model})`);
            }
            return found;
        } catch (error) {
            console.warn(`⚠️  Ollama is not reachable at ${this.baseUrl}: ${errorMessage(error)}`);
            return false;
        }
    }
}
