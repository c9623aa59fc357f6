export interface OllamaGenerateRequest {
    model: string;
    prompt: string;
    stream: false;
}

export interface OllamaGenerateResponse {
    model: string;
    created_at: string;
    response: string;
    done: boolean;
}

export interface OllamaEmbedRequest {
    model: string;
    input: string[];
}

export interface OllamaEmbedResponse {
    model: string;
    embeddings: number[][];
}

export interface OllamaTagsResponse {
    models: Array<{
        name: string;
        modified_at: string;
        size: number;
    }>;
}
