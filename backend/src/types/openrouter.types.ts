export interface ChatMessage {
    role: 'user' | 'assistant' | 'system';
    content: string;
}

export interface OpenRouterChatRequest {
    model: string;
    messages: ChatMessage[];
    temperature?: number;
    max_tokens?: number;
}

// Only the parts of a completion the analyzer reads
export interface OpenRouterResponse {
    id?: string;
    model?: string;
    choices: Array<{
        message?: {
            role: string;
            content: string | null;
        };
        finish_reason?: string;
    }>;
}
