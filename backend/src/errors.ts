export type ErrorCode =
    | 'provider_unavailable'
    | 'malformed_analysis'
    | 'session_not_found'
    | 'session_stopped';

export class ConversationGraphError extends Error {
    readonly code: ErrorCode;
    readonly details: Record<string, unknown>;

    constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}) {
        super(message);
        this.name = 'ConversationGraphError';
        this.code = code;
        this.details = details;
    }
}

/**
 * An embedding or analyzer call failed or timed out. Recoverable: the next
 * utterance retries the same window.
 */
export class ProviderUnavailableError extends ConversationGraphError {
    readonly provider: string;

    constructor(provider: string, message: string, cause?: unknown) {
        super('provider_unavailable', message, { provider });
        this.name = 'ProviderUnavailableError';
        this.provider = provider;
        if (cause !== undefined) {
            this.cause = cause;
        }
    }
}

/**
 * The analyzer answered but no usable structured payload could be read.
 * Never leaves the analysis service.
 */
export class MalformedAnalysisError extends ConversationGraphError {
    constructor(message: string, raw: string) {
        super('malformed_analysis', message, { raw: raw.slice(0, 200) });
        this.name = 'MalformedAnalysisError';
    }
}

export class SessionNotFoundError extends ConversationGraphError {
    constructor(sessionId: string) {
        super('session_not_found', `Session ${sessionId} not found`, { sessionId });
        this.name = 'SessionNotFoundError';
    }
}

export class SessionStoppedError extends ConversationGraphError {
    constructor(sessionId: string) {
        super('session_stopped', `Session ${sessionId} is stopped`, { sessionId });
        this.name = 'SessionStoppedError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}
