import type { SessionSummary } from '../types';
import { ConversationSession } from './session.service';
import type { SessionOptions } from './session.service';
import { SessionNotFoundError } from '../errors';

export type SessionFactory = (sessionId?: string) => ConversationSession;

/**
 * Independent conversation sessions, keyed by id
 */
export class SessionRegistry {
    private sessions: Map<string, ConversationSession> = new Map();

    constructor(private factory: SessionFactory) {}

    static fromOptions(options: Omit<SessionOptions, 'sessionId'>): SessionRegistry {
        return new SessionRegistry(sessionId => new ConversationSession({ ...options, sessionId }));
    }

    create(sessionId?: string): ConversationSession {
        if (sessionId && this.sessions.has(sessionId)) {
            throw new Error(`Session ${sessionId} already exists`);
        }
        const session = this.factory(sessionId);
        this.sessions.set(session.id, session);
        console.log(`🎙️ Session ${session.id} started`);
        return session;
    }

    get(sessionId: string): ConversationSession {
        const session = this.sessions.get(sessionId);
        if (!session) {
            throw new SessionNotFoundError(sessionId);
        }
        return session;
    }

    getOrCreate(sessionId: string): ConversationSession {
        return this.sessions.get(sessionId) ?? this.create(sessionId);
    }

    has(sessionId: string): boolean {
        return this.sessions.has(sessionId);
    }

    list(): SessionSummary[] {
        return [...this.sessions.values()].map(session => session.getSummary());
    }

    async stop(sessionId: string): Promise<ConversationSession> {
        const session = this.get(sessionId);
        await session.stop();
        return session;
    }

    async delete(sessionId: string): Promise<void> {
        const session = this.get(sessionId);
        await session.stop();
        this.sessions.delete(sessionId);
    }

    async stopAll(): Promise<void> {
        await Promise.all([...this.sessions.values()].map(session => session.stop()));
    }
}
