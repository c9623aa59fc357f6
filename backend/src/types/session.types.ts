import type { Utterance, SemanticChunk } from './conversation.types';
import type { GraphJSON } from './graph.types';

export type SessionStatus = 'active' | 'stopped';

export interface IngestResult {
    utterance: Utterance;
    chunks: SemanticChunk[];
    decisionNodeIds: string[];
    error?: 'provider_unavailable';
}

export interface SessionSummary {
    sessionId: string;
    status: SessionStatus;
    totalSegments: number;
    semanticChunks: number;
    decisionNodes: number;
    optionNodes: number;
}

export interface UtteranceJSON {
    id: number;
    text: string;
    timestamp: string;
}

export interface ChunkJSON {
    id: string;
    text: string;
    memberIds: number[];
    timestamp: string;
    embedding: number[];
}

/**
 * Read-only export of a session; every instant is an ISO-8601 string
 */
export interface SessionSnapshot {
    sessionId: string;
    status: SessionStatus;
    startedAt: string;
    stoppedAt?: string;
    utterances: UtteranceJSON[];
    chunks: ChunkJSON[];
    graph: GraphJSON;
    summary: SessionSummary;
}

export type SessionListener = (session: SessionSnapshot, result: IngestResult) => void;
