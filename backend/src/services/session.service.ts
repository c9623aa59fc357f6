import { v4 as uuidv4 } from 'uuid';
import type {
    IngestResult,
    SemanticChunk,
    SessionListener,
    SessionSnapshot,
    SessionStatus,
    SessionSummary,
    StructuredAnalyzer
} from '../types';
import type { EmbeddingProvider } from './embedding.service';
import { BufferService } from './buffer.service';
import { ChunkerService } from './chunker.service';
import { GraphService } from './graph.service';
import { AnalysisService } from './analysis.service';
import { ProviderUnavailableError, SessionStoppedError, errorMessage } from '../errors';
import { SerialQueue } from '../utils/serial-queue';

export interface SessionOptions {
    embedder: EmbeddingProvider;
    analyzer: StructuredAnalyzer;
    threshold: number;
    windowSize?: number;
    embeddingTimeoutMs?: number;
    analyzerTimeoutMs?: number;
    sessionId?: string;
    now?: () => Date;
}

/**
 * One conversation: owns the utterance buffer, the chunker cursor, the
 * chunk list and the decision graph. Utterances are appended as they
 * arrive; chunking and graph updates run one at a time behind them.
 */
export class ConversationSession {
    readonly id: string;
    readonly startedAt: Date;
    private stoppedAt?: Date;
    private buffer = new BufferService();
    private chunker: ChunkerService;
    private graph: GraphService;
    private analysis: AnalysisService;
    private chunks: SemanticChunk[] = [];
    private queue = new SerialQueue();
    private listeners: SessionListener[] = [];
    private windowSize: number;
    private now: () => Date;

    constructor(options: SessionOptions) {
        this.id = options.sessionId ?? uuidv4();
        this.now = options.now ?? (() => new Date());
        this.startedAt = this.now();
        this.windowSize = options.windowSize ?? 10;
        this.chunker = new ChunkerService(options.embedder, {
            threshold: options.threshold,
            embeddingTimeoutMs: options.embeddingTimeoutMs
        });
        this.graph = new GraphService(this.now);
        this.analysis = new AnalysisService(options.analyzer, options.analyzerTimeoutMs);
    }

    get status(): SessionStatus {
        return this.stoppedAt ? 'stopped' : 'active';
    }

    get pending(): number {
        return this.queue.size;
    }

    getGraph(): GraphService {
        return this.graph;
    }

    getChunks(): SemanticChunk[] {
        return [...this.chunks];
    }

    onUpdate(listener: SessionListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    /**
     * Record an utterance and queue the chunk/graph step behind it. The step
     * works on the window as it stood when this utterance arrived.
     * Throws up front for empty text or a stopped session; the returned
     * promise itself never rejects.
     */
    ingest(text: string, timestamp: Date = this.now()): Promise<IngestResult> {
        if (this.stoppedAt) {
            throw new SessionStoppedError(this.id);
        }

        const utterance = this.buffer.append(text, timestamp);
        const recent = this.buffer.recentWindow(this.windowSize);
        console.log(`📝 [${this.id.substring(0, 8)}] #${utterance.id} ${utterance.text}`);

        return this.queue.run(async (): Promise<IngestResult> => {
            const result: IngestResult = { utterance, chunks: [], decisionNodeIds: [] };
            let closed: SemanticChunk[];
            try {
                closed = await this.chunker.chunk(recent);
            } catch (error) {
                if (error instanceof ProviderUnavailableError) {
                    console.warn(`⚠️ Embeddings unavailable, will retry on next utterance: ${error.message}`);
                } else {
                    console.error(`❌ Chunking failed: ${errorMessage(error)}`);
                }
                result.error = 'provider_unavailable';
                return result;
            }

            // A chunk is recorded only once its decision node is in the graph
            for (const chunk of closed) {
                try {
                    const { analysis } = await this.analysis.analyze(chunk.text);
                    result.decisionNodeIds.push(this.graph.addChunk(chunk, analysis));
                    this.chunks.push(chunk);
                    result.chunks.push(chunk);
                } catch (error) {
                    console.error(`❌ Could not add ${chunk.id} to the graph: ${errorMessage(error)}`);
                }
            }

            if (result.chunks.length > 0) {
                this.notify(result);
            }
            return result;
        });
    }

    /**
     * Refuse new utterances and wait for queued work to finish
     */
    async stop(): Promise<void> {
        if (!this.stoppedAt) {
            this.stoppedAt = this.now();
            console.log(`🛑 Session ${this.id} stopping (${this.queue.size} pending)`);
        }
        await this.queue.drain();
    }

    getSummary(): SessionSummary {
        const stats = this.graph.getStats();
        return {
            sessionId: this.id,
            status: this.status,
            totalSegments: this.buffer.size,
            semanticChunks: this.chunks.length,
            decisionNodes: stats.decisionNodes,
            optionNodes: stats.optionNodes
        };
    }

    snapshot(): SessionSnapshot {
        return {
            sessionId: this.id,
            status: this.status,
            startedAt: this.startedAt.toISOString(),
            ...(this.stoppedAt ? { stoppedAt: this.stoppedAt.toISOString() } : {}),
            utterances: this.buffer.getAll().map(u => ({
                id: u.id,
                text: u.text,
                timestamp: u.timestamp.toISOString()
            })),
            chunks: this.chunks.map(chunk => ({
                id: chunk.id,
                text: chunk.text,
                memberIds: chunk.members.map(u => u.id),
                timestamp: chunk.timestamp.toISOString(),
                embedding: [...chunk.embedding]
            })),
            graph: this.graph.toJSON(),
            summary: this.getSummary()
        };
    }

    private notify(result: IngestResult): void {
        if (this.listeners.length === 0) return;
        const snapshot = this.snapshot();
        for (const listener of this.listeners) {
            try {
                listener(snapshot, result);
            } catch (error) {
                console.error('❌ Session listener failed:', error);
            }
        }
    }
}
