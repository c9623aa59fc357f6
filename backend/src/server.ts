import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { loadConfig } from './config';
import type { AppConfig } from './config';
import { ConversationGraphError, SessionStoppedError, errorMessage } from './errors';
import { OllamaService } from './services/ollama.service';
import { OpenRouterService } from './services/openrouter.service';
import { OllamaEmbeddingService } from './services/embedding.service';
import { ConversationSession } from './services/session.service';
import { SessionRegistry } from './services/registry.service';
import { StorageService } from './services/storage.service';
import { createSessionRouter, parseTimestamp } from './routes/sessions';
import { createVapiRouter } from './routes/vapi';
import type { StructuredAnalyzer } from './types';

export interface AppDeps {
    config: AppConfig;
    registry: SessionRegistry;
    storage: StorageService;
    analyzer: StructuredAnalyzer;
    ollama?: OllamaService;
}

const STATUS_BY_CODE: Record<string, number> = {
    session_not_found: 404,
    session_stopped: 409,
    provider_unavailable: 503
};

export function createAnalyzer(config: AppConfig): StructuredAnalyzer {
    if (config.analyzerProvider === 'openrouter') {
        return new OpenRouterService({
            apiKey: config.openRouter.apiKey,
            timeoutMs: config.timeouts.analyzerMs
        });
    }
    return new OllamaService({
        baseUrl: config.ollama.url,
        model: config.ollama.model,
        timeoutMs: config.timeouts.analyzerMs
    });
}

/**
 * Registry whose sessions broadcast graph changes to their Socket.IO room
 */
export function createSessionRegistry(config: AppConfig, analyzer: StructuredAnalyzer, io?: SocketIOServer): SessionRegistry {
    const embedder = new OllamaEmbeddingService({
        baseUrl: config.ollama.url,
        model: config.ollama.embeddingModel,
        timeoutMs: config.timeouts.embeddingMs,
        cacheSize: config.ollama.embeddingCacheSize
    });

    return new SessionRegistry(sessionId => {
        const session = new ConversationSession({
            embedder,
            analyzer,
            sessionId,
            threshold: config.chunking.threshold,
            windowSize: config.chunking.windowSize,
            embeddingTimeoutMs: config.timeouts.embeddingMs,
            analyzerTimeoutMs: config.timeouts.analyzerMs
        });
        if (io) {
            session.onUpdate((snapshot, result) => {
                io.to(snapshot.sessionId).emit('graph:update', snapshot);
                io.to(snapshot.sessionId).emit('chunk:created', {
                    chunks: result.chunks.map(chunk => ({ id: chunk.id, text: chunk.text })),
                    decisionNodeIds: result.decisionNodeIds
                });
            });
        }
        return session;
    });
}

export function createApp({ config, registry, storage, analyzer, ollama }: AppDeps): Express {
    const app = express();

    app.use(helmet()); // Security headers
    app.use(cors({
        origin: config.frontendUrl,
        credentials: true
    }));
    app.use(morgan('combined')); // Logging
    app.use(express.json());
    app.use(express.urlencoded({ extended: true }));

    app.get('/api/health', async (_req: Request, res: Response) => {
        const analyzerReachable = ollama ? await ollama.isAvailable() : undefined;
        res.json({
            status: 'OK',
            timestamp: new Date().toISOString(),
            analyzer: analyzer.name,
            analyzerReachable,
            sessions: registry.list().length
        });
    });

    app.use('/api/sessions', createSessionRouter({ registry, storage }));
    app.use('/api/vapi', createVapiRouter(registry));

    // Error handling middleware
    app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof ConversationGraphError) {
            res.status(STATUS_BY_CODE[err.code] ?? 400).json({ error: err.code, message: err.message });
            return;
        }
        if (err instanceof RangeError) {
            res.status(400).json({ error: 'invalid_request', message: err.message });
            return;
        }
        console.error(err.stack);
        res.status(500).json({
            error: 'Something went wrong!',
            message: process.env.NODE_ENV === 'development' ? err.message : 'Internal server error'
        });
    });

    // 404 handler
    app.use((_req: Request, res: Response) => {
        res.status(404).json({ error: 'Route not found' });
    });

    return app;
}

/**
 * Socket.IO: clients join a session room, producers push utterances
 */
export function attachSocketHandlers(io: SocketIOServer, registry: SessionRegistry): void {
    io.on('connection', (socket) => {
        console.log(`✅ Client connected: ${socket.id}`);

        socket.on('disconnect', () => {
            console.log(`❌ Client disconnected: ${socket.id}`);
        });

        socket.on('session:join', async (data: { sessionId?: string }) => {
            try {
                const session = data?.sessionId ? registry.get(data.sessionId) : registry.create();
                await socket.join(session.id);
                socket.emit('graph:update', session.snapshot());
            } catch (error) {
                socket.emit('error', { message: errorMessage(error) });
            }
        });

        socket.on('graph:request', (data: { sessionId: string }) => {
            try {
                socket.emit('graph:update', registry.get(data.sessionId).snapshot());
            } catch (error) {
                socket.emit('error', { message: errorMessage(error) });
            }
        });

        socket.on('utterance', async (data: { sessionId: string; text: string; timestamp?: string }) => {
            try {
                const session = registry.get(data.sessionId);
                const result = await session.ingest(data.text, parseTimestamp(data.timestamp) ?? undefined);
                socket.emit('utterance:accepted', {
                    id: result.utterance.id,
                    chunks: result.chunks.length,
                    error: result.error
                });
            } catch (error) {
                const code = error instanceof SessionStoppedError ? 'session_stopped' : 'invalid_utterance';
                socket.emit('error', { code, message: errorMessage(error) });
            }
        });
    });
}

async function start(): Promise<void> {
    const config = loadConfig();
    const app = express();
    const httpServer = createServer(app);
    const io = new SocketIOServer(httpServer, {
        cors: {
            origin: [config.frontendUrl],
            methods: ['GET', 'POST'],
            credentials: true
        }
    });

    const analyzer = createAnalyzer(config);
    const ollama = analyzer instanceof OllamaService ? analyzer : undefined;
    const registry = createSessionRegistry(config, analyzer, io);
    const storage = new StorageService(config.dataDir);

    if (ollama && !(await ollama.isAvailable())) {
        console.warn(`⚠️  Start Ollama and run: ollama pull ${config.ollama.model} && ollama pull ${config.ollama.embeddingModel}`);
    }

    app.use(createApp({ config, registry, storage, analyzer, ollama }));
    attachSocketHandlers(io, registry);

    const shutdown = async (): Promise<void> => {
        console.log('\n👋 Shutting down, finishing in-flight work...');
        await registry.stopAll();
        io.close();
        process.exit(0);
    };
    process.on('SIGINT', () => {
        shutdown().catch(error => {
            console.error('❌ Shutdown failed:', error);
            process.exit(1);
        });
    });

    httpServer.listen(config.port, () => {
        console.log(`🚀 Server running on port ${config.port}`);
        console.log(`🏥 Health check at http://localhost:${config.port}/api/health`);
        console.log(`🧩 Chunk threshold ${config.chunking.threshold}, window ${config.chunking.windowSize}`);
        console.log(`🤖 Analyzer: ${analyzer.name}`);
        console.log(`🎙️  Vapi webhook at http://localhost:${config.port}/api/vapi/webhook`);
    });
}

if (require.main === module) {
    start().catch(error => {
        console.error('❌ Failed to start server:', error);
        process.exit(1);
    });
}
