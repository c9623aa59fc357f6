import { Router, Request, Response, NextFunction } from 'express';
import type { SessionRegistry } from '../services/registry.service';
import type { StorageService } from '../services/storage.service';

export interface SessionRouterDeps {
    registry: SessionRegistry;
    storage: StorageService;
}

/**
 * Parse an optional ISO timestamp from a request body
 */
export function parseTimestamp(value: unknown): Date | undefined | null {
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string' && typeof value !== 'number') return null;
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
}

export function createSessionRouter({ registry, storage }: SessionRouterDeps): Router {
    const sessions = Router();

    sessions.post('/', (_req: Request, res: Response) => {
        const session = registry.create();
        res.status(201).json(session.getSummary());
    });

    sessions.get('/', (_req: Request, res: Response) => {
        res.json(registry.list());
    });

    sessions.get('/saved', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            const saved = await storage.listSnapshots();
            res.json(saved.map(snapshot => snapshot.summary));
        } catch (error) {
            next(error);
        }
    });

    sessions.get('/saved/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const snapshot = await storage.loadSnapshot(req.params.id);
            if (!snapshot) {
                res.status(404).json({ error: 'Saved session not found' });
                return;
            }
            res.json(snapshot);
        } catch (error) {
            next(error);
        }
    });

    sessions.delete('/saved/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const removed = await storage.deleteSnapshot(req.params.id);
            res.status(removed ? 200 : 404).json({ deleted: removed });
        } catch (error) {
            next(error);
        }
    });

    sessions.get('/:id', (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(registry.get(req.params.id).getSummary());
        } catch (error) {
            next(error);
        }
    });

    // Transcription producer pushes one utterance
    sessions.post('/:id/utterances', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const { text, timestamp } = req.body ?? {};
            if (typeof text !== 'string' || !text.trim()) {
                res.status(400).json({ error: 'Text is required' });
                return;
            }
            const at = parseTimestamp(timestamp);
            if (at === null) {
                res.status(400).json({ error: 'Timestamp must be an ISO-8601 string' });
                return;
            }

            const session = registry.get(req.params.id);
            const result = await session.ingest(text, at);
            res.json({
                utterance: { ...result.utterance, timestamp: result.utterance.timestamp.toISOString() },
                chunks: result.chunks.map(chunk => ({
                    id: chunk.id,
                    text: chunk.text,
                    memberIds: chunk.members.map(u => u.id)
                })),
                decisionNodeIds: result.decisionNodeIds,
                error: result.error
            });
        } catch (error) {
            next(error);
        }
    });

    sessions.get('/:id/export', (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(registry.get(req.params.id).snapshot());
        } catch (error) {
            next(error);
        }
    });

    sessions.post('/:id/export', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const file = await storage.saveSnapshot(registry.get(req.params.id).snapshot());
            res.json({ message: 'Session exported', file });
        } catch (error) {
            next(error);
        }
    });

    sessions.post('/:id/stop', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = await registry.stop(req.params.id);
            res.json(session.getSummary());
        } catch (error) {
            next(error);
        }
    });

    sessions.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            await registry.delete(req.params.id);
            res.json({ message: 'Session deleted' });
        } catch (error) {
            next(error);
        }
    });

    return sessions;
}
