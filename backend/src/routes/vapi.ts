import { Router, Request, Response, NextFunction } from 'express';
import type { SessionRegistry } from '../services/registry.service';
import type { VapiWebhookEvent } from '../types';
import { parseTimestamp } from './sessions';

const DEFAULT_CALL = 'vapi-default';

function isWebhookEvent(value: unknown): value is VapiWebhookEvent {
    if (typeof value !== 'object' || value === null || !('type' in value)) return false;
    return value.type === 'transcript' || value.type === 'conversation-start' || value.type === 'conversation-end';
}

/**
 * Vapi as a transcription producer: final transcripts become utterances in
 * the session named after the call
 */
export function createVapiRouter(registry: SessionRegistry): Router {
    const vapi = Router();

    vapi.post('/webhook', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const event: unknown = req.body?.message ?? req.body;
            if (!isWebhookEvent(event)) {
                console.log('🔔 Ignoring Vapi webhook event:', req.body?.type ?? 'unknown');
                res.json({ received: true });
                return;
            }

            const sessionId = event.call?.id ?? DEFAULT_CALL;

            switch (event.type) {
                case 'conversation-start':
                    console.log('🎙️ Conversation started');
                    registry.getOrCreate(sessionId);
                    break;

                case 'conversation-end':
                    console.log('🛑 Conversation ended');
                    if (registry.has(sessionId)) {
                        await registry.stop(sessionId);
                    }
                    break;

                case 'transcript': {
                    if (event.transcriptType === 'partial' || typeof event.transcript !== 'string' || !event.transcript.trim()) {
                        break;
                    }
                    const session = registry.getOrCreate(sessionId);
                    if (session.status === 'stopped') {
                        console.warn(`⚠️ Transcript for stopped session ${sessionId} dropped`);
                        break;
                    }
                    const result = await session.ingest(event.transcript, parseTimestamp(event.timestamp) ?? undefined);
                    res.json({ received: true, utteranceId: result.utterance.id, chunks: result.chunks.length });
                    return;
                }
            }

            res.json({ received: true });
        } catch (error) {
            next(error);
        }
    });

    return vapi;
}
