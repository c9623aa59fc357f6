import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import axios, { AxiosInstance } from 'axios';
import type { Server } from 'http';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createApp } from '../src/server';
import { loadConfig } from '../src/config';
import { SessionRegistry } from '../src/services/registry.service';
import { StorageService } from '../src/services/storage.service';
import { FakeAnalyzer, FakeEmbedder, DRINKS_JSON, at } from './fakes';

describe('HTTP routes', () => {
    let server: Server;
    let client: AxiosInstance;
    let dataDir: string;
    let registry: SessionRegistry;

    beforeEach(async () => {
        dataDir = await mkdtemp(join(tmpdir(), 'decision-graph-http-'));
        registry = SessionRegistry.fromOptions({
            embedder: new FakeEmbedder({
                'I want coffee': at(0.85),
                'Coffee sounds great': [1, 0]
            }),
            analyzer: new FakeAnalyzer(() => DRINKS_JSON),
            threshold: 0.7
        });
        const app = createApp({
            config: loadConfig({}),
            registry,
            storage: new StorageService(dataDir),
            analyzer: new FakeAnalyzer(() => DRINKS_JSON)
        });
        server = await new Promise<Server>(resolve => {
            const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
        });
        const address = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('Server is not listening on a TCP port');
        }
        client = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
    });

    afterEach(async () => {
        await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
        await rm(dataDir, { recursive: true, force: true });
    });

    it('creates a session and grows its graph from posted utterances', async () => {
        const created = await client.post('/api/sessions');
        expect(created.status).toBe(201);
        const id: string = created.data.sessionId;

        await client.post(`/api/sessions/${id}/utterances`, { text: 'I want coffee', timestamp: '2024-05-01T10:00:00.000Z' });
        const second = await client.post(`/api/sessions/${id}/utterances`, { text: 'Coffee sounds great' });

        expect(second.status).toBe(200);
        expect(second.data.decisionNodeIds).toEqual(['chunk_0']);
        expect(second.data.chunks).toEqual([{ id: 'chunk_0', text: 'I want coffee Coffee sounds great', memberIds: [0, 1] }]);

        const exported = await client.get(`/api/sessions/${id}/export`);
        expect(exported.data.utterances[0].timestamp).toBe('2024-05-01T10:00:00.000Z');
        expect(exported.data.summary).toMatchObject({ decisionNodes: 1, optionNodes: 2 });
    });

    it('validates utterance bodies', async () => {
        const id: string = (await client.post('/api/sessions')).data.sessionId;

        expect((await client.post(`/api/sessions/${id}/utterances`, { text: '  ' })).status).toBe(400);
        expect((await client.post(`/api/sessions/${id}/utterances`, { text: 'hi', timestamp: 'yesterday' })).status).toBe(400);
    });

    it('maps unknown and stopped sessions to 404 and 409', async () => {
        expect((await client.get('/api/sessions/missing')).status).toBe(404);

        const id: string = (await client.post('/api/sessions')).data.sessionId;
        await client.post(`/api/sessions/${id}/stop`);
        const late = await client.post(`/api/sessions/${id}/utterances`, { text: 'too late' });

        expect(late.status).toBe(409);
        expect(late.data.error).toBe('session_stopped');
    });

    it('saves an export to disk', async () => {
        const id: string = (await client.post('/api/sessions')).data.sessionId;

        const saved = await client.post(`/api/sessions/${id}/export`);

        expect(saved.data.file).toBe(join(dataDir, 'exports', `${id}.json`));
        const listed = await client.get('/api/sessions/saved');
        expect(listed.data.map((s: { sessionId: string }) => s.sessionId)).toEqual([id]);

        const loaded = await client.get(`/api/sessions/saved/${id}`);
        expect(loaded.data.sessionId).toBe(id);
        expect((await client.delete(`/api/sessions/saved/${id}`)).data).toEqual({ deleted: true });
        expect((await client.get(`/api/sessions/saved/${id}`)).status).toBe(404);
    });

    it('ingests final Vapi transcripts into the call session', async () => {
        await client.post('/api/vapi/webhook', { message: { type: 'transcript', transcriptType: 'partial', transcript: 'I wa', call: { id: 'call-1' } } });
        await client.post('/api/vapi/webhook', { message: { type: 'transcript', transcriptType: 'final', transcript: 'I want coffee', call: { id: 'call-1' } } });
        await client.post('/api/vapi/webhook', { type: 'transcript', transcript: 'Coffee sounds great', call: { id: 'call-1' } });
        await client.post('/api/vapi/webhook', { type: 'conversation-end', call: { id: 'call-1' } });

        expect(registry.get('call-1').getSummary()).toEqual({
            sessionId: 'call-1',
            status: 'stopped',
            totalSegments: 2,
            semanticChunks: 1,
            decisionNodes: 1,
            optionNodes: 2
        });
    });
});
