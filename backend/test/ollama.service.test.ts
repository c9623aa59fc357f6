import { describe, it, expect, vi, afterEach } from 'vitest';
import axios from 'axios';
import { OllamaService } from '../src/services/ollama.service';
import { OllamaEmbeddingService } from '../src/services/embedding.service';
import { DRINKS_JSON } from './fakes';

afterEach(() => {
    vi.restoreAllMocks();
});

describe('OllamaService', () => {
    it('asks /api/generate for a non-streamed analysis', async () => {
        const post = vi.spyOn(axios, 'post').mockResolvedValue({ data: { response: DRINKS_JSON, done: true } });
        const ollama = new OllamaService({ baseUrl: 'http://ollama.test:11434/', model: 'llama3.2:3b', timeoutMs: 500 });

        const raw = await ollama.analyze('I want coffee');

        expect(raw).toBe(DRINKS_JSON);
        expect(post).toHaveBeenCalledTimes(1);
        const [url, body, options] = post.mock.calls[0];
        expect(url).toBe('http://ollama.test:11434/api/generate');
        expect(body).toMatchObject({ model: 'llama3.2:3b', stream: false });
        expect(options).toMatchObject({ timeout: 500 });
    });

    it('returns an empty string when the reply has no response field', async () => {
        vi.spyOn(axios, 'post').mockResolvedValue({ data: { done: true } });
        const ollama = new OllamaService({ baseUrl: 'http://ollama.test', model: 'm' });

        expect(await ollama.analyze('x')).toBe('');
    });

    it('reports availability from the pulled model list', async () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const get = vi.spyOn(axios, 'get').mockResolvedValue({ data: { models: [{ name: 'llama3.2:3b' }] } });

        expect(await new OllamaService({ baseUrl: 'http://ollama.test', model: 'llama3.2:3b' }).isAvailable()).toBe(true);
        expect(await new OllamaService({ baseUrl: 'http://ollama.test', model: 'other' }).isAvailable()).toBe(false);
        expect(get).toHaveBeenCalledWith('http://ollama.test/api/tags', { timeout: 5000 });

        get.mockRejectedValue(new Error('ECONNREFUSED'));
        expect(await new OllamaService({ baseUrl: 'http://ollama.test', model: 'llama3.2:3b' }).isAvailable()).toBe(false);
    });
});

describe('OllamaEmbeddingService', () => {
    it('embeds a batch in one call and keeps input order', async () => {
        const post = vi.spyOn(axios, 'post').mockResolvedValue({ data: { embeddings: [[1, 0], [0, 1]] } });
        const embedder = new OllamaEmbeddingService({ baseUrl: 'http://ollama.test', model: 'all-minilm' });

        const vectors = await embedder.embed(['first', 'second', 'first']);

        expect(vectors).toEqual([[1, 0], [0, 1], [1, 0]]);
        expect(post).toHaveBeenCalledTimes(1);
        expect(post.mock.calls[0][0]).toBe('http://ollama.test/api/embed');
        expect(post.mock.calls[0][1]).toEqual({ model: 'all-minilm', input: ['first', 'second'] });
    });

    it('serves repeated texts from its cache', async () => {
        const post = vi.spyOn(axios, 'post').mockResolvedValue({ data: { embeddings: [[0.5, 0.5]] } });
        const embedder = new OllamaEmbeddingService({ baseUrl: 'http://ollama.test', model: 'all-minilm' });

        await embedder.embed(['same']);
        const again = await embedder.embed(['same']);

        expect(again).toEqual([[0.5, 0.5]]);
        expect(post).toHaveBeenCalledTimes(1);
    });

    it('evicts the least recently used vector once the cache is full', async () => {
        const post = vi
            .spyOn(axios, 'post')
            .mockResolvedValueOnce({ data: { embeddings: [[1, 0], [0, 1]] } })
            .mockResolvedValueOnce({ data: { embeddings: [[1, 1]] } })
            .mockResolvedValueOnce({ data: { embeddings: [[0, 2]] } });
        const embedder = new OllamaEmbeddingService({ baseUrl: 'http://ollama.test', model: 'all-minilm', cacheSize: 2 });

        await embedder.embed(['a', 'b']);
        await embedder.embed(['a']);
        await embedder.embed(['c']);
        expect(await embedder.embed(['a'])).toEqual([[1, 0]]);
        expect(post).toHaveBeenCalledTimes(2);

        expect(await embedder.embed(['b'])).toEqual([[0, 2]]);
        expect(post).toHaveBeenCalledTimes(3);
        expect(post.mock.calls[2][1]).toEqual({ model: 'all-minilm', input: ['b'] });
    });

    it('rejects a reply with the wrong number of vectors', async () => {
        vi.spyOn(axios, 'post').mockResolvedValue({ data: { embeddings: [[1, 0]] } });
        const embedder = new OllamaEmbeddingService({ baseUrl: 'http://ollama.test', model: 'all-minilm' });

        await expect(embedder.embed(['a', 'b'])).rejects.toThrow('Invalid embedding response from Ollama');
    });
});
