import { describe, it, expect, vi, afterEach } from 'vitest';
import axios, { AxiosError } from 'axios';
import { OpenRouterService } from '../src/services/openrouter.service';
import { DRINKS_JSON } from './fakes';

afterEach(() => {
    vi.restoreAllMocks();
});

function reply(content: string) {
    return { data: { choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop' }] } };
}

describe('OpenRouterService', () => {
    it('moves on to the next model when one fails', async () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const post = vi
            .spyOn(axios, 'post')
            .mockRejectedValueOnce(new AxiosError('rate limited', '429'))
            .mockResolvedValueOnce(reply(DRINKS_JSON));
        const service = new OpenRouterService({
            apiKey: 'test-secret',
            models: ['model/a', 'model/b'],
            minRequestInterval: 0
        });

        const raw = await service.analyze('I want coffee');

        expect(raw).toBe(DRINKS_JSON);
        expect(post).toHaveBeenCalledTimes(2);
        expect(post.mock.calls[0][1]).toMatchObject({ model: 'model/a' });
        expect(post.mock.calls[1][1]).toMatchObject({ model: 'model/b' });
    });

    it('throws once every model has failed', async () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(axios, 'post').mockRejectedValue(new AxiosError('down'));
        const service = new OpenRouterService({ apiKey: 'test-secret', models: ['model/a'], minRequestInterval: 0 });

        await expect(service.analyze('x')).rejects.toThrow('All models failed. Please try again later.');
    });

    it('stops walking the model list once its time budget is spent', async () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const post = vi.spyOn(axios, 'post').mockImplementation(
            () => new Promise<never>((_resolve, reject) => setTimeout(() => reject(new AxiosError('timeout exceeded')), 40))
        );
        const service = new OpenRouterService({
            apiKey: 'test-secret',
            models: ['model/a', 'model/b'],
            minRequestInterval: 0,
            timeoutMs: 30
        });

        await expect(service.analyze('x')).rejects.toThrow('OpenRouter gave up after 30ms');
        expect(post).toHaveBeenCalledTimes(1);
        expect(post.mock.calls[0][2]?.timeout).toBeLessThanOrEqual(30);
    });

    it('refuses to run without an API key', async () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const service = new OpenRouterService({ apiKey: '' });

        await expect(service.analyze('x')).rejects.toThrow('OpenRouter API key not configured');
    });
});
