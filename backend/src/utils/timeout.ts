import { ProviderUnavailableError } from '../errors';

/**
 * Race a provider call against a deadline. Rejections and the deadline both
 * surface as ProviderUnavailableError.
 */
export async function withTimeout<T>(provider: string, work: Promise<T>, timeoutMs: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new ProviderUnavailableError(provider, `${provider} timed out after ${timeoutMs}ms`));
        }, timeoutMs);
    });

    try {
        return await Promise.race([work, deadline]);
    } catch (error) {
        if (error instanceof ProviderUnavailableError) {
            throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new ProviderUnavailableError(provider, `${provider} failed: ${message}`, error);
    } finally {
        if (timer) {
            clearTimeout(timer);
        }
    }
}
