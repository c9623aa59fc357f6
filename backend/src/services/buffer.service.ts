import type { Utterance } from '../types';

/**
 * Append-only store of utterances for one session. Ids start at 0 and
 * increase by one per append; nothing is ever evicted.
 */
export class BufferService {
    private utterances: Utterance[] = [];

    get size(): number {
        return this.utterances.length;
    }

    append(text: string, timestamp: Date = new Date()): Utterance {
        const trimmed = text.trim();
        if (!trimmed) {
            throw new RangeError('Utterance text cannot be empty');
        }

        const utterance: Utterance = Object.freeze({
            id: this.utterances.length,
            text: trimmed,
            timestamp
        });
        this.utterances.push(utterance);
        return utterance;
    }

    /**
     * The last n utterances in arrival order (fewer if the buffer is shorter)
     */
    recentWindow(n: number): Utterance[] {
        if (n <= 0) return [];
        return this.utterances.slice(-n);
    }

    getAll(): Utterance[] {
        return [...this.utterances];
    }
}
