import type { Utterance, SemanticChunk } from '../types';
import type { EmbeddingProvider } from './embedding.service';
import { assertThreshold } from '../config';
import { ProviderUnavailableError } from '../errors';
import { adjacentSimilarities } from '../utils/vector';
import { withTimeout } from '../utils/timeout';

export interface ChunkerOptions {
    threshold: number;
    embeddingTimeoutMs?: number;
}

/**
 * Groups adjacent utterances into semantic chunks.
 *
 * Grouping is greedy and sequential: an utterance joins the open group when
 * its similarity to the utterance right before it is above the threshold.
 * Only groups of two or more become chunks. The chunker remembers the
 * highest utterance id it has put in a chunk and never groups that
 * utterance, or any earlier one, again.
 */
export class ChunkerService {
    private threshold: number;
    private embeddingTimeoutMs: number;
    private lastConsumedId = -1;
    private emitted = 0;

    constructor(private embedder: EmbeddingProvider, options: ChunkerOptions) {
        this.threshold = assertThreshold(options.threshold);
        this.embeddingTimeoutMs = options.embeddingTimeoutMs ?? 10000;
    }

    getLastConsumedId(): number {
        return this.lastConsumedId;
    }

    getEmittedCount(): number {
        return this.emitted;
    }

    /**
     * Close every chunk the window currently supports.
     * State only advances once all embeddings are in hand.
     */
    async chunk(window: readonly Utterance[], threshold: number = this.threshold): Promise<SemanticChunk[]> {
        assertThreshold(threshold);

        const eligible = window.filter(u => u.id > this.lastConsumedId);
        if (eligible.length < 2) {
            return [];
        }

        const vectors = await this.embed(eligible.map(u => u.text));
        const similarities = adjacentSimilarities(vectors);
        const groups = this.group(eligible, similarities, threshold);
        if (groups.length === 0) {
            return [];
        }

        const texts = groups.map(members => members.map(u => u.text).join(' '));
        const chunkVectors = await this.embed(texts);

        const chunks: SemanticChunk[] = groups.map((members, i) => ({
            id: `chunk_${this.emitted + i}`,
            text: texts[i],
            members,
            timestamp: members[0].timestamp,
            embedding: chunkVectors[i]
        }));

        this.emitted += chunks.length;
        this.lastConsumedId = Math.max(
            this.lastConsumedId,
            ...chunks.map(chunk => chunk.members[chunk.members.length - 1].id)
        );

        for (const chunk of chunks) {
            console.log(`🧩 New semantic chunk ${chunk.id}: ${chunk.text.substring(0, 100)}`);
        }
        return chunks;
    }

    private group(utterances: Utterance[], similarities: number[], threshold: number): Utterance[][] {
        const groups: Utterance[][] = [];
        let open: Utterance[] = [utterances[0]];

        for (let i = 1; i < utterances.length; i++) {
            if (similarities[i - 1] > threshold) {
                open.push(utterances[i]);
                continue;
            }
            if (open.length > 1) {
                groups.push(open);
            }
            open = [utterances[i]];
        }

        // A trailing single stays open for the next call
        if (open.length > 1) {
            groups.push(open);
        }
        return groups;
    }

    private async embed(texts: string[]): Promise<number[][]> {
        const vectors = await withTimeout(this.embedder.name, this.embedder.embed(texts), this.embeddingTimeoutMs);
        if (vectors.length !== texts.length) {
            throw new ProviderUnavailableError(
                this.embedder.name,
                `Expected ${texts.length} embeddings, got ${vectors.length}`
            );
        }
        if (vectors.some(vector => vector.length !== vectors[0].length)) {
            throw new ProviderUnavailableError(this.embedder.name, 'Embeddings have mixed dimensions');
        }
        return vectors;
    }
}
