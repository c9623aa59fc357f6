/**
 * A single unit of transcribed speech as it arrives from the producer
 */
export interface Utterance {
    readonly id: number;
    readonly text: string;
    readonly timestamp: Date;
}

/**
 * A run of two or more adjacent utterances that stayed on one subject
 */
export interface SemanticChunk {
    readonly id: string;
    readonly text: string; // Member texts joined with a single space
    readonly members: readonly Utterance[];
    readonly timestamp: Date; // Timestamp of the first member
    readonly embedding: readonly number[];
}

export type ChunkMode = 'exploratory' | 'live';
