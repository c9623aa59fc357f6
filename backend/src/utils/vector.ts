/**
 * Cosine similarity of two vectors; 0 when either has zero length
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
        throw new Error('Embeddings must have same dimension');
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i++) {
        dotProduct += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    const denominator = Math.sqrt(normA) * Math.sqrt(normB);
    return denominator === 0 ? 0 : dotProduct / denominator;
}

/**
 * Similarity of each item to the one before it: result[i] compares i and i+1
 */
export function adjacentSimilarities(vectors: readonly (readonly number[])[]): number[] {
    const similarities: number[] = [];
    for (let i = 1; i < vectors.length; i++) {
        similarities.push(cosineSimilarity(vectors[i - 1], vectors[i]));
    }
    return similarities;
}
