function maxMagnitude(vector: readonly number[]): number {
    let max = 0;
    for (const value of vector) {
        max = Math.max(max, Math.abs(value));
    }
    return max;
}

/**
 * Cosine similarity of two equal-length vectors. A zero vector has no direction and scores 0.
 *
 * Each vector is divided by its largest component first, so squares stay in range for components
 * near the limits of a double.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
        throw new Error(`Cannot compare vectors of dimension ${a.length} and ${b.length}.`);
    }

    const scaleA = maxMagnitude(a);
    const scaleB = maxMagnitude(b);
    if (scaleA === 0 || scaleB === 0) {
        return 0;
    }

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i += 1) {
        const x = a[i] / scaleA;
        const y = b[i] / scaleB;
        dot += x * y;
        normA += x * x;
        normB += y * y;
    }

    // sqrt of the product keeps identical vectors at exactly 1
    const score = dot / Math.sqrt(normA * normB);
    return Math.min(1, Math.max(-1, score));
}
