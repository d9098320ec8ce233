/**
 * @fileoverview Vector helpers shared by the registry and the in-process store
 *
 * @module domain/utils/vectors
 */

/**
 * Cosine similarity of two equal-length vectors, clamped to [0, 1].
 * Zero vectors score 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
        throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
    }

    let dot = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i += 1) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    if (normA === 0 || normB === 0) {
        return 0;
    }

    return clampUnit(dot / (Math.sqrt(normA) * Math.sqrt(normB)));
}

/**
 * Clamp to [0, 1]; NaN becomes 0.
 */
export function clampUnit(value: number): number {
    if (Number.isNaN(value)) {
        return 0;
    }
    return Math.min(1, Math.max(0, value));
}

/**
 * Sort by descending score; equal scores keep their input order.
 */
export function rankByScore<T extends { readonly score: number }>(items: readonly T[]): T[] {
    return items
        .map((item, index) => ({ item, index }))
        .sort((a, b) => b.item.score - a.item.score || a.index - b.index)
        .map(({ item }) => item);
}
