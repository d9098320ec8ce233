/**
 * Local hashing embedder
 *
 * Feature-hashes word tokens into a fixed-size unit vector. Needs no model
 * server, so retrieval keeps working offline. Similarity reflects shared
 * vocabulary only.
 */

import type { Embedder } from "@legal-cascade/engine";

export const kHASHING_DIMENSIONS = 384;

function normalizeText(value: string): string {
    return value
        .toLowerCase()
        .replace(/[^a-z0-9\s]/g, " ")
        .replace(/\s+/g, " ")
        .trim();
}

/** 32-bit FNV-1a */
function hashToken(token: string): number {
    let hash = 2166136261;
    for (let i = 0; i < token.length; i++) {
        hash ^= token.charCodeAt(i);
        hash = Math.imul(hash, 16777619);
    }
    return hash >>> 0;
}

function unitNormalize(values: number[]): number[] {
    let norm = 0;
    for (const value of values) {
        norm += value * value;
    }
    if (norm <= 0) {
        return values;
    }
    const inv = 1 / Math.sqrt(norm);
    return values.map(value => Number((value * inv).toFixed(7)));
}

export class HashingEmbedder implements Embedder {
    readonly dimensions: number;

    constructor(dimensions: number = kHASHING_DIMENSIONS) {
        if (!Number.isInteger(dimensions) || dimensions < 1) {
            throw new RangeError(`Invalid embedding dimensions: ${dimensions}`);
        }
        this.dimensions = dimensions;
    }

    /** Synchronous form of {@link embed} */
    embedSync(text: string): number[] {
        const values = new Array<number>(this.dimensions).fill(0);
        const tokens = normalizeText(text).split(" ").filter(token => token.length > 1);

        for (const token of tokens) {
            const hash = hashToken(token);
            const index = hash % this.dimensions;
            const sign = hash % 2 === 0 ? 1 : -1;
            values[index] = (values[index] ?? 0) + sign * Math.min(3.2, 1 + token.length / 12);
        }

        return unitNormalize(values);
    }

    async embed(text: string): Promise<number[]> {
        return this.embedSync(text);
    }
}
