/**
 * Qdrant similarity store
 *
 * SimilarityStore over the Qdrant REST API. Point ids must be UUIDs, which
 * every id the classifier writes already is.
 */

import { z } from "zod";
import type { SimilarityHit, SimilarityPoint, SimilarityStore } from "@legal-cascade/engine";
import { SimilarityStoreError } from "../../domain/errors.js";
import { clampUnit, rankByScore } from "../../domain/utils/vectors.js";

export interface QdrantSimilarityStoreConfig {
    /** Base URL, e.g. http://localhost:6333 */
    url: string;

    apiKey?: string;

    /** Per-request timeout in milliseconds (default: 5000) */
    timeoutMs?: number;
}

const searchResponseSchema = z.object({
    result: z.array(z.object({
        id     : z.union([z.string(), z.number()]),
        score  : z.number(),
        payload: z.record(z.unknown()).nullish(),
    })),
});

const countResponseSchema = z.object({
    result: z.object({ count: z.number().int() }),
});

type HttpMethod = "GET" | "PUT" | "POST";

function normalizeBaseUrl(value: string): string {
    return value.endsWith("/") ? value : `${value}/`;
}

/**
 * Qdrant-backed SimilarityStore
 */
export class QdrantSimilarityStore implements SimilarityStore {
    private baseUrl: string;
    private apiKey: string | undefined;
    private timeoutMs: number;
    private known = new Set<string>();

    constructor(config: QdrantSimilarityStoreConfig) {
        this.baseUrl = normalizeBaseUrl(config.url);
        this.apiKey = config.apiKey;
        this.timeoutMs = config.timeoutMs ?? 5_000;
    }

    /**
     * Send a request; resolves to the response, or undefined on 404.
     */
    private async request(method: HttpMethod, path: string, body?: unknown): Promise<Response | undefined> {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

        const headers: Record<string, string> = { "Content-Type": "application/json" };
        if (this.apiKey) {
            headers["api-key"] = this.apiKey;
        }

        try {
            const response = await fetch(new URL(path, this.baseUrl), {
                method,
                headers,
                signal: controller.signal,
                ...(body !== undefined && { body: JSON.stringify(body) }),
            });

            if (response.status === 404) {
                return undefined;
            }
            if (!response.ok) {
                throw new SimilarityStoreError(`Qdrant ${method} ${path} failed`, response.status);
            }
            return response;
        }
        catch (error) {
            if (error instanceof SimilarityStoreError) {
                throw error;
            }
            const message = controller.signal.aborted
                ? `no response within ${this.timeoutMs}ms`
                : error instanceof Error ? error.message : String(error);
            throw new SimilarityStoreError(`Qdrant ${method} ${path} failed: ${message}`);
        }
        finally {
            clearTimeout(timeout);
        }
    }

    private collectionPath(collection: string): string {
        return `collections/${encodeURIComponent(collection)}`;
    }

    async ensureCollection(collection: string, dimensions: number): Promise<void> {
        if (this.known.has(collection)) {
            return;
        }

        const existing = await this.request("GET", this.collectionPath(collection));
        if (!existing) {
            await this.request("PUT", this.collectionPath(collection), {
                vectors: { size: dimensions, distance: "Cosine" },
            });
        }
        this.known.add(collection);
    }

    async upsert(collection: string, points: readonly SimilarityPoint[]): Promise<void> {
        if (points.length === 0) {
            return;
        }

        const response = await this.request("PUT", `${this.collectionPath(collection)}/points?wait=true`, {
            points: points.map(point => ({
                id     : point.id,
                vector : point.vector,
                payload: point.payload,
            })),
        });
        if (!response) {
            throw new SimilarityStoreError(`Unknown collection: ${collection}`, 404);
        }
    }

    async search(
        collection: string,
        vector: readonly number[],
        limit: number,
        minScore?: number
    ): Promise<SimilarityHit[]> {
        if (limit <= 0) {
            return [];
        }

        const response = await this.request("POST", `${this.collectionPath(collection)}/points/search`, {
            vector,
            limit,
            with_payload: true,
            ...(minScore !== undefined && { score_threshold: minScore }),
        });
        if (!response) {
            return [];
        }

        const parsed = searchResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new SimilarityStoreError("Unexpected Qdrant search response");
        }

        return rankByScore(parsed.data.result.map(row => ({
            id     : String(row.id),
            score  : clampUnit(row.score),
            payload: row.payload ?? {},
        })));
    }

    async count(collection: string): Promise<number> {
        const response = await this.request("POST", `${this.collectionPath(collection)}/points/count`, { exact: true });
        if (!response) {
            return 0;
        }

        const parsed = countResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new SimilarityStoreError("Unexpected Qdrant count response");
        }
        return parsed.data.result.count;
    }
}
