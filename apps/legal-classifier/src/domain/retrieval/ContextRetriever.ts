/**
 * @fileoverview Context Retriever
 *
 * Builds the RetrievalContext that grounds the language-model prompts:
 * nearest categories, nearest curated examples and nearest previously
 * classified documents.
 *
 * The three searches run independently. A search that fails or finds nothing
 * degrades to an empty list (the category search falls back to the
 * registry's local ranking); only failing to embed the text is fatal.
 *
 * @module domain/retrieval/ContextRetriever
 */

import type { Embedder, Logger, SimilarityHit, SimilarityStore } from "@legal-cascade/engine";
import { describeError, silentLogger } from "@legal-cascade/engine";
import { toExampleDoc, toPastDoc, type ExampleDoc, type PastDoc } from "../entities/ReferenceDocuments.js";
import { RetrievalError } from "../errors.js";
import { COLLECTIONS, type TaxonomyRegistry } from "../taxonomy/TaxonomyRegistry.js";
import type { Scored, TaxonomyEntry } from "../taxonomy/types.js";
import { clampUnit } from "../utils/vectors.js";

/** Characters of the document embedded for retrieval */
export const kRETRIEVAL_EXCERPT_CHARS = 1000;

export interface RetrievalContext {
    readonly similarCategories: readonly Scored<TaxonomyEntry>[];
    readonly similarExamples: readonly Scored<ExampleDoc>[];
    readonly similarDocuments: readonly Scored<PastDoc>[];

    /** Nearest document types by local ranking */
    readonly similarTypes: readonly Scored<TaxonomyEntry>[];

    /** Searches that failed and were replaced by an empty or local result */
    readonly degraded: readonly string[];
}

export const EMPTY_RETRIEVAL_CONTEXT: RetrievalContext = Object.freeze({
    similarCategories: [],
    similarExamples  : [],
    similarDocuments : [],
    similarTypes     : [],
    degraded         : [],
});

export interface ContextRetrieverOptions {
    readonly registry: TaxonomyRegistry;
    readonly embedder: Embedder;

    /** Omit to rank categories locally and skip examples and past documents */
    readonly store?: SimilarityStore;

    readonly logger?: Logger;
}

/**
 * Decode hits, dropping payloads that do not decode.
 */
function decodeHits<T>(hits: readonly SimilarityHit[], decode: (payload: unknown) => T | undefined): Scored<T>[] {
    const decoded: Scored<T>[] = [];
    for (const hit of hits) {
        const item = decode(hit.payload);
        if (item !== undefined) {
            decoded.push({ item, score: clampUnit(hit.score) });
        }
    }
    return decoded;
}

export class ContextRetriever {
    private readonly registry: TaxonomyRegistry;
    private readonly embedder: Embedder;
    private readonly store: SimilarityStore | undefined;
    private readonly logger: Logger;

    constructor(options: ContextRetrieverOptions) {
        this.registry = options.registry;
        this.embedder = options.embedder;
        this.store = options.store;
        this.logger = options.logger ?? silentLogger;
    }

    /**
     * Retrieve grounding context for a document.
     *
     * @throws RetrievalError when the text cannot be embedded
     */
    async retrieve(text: string, topK: number = 5, logger: Logger = this.logger): Promise<RetrievalContext> {
        let vector: number[];
        try {
            vector = await this.embedder.embed(text.slice(0, kRETRIEVAL_EXCERPT_CHARS));
        }
        catch (error) {
            throw new RetrievalError(`Failed to embed document text: ${describeError(error)}`);
        }

        const degraded: string[] = [];

        const [categoryHits, exampleHits, documentHits] = await Promise.all([
            this.search(COLLECTIONS.categories, vector, topK, degraded, logger),
            this.search(COLLECTIONS.examples, vector, topK, degraded, logger),
            this.search(COLLECTIONS.documents, vector, topK, degraded, logger),
        ]);

        let similarCategories = decodeHits(categoryHits, payload => this.toCategoryEntry(payload));
        if (similarCategories.length === 0) {
            similarCategories = this.registry.nearest(vector, "category", topK);
        }

        const context: RetrievalContext = Object.freeze({
            similarCategories: Object.freeze(similarCategories),
            similarExamples  : Object.freeze(decodeHits(exampleHits, toExampleDoc)),
            similarDocuments : Object.freeze(decodeHits(documentHits, toPastDoc)),
            similarTypes     : Object.freeze(this.registry.nearest(vector, "documentType", topK)),
            degraded         : Object.freeze(degraded),
        });

        logger.debug("Context retrieved", {
            categories: context.similarCategories.length,
            examples  : context.similarExamples.length,
            documents : context.similarDocuments.length,
            degraded,
        });

        return context;
    }

    private async search(
        collection: string,
        vector: readonly number[],
        topK: number,
        degraded: string[],
        logger: Logger
    ): Promise<SimilarityHit[]> {
        if (!this.store) {
            return [];
        }

        try {
            return await this.store.search(collection, vector, topK);
        }
        catch (error) {
            degraded.push(collection);
            logger.warn("Similarity search failed", { collection, error: describeError(error) });
            return [];
        }
    }

    private toCategoryEntry(payload: unknown): TaxonomyEntry | undefined {
        if (typeof payload !== "object" || payload === null || !("name" in payload)) {
            return undefined;
        }
        return typeof payload.name === "string" ? this.registry.entry("category", payload.name) : undefined;
    }
}
