/**
 * @fileoverview Taxonomy Registry
 *
 * Holds the category and document-type definitions and, after
 * `initialize()`, their embeddings. The registry is read-only once
 * initialized and is shared across classification calls.
 *
 * @module domain/taxonomy/TaxonomyRegistry
 */

import type { Embedder, Logger, SimilarityPoint, SimilarityStore } from "@legal-cascade/engine";
import { silentLogger } from "@legal-cascade/engine";
import { v5 as uuidv5 } from "uuid";
import { kDOCUMENT_NAMESPACE } from "../entities/LegalDocument.js";
import type { ExampleDoc } from "../entities/ReferenceDocuments.js";
import { ConfigurationError } from "../errors.js";
import { cosineSimilarity, rankByScore } from "../utils/vectors.js";
import {
    NO_MATCH_CATEGORY,
    NO_MATCH_TYPE,
    type CategoryDefinition,
    type DocumentTypeDefinition,
    type InconsistencyRule,
    type Scored,
    type TaxonomyDefinition,
    type TaxonomyEntry,
    type TaxonomyKind,
} from "./types.js";

/**
 * Similarity store collections used by the classifier.
 */
export const COLLECTIONS = Object.freeze({
    categories: "categories",
    examples  : "examples",
    documents : "documents",
});

export interface SeedReport {
    /** Points written per collection; 0 when the collection was already populated */
    readonly categories: number;
    readonly examples: number;
}

interface EmbeddedEntries {
    readonly dimensions: number;
    readonly category: readonly TaxonomyEntry[];
    readonly documentType: readonly TaxonomyEntry[];
}

function indexByName<T extends { readonly name: string }>(items: readonly T[], label: string): Map<string, T> {
    const map = new Map<string, T>();
    for (const item of items) {
        if (map.has(item.name)) {
            throw new ConfigurationError(`Duplicate ${label}: ${item.name}`);
        }
        map.set(item.name, item);
    }
    return map;
}

function entryText(entry: { name: string; description: string; keywords: readonly string[] }): string {
    return `${entry.name}: ${entry.description}\nKeywords: ${entry.keywords.join(", ")}`;
}

/**
 * Taxonomy of categories and document types.
 *
 * @example
 * ```typescript
 * const registry = new TaxonomyRegistry(loadTaxonomy(path));
 * await registry.initialize(embedder);
 * registry.nearest(vector, "category", 5);
 * ```
 */
export class TaxonomyRegistry {
    private readonly categoryIndex: Map<string, CategoryDefinition>;
    private readonly typeIndex: Map<string, DocumentTypeDefinition>;
    private readonly inconsistencyIndex: Map<string, InconsistencyRule>;
    private embedded: EmbeddedEntries | null = null;
    private embedder: Embedder | null = null;

    constructor(readonly definition: TaxonomyDefinition, private readonly logger: Logger = silentLogger) {
        if (definition.categories.length === 0) {
            throw new ConfigurationError("Taxonomy has no categories");
        }
        if (definition.documentTypes.length === 0) {
            throw new ConfigurationError("Taxonomy has no document types");
        }

        this.categoryIndex = indexByName(definition.categories, "category");
        this.typeIndex = indexByName(definition.documentTypes, "document type");

        if (this.categoryIndex.has(NO_MATCH_CATEGORY) || this.typeIndex.has(NO_MATCH_TYPE)) {
            throw new ConfigurationError("Taxonomy must not define the no-match labels");
        }

        for (const name of definition.validatorDocumentTypes) {
            if (!this.typeIndex.has(name)) {
                throw new ConfigurationError(`Unknown validator document type: ${name}`);
            }
        }

        this.inconsistencyIndex = new Map();
        for (const rule of definition.inconsistencies) {
            if (!this.typeIndex.has(rule.documentType)) {
                throw new ConfigurationError(`Inconsistency rule names unknown document type: ${rule.documentType}`);
            }
            const unknown = rule.expectedCategories.find(name => !this.categoryIndex.has(name));
            if (unknown) {
                throw new ConfigurationError(`Inconsistency rule names unknown category: ${unknown}`);
            }
            this.inconsistencyIndex.set(rule.documentType, rule);
        }
    }

    // ========================================================================
    // Definitions
    // ========================================================================

    get categories(): readonly CategoryDefinition[] {
        return this.definition.categories;
    }

    get documentTypes(): readonly DocumentTypeDefinition[] {
        return this.definition.documentTypes;
    }

    get categoryNames(): string[] {
        return this.definition.categories.map(category => category.name);
    }

    get documentTypeNames(): string[] {
        return this.definition.documentTypes.map(type => type.name);
    }

    get validatorDocumentTypes(): readonly string[] {
        return this.definition.validatorDocumentTypes;
    }

    isCategory(name: string): boolean {
        return this.categoryIndex.has(name);
    }

    isDocumentType(name: string): boolean {
        return this.typeIndex.has(name);
    }

    category(name: string): CategoryDefinition | undefined {
        return this.categoryIndex.get(name);
    }

    documentType(name: string): DocumentTypeDefinition | undefined {
        return this.typeIndex.get(name);
    }

    /**
     * Message describing why the pairing is inconsistent, if it is.
     */
    inconsistency(documentType: string, category: string): string | undefined {
        const rule = this.inconsistencyIndex.get(documentType);
        if (!rule || rule.expectedCategories.includes(category)) {
            return undefined;
        }
        return rule.message;
    }

    // ========================================================================
    // Embeddings
    // ========================================================================

    get isInitialized(): boolean {
        return this.embedded !== null;
    }

    /**
     * Embed every category and document type. Runs once; later calls are no-ops.
     */
    async initialize(embedder: Embedder): Promise<void> {
        if (this.embedded) {
            return;
        }

        const startTime = Date.now();

        const category: TaxonomyEntry[] = [];
        for (const definition of this.definition.categories) {
            category.push(Object.freeze({
                name                : definition.name,
                kind                : "category" as const,
                description         : definition.description,
                keywords            : definition.keywords,
                exampleDocumentTypes: new Set(definition.documentTypes),
                embedding           : Object.freeze(await embedder.embed(entryText(definition))),
            }));
        }

        const documentType: TaxonomyEntry[] = [];
        for (const definition of this.definition.documentTypes) {
            documentType.push(Object.freeze({
                name                : definition.name,
                kind                : "documentType" as const,
                description         : definition.description,
                keywords            : definition.keywords,
                exampleDocumentTypes: new Set<string>(),
                embedding           : Object.freeze(await embedder.embed(entryText(definition))),
            }));
        }

        this.embedder = embedder;
        this.embedded = Object.freeze({
            dimensions  : embedder.dimensions,
            category    : Object.freeze(category),
            documentType: Object.freeze(documentType),
        });

        this.logger.info("Taxonomy embedded", {
            categories   : category.length,
            documentTypes: documentType.length,
            durationMs   : Date.now() - startTime,
        });
    }

    entries(kind: TaxonomyKind): readonly TaxonomyEntry[] {
        return this.requireEmbedded()[kind];
    }

    entry(kind: TaxonomyKind, name: string): TaxonomyEntry | undefined {
        return this.entries(kind).find(entry => entry.name === name);
    }

    /**
     * Rank entries of one kind by cosine similarity to `vector`.
     */
    nearest(vector: readonly number[], kind: TaxonomyKind, k: number): Scored<TaxonomyEntry>[] {
        const scored = this.entries(kind).map(entry => ({
            item : entry,
            score: cosineSimilarity(vector, entry.embedding),
        }));
        return rankByScore(scored).slice(0, Math.max(0, k));
    }

    /**
     * Write category definitions and curated examples into their collections
     * when those collections are empty.
     */
    async seed(store: SimilarityStore, examples: readonly ExampleDoc[]): Promise<SeedReport> {
        const { dimensions, category } = this.requireEmbedded();
        const embedder = this.embedder;
        if (!embedder) {
            throw new Error("Taxonomy registry is not initialized");
        }

        for (const collection of Object.values(COLLECTIONS)) {
            await store.ensureCollection(collection, dimensions);
        }

        let categoriesWritten = 0;
        if (await store.count(COLLECTIONS.categories) === 0) {
            const points: SimilarityPoint[] = category.map(entry => ({
                id     : uuidv5(`category:${entry.name}`, kDOCUMENT_NAMESPACE),
                vector : entry.embedding,
                payload: {
                    name        : entry.name,
                    description : entry.description,
                    keywords    : [...entry.keywords],
                    exampleTypes: [...entry.exampleDocumentTypes],
                },
            }));
            await store.upsert(COLLECTIONS.categories, points);
            categoriesWritten = points.length;
        }

        let examplesWritten = 0;
        if (examples.length > 0 && await store.count(COLLECTIONS.examples) === 0) {
            const points: SimilarityPoint[] = [];
            for (const example of examples) {
                points.push({
                    id     : uuidv5(`example:${example.text}`, kDOCUMENT_NAMESPACE),
                    vector : await embedder.embed(example.text),
                    payload: { ...example },
                });
            }
            await store.upsert(COLLECTIONS.examples, points);
            examplesWritten = points.length;
        }

        this.logger.info("Similarity store seeded", { categories: categoriesWritten, examples: examplesWritten });

        return { categories: categoriesWritten, examples: examplesWritten };
    }

    private requireEmbedded(): EmbeddedEntries {
        if (!this.embedded) {
            throw new Error("Taxonomy registry is not initialized");
        }
        return this.embedded;
    }
}
