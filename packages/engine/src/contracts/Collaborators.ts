/**
 * @fileoverview External Collaborator Contracts
 *
 * Abstract ports for the services a classification cascade consumes:
 * language models, embedders, a similarity store, a zero-shot classifier
 * and a text extractor. Adapters live in the host application.
 *
 * @module @legal-cascade/engine/contracts/Collaborators
 */

// ============================================================================
// Language model
// ============================================================================

export interface CompletionRequest {
    /** Optional system instruction */
    readonly system?: string;

    readonly prompt: string;

    readonly maxTokens: number;

    /** Low values (≈0.1) for classification */
    readonly temperature: number;
}

/**
 * Request/response text completion service.
 * Implementations throw on transport failure or timeout.
 */
export interface LanguageModel {
    /** Identifier used in logs and diagnostics */
    readonly id: string;

    complete(request: CompletionRequest): Promise<string>;
}

// ============================================================================
// Embeddings
// ============================================================================

export interface Embedder {
    /** Length of every vector returned */
    readonly dimensions: number;

    embed(text: string): Promise<number[]>;
}

// ============================================================================
// Similarity store
// ============================================================================

export type Payload = Readonly<Record<string, unknown>>;

export interface SimilarityPoint {
    readonly id: string;
    readonly vector: readonly number[];
    readonly payload: Payload;
}

export interface SimilarityHit {
    readonly id: string;

    /** Similarity in [0, 1] */
    readonly score: number;

    readonly payload: Payload;
}

/**
 * Vector similarity store with named collections.
 *
 * `search` returns hits in descending score order; ties keep the store's
 * native order.
 */
export interface SimilarityStore {
    ensureCollection(collection: string, dimensions: number): Promise<void>;

    upsert(collection: string, points: readonly SimilarityPoint[]): Promise<void>;

    search(
        collection: string,
        vector: readonly number[],
        limit: number,
        minScore?: number
    ): Promise<SimilarityHit[]>;

    count(collection: string): Promise<number>;
}

// ============================================================================
// Zero-shot classification
// ============================================================================

export interface LabelScore {
    readonly label: string;
    readonly score: number;
}

export interface ZeroShotClassifier {
    /**
     * Score text against arbitrary candidate labels.
     * Returns labels in descending score order.
     */
    classify(text: string, candidateLabels: readonly string[]): Promise<LabelScore[]>;
}

// ============================================================================
// Text extraction
// ============================================================================

export interface TextExtractor {
    /** Whether the extractor handles this file name */
    supports(filePath: string): boolean;

    /** Throws when the file cannot be read or is unsupported */
    extract(filePath: string): Promise<string>;
}
