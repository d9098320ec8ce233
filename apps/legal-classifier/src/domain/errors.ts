/**
 * @fileoverview Domain Errors
 *
 * Named errors for hard failures outside the cascade. Failures of individual
 * model calls inside the cascade are not thrown to callers; stages turn
 * them into `StageError` results.
 *
 * @module domain/errors
 */

/**
 * A configuration file or environment variable is missing or invalid.
 */
export class ConfigurationError extends Error {
    constructor(message: string, readonly path?: string) {
        super(path ? `${message} (${path})` : message);
        this.name = "ConfigurationError";
    }
}

/**
 * The document text could not be embedded for retrieval.
 */
export class RetrievalError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "RetrievalError";
    }
}

/**
 * An input file is unsupported or unreadable.
 */
export class ExtractionError extends Error {
    constructor(readonly filePath: string, reason: string) {
        super(`Cannot extract text from ${filePath}: ${reason}`);
        this.name = "ExtractionError";
    }
}

/**
 * A similarity store request failed.
 */
export class SimilarityStoreError extends Error {
    constructor(message: string, readonly status?: number) {
        super(message);
        this.name = "SimilarityStoreError";
    }
}

export type ModelCallFailure = "timeout" | "unavailable" | "invalid_response" | "error";

/**
 * A language model or validator call failed.
 */
export class ModelCallError extends Error {
    constructor(readonly kind: ModelCallFailure, readonly service: string, readonly reason: string) {
        super(`${service}: ${reason}`);
        this.name = "ModelCallError";
    }
}
