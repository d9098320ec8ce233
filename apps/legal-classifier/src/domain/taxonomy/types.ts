/**
 * @fileoverview Taxonomy types
 *
 * @module domain/taxonomy/types
 */

export interface CategoryDefinition {
    readonly name: string;
    readonly description: string;
    readonly keywords: readonly string[];

    /** Free-text examples of documents filed under this category */
    readonly documentTypes: readonly string[];
}

export interface DocumentTypeDefinition {
    readonly name: string;
    readonly description: string;
    readonly keywords: readonly string[];
}

/**
 * A document type that only makes sense under certain categories.
 */
export interface InconsistencyRule {
    readonly documentType: string;
    readonly expectedCategories: readonly string[];
    readonly message: string;
}

export interface TaxonomyDefinition {
    readonly categories: readonly CategoryDefinition[];
    readonly documentTypes: readonly DocumentTypeDefinition[];

    /** Representative subset offered to the zero-shot validator */
    readonly validatorDocumentTypes: readonly string[];

    readonly inconsistencies: readonly InconsistencyRule[];
}

export type TaxonomyKind = "category" | "documentType";

/**
 * A category or document type with its precomputed embedding.
 */
export interface TaxonomyEntry {
    readonly name: string;
    readonly kind: TaxonomyKind;
    readonly description: string;
    readonly keywords: readonly string[];
    readonly exampleDocumentTypes: ReadonlySet<string>;
    readonly embedding: readonly number[];
}

/**
 * An item paired with a similarity score in [0, 1].
 */
export interface Scored<T> {
    readonly item: T;
    readonly score: number;
}

/** Category reported when a model answer names no known category */
export const NO_MATCH_CATEGORY = "Unclassified";

/** Document type reported when a model answer names no known type */
export const NO_MATCH_TYPE = "Unclassified Document";
