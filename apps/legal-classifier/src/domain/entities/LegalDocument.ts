/**
 * @fileoverview Legal Document Entity
 *
 * Domain-specific entity that extends the base Entity contract with the
 * metadata a classification call receives alongside the text.
 *
 * @module domain/entities/LegalDocument
 */

import type { Entity } from "@legal-cascade/engine";
import { v5 as uuidv5 } from "uuid";

/** Namespace for deterministic document and taxonomy identifiers */
export const kDOCUMENT_NAMESPACE = "5b0f6d3e-8c1a-4d6e-9f3b-2a7c41e9d8b0";

export interface LegalDocumentMetadata {
    /** Original file name, or "" when the text did not come from a file */
    readonly filename: string;

    readonly receivedAt: Date;
}

/**
 * A document flowing through the classification cascade.
 */
export interface LegalDocument extends Entity<LegalDocumentMetadata> {
    /** Entity type discriminator */
    readonly type: "legal-document";
}

export interface LegalDocumentInput {
    readonly content: string;
    readonly filename: string;
    readonly receivedAt?: Date;
    readonly traceId?: string;
}

/**
 * Stable identifier derived from the file name and the start of the text,
 * so reclassifying the same document overwrites its stored record.
 */
export function documentId(filename: string, content: string): string {
    return uuidv5(`${filename}_${content.slice(0, 100)}`, kDOCUMENT_NAMESPACE);
}

/**
 * Factory function to create a LegalDocument entity.
 *
 * @example
 * ```typescript
 * const document = createLegalDocument({
 *     content : "NOTICE TO APPEAR ...",
 *     filename: "nta.txt",
 * });
 * ```
 */
export function createLegalDocument(data: LegalDocumentInput): LegalDocument {
    return Object.freeze({
        id      : documentId(data.filename, data.content),
        type    : "legal-document" as const,
        content : data.content,
        metadata: Object.freeze({
            filename  : data.filename,
            receivedAt: data.receivedAt ?? new Date(),
        }),
        ...(data.traceId !== undefined && { traceId: data.traceId }),
    });
}
