/**
 * @fileoverview Domain entities barrel exports
 *
 * @module domain/entities
 */

export {
    createLegalDocument,
    documentId,
    kDOCUMENT_NAMESPACE,
    type LegalDocument,
    type LegalDocumentInput,
    type LegalDocumentMetadata,
} from "./LegalDocument.js";
export {
    exampleDocSchema,
    pastDocSchema,
    toExampleDoc,
    toPastDoc,
    type ExampleDoc,
    type PastDoc,
} from "./ReferenceDocuments.js";
