/**
 * @fileoverview Domain barrel exports
 *
 * Public surface of the legal-document classifier for embedding in other
 * services.
 *
 * @module domain
 */

export {
    LegalDocumentClassifier,
    kSTORED_EMBEDDING_CHARS,
    kSTORED_EXCERPT_CHARS,
    type ClassifyOptions,
    type LegalDocumentClassifierOptions,
} from "./LegalDocumentClassifier.js";
export {
    ConfigurationError,
    ExtractionError,
    ModelCallError,
    RetrievalError,
    SimilarityStoreError,
    type ModelCallFailure,
} from "./errors.js";
export * from "./entities/index.js";
export { TaxonomyRegistry, COLLECTIONS, type SeedReport } from "./taxonomy/TaxonomyRegistry.js";
export * from "./taxonomy/types.js";
export { ContextRetriever, EMPTY_RETRIEVAL_CONTEXT, type RetrievalContext } from "./retrieval/ContextRetriever.js";
export { HeuristicScorer, UNCERTAINTY_FLAGS, type Alternative, type HeuristicScore, type QualityMetrics } from "./scoring/HeuristicScorer.js";
export * from "./scoring/confidence.js";
export { parseClassificationResponse, type ParsedResponse, type ResponseVocabulary } from "./parsing/parseClassificationResponse.js";
export { LanguageModelStage, type ModelBinding, type LanguageModelStageOptions } from "./cascade/LanguageModelStage.js";
export { PatternClassifier, type PatternResult, type PatternRuleSet } from "./cascade/PatternClassifier.js";
export type { CascadeStageId, ClassificationInput, ModelUsed, RawClassification } from "./cascade/types.js";
export { ZeroShotValidator, type ValidatorOutcome } from "./validation/ZeroShotValidator.js";
export {
    ResultCombiner,
    type ClassificationDiagnostics,
    type ClassificationResult,
} from "./combiner/ResultCombiner.js";
