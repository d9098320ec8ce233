/**
 * @fileoverview Legal Document Classifier
 *
 * The classification service: retrieve context, run the cascade, validate,
 * combine, and remember the document for future retrievals.
 *
 * `classify()` is total. Every failure inside it degrades the result
 * (empty context, emergency rules, validator unavailable) instead of
 * propagating to the caller.
 *
 * @module domain/LegalDocumentClassifier
 */

import {
    CascadeEngine,
    childLogger,
    createEvent,
    describeError,
    generateTraceId,
    InMemoryEventBus,
    silentLogger,
    type CascadeStage,
    type Embedder,
    type EventBus,
    type Logger,
    type SimilarityStore,
} from "@legal-cascade/engine";
import type { PatternClassifier } from "./cascade/PatternClassifier.js";
import type { CascadeStageId, ClassificationInput, RawClassification } from "./cascade/types.js";
import {
    ResultCombiner,
    type ClassificationDiagnostics,
    type ClassificationResult,
    type RetrievalSummary,
} from "./combiner/ResultCombiner.js";
import { createLegalDocument, type LegalDocument } from "./entities/LegalDocument.js";
import type { PastDoc } from "./entities/ReferenceDocuments.js";
import {
    EMPTY_RETRIEVAL_CONTEXT,
    type ContextRetriever,
    type RetrievalContext,
} from "./retrieval/ContextRetriever.js";
import type { HeuristicScorer } from "./scoring/HeuristicScorer.js";
import { COLLECTIONS, type TaxonomyRegistry } from "./taxonomy/TaxonomyRegistry.js";
import type { ValidatorOutcome, ZeroShotValidator } from "./validation/ZeroShotValidator.js";

/** Characters of the document embedded when it is stored */
export const kSTORED_EMBEDDING_CHARS = 2000;

/** Characters of the document kept in the stored payload */
export const kSTORED_EXCERPT_CHARS = 500;

type LanguageModelCascadeStage = CascadeStage<ClassificationInput, RawClassification, CascadeStageId>;

export interface LegalDocumentClassifierOptions {
    readonly registry: TaxonomyRegistry;
    readonly retriever: ContextRetriever;
    readonly scorer: HeuristicScorer;

    /** Language model stages, attempted before the pattern rules */
    readonly stages: readonly LanguageModelCascadeStage[];

    readonly patterns: PatternClassifier;
    readonly validator: ZeroShotValidator;

    /** Where classified documents are remembered; omit to never persist */
    readonly store?: SimilarityStore;
    readonly embedder: Embedder;

    /** Persist successful classifications (default: true) */
    readonly persistResults?: boolean;

    /** Neighbours retrieved per search (default: 5) */
    readonly topK?: number;

    readonly eventBus?: EventBus;
    readonly logger?: Logger;
}

export interface ClassifyOptions {
    /** Override the service-wide persistence setting for this call */
    readonly persist?: boolean;
}

interface RetrievedContext {
    readonly context: RetrievalContext;
    readonly summary: RetrievalSummary;
}

function summarize(context: RetrievalContext, degraded: readonly string[]): RetrievalSummary {
    return Object.freeze({
        categories: context.similarCategories.length,
        examples  : context.similarExamples.length,
        documents : context.similarDocuments.length,
        degraded  : Object.freeze([...degraded]),
    });
}

/**
 * Legal document classification service.
 *
 * @example
 * ```typescript
 * const classifier = new LegalDocumentClassifier({ registry, retriever, scorer, stages, ... });
 *
 * classifier.eventBus.subscribe("document:review-required", event => notify(event));
 *
 * const result = await classifier.classify(text, "smith_affidavit.txt");
 * console.log(result.documentCategory, result.confidenceLevel);
 * ```
 */
export class LegalDocumentClassifier {
    private readonly options: LegalDocumentClassifierOptions;
    private readonly engine: CascadeEngine<ClassificationInput, RawClassification, CascadeStageId>;
    private readonly combiner: ResultCombiner;
    private readonly logger: Logger;
    private documentsCollectionReady = false;

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(options: LegalDocumentClassifierOptions) {
        this.options = options;
        this.logger = options.logger ?? silentLogger;
        this.eventBus = options.eventBus ?? new InMemoryEventBus(this.logger);
        this.combiner = new ResultCombiner(options.scorer);

        this.engine = new CascadeEngine({
            stages   : [...options.stages, options.patterns.asStage()],
            emergency: (input, error) => options.patterns.toRawClassification(
                input.text,
                input.filename,
                "emergency",
                `Emergency classification after: ${error}`
            ),
            eventBus : this.eventBus,
            logger   : childLogger(this.logger, "cascade"),
        });
    }

    /**
     * Stage identifiers in the order they are attempted.
     */
    get stageIds(): readonly CascadeStageId[] {
        return this.engine.stageIds;
    }

    /**
     * Classify one document. Never rejects.
     */
    async classify(text: string, filename: string = "", options: ClassifyOptions = {}): Promise<ClassificationResult> {
        const traceId = generateTraceId();
        const logger = childLogger(this.logger, "classifier", traceId);
        const document = createLegalDocument({ content: text, filename, traceId });

        this.eventBus.emit(createEvent("document:received", {
            documentId: document.id,
            filename,
            length    : text.length,
        }, traceId));

        try {
            const { context, summary } = await this.retrieveContext(text, logger);
            const outcome = await this.engine.run({ text, filename, context }, traceId);
            const raw = outcome.output;

            const validation = await this.options.validator.validate(text, raw.category, raw.documentType, logger);

            const result = this.combiner.combine({
                text,
                raw,
                validation,
                diagnostics: {
                    traceId,
                    stageFailures: outcome.failures,
                    ...(outcome.status === "emergency" && { emergencyError: outcome.error }),
                    retrieval    : summary,
                },
            });

            this.publish(document, result);

            if (outcome.status === "accepted" && (options.persist ?? this.options.persistResults ?? true)) {
                await this.persist(document, result, logger);
            }

            return result;
        }
        catch (error) {
            const message = describeError(error);
            logger.error("Classification failed, using emergency rules", { error: message });

            const result = this.emergencyResult(text, filename, traceId, message);
            this.publish(document, result);
            return result;
        }
    }

    private async retrieveContext(text: string, logger: Logger): Promise<RetrievedContext> {
        try {
            const context = await this.options.retriever.retrieve(text, this.options.topK ?? 5, logger);
            return { context, summary: summarize(context, context.degraded) };
        }
        catch (error) {
            logger.warn("Retrieval unavailable, classifying without context", { error: describeError(error) });
            return { context: EMPTY_RETRIEVAL_CONTEXT, summary: summarize(EMPTY_RETRIEVAL_CONTEXT, ["embedding"]) };
        }
    }

    private emergencyResult(text: string, filename: string, traceId: string, error: string): ClassificationResult {
        const raw = this.options.patterns.toRawClassification(
            text,
            filename,
            "emergency",
            `Emergency classification after: ${error}`
        );
        const validation: ValidatorOutcome = { available: false, reason: "Skipped after classification failure" };
        const diagnostics: ClassificationDiagnostics = {
            traceId,
            stageFailures : [],
            emergencyError: error,
            retrieval     : summarize(EMPTY_RETRIEVAL_CONTEXT, []),
        };

        return this.combiner.combine({ text, raw, validation, diagnostics });
    }

    private publish(document: LegalDocument, result: ClassificationResult): void {
        const traceId = result.diagnostics.traceId;

        this.eventBus.emit(createEvent("document:classified", {
            documentId     : document.id,
            category       : result.documentCategory,
            documentType   : result.documentType,
            confidenceLevel: result.confidenceLevel,
            confidenceScore: result.confidenceScore,
            modelUsed      : result.modelUsed,
        }, traceId));

        if (result.needsHumanReview) {
            this.eventBus.emit(createEvent("document:review-required", {
                documentId: document.id,
                flags     : [...result.uncertaintyFlags],
            }, traceId));
        }
    }

    /**
     * Remember a classified document. Failures are logged, not thrown.
     */
    private async persist(document: LegalDocument, result: ClassificationResult, logger: Logger): Promise<void> {
        const { store, embedder, registry } = this.options;
        if (!store || !registry.isCategory(result.documentCategory)) {
            return;
        }

        const pastDoc: PastDoc = {
            id             : document.id,
            filename       : document.metadata.filename,
            excerpt        : document.content.slice(0, kSTORED_EXCERPT_CHARS),
            category       : result.documentCategory,
            documentType   : result.documentType,
            confidenceLevel: result.confidenceLevel,
            confidenceScore: result.confidenceScore,
            classifiedAt   : new Date().toISOString(),
        };

        try {
            if (!this.documentsCollectionReady) {
                await store.ensureCollection(COLLECTIONS.documents, embedder.dimensions);
                this.documentsCollectionReady = true;
            }

            const vector = await embedder.embed(document.content.slice(0, kSTORED_EMBEDDING_CHARS));
            await store.upsert(COLLECTIONS.documents, [{ id: document.id, vector, payload: { ...pastDoc } }]);

            this.eventBus.emit(createEvent("document:persisted", {
                documentId: document.id,
                collection: COLLECTIONS.documents,
            }, result.diagnostics.traceId));
        }
        catch (error) {
            logger.warn("Failed to persist classified document", {
                documentId: document.id,
                error     : describeError(error),
            });
        }
    }
}
