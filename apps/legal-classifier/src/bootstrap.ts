/**
 * @fileoverview Composition root
 *
 * Wires settings, configuration files and adapters into a ready
 * LegalDocumentClassifier. Tests and embedders of this package pass
 * in-process collaborators through `overrides`; anything not overridden is
 * built from the settings.
 *
 * @module bootstrap
 */

import {
    childLogger,
    InMemoryEventBus,
    ResourceHost,
    ResourceSlot,
    silentLogger,
    type Embedder,
    type EventBus,
    type LanguageModel,
    type Logger,
    type SimilarityStore,
    type ZeroShotClassifier,
} from "@legal-cascade/engine";
import { HashingEmbedder } from "./adapters/embeddings/HashingEmbedder.js";
import { OpenAIEmbedder } from "./adapters/embeddings/OpenAIEmbedder.js";
import { OpenAICompatibleModel } from "./adapters/llm/OpenAICompatibleModel.js";
import { QdrantSimilarityStore } from "./adapters/store/QdrantSimilarityStore.js";
import { SqliteSimilarityStore } from "./adapters/store/SqliteSimilarityStore.js";
import { HttpZeroShotClient } from "./adapters/validator/HttpZeroShotClient.js";
import { loadPatterns } from "./config/loadPatterns.js";
import { loadExamples, loadTaxonomy } from "./config/loadTaxonomy.js";
import type { ModelEndpoint, Settings } from "./config/settings.js";
import { LanguageModelStage, type ModelBinding } from "./domain/cascade/LanguageModelStage.js";
import { PatternClassifier } from "./domain/cascade/PatternClassifier.js";
import type { ModelUsed } from "./domain/cascade/types.js";
import type { ExampleDoc } from "./domain/entities/ReferenceDocuments.js";
import { LegalDocumentClassifier } from "./domain/LegalDocumentClassifier.js";
import { ContextRetriever } from "./domain/retrieval/ContextRetriever.js";
import { HeuristicScorer } from "./domain/scoring/HeuristicScorer.js";
import { TaxonomyRegistry, type SeedReport } from "./domain/taxonomy/TaxonomyRegistry.js";
import { ZeroShotValidator } from "./domain/validation/ZeroShotValidator.js";

/** Used for overridden models that have no configured endpoint */
const kDEFAULT_MODEL_TIMEOUT_MS = 30_000;

/** Slot names, also reported as `modelUsed` */
type ModelSlotName = Extract<ModelUsed, "primary" | "fallback-api" | "fallback">;

export interface ClassifierOverrides {
    readonly store?: SimilarityStore;
    readonly embedder?: Embedder;

    /** Replace (or supply) the model behind a slot */
    readonly models?: Partial<Record<ModelSlotName, LanguageModel>>;

    readonly zeroShot?: ZeroShotClassifier;
    readonly eventBus?: EventBus;
    readonly logger?: Logger;
}

export interface ClassifierApp {
    readonly classifier: LegalDocumentClassifier;
    readonly registry: TaxonomyRegistry;
    readonly store: SimilarityStore;
    readonly host: ResourceHost;
    readonly settings: Settings;
    readonly examples: readonly ExampleDoc[];

    /** Seed taxonomy definitions and curated examples into empty collections */
    seedStore(): Promise<SeedReport>;

    /** Release model slots and close the store */
    close(): Promise<void>;
}

function createStore(settings: Settings): SimilarityStore & { close?: () => void } {
    const { store } = settings;
    if (store.backend === "qdrant") {
        return new QdrantSimilarityStore({
            url      : store.url,
            timeoutMs: store.timeoutMs,
            ...(store.apiKey !== undefined && { apiKey: store.apiKey }),
        });
    }
    return new SqliteSimilarityStore(store.path);
}

function createEmbedder(settings: Settings): Embedder {
    const { embedding } = settings;
    if (!embedding) {
        return new HashingEmbedder();
    }
    return new OpenAIEmbedder({
        baseURL   : embedding.baseURL,
        model     : embedding.model,
        dimensions: embedding.dimensions,
        timeoutMs : embedding.timeoutMs,
        ...(embedding.apiKey !== undefined && { apiKey: embedding.apiKey }),
    });
}

/**
 * Build a model binding when the slot has an endpoint or an override.
 */
function bindModel(
    name: ModelSlotName,
    endpoint: ModelEndpoint | undefined,
    override: LanguageModel | undefined,
    host: ResourceHost,
    logger: Logger
): ModelBinding | undefined {
    if (!endpoint && !override) {
        return undefined;
    }

    const slot = new ResourceSlot<LanguageModel>({
        name,
        logger,
        load: async () => override ?? new OpenAICompatibleModel({
            id       : name,
            baseURL  : endpoint?.baseURL ?? "",
            model    : endpoint?.model ?? name,
            timeoutMs: endpoint?.timeoutMs ?? kDEFAULT_MODEL_TIMEOUT_MS,
            ...(endpoint?.apiKey !== undefined && { apiKey: endpoint.apiKey }),
        }),
    });
    host.register(slot);

    return {
        modelUsed: name,
        slot,
        timeoutMs: endpoint?.timeoutMs ?? kDEFAULT_MODEL_TIMEOUT_MS,
    };
}

/**
 * Build the classifier and its collaborators.
 *
 * @throws ConfigurationError if a configuration file is invalid
 *
 * @example
 * ```typescript
 * const app = await createClassifier(loadSettings(process.env));
 * await app.seedStore();
 * const result = await app.classifier.classify(text, "notice.txt");
 * await app.close();
 * ```
 */
export async function createClassifier(
    settings: Settings,
    overrides: ClassifierOverrides = {}
): Promise<ClassifierApp> {
    const logger = overrides.logger ?? silentLogger;

    const registry = new TaxonomyRegistry(loadTaxonomy(settings.paths.taxonomy), childLogger(logger, "taxonomy"));
    const patterns = new PatternClassifier(loadPatterns(settings.paths.patterns, registry));
    const examples = loadExamples(settings.paths.examples, registry);

    const embedder = overrides.embedder ?? createEmbedder(settings);
    await registry.initialize(embedder);

    let store: SimilarityStore;
    let closeStore = (): void => {};
    if (overrides.store) {
        store = overrides.store;
    }
    else {
        const owned = createStore(settings);
        store = owned;
        closeStore = () => owned.close?.();
    }

    const host = new ResourceHost(childLogger(logger, "models"));
    const models = overrides.models ?? {};
    const slotLogger = childLogger(logger, "models");

    const primary = bindModel("primary", settings.models.primary, models.primary, host, slotLogger);
    const fallbackApi = bindModel("fallback-api", settings.models.fallbackApi, models["fallback-api"], host, slotLogger);
    const fallbackLocal = bindModel("fallback", settings.models.fallbackLocal, models.fallback, host, slotLogger);

    const scorer = new HeuristicScorer(registry, settings.scoring);

    const stages = [
        new LanguageModelStage({
            id                 : "primary",
            name               : "Legal-domain model",
            acceptanceThreshold: settings.scoring.primaryAcceptance,
            models             : primary ? [primary] : [],
            promptStyle        : "legal",
            taxonomy           : registry,
            scorer,
        }),
        new LanguageModelStage({
            id                 : "fallback",
            name               : "General model",
            acceptanceThreshold: settings.scoring.fallbackAcceptance,
            models             : [fallbackApi, fallbackLocal].filter((binding): binding is ModelBinding => binding !== undefined),
            promptStyle        : "general",
            taxonomy           : registry,
            scorer,
        }),
    ];

    const zeroShot = overrides.zeroShot ?? (settings.validator && new HttpZeroShotClient({
        url      : settings.validator.url,
        timeoutMs: settings.validator.timeoutMs,
        ...(settings.validator.apiKey !== undefined && { apiKey: settings.validator.apiKey }),
    }));

    const validator = new ZeroShotValidator({
        taxonomy : registry,
        timeoutMs: settings.validator?.timeoutMs ?? kDEFAULT_MODEL_TIMEOUT_MS,
        logger   : childLogger(logger, "validator"),
        ...(zeroShot !== undefined && { client: zeroShot }),
    });

    const retriever = new ContextRetriever({
        registry,
        embedder,
        store,
        logger: childLogger(logger, "retrieval"),
    });

    const classifier = new LegalDocumentClassifier({
        registry,
        retriever,
        scorer,
        stages,
        patterns,
        validator,
        store,
        embedder,
        persistResults: settings.persistResults,
        topK          : settings.retrievalTopK,
        eventBus      : overrides.eventBus ?? new InMemoryEventBus(logger),
        logger,
    });

    logger.info("Classifier ready", {
        categories   : registry.categoryNames.length,
        documentTypes: registry.documentTypeNames.length,
        examples     : examples.length,
        models       : host.names,
        store        : overrides.store ? "custom" : settings.store.backend,
        validator    : validator.isConfigured,
    });

    return {
        classifier,
        registry,
        store,
        host,
        settings,
        examples,
        seedStore: () => registry.seed(store, examples),
        close    : async () => {
            await host.unloadAll();
            closeStore();
        },
    };
}
