/**
 * @fileoverview Language model cascade stage
 *
 * Asks one or more models, in order, for a classification. Each answer is
 * parsed and scored with the heuristic scorer. The first answer whose
 * category and type are both in the taxonomy ends the stage, whatever its
 * score; the engine gates it against the threshold.
 *
 * A failed call, an empty response or an answer outside the taxonomy moves
 * on to the next model. When every answer is outside the taxonomy the first
 * one is returned with a score of 0. Only when no model answers at all does
 * the stage return an error.
 *
 * The timeout starts once the slot hands over its model, so time spent
 * queued behind another inference does not count against a call.
 *
 * @module domain/cascade/LanguageModelStage
 */

import {
    describeError,
    err,
    ok,
    ResourceUnavailableError,
    stageError,
    type CascadeStage,
    type LanguageModel,
    type Logger,
    type ResourceSlot,
    type Result,
    type StageContext,
    type StageError,
    type StageErrorKind,
} from "@legal-cascade/engine";
import { ModelCallError } from "../errors.js";
import { parseClassificationResponse } from "../parsing/parseClassificationResponse.js";
import { buildClassificationPrompt, type PromptStyle } from "../prompts/prompts.js";
import type { HeuristicScorer } from "../scoring/HeuristicScorer.js";
import type { TaxonomyRegistry } from "../taxonomy/TaxonomyRegistry.js";
import { withTimeout } from "../utils/timeout.js";
import type { CascadeStageId, ClassificationInput, ModelUsed, RawClassification } from "./types.js";

/**
 * A model the stage may call, held in its resource slot.
 */
export interface ModelBinding {
    /** Reported as `modelUsed` when this model's answer is chosen */
    readonly modelUsed: ModelUsed;

    readonly slot: ResourceSlot<LanguageModel>;

    readonly timeoutMs: number;
}

export interface LanguageModelStageOptions {
    readonly id: Exclude<CascadeStageId, "pattern-based">;
    readonly name?: string;
    readonly acceptanceThreshold: number;

    /** Tried in order */
    readonly models: readonly ModelBinding[];

    readonly promptStyle: PromptStyle;
    readonly taxonomy: TaxonomyRegistry;
    readonly scorer: HeuristicScorer;

    /** Default: 150 */
    readonly maxTokens?: number;

    /** Default: 0.1 */
    readonly temperature?: number;
}

interface ScoredAnswer {
    readonly classification: RawClassification;
    readonly recognized: boolean;
}

interface AttemptFailure {
    readonly model: ModelUsed;
    readonly kind: StageErrorKind;
    readonly message: string;
}

function failureKind(error: unknown): StageErrorKind {
    if (error instanceof ModelCallError) {
        return error.kind;
    }
    if (error instanceof ResourceUnavailableError) {
        return "unavailable";
    }
    return "error";
}

export class LanguageModelStage implements CascadeStage<ClassificationInput, RawClassification, CascadeStageId> {
    readonly id: Exclude<CascadeStageId, "pattern-based">;
    readonly name: string;
    readonly acceptanceThreshold: number;

    private readonly options: LanguageModelStageOptions;

    constructor(options: LanguageModelStageOptions) {
        this.id = options.id;
        this.name = options.name ?? `${options.id} language model`;
        this.acceptanceThreshold = options.acceptanceThreshold;
        this.options = options;
    }

    get modelCount(): number {
        return this.options.models.length;
    }

    async attempt(
        input: ClassificationInput,
        context: StageContext
    ): Promise<Result<RawClassification, StageError>> {
        const { models } = this.options;

        if (models.length === 0) {
            return err(stageError(this.id, "unavailable", "No language model configured"));
        }

        const request = {
            ...buildClassificationPrompt(this.options.promptStyle, {
                text    : input.text,
                filename: input.filename,
                context : input.context,
                taxonomy: this.options.taxonomy,
            }),
            maxTokens  : this.options.maxTokens ?? 150,
            temperature: this.options.temperature ?? 0.1,
        };

        const failures: AttemptFailure[] = [];
        let unrecognized: RawClassification | undefined;

        for (const binding of models) {
            const response = await this.call(binding, request, context.logger, failures);
            if (response === undefined) {
                continue;
            }

            const { classification, recognized } = this.interpret(input.text, response, binding.modelUsed);

            if (recognized) {
                return ok(classification);
            }

            unrecognized ??= classification;
            context.logger.info("Model answer outside the taxonomy", {
                model       : binding.modelUsed,
                category    : classification.category,
                documentType: classification.documentType,
            });
        }

        if (unrecognized) {
            return ok(unrecognized);
        }

        const kinds = new Set(failures.map(failure => failure.kind));
        const [onlyKind] = kinds;
        const kind: StageErrorKind = kinds.size === 1 && onlyKind !== undefined ? onlyKind : "unavailable";

        return err(stageError(
            this.id,
            kind,
            failures.map(failure => `${failure.model}: ${failure.message}`).join("; ")
        ));
    }

    /**
     * Call one model. Returns undefined and records the failure when the call
     * fails or the response is blank.
     */
    private async call(
        binding: ModelBinding,
        request: Parameters<LanguageModel["complete"]>[0],
        logger: Logger,
        failures: AttemptFailure[]
    ): Promise<string | undefined> {
        const startTime = Date.now();

        try {
            const response = await binding.slot.run(model =>
                withTimeout(model.complete(request), binding.timeoutMs, binding.modelUsed)
            );

            logger.debug("Model responded", { model: binding.modelUsed, durationMs: Date.now() - startTime });

            if (response.trim().length === 0) {
                failures.push({ model: binding.modelUsed, kind: "invalid_response", message: "empty response" });
                logger.warn("Model returned an empty response", { model: binding.modelUsed });
                return undefined;
            }

            return response;
        }
        catch (error) {
            const failure = {
                model  : binding.modelUsed,
                kind   : failureKind(error),
                message: error instanceof ModelCallError ? error.reason : describeError(error),
            };
            failures.push(failure);
            logger.warn("Model call failed", { ...failure, durationMs: Date.now() - startTime });
            return undefined;
        }
    }

    /**
     * Parse and score a response. Answers outside the taxonomy score 0.
     */
    private interpret(text: string, response: string, modelUsed: ModelUsed): ScoredAnswer {
        const { scorer } = this.options;
        const parsed = parseClassificationResponse(response, this.options.taxonomy);
        const heuristic = scorer.score(text, parsed.category, parsed.documentType, response);
        const recognized = parsed.categoryRecognized && parsed.typeRecognized;

        const classification: RawClassification = Object.freeze({
            category       : parsed.category,
            documentType   : parsed.documentType,
            confidenceScore: recognized ? scorer.confidence(heuristic) : 0,
            modelUsed,
            rawResponse    : response,
            reasoning      : parsed.reasoning,
            heuristic,
        });

        return { classification, recognized };
    }
}
