/**
 * @fileoverview Result Combiner
 *
 * Merges the accepted cascade answer, a heuristic score for that answer and
 * the validator outcome into the final ClassificationResult.
 *
 * Steps:
 * 1. Heuristic score for the final (category, type) pair
 * 2. Quality bonuses and flag/OCR penalties, clamped to [0, 1]
 * 3. Confidence level and the review rule
 * 4. Validator disagreement as an advisory flag
 * 5. Up to two alternative categories
 *
 * @module domain/combiner/ResultCombiner
 */

import type { StageFailure } from "@legal-cascade/engine";
import type { ModelUsed, PatternConfidence, RawClassification } from "../cascade/types.js";
import {
    bucketConfidence,
    needsHumanReview,
    type ConfidenceLevel,
} from "../scoring/confidence.js";
import type { Alternative, HeuristicScore, HeuristicScorer, QualityMetrics } from "../scoring/HeuristicScorer.js";
import type { ValidatorOutcome } from "../validation/ZeroShotValidator.js";

export interface RetrievalSummary {
    readonly categories: number;
    readonly examples: number;
    readonly documents: number;

    /** Searches that failed, or "embedding" when retrieval was skipped */
    readonly degraded: readonly string[];
}

export interface ClassificationDiagnostics {
    readonly traceId: string;

    /** Why earlier stages were passed over, in order */
    readonly stageFailures: readonly StageFailure[];

    /** Set when the run ended on the emergency path */
    readonly emergencyError?: string;

    readonly retrieval: RetrievalSummary;
}

/**
 * Final, immutable classification of one document.
 */
export interface ClassificationResult {
    readonly documentType: string;
    readonly documentCategory: string;
    readonly confidenceLevel: ConfidenceLevel;
    readonly confidenceScore: number;
    readonly reasoning: string;
    readonly uncertaintyFlags: readonly string[];
    readonly alternativeClassifications: readonly Alternative[];
    readonly needsHumanReview: boolean;

    readonly modelUsed: ModelUsed;

    /** Discrete level reported by the pattern-based classifier */
    readonly discreteConfidence?: PatternConfidence;

    readonly qualityMetrics: QualityMetrics;
    readonly validation: ValidatorOutcome;
    readonly diagnostics: ClassificationDiagnostics;
}

export interface CombineInput {
    readonly text: string;
    readonly raw: RawClassification;
    readonly validation: ValidatorOutcome;
    readonly diagnostics: ClassificationDiagnostics;
}

/**
 * Flag raised when the validator prefers another category. Advisory only:
 * it neither lowers the score nor counts toward the review flag limit.
 */
export function validatorDisagreementFlag(category: string, confidence: number): string {
    return `Validator suggests category "${category}" (${(confidence * 100).toFixed(0)}% confidence)`;
}

export class ResultCombiner {
    constructor(private readonly scorer: HeuristicScorer) {}

    combine(input: CombineInput): ClassificationResult {
        const { text, raw, validation } = input;
        const heuristic = this.currentHeuristic(text, raw);
        const config = this.scorer.config;

        const confidenceScore = this.scorer.confidence(heuristic);
        const confidenceLevel = bucketConfidence(confidenceScore, config);

        const flags = [...heuristic.uncertaintyFlags];
        if (validation.available && !validation.categoryMatch) {
            flags.push(validatorDisagreementFlag(validation.validatorCategory, validation.categoryConfidence));
        }

        return Object.freeze({
            documentType              : raw.documentType,
            documentCategory          : raw.category,
            confidenceLevel,
            confidenceScore,
            reasoning                 : raw.reasoning,
            uncertaintyFlags          : Object.freeze(flags),
            alternativeClassifications: Object.freeze(this.scorer.alternatives(text, raw.category)),
            needsHumanReview          : needsHumanReview({
                confidenceLevel,
                flagCount       : heuristic.uncertaintyFlags.length,
                ocrQualityIssues: heuristic.qualityMetrics.ocrQualityIssues,
            }, config),
            modelUsed                 : raw.modelUsed,
            ...(raw.discreteConfidence !== undefined && { discreteConfidence: raw.discreteConfidence }),
            qualityMetrics            : heuristic.qualityMetrics,
            validation,
            diagnostics               : Object.freeze({ ...input.diagnostics }),
        });
    }

    /**
     * Reuse the stage's heuristic score when it was computed for this text;
     * rule-based answers are scored here.
     */
    private currentHeuristic(text: string, raw: RawClassification): HeuristicScore {
        if (raw.heuristic) {
            return raw.heuristic;
        }
        return this.scorer.score(
            text,
            raw.category,
            raw.documentType,
            raw.rawResponse.length > 0 ? raw.rawResponse : undefined
        );
    }
}
