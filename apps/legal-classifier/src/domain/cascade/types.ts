/**
 * @fileoverview Classification cascade types
 *
 * @module domain/cascade/types
 */

import type { ScoredOutput } from "@legal-cascade/engine";
import type { RetrievalContext } from "../retrieval/ContextRetriever.js";
import type { HeuristicScore } from "../scoring/HeuristicScorer.js";

/** Stages in the order the cascade attempts them */
export type CascadeStageId = "primary" | "fallback" | "pattern-based";

/**
 * What produced the accepted answer. The fallback stage reports which of
 * its two models answered.
 */
export type ModelUsed = "primary" | "fallback" | "fallback-api" | "pattern-based" | "emergency";

/** Discrete confidence of the pattern-based classifier */
export type PatternConfidence = "High" | "Medium" | "Low";

/**
 * What every stage receives.
 */
export interface ClassificationInput {
    readonly text: string;
    readonly filename: string;
    readonly context: RetrievalContext;
}

/**
 * One stage's answer.
 */
export interface RawClassification extends ScoredOutput {
    readonly category: string;
    readonly documentType: string;

    /** Stage confidence in [0, 1] */
    readonly confidenceScore: number;

    readonly modelUsed: ModelUsed;

    /** Model output as received; empty for rule-based answers */
    readonly rawResponse: string;

    readonly reasoning: string;

    /** Set by the pattern-based classifier */
    readonly discreteConfidence?: PatternConfidence;

    /** Heuristic score behind `confidenceScore`, for language-model answers */
    readonly heuristic?: HeuristicScore;
}
