/**
 * @fileoverview Confidence configuration, bucketing and the review rule
 *
 * Every threshold and adjustment is configurable. The defaults are the
 * calibrated values the cascade ships with.
 *
 * @module domain/scoring/confidence
 */

import { clampUnit } from "../utils/vectors.js";

export type ConfidenceLevel = "High" | "Medium" | "Low" | "Uncertain";

/** Ordering used for monotonic comparisons, lowest first */
export const CONFIDENCE_LEVELS: readonly ConfidenceLevel[] = Object.freeze(["Uncertain", "Low", "Medium", "High"]);

export interface ScoringConfig {
    /** Primary stage acceptance threshold */
    readonly primaryAcceptance: number;

    /** Fallback stage acceptance threshold */
    readonly fallbackAcceptance: number;

    readonly structureBonus: number;
    readonly legalFormattingBonus: number;
    readonly lengthBonus: number;

    /** Word count above which the length bonus applies */
    readonly lengthBonusWords: number;

    readonly ocrPenalty: number;

    /** Subtracted once per uncertainty flag */
    readonly flagPenalty: number;

    /** Word count below which a document is flagged as too short */
    readonly shortDocumentWords: number;

    /** Fraction of a keyword list whose match saturates a keyword sub-score */
    readonly keywordSaturation: number;

    /** Minimum keyword-match ratio for an alternative classification */
    readonly alternativeMinRatio: number;

    readonly alternativeCount: number;

    /** A result with more flags than this needs review */
    readonly reviewFlagLimit: number;

    /** More categories than this with keyword hits counts as a mixed signal */
    readonly mixedCategoryLimit: number;

    readonly bucketBounds: {
        readonly high: number;
        readonly medium: number;
        readonly low: number;
    };
}

export const DEFAULT_SCORING_CONFIG: ScoringConfig = Object.freeze({
    primaryAcceptance   : 0.7,
    fallbackAcceptance  : 0.6,
    structureBonus      : 0.2,
    legalFormattingBonus: 0.15,
    lengthBonus         : 0.1,
    lengthBonusWords    : 200,
    ocrPenalty          : 0.2,
    flagPenalty         : 0.1,
    shortDocumentWords  : 50,
    keywordSaturation   : 0.3,
    alternativeMinRatio : 0.1,
    alternativeCount    : 2,
    reviewFlagLimit     : 2,
    mixedCategoryLimit  : 2,
    bucketBounds        : Object.freeze({ high: 0.8, medium: 0.6, low: 0.4 }),
});

/**
 * Map a score to its confidence level. Monotonic in `score`.
 */
export function bucketConfidence(score: number, config: ScoringConfig = DEFAULT_SCORING_CONFIG): ConfidenceLevel {
    const value = clampUnit(score);
    const { high, medium, low } = config.bucketBounds;

    if (value >= high) {
        return "High";
    }
    if (value >= medium) {
        return "Medium";
    }
    if (value >= low) {
        return "Low";
    }
    return "Uncertain";
}

/**
 * Negative when `a` ranks below `b`.
 */
export function compareConfidenceLevels(a: ConfidenceLevel, b: ConfidenceLevel): number {
    return CONFIDENCE_LEVELS.indexOf(a) - CONFIDENCE_LEVELS.indexOf(b);
}

export interface ReviewSignals {
    readonly confidenceLevel: ConfidenceLevel;
    readonly flagCount: number;
    readonly ocrQualityIssues: boolean;
}

/**
 * Any one of: Low or Uncertain confidence, more flags than the limit,
 * or OCR damage.
 */
export function needsHumanReview(signals: ReviewSignals, config: ScoringConfig = DEFAULT_SCORING_CONFIG): boolean {
    return compareConfidenceLevels(signals.confidenceLevel, "Low") <= 0
        || signals.flagCount > config.reviewFlagLimit
        || signals.ocrQualityIssues;
}
