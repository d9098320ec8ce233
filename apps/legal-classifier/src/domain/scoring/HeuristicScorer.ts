/**
 * @fileoverview Heuristic Scorer
 *
 * Scores a (category, document type) answer against the raw text without
 * calling any model:
 * - Keyword density for the category and for the document type
 * - Text quality signals (structure, legal formatting, OCR damage)
 * - Uncertainty flags
 *
 * Pure and stateless apart from the read-only taxonomy, so calls may run in
 * parallel. Empty text is valid input.
 *
 * Numbered sections ("3. Term") count as structure only at the start of a
 * line and before a capital letter; "paid in 2. the balance" mid-sentence
 * does not.
 *
 * @module domain/scoring/HeuristicScorer
 */

import type { TaxonomyRegistry } from "../taxonomy/TaxonomyRegistry.js";
import { countKeywordMatches } from "../utils/keywords.js";
import { clampUnit } from "../utils/vectors.js";
import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from "./confidence.js";

export interface QualityMetrics {
    readonly wordCount: number;
    readonly hasStructure: boolean;
    readonly hasLegalFormatting: boolean;
    readonly ocrQualityIssues: boolean;
}

export interface HeuristicScore {
    /** Mean of the two keyword sub-scores */
    readonly keywordConfidence: number;
    readonly categoryKeywordScore: number;
    readonly typeKeywordScore: number;
    readonly qualityMetrics: QualityMetrics;

    /** Distinct flags in the order they were raised */
    readonly uncertaintyFlags: readonly string[];
}

export interface Alternative {
    readonly category: string;

    /** Fraction of the category's keywords found in the text */
    readonly score: number;

    readonly reason: string;
}

export const UNCERTAINTY_FLAGS = Object.freeze({
    shortDocument: "Document too short for reliable classification",
    ocrIssues    : "Possible OCR quality issues detected",
    mixedSignals : "Document contains mixed category indicators",
    hedging      : "Language model expressed uncertainty in classification",
});

const STRUCTURE_PATTERNS: readonly RegExp[] = [
    /\b(WHEREAS|NOW THEREFORE|ARTICLE|SECTION|EXHIBIT)\b/i,
    /\b(agreement|contract|memorandum)\b/i,
    /^\s*\d+\.\s+[A-Z]/m,
    /\([a-z]\)/,
];

const LEGAL_FORMATTING_PATTERNS: readonly RegExp[] = [
    /\bIN THE\b.*\bCOURT\b/i,
    /\bCase No\./i,
    /\bPlaintiff\b.*\bv\./i,
    /\bDated:\s*\w+\s+\d+,\s+\d{4}/i,
];

const HEDGING_PHRASES: readonly string[] = [
    "appears to be",
    "seems like",
    "possibly",
    "likely",
    "unclear",
    "difficult to determine",
    "uncertain",
    "ambiguous",
    "could be",
];

const kSYMBOL_RUN = /[^\w\s]{3,}/;
const kGLYPH_RUN = /[Il1|]{3,}/g;
const kSHORT_TOKEN = /^[A-Za-z]{1,2}$/;
const kSHORT_TOKEN_RATIO = 0.5;
const kSHORT_TOKEN_MIN_TOKENS = 10;

function tokenize(text: string): string[] {
    return text.split(/\s+/).filter(token => token.length > 0);
}

/**
 * Runs of 3+ symbols, a text made mostly of 1-2 letter fragments, or
 * runs mixing the glyphs I, l, 1 and | (e.g. "l1I").
 */
export function hasOcrDamage(text: string, tokens: readonly string[] = tokenize(text)): boolean {
    if (kSYMBOL_RUN.test(text)) {
        return true;
    }

    if (tokens.length >= kSHORT_TOKEN_MIN_TOKENS) {
        const short = tokens.filter(token => kSHORT_TOKEN.test(token)).length;
        if (short / tokens.length >= kSHORT_TOKEN_RATIO) {
            return true;
        }
    }

    for (const match of text.matchAll(kGLYPH_RUN)) {
        const run = match[0];
        if (/[Il]/.test(run) && /[1|]/.test(run)) {
            return true;
        }
    }

    return false;
}

/**
 * Heuristic scorer backed by the taxonomy's keyword lists.
 *
 * @example
 * ```typescript
 * const scorer = new HeuristicScorer(registry);
 * const score = scorer.score(text, "Asylum & Refugee", "Official Form/Application", response);
 * scorer.confidence(score); // 0.55
 * ```
 */
export class HeuristicScorer {
    constructor(
        private readonly taxonomy: TaxonomyRegistry,
        readonly config: ScoringConfig = DEFAULT_SCORING_CONFIG
    ) {}

    /**
     * Score an answer against the text. `modelResponse` is checked for
     * hedging language when given.
     */
    score(text: string, category: string, documentType: string, modelResponse?: string): HeuristicScore {
        const lowerText = text.toLowerCase();
        const categoryKeywords = this.taxonomy.category(category)?.keywords ?? [];
        const typeKeywords = this.taxonomy.documentType(documentType)?.keywords ?? [];

        const categoryKeywordScore = this.keywordScore(lowerText, categoryKeywords);
        const typeKeywordScore = this.keywordScore(lowerText, typeKeywords);
        const qualityMetrics = this.analyzeQuality(text);

        const flags = new Set<string>();

        if (qualityMetrics.wordCount < this.config.shortDocumentWords) {
            flags.add(UNCERTAINTY_FLAGS.shortDocument);
        }
        if (qualityMetrics.ocrQualityIssues) {
            flags.add(UNCERTAINTY_FLAGS.ocrIssues);
        }
        if (this.matchingCategoryCount(lowerText) > this.config.mixedCategoryLimit) {
            flags.add(UNCERTAINTY_FLAGS.mixedSignals);
        }
        if (modelResponse !== undefined && containsHedging(modelResponse)) {
            flags.add(UNCERTAINTY_FLAGS.hedging);
        }

        const mismatch = this.taxonomy.inconsistency(documentType, category);
        if (mismatch) {
            flags.add(`Possible type/category mismatch: ${mismatch}`);
        }

        return Object.freeze({
            keywordConfidence: (categoryKeywordScore + typeKeywordScore) / 2,
            categoryKeywordScore,
            typeKeywordScore,
            qualityMetrics,
            uncertaintyFlags : Object.freeze([...flags]),
        });
    }

    /**
     * Text quality signals. Never throws; empty text yields all-false metrics
     * and a word count of 0.
     */
    analyzeQuality(text: string): QualityMetrics {
        const tokens = tokenize(text);

        return Object.freeze({
            wordCount         : tokens.length,
            hasStructure      : STRUCTURE_PATTERNS.some(pattern => pattern.test(text)),
            hasLegalFormatting: LEGAL_FORMATTING_PATTERNS.some(pattern => pattern.test(text)),
            ocrQualityIssues  : hasOcrDamage(text, tokens),
        });
    }

    /**
     * Calibrated confidence: keyword confidence plus quality bonuses, minus
     * the OCR penalty and a penalty per flag, clamped to [0, 1].
     *
     * @param extraFlags - Flags counted on top of the score's own
     */
    confidence(score: HeuristicScore, extraFlags: number = 0): number {
        const { qualityMetrics: quality } = score;
        let value = score.keywordConfidence;

        if (quality.hasStructure) {
            value += this.config.structureBonus;
        }
        if (quality.hasLegalFormatting) {
            value += this.config.legalFormattingBonus;
        }
        if (quality.wordCount > this.config.lengthBonusWords) {
            value += this.config.lengthBonus;
        }
        if (quality.ocrQualityIssues) {
            value -= this.config.ocrPenalty;
        }

        value -= this.config.flagPenalty * (score.uncertaintyFlags.length + extraFlags);

        return clampUnit(value);
    }

    /**
     * Other categories ranked by the share of their keywords found in the
     * text. Keeps the top ones above the minimum ratio, highest first.
     */
    alternatives(text: string, chosenCategory: string): Alternative[] {
        const lowerText = text.toLowerCase();

        const ranked = this.taxonomy.categories
            .filter(category => category.name !== chosenCategory && category.keywords.length > 0)
            .map((category, index) => ({
                category: category.name,
                ratio   : countKeywordMatches(lowerText, category.keywords) / category.keywords.length,
                index,
            }))
            .filter(candidate => candidate.ratio > this.config.alternativeMinRatio)
            .sort((a, b) => b.ratio - a.ratio || a.index - b.index)
            .slice(0, this.config.alternativeCount);

        return ranked.map(candidate => Object.freeze({
            category: candidate.category,
            score   : candidate.ratio,
            reason  : `Contains ${(candidate.ratio * 100).toFixed(1)}% of ${candidate.category} keywords`,
        }));
    }

    private keywordScore(lowerText: string, keywords: readonly string[]): number {
        if (keywords.length === 0) {
            return 0;
        }
        const matches = countKeywordMatches(lowerText, keywords);
        return Math.min(matches / Math.max(keywords.length * this.config.keywordSaturation, 1), 1);
    }

    private matchingCategoryCount(lowerText: string): number {
        return this.taxonomy.categories
            .filter(category => countKeywordMatches(lowerText, category.keywords) > 0)
            .length;
    }
}

/**
 * Whether free text contains hedging language.
 */
export function containsHedging(response: string): boolean {
    const lower = response.toLowerCase();
    return HEDGING_PHRASES.some(phrase => lower.includes(phrase));
}
