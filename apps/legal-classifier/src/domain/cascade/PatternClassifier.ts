/**
 * @fileoverview Pattern-based classifier
 *
 * Rule-based classification from the document text and file name. It never
 * fails and is the cascade's floor: its stage has no acceptance threshold,
 * and the emergency path calls it directly.
 *
 * Resolution order:
 * 1. Document type: first rule whose text patterns match; filename hints
 *    are consulted, in the same order, only when no text pattern matched
 * 2. Category: same procedure over the category rules, then the category
 *    implied by the document type, then the default
 * 3. Points: filename pairings, then the number of matching text patterns
 *    for the chosen type and category, mapped to High / Medium / Low
 *
 * @module domain/cascade/PatternClassifier
 */

import { ok, type CascadeStage, type Result, type StageError } from "@legal-cascade/engine";
import type { CascadeStageId, ClassificationInput, PatternConfidence, RawClassification } from "./types.js";

export interface PatternRule {
    /** Document type or category assigned when the rule fires */
    readonly label: string;

    /** Tested against the lowercased text */
    readonly text: readonly RegExp[];

    /** Tested against the lowercased file name */
    readonly filename: readonly RegExp[];
}

export interface FilenamePairing {
    /** Applies only when this type was chosen */
    readonly documentType?: string;

    /** Applies only when this category was chosen */
    readonly category?: string;

    readonly filename: RegExp;
    readonly points: number;
}

export interface PatternRuleSet {
    readonly defaultDocumentType: string;
    readonly defaultCategory: string;
    readonly documentTypeRules: readonly PatternRule[];
    readonly categoryRules: readonly PatternRule[];

    /** Category implied by a document type when no category rule fires */
    readonly categoryByDocumentType: ReadonlyMap<string, string>;

    readonly scoring: {
        readonly pairings: readonly FilenamePairing[];
        readonly documentTypeMatches: { readonly minimum: number; readonly points: number };
        readonly categoryMatches: { readonly minimum: number; readonly points: number };
        readonly levels: {
            readonly high: { readonly minPoints: number; readonly score: number };
            readonly medium: { readonly minPoints: number; readonly score: number };
            readonly low: { readonly score: number };
        };
    };
}

export type MatchSource = "text" | "filename" | "document-type" | "default";

export interface PatternResult {
    readonly documentType: string;
    readonly category: string;
    readonly documentTypeSource: MatchSource;
    readonly categorySource: MatchSource;
    readonly points: number;
    readonly discreteConfidence: PatternConfidence;

    /** Score for the discrete level */
    readonly confidenceScore: number;
}

function countMatches(patterns: readonly RegExp[], value: string): number {
    return patterns.filter(pattern => pattern.test(value)).length;
}

function resolve(
    rules: readonly PatternRule[],
    lowerText: string,
    lowerFilename: string
): { rule: PatternRule; source: "text" | "filename" } | undefined {
    const byText = rules.find(rule => countMatches(rule.text, lowerText) > 0);
    if (byText) {
        return { rule: byText, source: "text" };
    }

    if (lowerFilename.length === 0) {
        return undefined;
    }

    const byFilename = rules.find(rule => countMatches(rule.filename, lowerFilename) > 0);
    return byFilename ? { rule: byFilename, source: "filename" } : undefined;
}

/**
 * Pattern-based classifier.
 *
 * @example
 * ```typescript
 * const classifier = new PatternClassifier(loadPatterns(path, registry));
 * classifier.classify("AFFIDAVIT OF ...", "smith_affidavit.txt");
 * // { documentType: "Witness Affidavit/Declaration", discreteConfidence: "High", ... }
 * ```
 */
export class PatternClassifier {
    constructor(private readonly rules: PatternRuleSet) {}

    classify(text: string, filename: string = ""): PatternResult {
        const lowerText = text.toLowerCase();
        const lowerFilename = filename.toLowerCase();

        const typeMatch = resolve(this.rules.documentTypeRules, lowerText, lowerFilename);
        const documentType = typeMatch?.rule.label ?? this.rules.defaultDocumentType;
        const documentTypeSource: MatchSource = typeMatch?.source ?? "default";

        const categoryMatch = resolve(this.rules.categoryRules, lowerText, lowerFilename);
        const impliedCategory = this.rules.categoryByDocumentType.get(documentType);

        let category: string;
        let categorySource: MatchSource;
        if (categoryMatch) {
            category = categoryMatch.rule.label;
            categorySource = categoryMatch.source;
        }
        else if (impliedCategory !== undefined) {
            category = impliedCategory;
            categorySource = "document-type";
        }
        else {
            category = this.rules.defaultCategory;
            categorySource = "default";
        }

        const points = this.points(lowerText, lowerFilename, documentType, category);
        const { high, medium, low } = this.rules.scoring.levels;

        let discreteConfidence: PatternConfidence;
        let confidenceScore: number;
        if (points >= high.minPoints) {
            discreteConfidence = "High";
            confidenceScore = high.score;
        }
        else if (points >= medium.minPoints) {
            discreteConfidence = "Medium";
            confidenceScore = medium.score;
        }
        else {
            discreteConfidence = "Low";
            confidenceScore = low.score;
        }

        return Object.freeze({
            documentType,
            category,
            documentTypeSource,
            categorySource,
            points,
            discreteConfidence,
            confidenceScore,
        });
    }

    /**
     * Classification as a cascade answer.
     */
    toRawClassification(
        text: string,
        filename: string,
        modelUsed: "pattern-based" | "emergency",
        note?: string
    ): RawClassification {
        const result = this.classify(text, filename);
        const reasoning = [
            `Pattern rules chose type "${result.documentType}" (${result.documentTypeSource})`,
            `and category "${result.category}" (${result.categorySource})`,
            `with ${result.points} point${result.points === 1 ? "" : "s"}.`,
        ].join(" ");

        return Object.freeze({
            category          : result.category,
            documentType      : result.documentType,
            confidenceScore   : result.confidenceScore,
            modelUsed,
            rawResponse       : "",
            reasoning         : note ? `${reasoning} ${note}` : reasoning,
            discreteConfidence: result.discreteConfidence,
        });
    }

    /**
     * The cascade's floor stage. It has no threshold, so its answer is always
     * accepted.
     */
    asStage(): CascadeStage<ClassificationInput, RawClassification, CascadeStageId> {
        return {
            id     : "pattern-based",
            name   : "Pattern rules",
            attempt: async (input: ClassificationInput): Promise<Result<RawClassification, StageError>> =>
                ok(this.toRawClassification(input.text, input.filename, "pattern-based")),
        };
    }

    private points(lowerText: string, lowerFilename: string, documentType: string, category: string): number {
        const { scoring } = this.rules;
        let points = 0;

        for (const pairing of scoring.pairings) {
            const typeFits = pairing.documentType === undefined || pairing.documentType === documentType;
            const categoryFits = pairing.category === undefined || pairing.category === category;
            if (typeFits && categoryFits && pairing.filename.test(lowerFilename)) {
                points += pairing.points;
            }
        }

        const typeRule = this.rules.documentTypeRules.find(rule => rule.label === documentType);
        if (typeRule && countMatches(typeRule.text, lowerText) >= scoring.documentTypeMatches.minimum) {
            points += scoring.documentTypeMatches.points;
        }

        const categoryRule = this.rules.categoryRules.find(rule => rule.label === category);
        if (categoryRule && countMatches(categoryRule.text, lowerText) >= scoring.categoryMatches.minimum) {
            points += scoring.categoryMatches.points;
        }

        return points;
    }
}
