/**
 * @fileoverview Zero-shot validator
 *
 * Cross-checks the cascade's answer with a general zero-shot classifier:
 * one call over every category, one over a representative subset of
 * document types. The outcome only annotates the result; it never changes
 * the chosen labels.
 *
 * @module domain/validation/ZeroShotValidator
 */

import type { LabelScore, Logger, ZeroShotClassifier } from "@legal-cascade/engine";
import { describeError, silentLogger } from "@legal-cascade/engine";
import type { TaxonomyRegistry } from "../taxonomy/TaxonomyRegistry.js";
import { clampUnit } from "../utils/vectors.js";
import { withTimeout } from "../utils/timeout.js";

/** Characters of the document sent to the validator */
export const kVALIDATOR_EXCERPT_CHARS = 1000;

export interface ValidatorAgreement {
    readonly available: true;
    readonly validatorCategory: string;
    readonly validatorDocumentType: string;
    readonly categoryConfidence: number;
    readonly documentTypeConfidence: number;
    readonly categoryMatch: boolean;
    readonly documentTypeMatch: boolean;
}

export interface ValidatorUnavailable {
    readonly available: false;
    readonly reason: string;
}

export type ValidatorOutcome = ValidatorAgreement | ValidatorUnavailable;

export interface ZeroShotValidatorOptions {
    /** Omit when no validator service is configured */
    readonly client?: ZeroShotClassifier;

    readonly taxonomy: TaxonomyRegistry;

    /** Default: 30000 */
    readonly timeoutMs?: number;

    readonly logger?: Logger;
}

function unavailable(reason: string): ValidatorUnavailable {
    return Object.freeze({ available: false as const, reason });
}

function top(scores: readonly LabelScore[]): LabelScore | undefined {
    let best: LabelScore | undefined;
    for (const entry of scores) {
        if (!best || entry.score > best.score) {
            best = entry;
        }
    }
    return best;
}

export class ZeroShotValidator {
    private readonly options: ZeroShotValidatorOptions;
    private readonly logger: Logger;

    constructor(options: ZeroShotValidatorOptions) {
        this.options = options;
        this.logger = options.logger ?? silentLogger;
    }

    get isConfigured(): boolean {
        return this.options.client !== undefined;
    }

    /**
     * Validate an answer. Never throws; service failures yield
     * `{ available: false }`.
     */
    async validate(
        text: string,
        category: string,
        documentType: string,
        logger: Logger = this.logger
    ): Promise<ValidatorOutcome> {
        const { client, taxonomy } = this.options;
        if (!client) {
            return unavailable("No validator configured");
        }

        const excerpt = text.slice(0, kVALIDATOR_EXCERPT_CHARS);
        const timeoutMs = this.options.timeoutMs ?? 30_000;

        try {
            const categoryScores = await withTimeout(
                client.classify(excerpt, taxonomy.categoryNames),
                timeoutMs,
                "validator"
            );
            const typeScores = await withTimeout(
                client.classify(excerpt, taxonomy.validatorDocumentTypes),
                timeoutMs,
                "validator"
            );

            const bestCategory = top(categoryScores);
            const bestType = top(typeScores);
            if (!bestCategory || !bestType) {
                return unavailable("Validator returned no labels");
            }

            const outcome: ValidatorAgreement = Object.freeze({
                available             : true as const,
                validatorCategory     : bestCategory.label,
                validatorDocumentType : bestType.label,
                categoryConfidence    : clampUnit(bestCategory.score),
                documentTypeConfidence: clampUnit(bestType.score),
                categoryMatch         : bestCategory.label === category,
                documentTypeMatch     : bestType.label === documentType,
            });

            logger.debug("Validator finished", {
                categoryMatch    : outcome.categoryMatch,
                documentTypeMatch: outcome.documentTypeMatch,
            });

            return outcome;
        }
        catch (error) {
            const reason = describeError(error);
            logger.warn("Validator unavailable", { error: reason });
            return unavailable(reason);
        }
    }
}
