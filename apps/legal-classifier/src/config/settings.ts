/**
 * @fileoverview Application settings
 *
 * Reads the environment (populated from `.env` by the CLI entry point) and
 * validates it with zod. Endpoints left unset disable the matching
 * collaborator: no primary model URL means the primary stage reports
 * "unavailable", no validator URL means results carry no validation, and
 * no embedding URL selects the local hashing embedder.
 *
 * @module config/settings
 */

import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { isLogLevel, type LogLevel } from "@legal-cascade/engine";
import { z } from "zod";
import { ConfigurationError } from "../domain/errors.js";
import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from "../domain/scoring/confidence.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** Directory holding taxonomy.yml, patterns.yml and examples.yml */
export const kDEFAULT_CONFIG_DIR = join(__dirname, "..", "..", "config");

export interface ModelEndpoint {
    readonly baseURL: string;
    readonly model: string;
    readonly apiKey?: string;
    readonly timeoutMs: number;
}

export type StoreSettings =
    | { readonly backend: "sqlite"; readonly path: string }
    | { readonly backend: "qdrant"; readonly url: string; readonly apiKey?: string; readonly timeoutMs: number };

export interface Settings {
    readonly logLevel: LogLevel;
    readonly paths: {
        readonly taxonomy: string;
        readonly patterns: string;
        readonly examples: string;
    };
    readonly models: {
        readonly primary?: ModelEndpoint;
        readonly fallbackApi?: ModelEndpoint;
        readonly fallbackLocal?: ModelEndpoint;
    };
    readonly embedding?: {
        readonly baseURL: string;
        readonly model: string;
        readonly apiKey?: string;
        readonly dimensions: number;
        readonly timeoutMs: number;
    };
    readonly validator?: {
        readonly url: string;
        readonly apiKey?: string;
        readonly timeoutMs: number;
    };
    readonly store: StoreSettings;
    readonly retrievalTopK: number;
    readonly persistResults: boolean;
    readonly scoring: ScoringConfig;
}

/** Treat empty strings from `.env` files as unset */
const blankAsUndefined = (value: unknown): unknown =>
    typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(blankAsUndefined, z.string().trim().min(1).optional());
const optionalUrl = z.preprocess(blankAsUndefined, z.string().url().optional());
const timeout = (fallback: number) => z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(fallback));
const unit = (fallback: number) => z.preprocess(blankAsUndefined, z.coerce.number().min(0).max(1).default(fallback));
const flag = (fallback: boolean) => z.preprocess(
    blankAsUndefined,
    z.enum(["true", "false", "1", "0", "yes", "no"]).default(fallback ? "true" : "false")
        .transform(value => value === "true" || value === "1" || value === "yes")
);

const envSchema = z.object({
    LOG_LEVEL: z.preprocess(blankAsUndefined, z.string().default("info"))
        .refine(isLogLevel, { message: "must be one of debug, info, warn, error" }),

    TAXONOMY_PATH: optionalString,
    PATTERNS_PATH: optionalString,
    EXAMPLES_PATH: optionalString,

    PRIMARY_MODEL_URL    : optionalUrl,
    PRIMARY_MODEL_NAME   : z.preprocess(blankAsUndefined, z.string().default("saul-7b-instruct")),
    PRIMARY_MODEL_API_KEY: optionalString,
    MODEL_TIMEOUT_MS     : timeout(30_000),

    FALLBACK_API_URL       : optionalUrl,
    FALLBACK_API_MODEL     : z.preprocess(blankAsUndefined, z.string().default("mistral-small-latest")),
    FALLBACK_API_KEY       : optionalString,
    FALLBACK_API_TIMEOUT_MS: timeout(10_000),

    FALLBACK_LOCAL_URL  : optionalUrl,
    FALLBACK_LOCAL_MODEL: z.preprocess(blankAsUndefined, z.string().default("mistral-7b-instruct")),

    EMBEDDING_URL       : optionalUrl,
    EMBEDDING_MODEL     : z.preprocess(blankAsUndefined, z.string().default("text-embedding-3-small")),
    EMBEDDING_API_KEY   : optionalString,
    EMBEDDING_DIMENSIONS: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(1536)),

    VALIDATOR_URL       : optionalUrl,
    VALIDATOR_API_KEY   : optionalString,
    VALIDATOR_TIMEOUT_MS: timeout(30_000),

    STORE_BACKEND   : z.preprocess(blankAsUndefined, z.enum(["sqlite", "qdrant"]).default("sqlite")),
    SQLITE_PATH     : z.preprocess(blankAsUndefined, z.string().default("data/similarity.db")),
    QDRANT_URL      : optionalUrl,
    QDRANT_API_KEY  : optionalString,
    STORE_TIMEOUT_MS: timeout(5_000),

    RETRIEVAL_TOP_K: z.preprocess(blankAsUndefined, z.coerce.number().int().min(1).max(50).default(5)),
    PERSIST_RESULTS: flag(true),

    PRIMARY_ACCEPTANCE_THRESHOLD : unit(DEFAULT_SCORING_CONFIG.primaryAcceptance),
    FALLBACK_ACCEPTANCE_THRESHOLD: unit(DEFAULT_SCORING_CONFIG.fallbackAcceptance),
    STRUCTURE_BONUS              : unit(DEFAULT_SCORING_CONFIG.structureBonus),
    LEGAL_FORMATTING_BONUS       : unit(DEFAULT_SCORING_CONFIG.legalFormattingBonus),
    LENGTH_BONUS                 : unit(DEFAULT_SCORING_CONFIG.lengthBonus),
    OCR_PENALTY                  : unit(DEFAULT_SCORING_CONFIG.ocrPenalty),
    FLAG_PENALTY                 : unit(DEFAULT_SCORING_CONFIG.flagPenalty),
});

/**
 * Validate the environment into frozen settings.
 *
 * @throws ConfigurationError listing the invalid variables
 *
 * @example
 * ```typescript
 * import "dotenv/config";
 * const settings = loadSettings(process.env);
 * ```
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
        throw new ConfigurationError(`Invalid environment: ${issues}`);
    }

    const e = parsed.data;
    const logLevel: LogLevel = isLogLevel(e.LOG_LEVEL) ? e.LOG_LEVEL : "info";

    let store: StoreSettings;
    if (e.STORE_BACKEND === "qdrant") {
        if (!e.QDRANT_URL) {
            throw new ConfigurationError("QDRANT_URL is required when STORE_BACKEND=qdrant");
        }
        store = {
            backend  : "qdrant",
            url      : e.QDRANT_URL,
            ...(e.QDRANT_API_KEY !== undefined && { apiKey: e.QDRANT_API_KEY }),
            timeoutMs: e.STORE_TIMEOUT_MS,
        };
    }
    else {
        store = { backend: "sqlite", path: e.SQLITE_PATH };
    }

    const endpoint = (baseURL: string | undefined, model: string, apiKey: string | undefined, timeoutMs: number) =>
        baseURL === undefined
            ? undefined
            : { baseURL, model, timeoutMs, ...(apiKey !== undefined && { apiKey }) };

    const primary = endpoint(e.PRIMARY_MODEL_URL, e.PRIMARY_MODEL_NAME, e.PRIMARY_MODEL_API_KEY, e.MODEL_TIMEOUT_MS);
    const fallbackApi = endpoint(e.FALLBACK_API_URL, e.FALLBACK_API_MODEL, e.FALLBACK_API_KEY, e.FALLBACK_API_TIMEOUT_MS);
    const fallbackLocal = endpoint(e.FALLBACK_LOCAL_URL, e.FALLBACK_LOCAL_MODEL, undefined, e.MODEL_TIMEOUT_MS);

    return Object.freeze({
        logLevel,
        paths: Object.freeze({
            taxonomy: e.TAXONOMY_PATH ?? join(kDEFAULT_CONFIG_DIR, "taxonomy.yml"),
            patterns: e.PATTERNS_PATH ?? join(kDEFAULT_CONFIG_DIR, "patterns.yml"),
            examples: e.EXAMPLES_PATH ?? join(kDEFAULT_CONFIG_DIR, "examples.yml"),
        }),
        models: Object.freeze({
            ...(primary && { primary }),
            ...(fallbackApi && { fallbackApi }),
            ...(fallbackLocal && { fallbackLocal }),
        }),
        ...(e.EMBEDDING_URL !== undefined && {
            embedding: {
                baseURL   : e.EMBEDDING_URL,
                model     : e.EMBEDDING_MODEL,
                dimensions: e.EMBEDDING_DIMENSIONS,
                timeoutMs : e.MODEL_TIMEOUT_MS,
                ...(e.EMBEDDING_API_KEY !== undefined && { apiKey: e.EMBEDDING_API_KEY }),
            },
        }),
        ...(e.VALIDATOR_URL !== undefined && {
            validator: {
                url      : e.VALIDATOR_URL,
                timeoutMs: e.VALIDATOR_TIMEOUT_MS,
                ...(e.VALIDATOR_API_KEY !== undefined && { apiKey: e.VALIDATOR_API_KEY }),
            },
        }),
        store         : Object.freeze(store),
        retrievalTopK : e.RETRIEVAL_TOP_K,
        persistResults: e.PERSIST_RESULTS,
        scoring       : Object.freeze({
            ...DEFAULT_SCORING_CONFIG,
            primaryAcceptance   : e.PRIMARY_ACCEPTANCE_THRESHOLD,
            fallbackAcceptance  : e.FALLBACK_ACCEPTANCE_THRESHOLD,
            structureBonus      : e.STRUCTURE_BONUS,
            legalFormattingBonus: e.LEGAL_FORMATTING_BONUS,
            lengthBonus         : e.LENGTH_BONUS,
            ocrPenalty          : e.OCR_PENALTY,
            flagPenalty         : e.FLAG_PENALTY,
        }),
    });
}
