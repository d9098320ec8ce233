/**
 * @fileoverview Shared test fixtures: a small taxonomy and in-process fakes
 */

import { vi } from "vitest";
import type { CompletionRequest, Embedder, LanguageModel, LabelScore, ZeroShotClassifier } from "@legal-cascade/engine";
import { HashingEmbedder } from "../adapters/embeddings/HashingEmbedder.js";
import { TaxonomyRegistry } from "../domain/taxonomy/TaxonomyRegistry.js";
import type { TaxonomyDefinition } from "../domain/taxonomy/types.js";

export const TEST_TAXONOMY: TaxonomyDefinition = {
    categories: [
        {
            name         : "Contract",
            description  : "Agreements between parties",
            keywords     : [
                "agreement", "party", "term", "breach", "consideration",
                "indemnify", "warranty", "governing law", "termination", "obligations",
            ],
            documentTypes: ["Service agreement"],
        },
        {
            name         : "Immigration",
            description  : "Visas, asylum and removal",
            keywords     : ["visa", "asylum", "uscis", "removal", "petition"],
            documentTypes: ["Visa petition"],
        },
        {
            name         : "Litigation",
            description  : "Court proceedings",
            keywords     : ["plaintiff", "defendant", "court", "motion", "hearing"],
            documentTypes: [],
        },
        {
            name         : "Family Law",
            description  : "Custody and divorce",
            keywords     : ["custody", "divorce", "child support", "spouse"],
            documentTypes: [],
        },
    ],
    documentTypes: [
        { name: "Agreement", description: "A signed agreement", keywords: ["agreement", "whereas", "hereby", "parties"] },
        { name: "Motion", description: "A court filing", keywords: ["motion", "court", "respectfully", "hearing"] },
        { name: "Petition", description: "A petition to an agency", keywords: ["petition", "petitioner", "form"] },
        { name: "Letter", description: "Correspondence", keywords: ["dear", "sincerely"] },
    ],
    validatorDocumentTypes: ["Agreement", "Motion", "Letter"],
    inconsistencies       : [
        {
            documentType      : "Motion",
            expectedCategories: ["Litigation", "Immigration"],
            message           : "Motions are filed in court proceedings",
        },
    ],
};

export const TEST_DIMENSIONS = 64;

export function createTestRegistry(definition: TaxonomyDefinition = TEST_TAXONOMY): TaxonomyRegistry {
    return new TaxonomyRegistry(definition);
}

export async function createInitializedRegistry(embedder: Embedder = new HashingEmbedder(TEST_DIMENSIONS)): Promise<TaxonomyRegistry> {
    const registry = createTestRegistry();
    await registry.initialize(embedder);
    return registry;
}

/**
 * Language model returning the queued responses in order, then the last one.
 */
export function scriptedModel(id: string, ...responses: string[]) {
    let call = 0;
    const complete = vi.fn(async (_request: CompletionRequest) => {
        const response = responses[Math.min(call, responses.length - 1)] ?? "";
        call++;
        return response;
    });
    const model: LanguageModel = { id, complete };
    return { model, complete };
}

/**
 * Language model whose calls never settle, for timeout paths.
 */
export function hangingModel(id: string) {
    const complete = vi.fn((_request: CompletionRequest) => new Promise<string>(() => undefined));
    const model: LanguageModel = { id, complete };
    return { model, complete };
}

/**
 * Language model answering after `delayMs`, for queueing paths.
 */
export function delayedModel(id: string, delayMs: number, response: string) {
    const complete = vi.fn((_request: CompletionRequest) =>
        new Promise<string>(resolve => setTimeout(() => resolve(response), delayMs))
    );
    const model: LanguageModel = { id, complete };
    return { model, complete };
}

export function fixedZeroShot(categoryScores: LabelScore[], typeScores: LabelScore[]) {
    const classify = vi.fn(async (_text: string, labels: readonly string[]) =>
        labels.includes("Contract") ? categoryScores : typeScores
    );
    const client: ZeroShotClassifier = { classify };
    return { client, classify };
}

/** 200 words that match no keyword, structure or formatting rule */
export function filler(words: number): string {
    return Array.from({ length: words }, () => "provisions").join(" ");
}

/**
 * Contract text with structure, legal formatting and 228 words.
 * Matches 5 of the 10 Contract keywords and 3 of the 4 Agreement keywords.
 */
export const CONTRACT_TEXT = [
    "WHEREAS the parties enter into this agreement for valuable consideration;",
    "NOW THEREFORE each party shall indemnify the other against any breach.",
    "Case No. 2024-CV-0101",
    "Dated: March 3, 2024",
    filler(200),
].join("\n");
