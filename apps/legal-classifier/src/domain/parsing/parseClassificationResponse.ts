/**
 * @fileoverview Language model response parser
 *
 * Extracts the category and document type from a model's free-text answer.
 * The expected shape is
 *
 * ```
 * Category: Asylum & Refugee
 * Type: Official Form/Application
 * Reasoning: ...
 * ```
 *
 * or the same fields on one line separated by a semicolon or comma. Keys
 * match in any case. Values must name a taxonomy entry exactly after quotes,
 * brackets, markdown emphasis and a trailing period are stripped; anything
 * else maps to the no-match labels.
 *
 * @module domain/parsing/parseClassificationResponse
 */

import { NO_MATCH_CATEGORY, NO_MATCH_TYPE } from "../taxonomy/types.js";

export interface ResponseVocabulary {
    isCategory(name: string): boolean;
    isDocumentType(name: string): boolean;
}

export interface ParsedResponse {
    /** Taxonomy category, or NO_MATCH_CATEGORY */
    readonly category: string;

    /** Taxonomy document type, or NO_MATCH_TYPE */
    readonly documentType: string;

    /** Values as written, before matching */
    readonly rawCategory?: string;
    readonly rawType?: string;

    /** Both keys were present */
    readonly formatFound: boolean;

    readonly categoryRecognized: boolean;
    readonly typeRecognized: boolean;

    /** Text outside the Category/Type fields, or the whole response */
    readonly reasoning: string;
}

const kFIELD_PREFIX = String.raw`^[\s>*_#•-]*(?:\d+[.)]\s*)?\**`;
const kCATEGORY_FIELD = new RegExp(String.raw`${kFIELD_PREFIX}Category\**\s*:\s*(.*)$`, "i");
const kTYPE_FIELD = new RegExp(String.raw`${kFIELD_PREFIX}(?:Document\s+)?Type\**\s*:\s*(.*)$`, "i");
const kREASONING_LABEL = new RegExp(String.raw`${kFIELD_PREFIX}Reasoning\**\s*:\s*`, "i");

const WRAPPERS: readonly (readonly [string, string])[] = [
    ["\"", "\""],
    ["'", "'"],
    ["“", "”"],
    ["‘", "’"],
    ["[", "]"],
    ["<", ">"],
    ["(", ")"],
];

function unwrap(value: string): string {
    for (const [open, close] of WRAPPERS) {
        if (value.length >= 2 && value.startsWith(open) && value.endsWith(close)) {
            // "(a) and (b)" is not wrapped
            const inner = value.slice(open.length, -close.length);
            if (open === close || !inner.includes(close)) {
                return inner;
            }
        }
    }
    return value;
}

/**
 * Strip wrapping quotes and brackets, markdown emphasis and a trailing period.
 * Brackets that belong to the value ("Notice to Appear (NTA)") stay.
 */
export function cleanFieldValue(value: string): string {
    let cleaned = value.trim();
    let previous = "";

    while (cleaned !== previous) {
        previous = cleaned;
        cleaned = unwrap(
            cleaned
                .replace(/^[*_`]+/, "")
                .replace(/[*_`]+$/, "")
                .replace(/\.$/, "")
                .trim()
        ).trim();
    }

    return cleaned.replace(/\s+/g, " ");
}

/**
 * Parse a model response against the taxonomy vocabulary. Pure; never throws.
 */
export function parseClassificationResponse(response: string, vocabulary: ResponseVocabulary): ParsedResponse {
    const segments = response.split(/[\n;]|,\s*(?=(?:Document\s+)?Type\s*:)/i);
    const reasoningParts: string[] = [];

    let rawCategory: string | undefined;
    let rawType: string | undefined;

    for (const segment of segments) {
        const categoryMatch = kCATEGORY_FIELD.exec(segment);
        if (categoryMatch) {
            rawCategory ??= cleanFieldValue(categoryMatch[1]);
            continue;
        }

        const typeMatch = kTYPE_FIELD.exec(segment);
        if (typeMatch) {
            rawType ??= cleanFieldValue(typeMatch[1]);
            continue;
        }

        const text = segment.replace(kREASONING_LABEL, "").trim();
        if (text.length > 0) {
            reasoningParts.push(text);
        }
    }

    const categoryRecognized = rawCategory !== undefined && vocabulary.isCategory(rawCategory);
    const typeRecognized = rawType !== undefined && vocabulary.isDocumentType(rawType);

    return Object.freeze({
        category    : categoryRecognized && rawCategory !== undefined ? rawCategory : NO_MATCH_CATEGORY,
        documentType: typeRecognized && rawType !== undefined ? rawType : NO_MATCH_TYPE,
        ...(rawCategory !== undefined && { rawCategory }),
        ...(rawType !== undefined && { rawType }),
        formatFound : rawCategory !== undefined && rawType !== undefined,
        categoryRecognized,
        typeRecognized,
        reasoning   : reasoningParts.length > 0 ? reasoningParts.join(" ") : response.trim(),
    });
}
