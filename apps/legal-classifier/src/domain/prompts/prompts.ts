/**
 * @fileoverview Classification prompts
 *
 * Two prompts share one layout: the document excerpt, the retrieval context
 * and the full label lists, ending with the answer format the response
 * parser expects. The primary prompt addresses a legal-domain model; the
 * fallback prompt spells out more instructions for a general model.
 *
 * @module domain/prompts/prompts
 */

import type { RetrievalContext } from "../retrieval/ContextRetriever.js";
import type { TaxonomyRegistry } from "../taxonomy/TaxonomyRegistry.js";

export interface PromptInput {
    readonly text: string;
    readonly filename: string;
    readonly context: RetrievalContext;
    readonly taxonomy: TaxonomyRegistry;
}

export interface Prompt {
    readonly system: string;
    readonly prompt: string;
}

export type PromptStyle = "legal" | "general";

/** Characters of the document shown to the model */
export const kPROMPT_EXCERPT_CHARS = 2500;

const kCONTEXT_ITEMS = 3;
const kANSWER_FORMAT = "Category: <category name>; Type: <document type>";

const LEGAL_SYSTEM_PROMPT = `You are a legal document classifier for a law firm practicing U.S. immigration and criminal law.
Classify each document into exactly one category and exactly one document type from the lists you are given.
Answer on the first line with "${kANSWER_FORMAT}", then one or two sentences of reasoning.`;

const GENERAL_SYSTEM_PROMPT = `You are an expert AI legal document classifier for a law firm specializing in U.S. immigration and criminal law.
You only ever answer with labels copied verbatim from the lists you are given.`;

/**
 * Build the category list with descriptions
 */
function buildCategoryList(taxonomy: TaxonomyRegistry): string {
    return taxonomy.categories
        .map(category => `- ${category.name}: ${category.description}`)
        .join("\n");
}

function buildTypeList(taxonomy: TaxonomyRegistry): string {
    return taxonomy.documentTypeNames.map(name => `- ${name}`).join("\n");
}

function excerpt(text: string, limit: number): string {
    return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

/**
 * Render the retrieval context as numbered sections. Empty sections are
 * stated, so the model does not invent neighbours.
 */
export function buildContextSection(context: RetrievalContext): string {
    const lines: string[] = ["SIMILAR CATEGORIES:"];

    if (context.similarCategories.length > 0) {
        context.similarCategories.slice(0, kCONTEXT_ITEMS).forEach(({ item, score }, i) => {
            lines.push(`${i + 1}. ${item.name} (similarity: ${score.toFixed(3)})`);
            lines.push(`   Keywords: ${item.keywords.slice(0, 8).join(", ")}`);
        });
    }
    else {
        lines.push("None found.");
    }

    lines.push("", "SIMILAR CLASSIFIED EXAMPLES:");
    if (context.similarExamples.length > 0) {
        context.similarExamples.slice(0, kCONTEXT_ITEMS).forEach(({ item, score }, i) => {
            lines.push(`${i + 1}. ${excerpt(item.text, 200)}`);
            lines.push(`   Category: ${item.category}; Type: ${item.documentType} (similarity: ${score.toFixed(3)})`);
        });
    }
    else {
        lines.push("None found.");
    }

    if (context.similarDocuments.length > 0) {
        lines.push("", "PREVIOUSLY CLASSIFIED DOCUMENTS:");
        context.similarDocuments.slice(0, 2).forEach(({ item, score }, i) => {
            lines.push(`${i + 1}. ${item.filename || "(unnamed)"} (similarity: ${score.toFixed(3)})`);
            lines.push(`   Category: ${item.category}; Type: ${item.documentType}`);
        });
    }

    return lines.join("\n");
}

/**
 * Build the prompt for a model.
 *
 * @example
 * ```typescript
 * const { system, prompt } = buildClassificationPrompt("legal", { text, filename, context, taxonomy });
 * await model.complete({ system, prompt, maxTokens: 150, temperature: 0.1 });
 * ```
 */
export function buildClassificationPrompt(style: PromptStyle, input: PromptInput): Prompt {
    const sections = [
        "DOCUMENT TO CLASSIFY:",
        `Filename: ${input.filename || "(none)"}`,
        `Text: ${excerpt(input.text, kPROMPT_EXCERPT_CHARS)}`,
        "",
        buildContextSection(input.context),
        "",
        "DOCUMENT CATEGORIES (choose exactly one):",
        buildCategoryList(input.taxonomy),
        "",
        "DOCUMENT TYPES (choose exactly one):",
        buildTypeList(input.taxonomy),
        "",
    ];

    if (style === "general") {
        sections.push(
            "CLASSIFICATION INSTRUCTIONS:",
            "1. Use the similar categories and examples above as guidance, weighing their similarity scores",
            "2. Match the document content with the most appropriate category and type",
            "3. Copy the category and type names exactly as listed",
            `4. Answer in EXACTLY this format: "${kANSWER_FORMAT}", followed by a short reasoning line`,
            ""
        );
    }
    else {
        sections.push(`Answer format: ${kANSWER_FORMAT}`, "");
    }

    sections.push("Classify this document:");

    return Object.freeze({
        system: style === "legal" ? LEGAL_SYSTEM_PROMPT : GENERAL_SYSTEM_PROMPT,
        prompt: sections.join("\n"),
    });
}
