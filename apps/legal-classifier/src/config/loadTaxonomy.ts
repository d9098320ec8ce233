/**
 * @fileoverview Taxonomy, example and pattern loaders
 *
 * Loads the YAML configuration files and validates them with zod.
 * Any problem raises a ConfigurationError naming the file.
 *
 * @module config/loadTaxonomy
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigurationError } from "../domain/errors.js";
import type { ExampleDoc } from "../domain/entities/ReferenceDocuments.js";
import { exampleDocSchema } from "../domain/entities/ReferenceDocuments.js";
import type { ResponseVocabulary } from "../domain/parsing/parseClassificationResponse.js";
import type { TaxonomyDefinition } from "../domain/taxonomy/types.js";

const nameSchema = z.string().trim().min(1);
const keywordsSchema = z.array(z.string().trim().min(1)).default([]);

const taxonomySchema = z.object({
    categories: z.array(z.object({
        name         : nameSchema,
        description  : z.string().default(""),
        keywords     : keywordsSchema,
        documentTypes: z.array(z.string()).default([]),
    })).min(1),
    documentTypes: z.array(z.object({
        name       : nameSchema,
        description: z.string().default(""),
        keywords   : keywordsSchema,
    })).min(1),
    validatorDocumentTypes: z.array(nameSchema).default([]),
    inconsistencies       : z.array(z.object({
        documentType      : nameSchema,
        expectedCategories: z.array(nameSchema).min(1),
        message           : z.string().min(1),
    })).default([]),
});

const examplesSchema = z.object({
    examples: z.array(exampleDocSchema),
});

/**
 * Read and parse a YAML file.
 *
 * @throws ConfigurationError if the file is missing or not valid YAML
 */
export function readYamlFile(filePath: string): unknown {
    if (!existsSync(filePath)) {
        throw new ConfigurationError("Configuration file not found", filePath);
    }

    try {
        return parseYaml(readFileSync(filePath, "utf-8"));
    }
    catch (error) {
        throw new ConfigurationError(`Invalid YAML: ${error instanceof Error ? error.message : String(error)}`, filePath);
    }
}

/**
 * Validate parsed YAML against a schema.
 *
 * @throws ConfigurationError listing the first few issues
 */
export function validateConfig<T extends z.ZodTypeAny>(schema: T, value: unknown, filePath: string): z.output<T> {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .slice(0, 5)
            .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
        throw new ConfigurationError(`Invalid configuration: ${issues}`, filePath);
    }
    return parsed.data;
}

/**
 * Load the taxonomy definition.
 *
 * @example
 * ```typescript
 * const registry = new TaxonomyRegistry(loadTaxonomy("./config/taxonomy.yml"));
 * ```
 */
export function loadTaxonomy(filePath: string): TaxonomyDefinition {
    return validateConfig(taxonomySchema, readYamlFile(filePath), filePath);
}

/**
 * Load the curated classification examples. When a vocabulary is given,
 * every example must use its labels.
 */
export function loadExamples(filePath: string, vocabulary?: ResponseVocabulary): ExampleDoc[] {
    const { examples } = validateConfig(examplesSchema, readYamlFile(filePath), filePath);

    if (vocabulary) {
        examples.forEach((example, index) => {
            if (!vocabulary.isCategory(example.category)) {
                throw new ConfigurationError(`Example ${index} has unknown category: ${example.category}`, filePath);
            }
            if (!vocabulary.isDocumentType(example.documentType)) {
                throw new ConfigurationError(`Example ${index} has unknown document type: ${example.documentType}`, filePath);
            }
        });
    }

    return examples;
}
