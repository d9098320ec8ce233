/**
 * @fileoverview Pattern rule loader
 *
 * Compiles `patterns.yml` into the rule set of the pattern-based
 * classifier. Every label the rules can produce must exist in the taxonomy.
 *
 * @module config/loadPatterns
 */

import { z } from "zod";
import type { FilenamePairing, PatternRule, PatternRuleSet } from "../domain/cascade/PatternClassifier.js";
import { ConfigurationError } from "../domain/errors.js";
import type { ResponseVocabulary } from "../domain/parsing/parseClassificationResponse.js";
import { readYamlFile, validateConfig } from "./loadTaxonomy.js";

const patternListSchema = z.array(z.string().min(1)).default([]);

const pointsSchema = z.object({
    minimum: z.number().int().min(0),
    points : z.number().int().min(0),
});

const levelSchema = z.object({
    minPoints: z.number().int().min(0),
    score    : z.number().min(0).max(1),
});

const patternsSchema = z.object({
    defaultDocumentType: z.string().min(1),
    defaultCategory    : z.string().min(1),
    documentTypeRules  : z.array(z.object({
        documentType: z.string().min(1),
        text        : patternListSchema,
        filename    : patternListSchema,
    })),
    categoryRules: z.array(z.object({
        category: z.string().min(1),
        text    : patternListSchema,
        filename: patternListSchema,
    })),
    categoryByDocumentType: z.array(z.object({
        documentTypes: z.array(z.string().min(1)).min(1),
        category     : z.string().min(1),
    })).default([]),
    scoring: z.object({
        pairings: z.array(z.object({
            documentType: z.string().min(1).optional(),
            category    : z.string().min(1).optional(),
            filename    : z.string().min(1),
            points      : z.number().int().min(0),
        })).default([]),
        documentTypeMatches: pointsSchema,
        categoryMatches    : pointsSchema,
        levels             : z.object({
            high  : levelSchema,
            medium: levelSchema,
            low   : z.object({ score: z.number().min(0).max(1) }),
        }),
    }),
});

function compile(source: string, filePath: string): RegExp {
    try {
        return new RegExp(source);
    }
    catch (error) {
        throw new ConfigurationError(
            `Invalid pattern ${JSON.stringify(source)}: ${error instanceof Error ? error.message : String(error)}`,
            filePath
        );
    }
}

/**
 * Load and compile the pattern rules.
 *
 * @param vocabulary - Taxonomy the rule labels are checked against
 */
export function loadPatterns(filePath: string, vocabulary: ResponseVocabulary): PatternRuleSet {
    const raw = validateConfig(patternsSchema, readYamlFile(filePath), filePath);

    const requireType = (name: string): string => {
        if (!vocabulary.isDocumentType(name)) {
            throw new ConfigurationError(`Unknown document type in pattern rules: ${name}`, filePath);
        }
        return name;
    };
    const requireCategory = (name: string): string => {
        if (!vocabulary.isCategory(name)) {
            throw new ConfigurationError(`Unknown category in pattern rules: ${name}`, filePath);
        }
        return name;
    };

    const documentTypeRules: PatternRule[] = raw.documentTypeRules.map(rule => ({
        label   : requireType(rule.documentType),
        text    : rule.text.map(source => compile(source, filePath)),
        filename: rule.filename.map(source => compile(source, filePath)),
    }));

    const categoryRules: PatternRule[] = raw.categoryRules.map(rule => ({
        label   : requireCategory(rule.category),
        text    : rule.text.map(source => compile(source, filePath)),
        filename: rule.filename.map(source => compile(source, filePath)),
    }));

    const categoryByDocumentType = new Map<string, string>();
    for (const entry of raw.categoryByDocumentType) {
        const category = requireCategory(entry.category);
        for (const documentType of entry.documentTypes) {
            categoryByDocumentType.set(requireType(documentType), category);
        }
    }

    const pairings: FilenamePairing[] = raw.scoring.pairings.map(pairing => ({
        ...(pairing.documentType !== undefined && { documentType: requireType(pairing.documentType) }),
        ...(pairing.category !== undefined && { category: requireCategory(pairing.category) }),
        filename: compile(pairing.filename, filePath),
        points  : pairing.points,
    }));

    return Object.freeze({
        defaultDocumentType: requireType(raw.defaultDocumentType),
        defaultCategory    : requireCategory(raw.defaultCategory),
        documentTypeRules,
        categoryRules,
        categoryByDocumentType,
        scoring            : {
            pairings,
            documentTypeMatches: raw.scoring.documentTypeMatches,
            categoryMatches    : raw.scoring.categoryMatches,
            levels             : raw.scoring.levels,
        },
    });
}
