/**
 * @fileoverview Reference documents kept in the similarity store
 *
 * Curated examples and previously classified documents. Both are stored as
 * untyped payloads, so reads go through the schemas below.
 *
 * @module domain/entities/ReferenceDocuments
 */

import { z } from "zod";
import type { ConfidenceLevel } from "../scoring/confidence.js";

export interface ExampleDoc {
    readonly text: string;
    readonly category: string;
    readonly documentType: string;
    readonly description: string;
}

export interface PastDoc {
    readonly id: string;
    readonly filename: string;

    /** First characters of the classified text */
    readonly excerpt: string;

    readonly category: string;
    readonly documentType: string;
    readonly confidenceLevel: ConfidenceLevel;
    readonly confidenceScore: number;

    /** ISO-8601 timestamp */
    readonly classifiedAt: string;
}

export const exampleDocSchema = z.object({
    text        : z.string(),
    category    : z.string(),
    documentType: z.string(),
    description : z.string().default(""),
});

export const pastDocSchema = z.object({
    id             : z.string(),
    filename       : z.string(),
    excerpt        : z.string(),
    category       : z.string(),
    documentType   : z.string(),
    confidenceLevel: z.enum(["High", "Medium", "Low", "Uncertain"]),
    confidenceScore: z.number().min(0).max(1),
    classifiedAt   : z.string(),
});

/**
 * Decode a stored payload, or undefined when it is not an example.
 */
export function toExampleDoc(payload: unknown): ExampleDoc | undefined {
    const parsed = exampleDocSchema.safeParse(payload);
    return parsed.success ? parsed.data : undefined;
}

/**
 * Decode a stored payload, or undefined when it is not a past document.
 */
export function toPastDoc(payload: unknown): PastDoc | undefined {
    const parsed = pastDocSchema.safeParse(payload);
    return parsed.success ? parsed.data : undefined;
}
