/**
 * @fileoverview Fixture table for the model response parser
 *
 * Valid, partially valid and garbled answers, checked against the test
 * taxonomy.
 *
 * @module __tests__/parseClassificationResponse
 */

import { describe, it, expect } from "vitest";
import { cleanFieldValue, parseClassificationResponse } from "../domain/parsing/parseClassificationResponse.js";
import { NO_MATCH_CATEGORY, NO_MATCH_TYPE } from "../domain/taxonomy/types.js";
import { createTestRegistry } from "./fixtures.js";

const vocabulary = createTestRegistry();

interface Fixture {
    readonly name: string;
    readonly response: string;
    readonly category: string;
    readonly documentType: string;
    readonly formatFound: boolean;
    readonly reasoning: string;
}

const FIXTURES: readonly Fixture[] = [
    {
        name        : "single line with semicolon",
        response    : "Category: Contract; Type: Agreement",
        category    : "Contract",
        documentType: "Agreement",
        formatFound : true,
        reasoning   : "Category: Contract; Type: Agreement",
    },
    {
        name        : "one field per line with reasoning",
        response    : "Category: Contract\nType: Agreement\nReasoning: The text is a services agreement.",
        category    : "Contract",
        documentType: "Agreement",
        formatFound : true,
        reasoning   : "The text is a services agreement.",
    },
    {
        name        : "markdown emphasis and Document Type key",
        response    : "**Category:** Contract\n**Document Type:** Agreement",
        category    : "Contract",
        documentType: "Agreement",
        formatFound : true,
        reasoning   : "**Category:** Contract\n**Document Type:** Agreement",
    },
    {
        name        : "numbered fields with quotes, brackets and a period",
        response    : "1. Category: \"Immigration\"\n2. Type: [Petition].",
        category    : "Immigration",
        documentType: "Petition",
        formatFound : true,
        reasoning   : "1. Category: \"Immigration\"\n2. Type: [Petition].",
    },
    {
        name        : "comma separated fields",
        response    : "Category: Litigation, Type: Motion",
        category    : "Litigation",
        documentType: "Motion",
        formatFound : true,
        reasoning   : "Category: Litigation, Type: Motion",
    },
    {
        name        : "lowercase keys and trailing sentence",
        response    : "category: Immigration; type: Petition; The form requests a visa.",
        category    : "Immigration",
        documentType: "Petition",
        formatFound : true,
        reasoning   : "The form requests a visa.",
    },
    {
        name        : "unknown category",
        response    : "Category: Tax Law; Type: Agreement",
        category    : NO_MATCH_CATEGORY,
        documentType: "Agreement",
        formatFound : true,
        reasoning   : "Category: Tax Law; Type: Agreement",
    },
    {
        name        : "category only",
        response    : "Category: Family Law\nThe document concerns custody.",
        category    : "Family Law",
        documentType: NO_MATCH_TYPE,
        formatFound : false,
        reasoning   : "The document concerns custody.",
    },
    {
        name        : "free prose",
        response    : "  I think this is probably a contract.  ",
        category    : NO_MATCH_CATEGORY,
        documentType: NO_MATCH_TYPE,
        formatFound : false,
        reasoning   : "I think this is probably a contract.",
    },
    {
        name        : "empty response",
        response    : "",
        category    : NO_MATCH_CATEGORY,
        documentType: NO_MATCH_TYPE,
        formatFound : false,
        reasoning   : "",
    },
    {
        name        : "repeated fields keep the first",
        response    : "Category: Litigation\nCategory: Contract\nType: Motion",
        category    : "Litigation",
        documentType: "Motion",
        formatFound : true,
        reasoning   : "Category: Litigation\nCategory: Contract\nType: Motion",
    },
    {
        name        : "label case must match exactly",
        response    : "Category: contract; Type: agreement",
        category    : NO_MATCH_CATEGORY,
        documentType: NO_MATCH_TYPE,
        formatFound : true,
        reasoning   : "Category: contract; Type: agreement",
    },
];

describe("parseClassificationResponse", () => {
    // Scenario: Each fixture parses to the expected labels
    it.each(FIXTURES)("should parse $name", fixture => {
        const parsed = parseClassificationResponse(fixture.response, vocabulary);

        expect(parsed.category).toBe(fixture.category);
        expect(parsed.documentType).toBe(fixture.documentType);
        expect(parsed.formatFound).toBe(fixture.formatFound);
        expect(parsed.reasoning).toBe(fixture.reasoning);
    });

    // Scenario: Raw values are kept for diagnostics
    it("should keep the unrecognized raw value", () => {
        const parsed = parseClassificationResponse("Category: Tax Law; Type: Agreement", vocabulary);

        expect(parsed.rawCategory).toBe("Tax Law");
        expect(parsed.categoryRecognized).toBe(false);
        expect(parsed.typeRecognized).toBe(true);
    });

    // Scenario: No fields means no raw values
    it("should leave raw values undefined when no field is present", () => {
        const parsed = parseClassificationResponse("no fields here", vocabulary);

        expect(parsed.rawCategory).toBeUndefined();
        expect(parsed.rawType).toBeUndefined();
    });

    // Scenario: Garbled input never throws
    it("should not throw on arbitrary input", () => {
        const inputs = ["::::", "Category:", "Type:;;;", "\u0000\u0001", "Category: ((((", "*".repeat(500)];

        for (const input of inputs) {
            expect(() => parseClassificationResponse(input, vocabulary)).not.toThrow();
        }
    });
});

describe("cleanFieldValue", () => {
    // Scenario: Brackets that belong to the label stay
    it("should keep a parenthetical suffix", () => {
        expect(cleanFieldValue("Notice to Appear (NTA).")).toBe("Notice to Appear (NTA)");
    });

    // Scenario: Wrapping characters are removed
    it("should unwrap quotes and brackets", () => {
        expect(cleanFieldValue("(Motion)")).toBe("Motion");
        expect(cleanFieldValue("“Asylum & Refugee”")).toBe("Asylum & Refugee");
        expect(cleanFieldValue("`<Letter>`")).toBe("Letter");
    });

    // Scenario: Separate bracketed parts are not one wrapper
    it("should not unwrap unbalanced brackets", () => {
        expect(cleanFieldValue("(a) and (b)")).toBe("(a) and (b)");
    });

    // Scenario: Inner whitespace is collapsed
    it("should collapse whitespace", () => {
        expect(cleanFieldValue("  Family \t Law ")).toBe("Family Law");
    });
});
