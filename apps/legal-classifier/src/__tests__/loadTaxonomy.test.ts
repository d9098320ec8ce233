/**
 * @fileoverview Unit tests for the YAML configuration loaders
 *
 * Tests cover:
 * - loadTaxonomy defaults and validation
 * - loadExamples label checks
 * - loadPatterns compilation and label checks
 * - Error handling for missing and invalid files
 *
 * @module __tests__/loadTaxonomy
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { loadExamples, loadTaxonomy } from "../config/loadTaxonomy.js";
import { loadPatterns } from "../config/loadPatterns.js";
import { PatternClassifier } from "../domain/cascade/PatternClassifier.js";
import { createTestRegistry } from "./fixtures.js";

// Mock the fs module
vi.mock("fs", () => ({
    readFileSync: vi.fn(),
    existsSync  : vi.fn(),
}));

import { readFileSync, existsSync } from "fs";

const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);

const PATTERNS_YAML = `
defaultDocumentType: Letter
defaultCategory: Litigation
documentTypeRules:
  - documentType: Motion
    text: ['motion\\s+to']
    filename: [motion]
categoryRules:
  - category: Family Law
    text: ['\\bcustody\\b']
categoryByDocumentType:
  - documentTypes: [Petition]
    category: Immigration
scoring:
  pairings:
    - documentType: Motion
      filename: motion
      points: 3
  documentTypeMatches: { minimum: 2, points: 2 }
  categoryMatches: { minimum: 1, points: 1 }
  levels:
    high: { minPoints: 4, score: 0.8 }
    medium: { minPoints: 2, score: 0.6 }
    low: { score: 0.4 }
`;

describe("loadTaxonomy", () => {
    beforeEach(() => {
        vi.clearAllMocks();
        mockExistsSync.mockReturnValue(true);
    });

    // Scenario: Minimal taxonomy gets its defaults filled in
    it("should apply defaults to optional fields", () => {
        mockReadFileSync.mockReturnValue(`
categories:
  - name: Contract
    description: Agreements
    keywords: [agreement, breach]
documentTypes:
  - name: Agreement
`);

        const taxonomy = loadTaxonomy("/cfg/taxonomy.yml");

        expect(taxonomy).toEqual({
            categories: [{
                name         : "Contract",
                description  : "Agreements",
                keywords     : ["agreement", "breach"],
                documentTypes: [],
            }],
            documentTypes         : [{ name: "Agreement", description: "", keywords: [] }],
            validatorDocumentTypes: [],
            inconsistencies       : [],
        });
        expect(mockReadFileSync).toHaveBeenCalledWith("/cfg/taxonomy.yml", "utf-8");
    });

    // Scenario: File does not exist
    it("should throw when the file is missing", () => {
        mockExistsSync.mockReturnValue(false);

        expect(() => loadTaxonomy("/cfg/taxonomy.yml")).toThrow("Configuration file not found (/cfg/taxonomy.yml)");
        expect(mockReadFileSync).not.toHaveBeenCalled();
    });

    // Scenario: YAML syntax error
    it("should throw on invalid YAML", () => {
        mockReadFileSync.mockReturnValue("categories: [unclosed");

        expect(() => loadTaxonomy("/cfg/taxonomy.yml")).toThrow("Invalid YAML");
    });

    // Scenario: Schema violation
    it("should name the invalid field", () => {
        mockReadFileSync.mockReturnValue("categories: []\ndocumentTypes:\n  - name: Agreement\n");

        expect(() => loadTaxonomy("/cfg/taxonomy.yml")).toThrow(
            "Invalid configuration: categories: Array must contain at least 1 element(s) (/cfg/taxonomy.yml)"
        );
    });
});

describe("loadExamples", () => {
    const registry = createTestRegistry();

    beforeEach(() => {
        vi.clearAllMocks();
        mockExistsSync.mockReturnValue(true);
    });

    // Scenario: Examples with taxonomy labels
    it("should load examples and default their description", () => {
        mockReadFileSync.mockReturnValue(`
examples:
  - text: Motion to reopen removal proceedings
    category: Litigation
    documentType: Motion
`);

        expect(loadExamples("/cfg/examples.yml", registry)).toEqual([{
            text        : "Motion to reopen removal proceedings",
            category    : "Litigation",
            documentType: "Motion",
            description : "",
        }]);
    });

    // Scenario: Example outside the taxonomy
    it("should reject an example with an unknown category", () => {
        mockReadFileSync.mockReturnValue(`
examples:
  - text: Quarterly filing
    category: Tax
    documentType: Letter
`);

        expect(() => loadExamples("/cfg/examples.yml", registry)).toThrow(
            "Example 0 has unknown category: Tax (/cfg/examples.yml)"
        );
    });

    // Scenario: No vocabulary means no label checks
    it("should skip label checks without a vocabulary", () => {
        mockReadFileSync.mockReturnValue(`
examples:
  - text: Quarterly filing
    category: Tax
    documentType: Return
`);

        expect(loadExamples("/cfg/examples.yml")).toHaveLength(1);
    });
});

describe("loadPatterns", () => {
    const registry = createTestRegistry();

    beforeEach(() => {
        vi.clearAllMocks();
        mockExistsSync.mockReturnValue(true);
    });

    // Scenario: Rules compile and drive the classifier
    it("should compile the rules", () => {
        mockReadFileSync.mockReturnValue(PATTERNS_YAML);

        const rules = loadPatterns("/cfg/patterns.yml", registry);

        expect(rules.documentTypeRules[0]?.text[0]?.source).toBe("motion\\s+to");
        expect(rules.categoryRules[0]?.filename).toEqual([]);
        expect(rules.categoryByDocumentType.get("Petition")).toBe("Immigration");

        const result = new PatternClassifier(rules).classify("Motion to modify custody", "motion.txt");
        expect(result.documentType).toBe("Motion");
        expect(result.category).toBe("Family Law");
        expect(result.points).toBe(4);
        expect(result.discreteConfidence).toBe("High");
    });

    // Scenario: Rule names a label the taxonomy lacks
    it("should reject labels outside the taxonomy", () => {
        mockReadFileSync.mockReturnValue(PATTERNS_YAML.replace("documentType: Motion\n    text", "documentType: Subpoena\n    text"));

        expect(() => loadPatterns("/cfg/patterns.yml", registry)).toThrow(
            "Unknown document type in pattern rules: Subpoena (/cfg/patterns.yml)"
        );
    });

    // Scenario: Regular expression does not compile
    it("should reject an invalid pattern", () => {
        mockReadFileSync.mockReturnValue(PATTERNS_YAML.replace("'\\bcustody\\b'", "'custody(('"));

        expect(() => loadPatterns("/cfg/patterns.yml", registry)).toThrow(/^Invalid pattern "custody\(\("/);
    });
});
