/**
 * @fileoverview Unit tests for the language model cascade stage
 *
 * @module __tests__/LanguageModelStage
 */

import { describe, it, expect } from "vitest";
import { ResourceSlot, silentLogger, type LanguageModel, type StageContext } from "@legal-cascade/engine";
import { LanguageModelStage, type ModelBinding } from "../domain/cascade/LanguageModelStage.js";
import type { ModelUsed } from "../domain/cascade/types.js";
import { EMPTY_RETRIEVAL_CONTEXT } from "../domain/retrieval/ContextRetriever.js";
import { HeuristicScorer } from "../domain/scoring/HeuristicScorer.js";
import { CONTRACT_TEXT, createTestRegistry, delayedModel, hangingModel, scriptedModel } from "./fixtures.js";

const registry = createTestRegistry();
const scorer = new HeuristicScorer(registry);

const INPUT = { text: CONTRACT_TEXT, filename: "msa.txt", context: EMPTY_RETRIEVAL_CONTEXT };
const CONTEXT: StageContext = { traceId: "tr_1", logger: silentLogger, previousFailures: [] };

// Scores on CONTRACT_TEXT: 1.0, 0.95 and 0.45
const CONTRACT_AGREEMENT = "Category: Contract\nType: Agreement\nReasoning: Recitals and an indemnity clause.";
const CONTRACT_LETTER = "Category: Contract; Type: Letter";
const IMMIGRATION_LETTER = "Category: Immigration; Type: Letter";
const UNKNOWN_CATEGORY = "Category: Tax; Type: Agreement";

function bind(modelUsed: ModelUsed, model: LanguageModel, timeoutMs: number = 1000): ModelBinding {
    return {
        modelUsed,
        slot: new ResourceSlot({ name: modelUsed, load: async () => model }),
        timeoutMs,
    };
}

function createStage(id: "primary" | "fallback", threshold: number, models: ModelBinding[]): LanguageModelStage {
    return new LanguageModelStage({
        id,
        acceptanceThreshold: threshold,
        models,
        promptStyle        : id === "primary" ? "legal" : "general",
        taxonomy           : registry,
        scorer,
    });
}

describe("LanguageModelStage", () => {
    // Scenario: Stage without models
    it("should report unavailable when no model is configured", async () => {
        const stage = createStage("primary", 0.7, []);

        const result = await stage.attempt(INPUT, CONTEXT);

        expect(stage.modelCount).toBe(0);
        expect(result).toEqual({
            ok   : false,
            error: { stageId: "primary", kind: "unavailable", message: "No language model configured" },
        });
    });

    // Scenario: First model answers above the threshold
    it("should return a scored answer from the first model", async () => {
        const primary = scriptedModel("primary", CONTRACT_AGREEMENT);
        const stage = createStage("primary", 0.7, [bind("primary", primary.model)]);

        const result = await stage.attempt(INPUT, CONTEXT);

        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(result.value.category).toBe("Contract");
            expect(result.value.documentType).toBe("Agreement");
            expect(result.value.confidenceScore).toBe(1);
            expect(result.value.modelUsed).toBe("primary");
            expect(result.value.rawResponse).toBe(CONTRACT_AGREEMENT);
            expect(result.value.heuristic?.uncertaintyFlags).toEqual([]);
        }
        expect(primary.complete).toHaveBeenCalledTimes(1);
        expect(primary.complete).toHaveBeenCalledWith(expect.objectContaining({ maxTokens: 150, temperature: 0.1 }));
    });

    // Scenario: The prompt carries the document and the label lists
    it("should send the legal prompt with the document excerpt", async () => {
        const primary = scriptedModel("primary", CONTRACT_AGREEMENT);
        const stage = createStage("primary", 0.7, [bind("primary", primary.model)]);

        await stage.attempt(INPUT, CONTEXT);

        const [request] = primary.complete.mock.calls[0] ?? [];
        expect(request?.prompt).toContain("Filename: msa.txt");
        expect(request?.prompt).toContain("- Family Law: Custody and divorce");
        expect(request?.prompt).toContain("Answer format: Category: <category name>; Type: <document type>");
    });

    // Scenario: A usable answer below threshold ends the stage
    it("should return a recognized answer below threshold without calling the next model", async () => {
        const api = scriptedModel("fallback-api", IMMIGRATION_LETTER);
        const local = scriptedModel("fallback", CONTRACT_LETTER);
        const stage = createStage("fallback", 0.6, [bind("fallback-api", api.model), bind("fallback", local.model)]);

        const result = await stage.attempt(INPUT, CONTEXT);

        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(result.value.modelUsed).toBe("fallback-api");
            expect(result.value.category).toBe("Immigration");
            expect(result.value.confidenceScore).toBeCloseTo(0.45, 10);
        }
        expect(api.complete).toHaveBeenCalledTimes(1);
        expect(local.complete).not.toHaveBeenCalled();
    });

    // Scenario: Labels outside the taxonomy move on to the next model
    it("should try the next model when an answer is outside the taxonomy", async () => {
        const api = scriptedModel("fallback-api", UNKNOWN_CATEGORY);
        const local = scriptedModel("fallback", CONTRACT_LETTER);
        const stage = createStage("fallback", 0.6, [bind("fallback-api", api.model), bind("fallback", local.model)]);

        const result = await stage.attempt(INPUT, CONTEXT);

        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(result.value.modelUsed).toBe("fallback");
            expect(result.value.confidenceScore).toBeCloseTo(0.95, 10);
        }
        expect(api.complete).toHaveBeenCalledTimes(1);
        expect(local.complete).toHaveBeenCalledTimes(1);
    });

    // Scenario: An accepted answer stops the stage
    it("should not call later models once an answer clears the threshold", async () => {
        const api = scriptedModel("fallback-api", CONTRACT_LETTER);
        const local = scriptedModel("fallback", CONTRACT_AGREEMENT);
        const stage = createStage("fallback", 0.6, [bind("fallback-api", api.model), bind("fallback", local.model)]);

        const result = await stage.attempt(INPUT, CONTEXT);

        expect(result.ok && result.value.modelUsed).toBe("fallback-api");
        expect(local.complete).not.toHaveBeenCalled();
    });

    // Scenario: Every answer is outside the taxonomy
    it("should return the first unrecognized answer so the engine can gate it", async () => {
        const api = scriptedModel("fallback-api", UNKNOWN_CATEGORY);
        const local = scriptedModel("fallback", "Category: Probate; Type: Letter");
        const stage = createStage("fallback", 0.6, [bind("fallback-api", api.model), bind("fallback", local.model)]);

        const result = await stage.attempt(INPUT, CONTEXT);

        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(result.value.modelUsed).toBe("fallback-api");
            expect(result.value.category).toBe("Unclassified");
            expect(result.value.confidenceScore).toBe(0);
        }
        expect(local.complete).toHaveBeenCalledTimes(1);
    });

    // Scenario: A label outside the taxonomy
    it("should score an unrecognized label as zero", async () => {
        const primary = scriptedModel("primary", UNKNOWN_CATEGORY);
        const stage = createStage("primary", 0.7, [bind("primary", primary.model)]);

        const result = await stage.attempt(INPUT, CONTEXT);

        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(result.value.category).toBe("Unclassified");
            expect(result.value.documentType).toBe("Agreement");
            expect(result.value.confidenceScore).toBe(0);
        }
    });

    // Scenario: Model never answers
    it("should report a timeout when the only model hangs", async () => {
        const primary = hangingModel("primary");
        const stage = createStage("primary", 0.7, [bind("primary", primary.model, 20)]);

        const result = await stage.attempt(INPUT, CONTEXT);

        expect(result).toEqual({
            ok   : false,
            error: { stageId: "primary", kind: "timeout", message: "primary: no response within 20ms" },
        });
    });

    // Scenario: Concurrent documents share one model
    it("should queue concurrent calls without counting the wait against the timeout", async () => {
        const primary = delayedModel("primary", 60, CONTRACT_AGREEMENT);
        const binding = bind("primary", primary.model, 100);
        const stage = createStage("primary", 0.7, [binding]);

        const results = await Promise.all([
            stage.attempt(INPUT, CONTEXT),
            stage.attempt(INPUT, CONTEXT),
            stage.attempt(INPUT, CONTEXT),
        ]);

        expect(results.map(result => result.ok && result.value.modelUsed)).toEqual(["primary", "primary", "primary"]);
        expect(primary.complete).toHaveBeenCalledTimes(3);
        expect(binding.slot.pendingCount).toBe(0);
    });

    // Scenario: A hung call gives the slot back when it times out
    it("should free the slot for the next caller after a timeout", async () => {
        const primary = scriptedModel("primary", CONTRACT_AGREEMENT);
        primary.complete.mockImplementationOnce(() => new Promise<string>(() => undefined));
        const stage = createStage("primary", 0.7, [bind("primary", primary.model, 20)]);

        const [first, second] = await Promise.all([
            stage.attempt(INPUT, CONTEXT),
            stage.attempt(INPUT, CONTEXT),
        ]);

        expect(first).toEqual({
            ok   : false,
            error: { stageId: "primary", kind: "timeout", message: "primary: no response within 20ms" },
        });
        expect(second.ok && second.value.confidenceScore).toBe(1);
        expect(primary.complete).toHaveBeenCalledTimes(2);
    });

    // Scenario: Blank completion
    it("should report an empty response as invalid", async () => {
        const primary = scriptedModel("primary", "   ");
        const stage = createStage("primary", 0.7, [bind("primary", primary.model)]);

        const result = await stage.attempt(INPUT, CONTEXT);

        expect(result).toEqual({
            ok   : false,
            error: { stageId: "primary", kind: "invalid_response", message: "primary: empty response" },
        });
    });

    // Scenario: Different failures across models
    it("should report mixed failures as unavailable", async () => {
        const api = hangingModel("fallback-api");
        const local = scriptedModel("fallback", "");
        const stage = createStage("fallback", 0.6, [bind("fallback-api", api.model, 20), bind("fallback", local.model)]);

        const result = await stage.attempt(INPUT, CONTEXT);

        expect(result).toEqual({
            ok   : false,
            error: {
                stageId: "fallback",
                kind   : "unavailable",
                message: "fallback-api: no response within 20ms; fallback: empty response",
            },
        });
    });

    // Scenario: Slot refuses to load on demand
    it("should treat an unloaded slot as unavailable", async () => {
        const primary = scriptedModel("primary", CONTRACT_AGREEMENT);
        const binding: ModelBinding = {
            modelUsed: "primary",
            slot     : new ResourceSlot({ name: "primary", load: async () => primary.model, autoLoad: false }),
            timeoutMs: 1000,
        };
        const stage = createStage("primary", 0.7, [binding]);

        const result = await stage.attempt(INPUT, CONTEXT);

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe("unavailable");
        }
        expect(primary.complete).not.toHaveBeenCalled();
    });
});
