/**
 * @fileoverview Unit tests for CascadeEngine
 *
 * Tests cover:
 * - Acceptance gating per stage threshold
 * - Fall-through on err results and below-threshold answers
 * - Floor stages without a threshold
 * - Emergency path on thrown exceptions and on exhaustion
 * - Event emission
 * - Configuration validation
 *
 * @module @legal-cascade/engine/__tests__/CascadeEngine
 */

import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { CascadeEngine } from "../engine/CascadeEngine.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { stageError, type CascadeStage } from "../contracts/CascadeStage.js";
import { err, ok } from "../contracts/Result.js";
import type { EventPayload } from "../contracts/EventBus.js";

interface Answer {
    readonly label: string;
    readonly confidenceScore: number;
}

type StageId = "primary" | "fallback" | "floor";

type TestStage = CascadeStage<string, Answer, StageId>;

type MockStage = TestStage & { attempt: Mock<TestStage["attempt"]> };

function createStage(
    id: StageId,
    behavior: () => Promise<Answer> | Answer | "fail",
    acceptanceThreshold?: number
): MockStage {
    return {
        id,
        acceptanceThreshold,
        attempt: vi.fn<TestStage["attempt"]>(async () => {
            const value = await behavior();
            return value === "fail"
                ? err(stageError(id, "unavailable", `${id} offline`))
                : ok(value);
        }),
    };
}

const emergency = (input: string, error: string): Answer => ({
    label          : `emergency:${input}:${error}`,
    confidenceScore: 0.4,
});

describe("CascadeEngine", () => {
    let eventBus: InMemoryEventBus;
    let events: EventPayload[];

    beforeEach(() => {
        eventBus = new InMemoryEventBus();
        events = [];
        eventBus.subscribe("*", event => events.push(event));
    });

    describe("acceptance gating", () => {
        // Scenario: First stage clears its threshold, later stages never run
        it("should stop at the first stage whose answer meets its threshold", async () => {
            const primary = createStage("primary", () => ({ label: "a", confidenceScore: 0.7 }), 0.7);
            const fallback = createStage("fallback", () => ({ label: "b", confidenceScore: 0.9 }), 0.6);
            const floor = createStage("floor", () => ({ label: "c", confidenceScore: 0.4 }));

            const engine = new CascadeEngine({ stages: [primary, fallback, floor], emergency, eventBus });
            const outcome = await engine.run("doc", "tr_gate");

            expect(outcome.status).toBe("accepted");
            if (outcome.status === "accepted") {
                expect(outcome.stageId).toBe("primary");
                expect(outcome.output.label).toBe("a");
                expect(outcome.failures).toEqual([]);
            }
            expect(fallback.attempt).not.toHaveBeenCalled();
            expect(floor.attempt).not.toHaveBeenCalled();
        });

        // Scenario: Below-threshold answer is discarded and recorded
        it("should fall through when confidence is below threshold and keep the reason", async () => {
            const primary = createStage("primary", () => ({ label: "a", confidenceScore: 0.69 }), 0.7);
            const fallback = createStage("fallback", () => ({ label: "b", confidenceScore: 0.6 }), 0.6);
            const floor = createStage("floor", () => ({ label: "c", confidenceScore: 0.4 }));

            const engine = new CascadeEngine({ stages: [primary, fallback, floor], emergency });
            const outcome = await engine.run("doc");

            expect(outcome.status).toBe("accepted");
            if (outcome.status === "accepted") {
                expect(outcome.stageId).toBe("fallback");
                expect(outcome.output.label).toBe("b");
                expect(outcome.failures).toEqual([{
                    stageId   : "primary",
                    kind      : "below_threshold",
                    message   : "Confidence 0.69 below acceptance threshold 0.70",
                    confidence: 0.69,
                }]);
            }
            expect(floor.attempt).not.toHaveBeenCalled();
        });

        // Scenario: Floor stage accepts any confidence
        it("should accept the floor stage regardless of confidence", async () => {
            const primary = createStage("primary", () => "fail", 0.7);
            const fallback = createStage("fallback", () => "fail", 0.6);
            const floor = createStage("floor", () => ({ label: "c", confidenceScore: 0.05 }));

            const engine = new CascadeEngine({ stages: [primary, fallback, floor], emergency });
            const outcome = await engine.run("doc");

            expect(outcome.status).toBe("accepted");
            if (outcome.status === "accepted") {
                expect(outcome.stageId).toBe("floor");
                expect(outcome.failures.map(f => f.kind)).toEqual(["unavailable", "unavailable"]);
            }
        });

        // Scenario: Later stages see earlier failures in their context
        it("should pass previous failures to each stage", async () => {
            const primary = createStage("primary", () => "fail", 0.7);
            const floor = createStage("floor", () => ({ label: "c", confidenceScore: 0.5 }));

            const engine = new CascadeEngine({ stages: [primary, floor], emergency });
            await engine.run("doc", "tr_ctx");

            const context = floor.attempt.mock.calls[0]?.[1];
            expect(context?.traceId).toBe("tr_ctx");
            expect(context?.previousFailures).toEqual([
                { stageId: "primary", kind: "unavailable", message: "primary offline" },
            ]);
        });
    });

    describe("emergency path", () => {
        // Scenario: A stage throws; the emergency handler produces the output
        it("should route thrown exceptions to the emergency handler", async () => {
            const primary = createStage("primary", () => "fail", 0.7);
            const fallback = createStage("fallback", () => {
                throw new Error("socket hang up");
            }, 0.6);
            const floor = createStage("floor", () => ({ label: "c", confidenceScore: 0.4 }));

            const engine = new CascadeEngine({ stages: [primary, fallback, floor], emergency, eventBus });
            const outcome = await engine.run("doc");

            expect(outcome.status).toBe("emergency");
            if (outcome.status === "emergency") {
                expect(outcome.error).toBe("socket hang up");
                expect(outcome.output.label).toBe("emergency:doc:socket hang up");
                expect(outcome.failures).toHaveLength(1);
            }
            expect(floor.attempt).not.toHaveBeenCalled();
            expect(events.map(e => e.type)).toContain("cascade:emergency");
        });

        // Scenario: No floor and nothing accepted
        it("should use the emergency handler when every stage falls through", async () => {
            const primary = createStage("primary", () => ({ label: "a", confidenceScore: 0.1 }), 0.7);

            const engine = new CascadeEngine({ stages: [primary], emergency });
            const outcome = await engine.run("doc");

            expect(outcome.status).toBe("emergency");
            if (outcome.status === "emergency") {
                expect(outcome.error).toBe("No stage accepted an answer (primary: below_threshold)");
            }
        });
    });

    describe("events", () => {
        // Scenario: Event sequence for a run that falls through once
        it("should emit stage decisions in order with the trace ID", async () => {
            const primary = createStage("primary", () => "fail", 0.7);
            const floor = createStage("floor", () => ({ label: "c", confidenceScore: 0.4 }));

            const engine = new CascadeEngine({ stages: [primary, floor], emergency, eventBus });
            await engine.run("doc", "tr_events");

            expect(events.map(e => e.type)).toEqual([
                "cascade:started",
                "stage:attempting",
                "stage:failed",
                "stage:attempting",
                "stage:accepted",
                "cascade:completed",
            ]);
            expect(events.every(e => e.traceId === "tr_events")).toBe(true);
        });
    });

    describe("configuration", () => {
        // Scenario: Empty stage list
        it("should reject an empty stage list", () => {
            expect(() => new CascadeEngine<string, Answer, StageId>({ stages: [], emergency }))
                .toThrow("CascadeEngine requires at least one stage");
        });

        // Scenario: Duplicate stage identifiers
        it("should reject duplicate stage ids", () => {
            const a = createStage("primary", () => "fail", 0.7);
            const b = createStage("primary", () => "fail", 0.6);

            expect(() => new CascadeEngine({ stages: [a, b], emergency })).toThrow("Duplicate stage id: primary");
        });

        // Scenario: Stage ids are exposed in order
        it("should expose stage ids in attempt order", () => {
            const engine = new CascadeEngine({
                stages: [
                    createStage("primary", () => "fail", 0.7),
                    createStage("floor", () => "fail"),
                ],
                emergency,
            });

            expect(engine.stageIds).toEqual(["primary", "floor"]);
        });
    });
});
