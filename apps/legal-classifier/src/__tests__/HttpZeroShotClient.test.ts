/**
 * @fileoverview Unit tests for the HTTP zero-shot client
 *
 * @module __tests__/HttpZeroShotClient
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { HttpZeroShotClient } from "../adapters/validator/HttpZeroShotClient.js";

function jsonResponse(body: unknown, status: number = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("HttpZeroShotClient", () => {
    const url = "http://localhost:9000/classify";
    let fetchMock: Mock<typeof fetch>;

    beforeEach(() => {
        fetchMock = vi.fn<typeof fetch>();
        vi.stubGlobal("fetch", fetchMock);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    // Scenario: Labels come back sorted by score
    it("should post the candidate labels and sort the scores", async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse({ labels: ["Contract", "Litigation"], scores: [0.2, 0.8] }));
        const client = new HttpZeroShotClient({ url, apiKey: "test-secret" });

        const scores = await client.classify("Complaint for breach", ["Contract", "Litigation"]);

        expect(scores).toEqual([
            { label: "Litigation", score: 0.8 },
            { label: "Contract", score: 0.2 },
        ]);

        const [target, init] = fetchMock.mock.calls[0] ?? [];
        expect(target).toBe(url);
        expect(init?.method).toBe("POST");
        expect(init?.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-secret" });
        expect(JSON.parse(String(init?.body))).toEqual({
            inputs    : "Complaint for breach",
            parameters: { candidate_labels: ["Contract", "Litigation"], multi_label: false },
        });
    });

    // Scenario: Answer wrapped in an array
    it("should accept a one-element array response", async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse([{ labels: ["Immigration"], scores: [0.91] }]));

        const scores = await new HttpZeroShotClient({ url }).classify("Form I-130", ["Immigration"]);

        expect(scores).toEqual([{ label: "Immigration", score: 0.91 }]);
        expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({ "Content-Type": "application/json" });
    });

    // Scenario: No labels to score
    it("should not call the service without candidate labels", async () => {
        await expect(new HttpZeroShotClient({ url }).classify("text", [])).resolves.toEqual([]);
        expect(fetchMock).not.toHaveBeenCalled();
    });

    // Scenario: HTTP errors
    it.each([
        [503, "unavailable"],
        [500, "error"],
    ] as const)("should map HTTP %i to %s", async (status, kind) => {
        fetchMock.mockResolvedValueOnce(jsonResponse({ error: "busy" }, status));

        await expect(new HttpZeroShotClient({ url }).classify("text", ["Contract"])).rejects.toMatchObject({
            kind,
            service: "validator",
            message: `validator: HTTP ${status}`,
        });
    });

    // Scenario: Malformed responses
    it("should reject malformed responses", async () => {
        const client = new HttpZeroShotClient({ url });
        fetchMock.mockResolvedValueOnce(jsonResponse({ label: "Contract" }));
        fetchMock.mockResolvedValueOnce(jsonResponse({ labels: ["Contract", "Litigation"], scores: [0.7] }));

        await expect(client.classify("text", ["Contract"])).rejects.toMatchObject({
            kind   : "invalid_response",
            message: "validator: Unexpected zero-shot response",
        });
        await expect(client.classify("text", ["Contract"])).rejects.toMatchObject({
            kind   : "invalid_response",
            message: "validator: Labels and scores differ in length",
        });
    });

    // Scenario: Service unreachable
    it("should report network errors as unavailable", async () => {
        fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

        await expect(new HttpZeroShotClient({ url }).classify("text", ["Contract"])).rejects.toMatchObject({
            kind   : "unavailable",
            message: "validator: fetch failed",
        });
    });

    // Scenario: Service does not answer in time
    it("should time out a slow service", async () => {
        fetchMock.mockImplementationOnce((_input, init) => new Promise((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }));

        await expect(new HttpZeroShotClient({ url, timeoutMs: 10 }).classify("text", ["Contract"])).rejects.toMatchObject({
            kind   : "timeout",
            message: "validator: no response within 10ms",
        });
    });
});
