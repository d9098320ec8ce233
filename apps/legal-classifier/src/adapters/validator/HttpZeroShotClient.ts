/**
 * Zero-shot classification over HTTP
 *
 * Talks to an inference endpoint serving an NLI model through the
 * zero-shot-classification task (`{ inputs, parameters: { candidate_labels } }`
 * in, `{ labels, scores }` out).
 */

import { z } from "zod";
import type { LabelScore, ZeroShotClassifier } from "@legal-cascade/engine";
import { ModelCallError } from "../../domain/errors.js";

export interface HttpZeroShotClientConfig {
    url: string;
    apiKey?: string;

    /** Request timeout in milliseconds (default: 30000) */
    timeoutMs?: number;
}

const labelsSchema = z.object({
    labels: z.array(z.string()),
    scores: z.array(z.number()),
});

/** Some servers wrap the answer in a one-element array */
const responseSchema = z.union([labelsSchema, z.array(labelsSchema).min(1)]);

const kSERVICE = "validator";

export class HttpZeroShotClient implements ZeroShotClassifier {
    private url: string;
    private apiKey: string | undefined;
    private timeoutMs: number;

    constructor(config: HttpZeroShotClientConfig) {
        this.url = config.url;
        this.apiKey = config.apiKey;
        this.timeoutMs = config.timeoutMs ?? 30_000;
    }

    async classify(text: string, candidateLabels: readonly string[]): Promise<LabelScore[]> {
        if (candidateLabels.length === 0) {
            return [];
        }

        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

        const headers: Record<string, string> = { "Content-Type": "application/json" };
        if (this.apiKey) {
            headers.Authorization = `Bearer ${this.apiKey}`;
        }

        let body: unknown;
        try {
            const response = await fetch(this.url, {
                method: "POST",
                headers,
                body  : JSON.stringify({
                    inputs    : text,
                    parameters: { candidate_labels: candidateLabels, multi_label: false },
                }),
                signal: controller.signal,
            });

            if (!response.ok) {
                const kind = response.status === 503 ? "unavailable" : "error";
                throw new ModelCallError(kind, kSERVICE, `HTTP ${response.status}`);
            }

            body = await response.json();
        }
        catch (error) {
            if (error instanceof ModelCallError) {
                throw error;
            }
            if (controller.signal.aborted) {
                throw new ModelCallError("timeout", kSERVICE, `no response within ${this.timeoutMs}ms`);
            }
            throw new ModelCallError("unavailable", kSERVICE, error instanceof Error ? error.message : String(error));
        }
        finally {
            clearTimeout(timeout);
        }

        const parsed = responseSchema.safeParse(body);
        if (!parsed.success) {
            throw new ModelCallError("invalid_response", kSERVICE, "Unexpected zero-shot response");
        }

        const result = Array.isArray(parsed.data) ? parsed.data[0] : parsed.data;
        if (!result || result.labels.length !== result.scores.length) {
            throw new ModelCallError("invalid_response", kSERVICE, "Labels and scores differ in length");
        }

        return result.labels
            .map((label, index) => ({ label, score: result.scores[index] ?? 0 }))
            .sort((a, b) => b.score - a.score);
    }
}
