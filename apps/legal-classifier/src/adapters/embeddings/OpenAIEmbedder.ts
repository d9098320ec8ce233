/**
 * OpenAI-compatible embeddings
 */

import OpenAI from "openai";
import type { Embedder } from "@legal-cascade/engine";

export interface OpenAIEmbedderConfig {
    baseURL: string;
    model: string;

    /** Length of the vectors the model returns */
    dimensions: number;

    apiKey?: string;

    /** Request timeout in milliseconds (default: 30000) */
    timeoutMs?: number;
}

export class OpenAIEmbedder implements Embedder {
    readonly dimensions: number;

    private client: OpenAI;
    private model: string;

    constructor(config: OpenAIEmbedderConfig) {
        this.dimensions = config.dimensions;
        this.model = config.model;

        this.client = new OpenAI({
            apiKey    : config.apiKey ?? "not-needed",
            baseURL   : config.baseURL,
            timeout   : config.timeoutMs ?? 30_000,
            maxRetries: 0,
        });
    }

    async embed(text: string): Promise<number[]> {
        const response = await this.client.embeddings.create({
            model: this.model,
            input: text.length > 0 ? text : " ",
        });

        const embedding = response.data[0]?.embedding;

        if (!embedding) {
            throw new Error("No embedding in response");
        }
        if (embedding.length !== this.dimensions) {
            throw new Error(`Expected ${this.dimensions} dimensions, got ${embedding.length}`);
        }

        return embedding;
    }
}
