/**
 * OpenAI-compatible language model
 *
 * Chat completions against any server that speaks the OpenAI API: the
 * legal-domain model server, a hosted general model, or a local model
 * server. SDK retries are disabled so a failing endpoint fails fast and the
 * cascade can move on.
 */

import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError } from "openai";
import type { CompletionRequest, LanguageModel } from "@legal-cascade/engine";
import { ModelCallError } from "../../domain/errors.js";

/**
 * Configuration options for an OpenAI-compatible model
 */
export interface OpenAICompatibleModelConfig {
    /** Identifier used in logs and errors */
    id: string;

    /** Base URL of the server, e.g. http://localhost:8000/v1 */
    baseURL: string;

    /** Model name the server expects */
    model: string;

    /** API key; local servers usually accept any value */
    apiKey?: string;

    /** Request timeout in milliseconds (default: 30000) */
    timeoutMs?: number;
}

/**
 * Translate SDK errors into ModelCallError kinds.
 */
function toModelCallError(id: string, error: unknown): ModelCallError {
    if (error instanceof ModelCallError) {
        return error;
    }
    if (error instanceof APIConnectionTimeoutError) {
        return new ModelCallError("timeout", id, error.message);
    }
    if (error instanceof APIConnectionError) {
        return new ModelCallError("unavailable", id, error.message);
    }
    if (error instanceof APIError) {
        const kind = error.status === 503 || error.status === 502 ? "unavailable" : "error";
        return new ModelCallError(kind, id, `HTTP ${error.status ?? "error"}: ${error.message}`);
    }
    return new ModelCallError("error", id, error instanceof Error ? error.message : String(error));
}

/**
 * OpenAI-compatible LanguageModel implementation
 */
export class OpenAICompatibleModel implements LanguageModel {
    readonly id: string;

    private client: OpenAI;
    private model: string;

    constructor(config: OpenAICompatibleModelConfig) {
        this.id = config.id;
        this.model = config.model;

        this.client = new OpenAI({
            apiKey    : config.apiKey ?? "not-needed",
            baseURL   : config.baseURL,
            timeout   : config.timeoutMs ?? 30_000,
            maxRetries: 0,
        });
    }

    async complete(request: CompletionRequest): Promise<string> {
        const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
        if (request.system) {
            messages.push({ role: "system", content: request.system });
        }
        messages.push({ role: "user", content: request.prompt });

        try {
            const response = await this.client.chat.completions.create({
                model      : this.model,
                temperature: request.temperature,
                max_tokens : request.maxTokens,
                messages,
            });

            const content = response.choices[0]?.message?.content;

            if (!content) {
                throw new ModelCallError("invalid_response", this.id, "No content in response");
            }

            return content;
        }
        catch (error) {
            throw toModelCallError(this.id, error);
        }
    }
}
