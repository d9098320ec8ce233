/**
 * @fileoverview Cascade Stage Contract
 *
 * A cascade stage is one attempt at producing an answer, gated by a
 * confidence threshold before the engine falls through to the next stage.
 *
 * Stages never throw for expected failures (service down, timeout, garbled
 * output). They return `err(StageError)` and the engine moves on. A thrown
 * exception is treated as systemic and routes the run to the emergency path.
 *
 * @module @legal-cascade/engine/contracts/CascadeStage
 */

import type { Logger } from "./Logger.js";
import type { Result } from "./Result.js";

/**
 * Why a stage did not produce an accepted answer.
 */
export type StageErrorKind =
    | "unavailable"
    | "timeout"
    | "invalid_response"
    | "below_threshold"
    | "error";

export interface StageError {
    readonly stageId: string;
    readonly kind: StageErrorKind;
    readonly message: string;

    /** Confidence of a rejected answer, for below_threshold failures */
    readonly confidence?: number;
}

/**
 * Failure retained for diagnostics after the cascade moves past a stage.
 */
export type StageFailure = StageError;

/**
 * Minimum shape every stage output must have so the engine can gate it.
 */
export interface ScoredOutput {
    readonly confidenceScore: number;
}

/**
 * Context handed to each stage attempt.
 */
export interface StageContext {
    readonly traceId: string;
    readonly logger: Logger;

    /** Failures of the stages that ran before this one, in order */
    readonly previousFailures: readonly StageFailure[];
}

/**
 * A single stage in a cascade.
 *
 * @typeParam TInput - What every stage receives
 * @typeParam TOutput - What every stage produces
 * @typeParam TStageId - Closed set of stage identifiers
 */
export interface CascadeStage<TInput, TOutput extends ScoredOutput, TStageId extends string = string> {
    readonly id: TStageId;

    readonly name?: string;

    /**
     * Minimum confidence for this stage's output to be accepted.
     * A stage without a threshold is a floor: its output is always accepted.
     */
    readonly acceptanceThreshold?: number;

    attempt(input: TInput, context: StageContext): Promise<Result<TOutput, StageError>>;
}

export function stageError(
    stageId: string,
    kind: StageErrorKind,
    message: string,
    confidence?: number
): StageError {
    return Object.freeze({
        stageId,
        kind,
        message,
        ...(confidence !== undefined && { confidence }),
    });
}

/**
 * Whether a stage's output clears its acceptance threshold.
 */
export function isAccepted<TOutput extends ScoredOutput>(
    stage: Pick<CascadeStage<unknown, TOutput>, "acceptanceThreshold">,
    output: TOutput
): boolean {
    return stage.acceptanceThreshold === undefined || output.confidenceScore >= stage.acceptanceThreshold;
}
