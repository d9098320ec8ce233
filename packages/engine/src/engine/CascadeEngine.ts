/**
 * @fileoverview CascadeEngine
 *
 * Runs an ordered list of stages until one produces an answer that clears its
 * acceptance threshold.
 *
 * Run flow:
 * 1. Each stage is attempted in order, strictly one at a time
 * 2. An `ok` result at or above the stage threshold ends the run
 * 3. An `err` result, or an answer below threshold, is recorded and the run
 *    falls through to the next stage
 * 4. Any exception escaping a stage ends the run on the emergency path
 *
 * Design principles:
 * - Domain-agnostic: knows nothing about documents or taxonomies
 * - Closed control flow: the outcome is a tagged union, not a string lookup
 * - Observable: emits events at each stage decision
 *
 * @module @legal-cascade/engine/engine/CascadeEngine
 */

import {
    isAccepted,
    stageError,
    type CascadeStage,
    type ScoredOutput,
    type StageFailure,
} from "../contracts/CascadeStage.js";
import { generateTraceId } from "../contracts/Entity.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { Logger } from "../contracts/Logger.js";
import { silentLogger } from "../contracts/Logger.js";
import { describeError, isErr } from "../contracts/Result.js";
import { childLogger } from "../impl/ConsoleLogger.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";

/**
 * A stage's answer was accepted.
 */
export interface AcceptedOutcome<TOutput, TStageId extends string> {
    readonly status: "accepted";
    readonly stageId: TStageId;
    readonly output: TOutput;
    readonly failures: readonly StageFailure[];
    readonly traceId: string;
}

/**
 * The run ended on the emergency path.
 */
export interface EmergencyOutcome<TOutput> {
    readonly status: "emergency";
    readonly output: TOutput;

    /** Message of the exception that ended the run */
    readonly error: string;

    readonly failures: readonly StageFailure[];
    readonly traceId: string;
}

export type CascadeOutcome<TOutput, TStageId extends string> =
    | AcceptedOutcome<TOutput, TStageId>
    | EmergencyOutcome<TOutput>;

/**
 * Produces an output when the cascade cannot. Must not throw.
 */
export type EmergencyHandler<TInput, TOutput> = (input: TInput, error: string) => TOutput;

export interface CascadeEngineConfig<TInput, TOutput extends ScoredOutput, TStageId extends string> {
    /** Stages in the order they are attempted */
    readonly stages: readonly CascadeStage<TInput, TOutput, TStageId>[];

    readonly emergency: EmergencyHandler<TInput, TOutput>;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    readonly logger?: Logger;
}

/**
 * Thrown inside the run when every stage fell through without an accepted answer.
 */
export class CascadeExhaustedError extends Error {
    constructor(readonly failures: readonly StageFailure[]) {
        super(`No stage accepted an answer (${failures.map(f => `${f.stageId}: ${f.kind}`).join(", ")})`);
        this.name = "CascadeExhaustedError";
    }
}

/**
 * CascadeEngine - ordered, threshold-gated stage runner.
 *
 * @example
 * ```typescript
 * const engine = new CascadeEngine({
 *     stages   : [primaryStage, fallbackStage, patternStage],
 *     emergency: (input, error) => patternClassifier.classifyEmergency(input, error),
 * });
 *
 * const outcome = await engine.run(input);
 * switch (outcome.status) {
 *     case "accepted":  console.log(outcome.stageId); break;
 *     case "emergency": console.warn(outcome.error); break;
 * }
 * ```
 */
export class CascadeEngine<TInput, TOutput extends ScoredOutput, TStageId extends string> {
    private readonly stages: readonly CascadeStage<TInput, TOutput, TStageId>[];
    private readonly emergency: EmergencyHandler<TInput, TOutput>;
    private readonly logger: Logger;

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: CascadeEngineConfig<TInput, TOutput, TStageId>) {
        if (config.stages.length === 0) {
            throw new Error("CascadeEngine requires at least one stage");
        }

        const seen = new Set<string>();
        for (const stage of config.stages) {
            if (seen.has(stage.id)) {
                throw new Error(`Duplicate stage id: ${stage.id}`);
            }
            seen.add(stage.id);
        }

        this.stages = Object.freeze([...config.stages]);
        this.emergency = config.emergency;
        this.eventBus = config.eventBus ?? new InMemoryEventBus();
        this.logger = config.logger ?? silentLogger;
    }

    /**
     * Identifiers of the configured stages, in order.
     */
    get stageIds(): readonly TStageId[] {
        return this.stages.map(stage => stage.id);
    }

    /**
     * Run the cascade once. Never rejects unless the emergency handler throws.
     */
    async run(input: TInput, traceId: string = generateTraceId()): Promise<CascadeOutcome<TOutput, TStageId>> {
        const failures: StageFailure[] = [];
        const startTime = Date.now();

        this.emit(createEvent("cascade:started", { stages: this.stageIds }, traceId));

        try {
            for (const stage of this.stages) {
                this.emit(createEvent("stage:attempting", { stageId: stage.id }, traceId));

                const result = await stage.attempt(input, {
                    traceId,
                    logger          : childLogger(this.logger, stage.id, traceId),
                    previousFailures: Object.freeze([...failures]),
                });

                if (isErr(result)) {
                    failures.push(result.error);
                    this.logger.warn("Stage failed", { traceId, ...result.error });
                    this.emit(createEvent("stage:failed", { ...result.error }, traceId));
                    continue;
                }

                const confidence = result.value.confidenceScore;

                if (!isAccepted(stage, result.value)) {
                    const threshold = stage.acceptanceThreshold ?? 0;
                    const failure = stageError(
                        stage.id,
                        "below_threshold",
                        `Confidence ${confidence.toFixed(2)} below acceptance threshold ${threshold.toFixed(2)}`,
                        confidence
                    );
                    failures.push(failure);
                    this.logger.info("Stage answer rejected", { traceId, stageId: stage.id, confidence, threshold });
                    this.emit(createEvent("stage:rejected", { ...failure, threshold }, traceId));
                    continue;
                }

                this.logger.debug("Stage answer accepted", { traceId, stageId: stage.id, confidence });
                this.emit(createEvent("stage:accepted", { stageId: stage.id, confidence }, traceId));
                this.emit(createEvent("cascade:completed", {
                    status    : "accepted",
                    stageId   : stage.id,
                    failures  : failures.length,
                    durationMs: Date.now() - startTime,
                }, traceId));

                return Object.freeze({
                    status  : "accepted" as const,
                    stageId : stage.id,
                    output  : result.value,
                    failures: Object.freeze([...failures]),
                    traceId,
                });
            }

            throw new CascadeExhaustedError(failures);
        }
        catch (error) {
            const message = describeError(error);

            this.logger.error("Cascade failed, using emergency path", { traceId, error: message });
            this.emit(createEvent("cascade:emergency", { error: message, failures: failures.length }, traceId));

            const output = this.emergency(input, message);

            this.emit(createEvent("cascade:completed", {
                status    : "emergency",
                failures  : failures.length,
                durationMs: Date.now() - startTime,
            }, traceId));

            return Object.freeze({
                status  : "emergency" as const,
                output,
                error   : message,
                failures: Object.freeze([...failures]),
                traceId,
            });
        }
    }

    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }
}
