/**
 * @fileoverview Cascade Engine
 *
 * Domain-agnostic, threshold-gated classification cascade.
 *
 * The engine provides:
 * - Ordered stages with acceptance thresholds and an unconditional floor
 * - An emergency path for exceptions escaping any stage
 * - Result types for expected failures of external calls
 * - Single-slot lifecycle management for expensive model handles
 * - Contracts for language models, embedders, similarity stores and validators
 *
 * @module @legal-cascade/engine
 * @example
 * ```typescript
 * import { CascadeEngine, ok, type CascadeStage } from "@legal-cascade/engine";
 *
 * const engine = new CascadeEngine({ stages, emergency });
 * const outcome = await engine.run(input);
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export type {
    Entity,
    Ok,
    Err,
    Result,
    Logger,
    LogLevel,
    CascadeStage,
    ScoredOutput,
    StageContext,
    StageError,
    StageErrorKind,
    StageFailure,
    CompletionRequest,
    LanguageModel,
    Embedder,
    Payload,
    SimilarityPoint,
    SimilarityHit,
    SimilarityStore,
    LabelScore,
    ZeroShotClassifier,
    TextExtractor,
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    CascadeEventType,
    DocumentEventType,
    Subscription,
} from "./contracts/index.js";
export {
    generateTraceId,
    ok,
    err,
    isErr,
    describeError,
    LOG_LEVELS,
    isLogLevel,
    silentLogger,
    stageError,
    isAccepted,
    createEvent,
} from "./contracts/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export {
    InMemoryEventBus,
    createConsoleLogger,
    childLogger,
    type ConsoleLoggerOptions,
} from "./impl/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    CascadeEngine,
    CascadeExhaustedError,
    type AcceptedOutcome,
    type CascadeEngineConfig,
    type CascadeOutcome,
    type EmergencyHandler,
    type EmergencyOutcome,
} from "./engine/index.js";

// ============================================================================
// Resource exports
// ============================================================================

export {
    ResourceSlot,
    ResourceUnavailableError,
    ResourceHost,
    type ResourceSlotOptions,
    type LoadReport,
    type ManagedResource,
} from "./resources/index.js";
