/**
 * Contract exports
 */

export type { Entity } from "./Entity.js";
export { generateTraceId } from "./Entity.js";

export type { Ok, Err, Result } from "./Result.js";
export { ok, err, isErr, describeError } from "./Result.js";

export type { Logger, LogLevel } from "./Logger.js";
export { LOG_LEVELS, isLogLevel, silentLogger } from "./Logger.js";

export type {
    CascadeStage,
    ScoredOutput,
    StageContext,
    StageError,
    StageErrorKind,
    StageFailure,
} from "./CascadeStage.js";
export { stageError, isAccepted } from "./CascadeStage.js";

export type {
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
} from "./Collaborators.js";

export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    CascadeEventType,
    DocumentEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
