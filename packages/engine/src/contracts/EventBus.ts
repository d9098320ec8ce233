/**
 * @fileoverview EventBus Contract
 *
 * Stage decisions and document milestones, published for observers.
 * Dispatch is synchronous and in order of emission; the cascade never
 * waits on or reads from a subscriber.
 *
 * @module @legal-cascade/engine/contracts/EventBus
 */

export interface EventPayload {
    readonly type: string;

    /** ISO-8601 emission time */
    readonly timestamp: string;

    /** Correlates every event of one classification run */
    readonly traceId?: string;

    readonly data?: Record<string, unknown>;
}

/**
 * Event types emitted by the cascade engine.
 */
export type CascadeEventType =
    | "cascade:started"
    | "stage:attempting"
    | "stage:accepted"
    | "stage:rejected"
    | "stage:failed"
    | "cascade:emergency"
    | "cascade:completed";

/**
 * Event types emitted by a document classification service.
 */
export type DocumentEventType =
    | "document:received"
    | "document:classified"
    | "document:review-required"
    | "document:persisted";

/** Known types plus any service-specific string */
export type EventType = CascadeEventType | DocumentEventType | (string & {});

export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void;

export interface Subscription {
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("stage:rejected", (event) => {
 *     console.log("Stage rejected:", event.data);
 * });
 *
 * bus.emit(createEvent("stage:rejected", { stageId: "primary" }, "tr_abc"));
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /** Deliver to subscribers of the event's type, then to "*" subscribers */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type ("*" for all events).
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /** Like subscribe, but the handler runs at most once */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Remove all subscriptions for a specific event type ("*" or nothing for all).
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Stamp and freeze an event. Absent `data` and `traceId` are left off the
 * payload rather than set to undefined.
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    traceId?: string
): EventPayload {
    return Object.freeze({
        type,
        timestamp: new Date().toISOString(),
        ...(traceId !== undefined && { traceId }),
        ...(data !== undefined && { data }),
    });
}
