/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * A synchronous, in-memory event bus. Handler failures are reported to the
 * configured logger and never reach the emitter.
 *
 * @module @legal-cascade/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import type { Logger } from "../contracts/Logger.js";
import { describeError } from "../contracts/Result.js";

/**
 * In-memory EventBus. Handlers run synchronously inside emit().
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("document:classified", (event) => {
 *     console.log("Classified:", event.data);
 * });
 *
 * bus.emit(createEvent("document:classified", { category: "Asylum & Refugee" }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers: Map<string, Set<EventHandler>> = new Map();

    /**
     * @param logger - Receives handler failures (default: console.error)
     */
    constructor(private readonly logger?: Logger) {}

    /**
     * Emit an event to all subscribers.
     *
     * Specific handlers run before wildcard handlers.
     */
    emit(event: EventPayload): void {
        this.dispatch(this.handlers.get(event.type), event);
        this.dispatch(this.handlers.get("*"), event);
    }

    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    once(eventType: EventType, handler: EventHandler): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            handler(event);
        });
        return subscription;
    }

    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers registered for an event type.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(handlers: Set<EventHandler> | undefined, event: EventPayload): void {
        if (!handlers) {
            return;
        }
        // Copy so once() handlers can unsubscribe mid-dispatch.
        for (const handler of [...handlers]) {
            try {
                handler(event);
            }
            catch (error) {
                if (this.logger) {
                    this.logger.error("EventBus handler error", { eventType: event.type, error: describeError(error) });
                }
                else {
                    console.error(`EventBus handler error for ${event.type}:`, error);
                }
            }
        }
    }
}
