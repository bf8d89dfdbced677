/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * Synchronous, in-process event bus for a single pipeline run.
 *
 * @module @ruleboard/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { createConsoleLogger } from "../contracts/Logger.js";
import { errorMessage } from "../contracts/errors.js";

/**
 * In-memory EventBus implementation.
 *
 * Handlers for a type run before wildcard handlers. A throwing handler
 * is logged and does not prevent the remaining handlers from running.
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("target:written", (event) => {
 *     console.log("Wrote", event.data?.destination);
 * });
 *
 * bus.emit(createEvent("target:written", { destination: "dist/rules.list" }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers: Map<EventType | "*", Set<EventHandler>> = new Map();
    private readonly logger: EngineLogger;

    constructor(logger: EngineLogger = createConsoleLogger("warn", "[EventBus]")) {
        this.logger = logger;
    }

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
     * Number of handlers for a type. Used by tests.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(handlers: Set<EventHandler> | undefined, event: EventPayload): void {
        if (!handlers) {
            return;
        }

        // Copy so that once() can unsubscribe while iterating
        for (const handler of [...handlers]) {
            try {
                handler(event);
            }
            catch (error) {
                this.logger.error("Event handler failed", {
                    type : event.type,
                    error: errorMessage(error),
                });
            }
        }
    }
}
