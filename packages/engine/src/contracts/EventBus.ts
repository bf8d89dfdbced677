/**
 * @fileoverview EventBus Contract
 *
 * Internal event flow for one pipeline run. The CLI subscribes to
 * these events for console progress; tests subscribe to assert order.
 *
 * Dispatch is synchronous and in-memory. Ordering is preserved
 * within a single event type.
 *
 * @module @ruleboard/engine/contracts/EventBus
 */

/**
 * Event payload base interface.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: EventType;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Run identifier for correlation */
    readonly runId?: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Run-level events.
 */
export type RunEventType =
    | "run:started"
    | "run:completed";

/**
 * Per-source events, emitted in configured source order.
 */
export type SourceEventType =
    | "source:skipped"
    | "source:fetched"
    | "source:failed"
    | "source:detected"
    | "source:unknown"
    | "source:normalized"
    | "source:misdetected"
    | "source:redirects";

/**
 * Per-target events.
 */
export type TargetEventType =
    | "target:written"
    | "target:failed";

/**
 * All event types.
 */
export type EventType = RunEventType | SourceEventType | TargetEventType;

/**
 * Event handler function signature.
 */
export type EventHandler = (event: EventPayload) => void;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    /** Unsubscribe from the event */
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("source:failed", (event) => {
 *     console.warn("Source failed:", event.data);
 * });
 *
 * bus.emit(createEvent("source:failed", { source: "hBlock", error: "timeout" }));
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers.
     */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type, or "*" for all events.
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Subscribe to the next event of a type only.
     */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Remove all subscriptions for a type, or every subscription.
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Create an event payload stamped with the current time.
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    runId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        runId,
        data,
    };
}
