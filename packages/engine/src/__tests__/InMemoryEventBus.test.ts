/**
 * @fileoverview Unit tests for InMemoryEventBus
 *
 * Tests cover:
 * - Typed and wildcard subscriptions, in dispatch order
 * - One-time subscriptions
 * - Unsubscribe and clear
 * - Handler errors are logged and contained
 *
 * @module @ruleboard/engine/__tests__/InMemoryEventBus
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { createEvent, type EventPayload } from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";

function createMockLogger(): EngineLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

const fetched: EventPayload = {
    type     : "source:fetched",
    timestamp: "2025-01-15T10:00:00.000Z",
    runId    : "run_abc_123",
    data     : { source: "hBlock", bytes: 42 },
};

const failed: EventPayload = {
    type     : "source:failed",
    timestamp: "2025-01-15T10:00:01.000Z",
    data     : { source: "EasyList China", error: "Timed out" },
};

describe("InMemoryEventBus", () => {
    let logger: EngineLogger;
    let eventBus: InMemoryEventBus;

    beforeEach(() => {
        logger = createMockLogger();
        eventBus = new InMemoryEventBus(logger);
    });

    describe("subscribe and emit", () => {
        // Scenario: Basic subscription receives emitted events
        it("should call handler when matching event is emitted", () => {
            const handler = vi.fn();

            eventBus.subscribe("source:fetched", handler);
            eventBus.emit(fetched);

            expect(handler).toHaveBeenCalledTimes(1);
            expect(handler).toHaveBeenCalledWith(fetched);
        });

        // Scenario: Handler not called for other event types
        it("should not call handler for non-matching event type", () => {
            const handler = vi.fn();

            eventBus.subscribe("source:fetched", handler);
            eventBus.emit(failed);

            expect(handler).not.toHaveBeenCalled();
        });

        // Scenario: Events reach a handler in emission order
        it("should deliver events in the order they are emitted", () => {
            const seen: string[] = [];
            eventBus.subscribe("source:normalized", (event) => {
                seen.push(String(event.data?.source));
            });

            eventBus.emit(createEvent("source:normalized", { source: "first" }));
            eventBus.emit(createEvent("source:normalized", { source: "second" }));
            eventBus.emit(createEvent("source:normalized", { source: "third" }));

            expect(seen).toEqual(["first", "second", "third"]);
        });
    });

    describe("wildcard subscription", () => {
        // Scenario: Wildcard handler receives all events, after typed handlers
        it("should call typed handlers before wildcard handlers", () => {
            const order: string[] = [];

            eventBus.subscribe("*", () => order.push("wildcard"));
            eventBus.subscribe("source:fetched", () => order.push("typed"));
            eventBus.emit(fetched);
            eventBus.emit(failed);

            expect(order).toEqual(["typed", "wildcard", "wildcard"]);
        });
    });

    describe("once", () => {
        // Scenario: once() handler only called for first event
        it("should call handler only once then auto-unsubscribe", () => {
            const handler = vi.fn();

            eventBus.once("run:completed", handler);
            eventBus.emit(createEvent("run:completed", { succeeded: true }));
            eventBus.emit(createEvent("run:completed", { succeeded: true }));

            expect(handler).toHaveBeenCalledTimes(1);
            expect(eventBus.handlerCount("run:completed")).toBe(0);
        });

        // Scenario: once() can be unsubscribed before the event
        it("should allow manual unsubscribe before event is emitted", () => {
            const handler = vi.fn();

            const subscription = eventBus.once("run:started", handler);
            subscription.unsubscribe();
            eventBus.emit(createEvent("run:started"));

            expect(handler).not.toHaveBeenCalled();
        });
    });

    describe("unsubscribe", () => {
        // Scenario: Other handlers still called after one unsubscribes
        it("should still call other handlers after one unsubscribes", () => {
            const handler1 = vi.fn();
            const handler2 = vi.fn();

            const sub1 = eventBus.subscribe("source:fetched", handler1);
            eventBus.subscribe("source:fetched", handler2);

            sub1.unsubscribe();
            eventBus.emit(fetched);

            expect(handler1).not.toHaveBeenCalled();
            expect(handler2).toHaveBeenCalledTimes(1);
        });

        // Scenario: Double unsubscribe does not throw
        it("should allow unsubscribing twice", () => {
            const subscription = eventBus.subscribe("source:fetched", vi.fn());
            subscription.unsubscribe();

            expect(() => subscription.unsubscribe()).not.toThrow();
            expect(eventBus.handlerCount("source:fetched")).toBe(0);
        });
    });

    describe("clear", () => {
        // Scenario: Clear one event type
        it("should remove all handlers for one event type", () => {
            const handler = vi.fn();
            const otherHandler = vi.fn();

            eventBus.subscribe("source:fetched", handler);
            eventBus.subscribe("source:failed", otherHandler);

            eventBus.clear("source:fetched");
            eventBus.emit(fetched);
            eventBus.emit(failed);

            expect(handler).not.toHaveBeenCalled();
            expect(otherHandler).toHaveBeenCalledTimes(1);
        });

        // Scenario: Clear everything
        it("should remove every handler when called without a type", () => {
            eventBus.subscribe("source:fetched", vi.fn());
            eventBus.subscribe("*", vi.fn());

            eventBus.clear();

            expect(eventBus.handlerCount("source:fetched")).toBe(0);
            expect(eventBus.handlerCount("*")).toBe(0);
        });
    });

    describe("error handling", () => {
        // Scenario: A throwing handler is logged; the rest still run
        it("should log handler errors and keep dispatching", () => {
            const successHandler = vi.fn();
            const wildcardHandler = vi.fn();

            eventBus.subscribe("source:fetched", () => {
                throw new Error("Handler error");
            });
            eventBus.subscribe("source:fetched", successHandler);
            eventBus.subscribe("*", wildcardHandler);
            eventBus.emit(fetched);

            expect(successHandler).toHaveBeenCalledTimes(1);
            expect(wildcardHandler).toHaveBeenCalledTimes(1);
            expect(logger.error).toHaveBeenCalledWith("Event handler failed", {
                type : "source:fetched",
                error: "Handler error",
            });
        });
    });

    describe("createEvent", () => {
        // Scenario: Factory stamps time and carries the run id
        it("should build a payload with an ISO timestamp and run id", () => {
            const event = createEvent("target:written", { destination: "out/a.list" }, "run_x_1");

            expect(event.type).toBe("target:written");
            expect(event.runId).toBe("run_x_1");
            expect(event.data).toEqual({ destination: "out/a.list" });
            expect(new Date(event.timestamp).toISOString()).toBe(event.timestamp);
        });
    });
});
