/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @ruleboard/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
export { RuleSet } from "./RuleSet.js";
export { StaticSourceFetcher, type StaticSourceFetcherConfig } from "./StaticSourceFetcher.js";
