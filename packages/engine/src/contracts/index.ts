/**
 * @fileoverview Contract barrel exports
 *
 * Interfaces and types shared by every stage of the pipeline.
 *
 * @module @ruleboard/engine/contracts
 */

// Rule model
export type { MatchKind, Rule, RuleAction } from "./Rule.js";
export {
    MATCH_KINDS,
    createRule,
    isValidDomain,
    isValidPattern,
    ruleKey,
    rulesEqual,
} from "./Rule.js";

// Formats
export type {
    Format,
    FormatHandler,
    KnownFormat,
    LineResult,
} from "./Format.js";
export {
    FORMAT_PRIORITY,
    isCommentLine,
    parseFormatName,
} from "./Format.js";

// Sources
export type { FetchStatus, RawDocument, RuleSource } from "./RuleSource.js";
export { createFailedDocument } from "./RuleSource.js";
export type { SourceFetcher } from "./SourceFetcher.js";

// Emission
export type {
    Dialect,
    DialectRenderer,
    EmissionTarget,
    EmitContext,
    EmitResult,
} from "./Emitter.js";
export { DIALECTS, isDialect } from "./Emitter.js";

// EventBus contract
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    RunEventType,
    SourceEventType,
    TargetEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";

// Logging
export type { EngineLogger, LogLevel } from "./Logger.js";
export { createConsoleLogger, isLogLevel, silentLogger } from "./Logger.js";

// Errors
export type { RuleboardErrorKind } from "./errors.js";
export {
    ConfigError,
    FetchError,
    RuleboardError,
    WriteError,
    errorMessage,
} from "./errors.js";
