/**
 * @fileoverview Ruleboard Engine
 *
 * Fetches DNS and ad blocking rule lists in mixed dialects, detects
 * each list's format, normalizes it into one rule model, and emits a
 * deduplicated RuleSet in the dialects that proxy tools consume.
 *
 * @module @ruleboard/engine
 * @example
 * ```typescript
 * import {
 *     RuleboardPipeline,
 *     StaticSourceFetcher,
 *     type RuleSource,
 * } from "@ruleboard/engine";
 *
 * const sources: RuleSource[] = [
 *     { name: "local", urls: ["https://lists.test/hosts.txt"] },
 * ];
 * const pipeline = new RuleboardPipeline({
 *     fetcher: new StaticSourceFetcher({ "https://lists.test/hosts.txt": "0.0.0.0 ads.example.com" }),
 * });
 * const summary = await pipeline.run(sources, [
 *     { dialect: "loon-list", destination: "out/adblock.list" },
 * ]);
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export * from "./contracts/index.js";

// ============================================================================
// Stage exports
// ============================================================================

export {
    FORMAT_HANDLERS,
    adblockHandler,
    hostsHandler,
    plainHandler,
    surgeLoonHandler,
    candidateLines,
    splitLines,
    stripInlineComment,
} from "./formats/index.js";

export {
    FormatDetector,
    detectFormat,
    type DetectionSample,
    type FormatDetectorConfig,
} from "./detect/FormatDetector.js";

export {
    Normalizer,
    type NormalizeResult,
    type NormalizeStats,
    type NormalizerConfig,
    type RedirectEntry,
    type RedirectPolicy,
} from "./normalize/Normalizer.js";

export {
    aggregate,
    type AggregateOptions,
    type AggregateResult,
    type AggregateStats,
} from "./aggregate/Aggregator.js";

export {
    analyzeOverlap,
    type OverlapReport,
    type PairOverlap,
    type SourceOverlap,
    type SourceRules,
} from "./aggregate/overlap.js";

export { emit, render, type RenderedTarget } from "./emit/Emitter.js";
export { writeFileAtomic } from "./emit/atomicWrite.js";
export {
    DIALECT_RENDERERS,
    LOON_RULE_TYPE,
    RULES_BEGIN_MARKER,
    RULES_END_MARKER,
    RULES_PLACEHOLDER,
    renderTemplate,
} from "./emit/dialects.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { InMemoryEventBus, RuleSet, StaticSourceFetcher, type StaticSourceFetcherConfig } from "./impl/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    RuleboardPipeline,
    mapWithConcurrency,
    type PipelineConfig,
    type RunSummary,
    type SourceReport,
    type SourceStatus,
} from "./engine/index.js";
