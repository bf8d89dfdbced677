/**
 * @fileoverview RuleboardPipeline
 *
 * The orchestration engine for one aggregation run.
 *
 * Pipeline flow:
 * 1. Fetch every source through a bounded pool (completion order is irrelevant)
 * 2. In configured order: detect format, normalize, record a source report
 * 3. Aggregate into one deduplicated RuleSet, apply exclusions
 * 4. Emit every target independently with atomic replacement
 *
 * Failures are contained at the smallest unit: a failed fetch or
 * unknown format skips one source, a failed write fails one target.
 * The run fails only when no source yields a usable rule, and in that
 * case nothing is written.
 *
 * @module @ruleboard/engine/engine/RuleboardPipeline
 */

import type { EmitContext, EmitResult, EmissionTarget } from "../contracts/Emitter.js";
import type { EventBus, EventPayload, EventType } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { Format, KnownFormat } from "../contracts/Format.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { createConsoleLogger } from "../contracts/Logger.js";
import type { Rule } from "../contracts/Rule.js";
import type { RawDocument, RuleSource } from "../contracts/RuleSource.js";
import type { SourceFetcher } from "../contracts/SourceFetcher.js";
import { errorMessage } from "../contracts/errors.js";
import type { AggregateStats } from "../aggregate/Aggregator.js";
import { aggregate } from "../aggregate/Aggregator.js";
import type { OverlapReport } from "../aggregate/overlap.js";
import { analyzeOverlap } from "../aggregate/overlap.js";
import { FormatDetector } from "../detect/FormatDetector.js";
import { emit } from "../emit/Emitter.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import type { NormalizeStats, NormalizerConfig, RedirectEntry } from "../normalize/Normalizer.js";
import { Normalizer } from "../normalize/Normalizer.js";
import { mapWithConcurrency } from "./pool.js";

/**
 * Pipeline configuration options.
 */
export interface PipelineConfig {
    /** Where documents come from */
    readonly fetcher: SourceFetcher;

    /** Maximum fetches in flight (default: 4) */
    readonly concurrency?: number;

    /** Patterns never emitted */
    readonly exclude?: readonly string[];

    /** Normalizer tuning */
    readonly normalizer?: NormalizerConfig;

    /** Custom detector (default: FormatDetector with default tuning) */
    readonly detector?: FormatDetector;

    /** Header title and rule tag for emitted files */
    readonly output?: {
        readonly title?: string;
        readonly tag?: string;
    };

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for pipeline operations */
    readonly logger?: EngineLogger;

    /** Clock (default: new Date()) */
    readonly now?: () => Date;
}

/**
 * Outcome of one source.
 *
 * - ok: at least one rule
 * - empty: parsed, but no rules
 * - fetch-failed: network, timeout or HTTP status failure
 * - unknown-format: no dialect recognized
 * - skipped: disabled in configuration
 */
export type SourceStatus = "ok" | "empty" | "fetch-failed" | "unknown-format" | "skipped";

/**
 * Per-source report.
 */
export interface SourceReport {
    readonly name: string;
    readonly urls: readonly string[];
    readonly status: SourceStatus;
    readonly format: Format | null;

    /** Format came from configuration rather than detection */
    readonly formatHinted: boolean;

    readonly fetchedAt: Date | null;

    /** Rules produced by normalization, before deduplication */
    readonly rules: number;

    readonly stats: NormalizeStats | null;
    readonly skipRate: number;
    readonly suspectedMisdetection: boolean;
    readonly redirects: readonly RedirectEntry[];
    readonly error?: string;
}

/**
 * Summary of a run.
 */
export interface RunSummary {
    readonly runId: string;
    readonly startedAt: Date;
    readonly finishedAt: Date;
    readonly sources: readonly SourceReport[];
    readonly aggregate: AggregateStats;
    readonly overlap: OverlapReport;
    readonly targets: readonly EmitResult[];

    /** Malformed lines across all sources */
    readonly skippedLines: number;

    /** At least one source yielded a rule */
    readonly succeeded: boolean;
}

const DEFAULT_TITLE = "Aggregated ad blocking rules";
const DEFAULT_TAG = "AdBlock";

/**
 * Generate a run identifier for event correlation.
 */
function generateRunId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `run_${timestamp}_${random}`;
}

/**
 * Internal result of processing one fetched document.
 */
interface ProcessedSource {
    readonly report: SourceReport;
    readonly rules: readonly Rule[];
}

/**
 * RuleboardPipeline - runs fetch, detect, normalize, aggregate, emit once.
 *
 * @example
 * ```typescript
 * const pipeline = new RuleboardPipeline({
 *     fetcher: new HttpSourceFetcher({ timeoutMs: 30000 }),
 *     concurrency: 4,
 *     exclude: ["paypal.com"],
 * });
 *
 * pipeline.eventBus.subscribe("source:failed", (event) => {
 *     console.warn("Source failed:", event.data);
 * });
 *
 * const summary = await pipeline.run(sources, targets);
 * process.exitCode = summary.succeeded ? 0 : 1;
 * ```
 */
export class RuleboardPipeline {
    private readonly fetcher: SourceFetcher;
    private readonly concurrency: number;
    private readonly exclude: readonly string[];
    private readonly detector: FormatDetector;
    private readonly normalizer: Normalizer;
    private readonly title: string;
    private readonly tag: string;
    private readonly logger: EngineLogger;
    private readonly now: () => Date;

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: PipelineConfig) {
        this.fetcher     = config.fetcher;
        this.concurrency = config.concurrency ?? 4;
        this.exclude     = config.exclude ?? [];
        this.detector    = config.detector ?? new FormatDetector();
        this.normalizer  = new Normalizer(config.normalizer);
        this.title       = config.output?.title ?? DEFAULT_TITLE;
        this.tag         = config.output?.tag ?? DEFAULT_TAG;
        this.eventBus    = config.eventBus ?? new InMemoryEventBus();
        this.logger      = config.logger ?? createConsoleLogger("info", "[Pipeline]");
        this.now         = config.now ?? (() => new Date());
    }

    /**
     * Run the pipeline once.
     *
     * @param sources - Configured sources, in the order that fixes output order
     * @param targets - Emission targets, written independently
     */
    async run(sources: readonly RuleSource[], targets: readonly EmissionTarget[]): Promise<RunSummary> {
        const runId = generateRunId();
        const startedAt = this.now();

        this.emit("run:started", { sources: sources.length, targets: targets.length }, runId);
        this.logger.info("Run started", { runId, sources: sources.length, targets: targets.length });

        // Results come back in input order, so they pair with sources by position
        const documents = await mapWithConcurrency(
            sources,
            this.concurrency,
            async (source) => (source.skip ? null : this.fetch(source))
        );

        const processed = sources.map((source, index) => {
            const doc = documents[index];
            return doc ? this.process(doc, runId) : this.skipped(source, runId);
        });

        const contributing = processed.filter((entry) => entry.report.status === "ok");
        const { ruleSet, stats } = aggregate(contributing.map((entry) => entry.rules), { exclude: this.exclude });
        const overlap = analyzeOverlap(contributing.map((entry) => ({ name: entry.report.name, rules: entry.rules })));

        if (stats.excluded > 0) {
            this.logger.info("Excluded rules", { runId, excluded: stats.excluded });
        }

        const succeeded = ruleSet.size > 0;
        let results: EmitResult[] = [];

        if (succeeded) {
            const context: EmitContext = {
                title      : this.title,
                tag        : this.tag,
                sourceNames: contributing.map((entry) => entry.report.name),
            };
            results = await this.emitTargets(ruleSet.toArray(), targets, context, runId);
        }
        else {
            this.logger.error("No source yielded rules; outputs left untouched", { runId });
        }

        const reports = processed.map((entry) => entry.report);
        const summary: RunSummary = {
            runId,
            startedAt,
            finishedAt  : this.now(),
            sources     : reports,
            aggregate   : stats,
            overlap,
            targets     : results,
            skippedLines: reports.reduce((sum, report) => sum + (report.stats?.malformed ?? 0), 0),
            succeeded,
        };

        this.emit("run:completed", {
            succeeded,
            rules       : stats.unique,
            skippedLines: summary.skippedLines,
            failed      : reports.filter((report) => report.status === "fetch-failed").length,
        }, runId);

        this.logger.info("Run completed", {
            runId,
            succeeded,
            rules     : stats.unique,
            duplicates: stats.duplicates,
        });

        return summary;
    }

    /**
     * Fetch one source. The fetcher contract forbids rejection, but a
     * broken fetcher must not take the run down with it.
     */
    private async fetch(source: RuleSource): Promise<RawDocument> {
        try {
            return await this.fetcher.fetch(source);
        }
        catch (error) {
            return {
                source,
                body     : "",
                fetchedAt: this.now(),
                status   : "failure",
                error    : errorMessage(error),
            };
        }
    }

    private process(doc: RawDocument, runId: string): ProcessedSource {
        const { source } = doc;
        const base = {
            name                 : source.name,
            urls                 : source.urls,
            fetchedAt            : doc.fetchedAt,
            formatHinted         : source.format !== undefined,
            skipRate             : 0,
            suspectedMisdetection: false,
            redirects            : [],
        };

        if (doc.status === "failure") {
            this.emit("source:failed", { source: source.name, error: doc.error }, runId);
            this.logger.warn("Fetch failed; source skipped", { source: source.name, error: doc.error });

            return {
                report: { ...base, status: "fetch-failed", format: null, rules: 0, stats: null, error: doc.error },
                rules : [],
            };
        }

        this.emit("source:fetched", { source: source.name, bytes: doc.body.length }, runId);

        const format: Format = source.format ?? this.detector.detect(doc.body);
        if (format === "UNKNOWN") {
            const error = `Unrecognized format for ${source.name}`;
            this.emit("source:unknown", { source: source.name }, runId);
            this.logger.warn("Format not recognized; source skipped", { source: source.name });

            return {
                report: { ...base, status: "unknown-format", format, rules: 0, stats: null, error },
                rules : [],
            };
        }

        if (source.format) {
            this.logger.debug("Using configured format", { source: source.name, format });
        }
        this.emit("source:detected", { source: source.name, format, hinted: base.formatHinted }, runId);

        return this.normalize(doc, format, base, runId);
    }

    private normalize(
        doc: RawDocument,
        format: KnownFormat,
        base: Pick<SourceReport, "name" | "urls" | "fetchedAt" | "formatHinted">,
        runId: string
    ): ProcessedSource {
        const result = this.normalizer.normalizeDocument(doc, format);
        const name = doc.source.name;

        this.emit("source:normalized", {
            source   : name,
            format,
            rules    : result.rules.length,
            malformed: result.stats.malformed,
            skipRate : result.skipRate,
        }, runId);

        if (result.suspectedMisdetection) {
            this.emit("source:misdetected", { source: name, format, skipRate: result.skipRate }, runId);
            this.logger.warn("High skip rate; format may be misdetected", {
                source  : name,
                format,
                skipRate: result.skipRate,
            });
        }

        if (result.redirects.length > 0) {
            this.emit("source:redirects", {
                source   : name,
                count    : result.redirects.length,
                targets  : [...new Set(result.redirects.map((entry) => entry.target))],
            }, runId);
            this.logger.warn("Hosts entries redirect to non-blocking addresses", {
                source: name,
                count : result.redirects.length,
            });
        }

        return {
            report: {
                ...base,
                status               : result.rules.length > 0 ? "ok" : "empty",
                format,
                rules                : result.rules.length,
                stats                : result.stats,
                skipRate             : result.skipRate,
                suspectedMisdetection: result.suspectedMisdetection,
                redirects            : result.redirects,
            },
            rules: result.rules,
        };
    }

    private skipped(source: RuleSource, runId: string): ProcessedSource {
        this.emit("source:skipped", { source: source.name }, runId);
        this.logger.info("Source disabled in configuration", { source: source.name });

        return {
            report: {
                name                 : source.name,
                urls                 : source.urls,
                status               : "skipped",
                format               : null,
                formatHinted         : source.format !== undefined,
                fetchedAt            : null,
                rules                : 0,
                stats                : null,
                skipRate             : 0,
                suspectedMisdetection: false,
                redirects            : [],
            },
            rules: [],
        };
    }

    /**
     * Write every target. A failure is recorded for that target only.
     */
    private async emitTargets(
        rules: readonly Rule[],
        targets: readonly EmissionTarget[],
        context: EmitContext,
        runId: string
    ): Promise<EmitResult[]> {
        const results: EmitResult[] = [];

        for (const target of targets) {
            try {
                const result = await emit(rules, target, context);
                results.push(result);

                this.emit("target:written", {
                    dialect    : target.dialect,
                    destination: target.destination,
                    written    : result.written,
                    omitted    : result.omitted,
                }, runId);
            }
            catch (error) {
                const message = errorMessage(error);
                results.push({
                    dialect    : target.dialect,
                    destination: target.destination,
                    success    : false,
                    written    : 0,
                    omitted    : 0,
                    bytes      : 0,
                    error      : message,
                });

                this.emit("target:failed", { dialect: target.dialect, destination: target.destination, error: message }, runId);
                this.logger.error("Target write failed", { destination: target.destination, error: message });
            }
        }

        return results;
    }

    private emit(type: EventType, data: Record<string, unknown>, runId: string): void {
        const event: EventPayload = createEvent(type, data, runId);
        this.eventBus.emit(event);
    }
}
