/**
 * @fileoverview CLI run
 *
 * One invocation: load configuration, fetch and merge every source,
 * write the rule files, the run report and the status page, and map
 * the outcome to an exit code.
 *
 * Exit codes:
 * - 0: at least one source yielded rules
 * - 1: no source yielded rules, or the configuration is invalid
 * - 2: usage error
 *
 * @module cli/run
 */

import { dirname, join, resolve } from "path";
import { fileURLToPath } from "url";
import {
    RuleboardPipeline,
    createConsoleLogger,
    errorMessage,
    isLogLevel,
    type EmissionTarget,
    type EngineLogger,
    type EventBus,
    type EventPayload,
    type LogLevel,
} from "@ruleboard/engine";
import { buildTargets, loadConfig, type RuleboardConfig } from "../config/index.js";
import { HttpSourceFetcher, type FetchFunction } from "../providers/index.js";
import { writeReports } from "../report/index.js";
import { USAGE, UsageError, parseArgs, type CliArgs } from "./args.js";

// apps/ruleboard, two levels above src/cli
const APP_DIR = join(dirname(fileURLToPath(import.meta.url)), "..", "..");

export const DEFAULT_OUTPUT_DIR = "public";

/**
 * Injection points for tests.
 */
export interface CliEnvironment {
    /** Environment variables (default: process.env) */
    readonly env?: Readonly<Record<string, string | undefined>>;

    /** fetch implementation handed to the HTTP fetcher */
    readonly fetchImpl?: FetchFunction;

    /** Replaces the console logger */
    readonly logger?: EngineLogger;

    /** Directory holding config/ and templates/ (default: the app directory) */
    readonly appDir?: string;

    readonly now?: () => Date;
}

function resolveLogLevel(verbose: boolean, value: string | undefined): LogLevel {
    if (verbose) {
        return "debug";
    }
    return value !== undefined && isLogLevel(value) ? value : "info";
}

function text(event: EventPayload, key: string): string {
    const value = event.data?.[key];
    return value === undefined ? "" : String(value);
}

/**
 * Console progress lines for pipeline events. Failures are already
 * reported through the logger.
 */
export function attachProgressReporter(eventBus: EventBus, logger: EngineLogger): void {
    eventBus.subscribe("source:normalized", (event) => {
        logger.info(`[SOURCE] ${text(event, "source")}: ${text(event, "rules")} rules (${text(event, "format")})`);
    });

    eventBus.subscribe("source:skipped", (event) => {
        logger.info(`[SKIPPED] ${text(event, "source")}`);
    });

    eventBus.subscribe("target:written", (event) => {
        const omitted = text(event, "omitted");
        logger.info(
            `[WRITTEN] ${text(event, "destination")}: ${text(event, "written")} rules` +
            (omitted !== "0" ? `, ${omitted} omitted` : "")
        );
    });

    eventBus.subscribe("run:completed", (event) => {
        logger.info(`[DONE] ${text(event, "rules")} rules, ${text(event, "skippedLines")} lines skipped`);
    });
}

function load(configPath: string, outputDir: string, logger: EngineLogger): {
    config: RuleboardConfig;
    targets: EmissionTarget[];
} | null {
    try {
        const config = loadConfig(configPath);
        return { config, targets: buildTargets(config.targets, outputDir) };
    }
    catch (error) {
        logger.error("Invalid configuration", { path: configPath, error: errorMessage(error) });
        return null;
    }
}

/**
 * Run the CLI once and return the exit code.
 *
 * @example
 * ```typescript
 * process.exitCode = await runCli(process.argv.slice(2));
 * ```
 */
export async function runCli(argv: readonly string[], environment: CliEnvironment = {}): Promise<number> {
    let args: CliArgs;
    try {
        args = parseArgs(argv);
    }
    catch (error) {
        if (error instanceof UsageError) {
            console.error(`${error.message}\n${USAGE}`);
            return 2;
        }
        throw error;
    }

    if (args.help) {
        console.log(USAGE);
        return 0;
    }

    const env = environment.env ?? process.env;
    const appDir = environment.appDir ?? APP_DIR;
    const logger = environment.logger
        ?? createConsoleLogger(resolveLogLevel(args.verbose, env.RULEBOARD_LOG_LEVEL), "[ruleboard]");

    const configPath = resolve(args.configPath ?? env.RULEBOARD_CONFIG ?? join(appDir, "config", "ruleboard.yml"));
    const outputDir = resolve(args.outputDir ?? env.RULEBOARD_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR);

    const loaded = load(configPath, outputDir, logger);
    if (!loaded) {
        return 1;
    }
    const { config, targets } = loaded;

    logger.info("Configuration loaded", {
        path   : configPath,
        sources: config.sources.length,
        targets: targets.length,
        outputDir,
    });

    const fetcher = new HttpSourceFetcher({
        timeoutMs   : config.fetch.timeoutMs,
        retries     : config.fetch.retries,
        retryDelayMs: config.fetch.retryDelayMs,
        userAgent   : config.fetch.userAgent,
        logger,
        ...(environment.fetchImpl ? { fetchImpl: environment.fetchImpl } : {}),
        ...(environment.now ? { now: environment.now } : {}),
    });

    const pipeline = new RuleboardPipeline({
        fetcher,
        concurrency: config.fetch.concurrency,
        exclude    : config.exclude,
        normalizer : config.normalize,
        output     : config.output,
        logger,
        ...(environment.now ? { now: environment.now } : {}),
    });

    attachProgressReporter(pipeline.eventBus, logger);

    const summary = await pipeline.run(config.sources, targets);

    await writeReports(summary, {
        outputDir,
        report         : config.report,
        title          : config.output.title,
        defaultTemplate: join(appDir, "templates", "status.html"),
        logger,
    });

    return summary.succeeded ? 0 : 1;
}
