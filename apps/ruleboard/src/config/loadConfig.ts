/**
 * @fileoverview Configuration Loader
 *
 * Loads sources, targets and run settings from a YAML file and
 * validates them by hand. Every problem names the offending key or
 * index.
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { dirname, isAbsolute, resolve } from "path";
import { parse as parseYaml } from "yaml";
import {
    ConfigError,
    errorMessage,
    isDialect,
    isValidDomain,
    parseFormatName,
    type Dialect,
    type EmissionTarget,
    type RedirectPolicy,
    type RuleSource,
} from "@ruleboard/engine";

/**
 * A target as configured, before its paths are resolved.
 */
export interface TargetConfig {
    readonly dialect: Dialect;

    /** Output path, relative to the output directory unless absolute */
    readonly path: string;

    /** Absolute template path */
    readonly template?: string;
}

/**
 * Run report outputs. `null` disables an output.
 */
export interface ReportConfig {
    readonly json: string | null;
    readonly page: string | null;

    /** Absolute status page template path; null uses the bundled one */
    readonly template: string | null;
}

export interface FetchSettings {
    readonly timeoutMs: number;
    readonly retries: number;
    readonly retryDelayMs: number;
    readonly concurrency: number;
    readonly userAgent: string;
}

export interface NormalizeSettings {
    readonly hostsRedirects: RedirectPolicy;
    readonly misdetectionThreshold: number;
}

/**
 * Validated configuration.
 */
export interface RuleboardConfig {
    readonly sources: readonly RuleSource[];
    readonly exclude: readonly string[];
    readonly targets: readonly TargetConfig[];
    readonly output: {
        readonly title: string;
        readonly tag: string;
    };
    readonly report: ReportConfig;
    readonly fetch: FetchSettings;
    readonly normalize: NormalizeSettings;
}

export const DEFAULT_FETCH_SETTINGS: FetchSettings = {
    timeoutMs   : 30000,
    retries     : 1,
    retryDelayMs: 1000,
    concurrency : 4,
    userAgent   : "ruleboard/0.1",
};

const DEFAULT_TITLE = "Aggregated ad blocking rules";
const DEFAULT_TAG = "AdBlock";

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(record: RawRecord, key: string, where: string): string | undefined {
    const value = record[key];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== "string" || value.trim() === "") {
        throw new ConfigError(`Invalid ${where}: '${key}' must be a non-empty string`);
    }
    return value.trim();
}

function optionalNumber(
    record: RawRecord,
    key: string,
    where: string,
    check: (value: number) => boolean,
    expected: string
): number | undefined {
    const value = record[key];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== "number" || !Number.isFinite(value) || !check(value)) {
        throw new ConfigError(`Invalid ${where}: '${key}' must be ${expected}`);
    }
    return value;
}

function optionalSection(parsed: RawRecord, key: string): RawRecord {
    const value = parsed[key];
    if (value === undefined || value === null) {
        return {};
    }
    if (!isRecord(value)) {
        throw new ConfigError(`Invalid '${key}' section: expected a mapping`);
    }
    return value;
}

const isNonNegativeInteger = (value: number) => Number.isInteger(value) && value >= 0;
const isPositiveInteger = (value: number) => Number.isInteger(value) && value >= 1;

function isRedirectPolicy(value: string): value is RedirectPolicy {
    return value === "drop" || value === "include";
}

/**
 * Resolve a path against a base directory unless it is already absolute.
 */
export function resolvePath(baseDir: string, path: string): string {
    return isAbsolute(path) ? path : resolve(baseDir, path);
}

function parseSource(raw: unknown, index: number): RuleSource {
    const where = `source at index ${index}`;
    if (!isRecord(raw)) {
        throw new ConfigError(`Invalid ${where}: expected a mapping`);
    }

    const name = optionalString(raw, "name", where);
    if (!name) {
        throw new ConfigError(`Invalid ${where}: missing or invalid 'name'`);
    }

    const url = optionalString(raw, "url", where);
    let urls: string[];
    if (raw.urls !== undefined) {
        if (url !== undefined) {
            throw new ConfigError(`Invalid ${where}: use either 'url' or 'urls', not both`);
        }
        if (!Array.isArray(raw.urls) || raw.urls.length === 0) {
            throw new ConfigError(`Invalid ${where}: 'urls' must be a non-empty list`);
        }
        urls = raw.urls.map((entry, urlIndex) => {
            if (typeof entry !== "string" || entry.trim() === "") {
                throw new ConfigError(`Invalid ${where}: 'urls[${urlIndex}]' must be a non-empty string`);
            }
            return entry.trim();
        });
    }
    else if (url !== undefined) {
        urls = [url];
    }
    else {
        throw new ConfigError(`Invalid ${where}: missing 'url' or 'urls'`);
    }

    const formatName = optionalString(raw, "format", where);
    const format = formatName === undefined ? undefined : parseFormatName(formatName);
    if (format === null) {
        throw new ConfigError(
            `Invalid ${where}: unknown format '${formatName}' (expected hosts, surge-loon, adblock or plain)`
        );
    }

    if (raw.skip !== undefined && typeof raw.skip !== "boolean") {
        throw new ConfigError(`Invalid ${where}: 'skip' must be true or false`);
    }

    return {
        name,
        urls,
        ...(format !== undefined ? { format } : {}),
        ...(raw.skip === true ? { skip: true } : {}),
    };
}

function parseTarget(raw: unknown, index: number, configDir: string): TargetConfig {
    const where = `target at index ${index}`;
    if (!isRecord(raw)) {
        throw new ConfigError(`Invalid ${where}: expected a mapping`);
    }

    const dialect = raw.dialect;
    if (!isDialect(dialect)) {
        throw new ConfigError(`Invalid ${where}: unknown dialect '${String(dialect)}'`);
    }

    const path = optionalString(raw, "path", where);
    if (!path) {
        throw new ConfigError(`Invalid ${where}: missing or invalid 'path'`);
    }

    const template = optionalString(raw, "template", where);
    if (dialect === "loon-config" && template === undefined) {
        throw new ConfigError(`Invalid ${where}: dialect 'loon-config' requires a 'template'`);
    }

    return {
        dialect,
        path,
        ...(template !== undefined ? { template: resolvePath(configDir, template) } : {}),
    };
}

function parseReportOutput(report: RawRecord, key: "json" | "page", fallback: string): string | null {
    const value = report[key];
    if (value === false) {
        return null;
    }
    return optionalString(report, key, "'report' section") ?? fallback;
}

/**
 * Parse and validate configuration text.
 *
 * @param content - YAML text
 * @param configDir - Directory that relative template paths resolve against
 * @throws ConfigError naming the first problem found
 */
export function parseConfig(content: string, configDir: string): RuleboardConfig {
    let parsed: unknown;
    try {
        parsed = parseYaml(content);
    }
    catch (error) {
        throw new ConfigError(`Invalid YAML: ${errorMessage(error)}`, { cause: error });
    }

    if (!isRecord(parsed) || !Array.isArray(parsed.sources)) {
        throw new ConfigError("Invalid config file format: expected { sources: [...] }");
    }

    const sources = parsed.sources.map((raw, index) => parseSource(raw, index));
    const seen = new Set<string>();
    for (const source of sources) {
        if (seen.has(source.name)) {
            throw new ConfigError(`Duplicate source name '${source.name}'`);
        }
        seen.add(source.name);
    }

    const rawExclude = parsed.exclude ?? [];
    if (!Array.isArray(rawExclude)) {
        throw new ConfigError("Invalid 'exclude': expected a list of domains");
    }
    const exclude = rawExclude.map((entry, index) => {
        const domain = typeof entry === "string" ? entry.trim().toLowerCase() : "";
        if (!isValidDomain(domain)) {
            throw new ConfigError(`Invalid exclude entry at index ${index}: '${String(entry)}' is not a domain`);
        }
        return domain;
    });

    const rawTargets = parsed.targets ?? [];
    if (!Array.isArray(rawTargets)) {
        throw new ConfigError("Invalid 'targets': expected a list");
    }
    const targets = rawTargets.map((raw, index) => parseTarget(raw, index, configDir));

    const output = optionalSection(parsed, "output");
    const report = optionalSection(parsed, "report");
    const fetch = optionalSection(parsed, "fetch");
    const normalize = optionalSection(parsed, "normalize");

    const reportTemplate = optionalString(report, "template", "'report' section");

    const hostsRedirects = optionalString(normalize, "hostsRedirects", "'normalize' section") ?? "drop";
    if (!isRedirectPolicy(hostsRedirects)) {
        throw new ConfigError(`Invalid 'normalize' section: 'hostsRedirects' must be drop or include`);
    }

    return {
        sources,
        exclude,
        targets,
        output: {
            title: optionalString(output, "title", "'output' section") ?? DEFAULT_TITLE,
            tag  : optionalString(output, "tag", "'output' section") ?? DEFAULT_TAG,
        },
        report: {
            json    : parseReportOutput(report, "json", "report.json"),
            page    : parseReportOutput(report, "page", "index.html"),
            template: reportTemplate === undefined ? null : resolvePath(configDir, reportTemplate),
        },
        fetch: {
            timeoutMs: optionalNumber(fetch, "timeoutMs", "'fetch' section", isPositiveInteger, "a positive integer")
                ?? DEFAULT_FETCH_SETTINGS.timeoutMs,
            retries: optionalNumber(fetch, "retries", "'fetch' section", isNonNegativeInteger, "a non-negative integer")
                ?? DEFAULT_FETCH_SETTINGS.retries,
            retryDelayMs: optionalNumber(fetch, "retryDelayMs", "'fetch' section", isNonNegativeInteger, "a non-negative integer")
                ?? DEFAULT_FETCH_SETTINGS.retryDelayMs,
            concurrency: optionalNumber(fetch, "concurrency", "'fetch' section", isPositiveInteger, "a positive integer")
                ?? DEFAULT_FETCH_SETTINGS.concurrency,
            userAgent: optionalString(fetch, "userAgent", "'fetch' section") ?? DEFAULT_FETCH_SETTINGS.userAgent,
        },
        normalize: {
            hostsRedirects,
            misdetectionThreshold: optionalNumber(
                normalize,
                "misdetectionThreshold",
                "'normalize' section",
                (value) => value >= 0 && value <= 1,
                "between 0 and 1"
            ) ?? 0.5,
        },
    };
}

/**
 * Load configuration from a YAML file.
 *
 * @param filePath - Path to the ruleboard.yml file
 * @throws ConfigError if the file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const config = loadConfig("./config/ruleboard.yml");
 * console.log(config.sources.map((source) => source.name));
 * // ["AdGuard DNS filter", "EasyList China", ...]
 * ```
 */
export function loadConfig(filePath: string): RuleboardConfig {
    if (!existsSync(filePath)) {
        throw new ConfigError(`Config file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    return parseConfig(content, dirname(resolve(filePath)));
}

/**
 * Turn configured targets into emission targets: paths resolve against
 * the output directory and template files are read.
 *
 * @throws ConfigError if a template cannot be read
 */
export function buildTargets(targets: readonly TargetConfig[], outputDir: string): EmissionTarget[] {
    return targets.map((target) => {
        const destination = resolvePath(outputDir, target.path);
        if (target.template === undefined) {
            return { dialect: target.dialect, destination };
        }

        if (!existsSync(target.template)) {
            throw new ConfigError(`Template not found: ${target.template}`);
        }
        return {
            dialect : target.dialect,
            destination,
            template: readFileSync(target.template, "utf-8"),
        };
    });
}
