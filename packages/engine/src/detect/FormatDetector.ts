/**
 * @fileoverview Format Detector
 *
 * Classifies a raw document as one of the known rule dialects by
 * checking structural cues on a sample of leading candidate lines.
 *
 * Checks run in FORMAT_PRIORITY order, most specific first:
 * 1. HOSTS      - majority of lines are `IP hostname`
 * 2. SURGE_LOON - majority of lines are `TYPE,value`
 * 3. ADBLOCK    - adblock syntax present, dense or with adblock markers
 * 4. PLAIN      - every line is a bare domain
 * 5. UNKNOWN    - nothing matched
 *
 * @module @ruleboard/engine/detect/FormatDetector
 */

import type { Format, FormatHandler, KnownFormat } from "../contracts/Format.js";
import { FORMAT_PRIORITY } from "../contracts/Format.js";
import { FORMAT_HANDLERS } from "../formats/index.js";
import { candidateLines, splitLines } from "../formats/lines.js";

/**
 * Detector tuning.
 */
export interface FormatDetectorConfig {
    /** Candidate lines in the first sample (default: 100) */
    readonly initialSample?: number;

    /** Sample growth factor when inconclusive (default: 4) */
    readonly growthFactor?: number;

    /** Below this share of matched lines the sample is expanded (default: 0.1) */
    readonly minMatchedShare?: number;

    /** Share of lines needed for HOSTS and SURGE_LOON (default: 0.5) */
    readonly majorityShare?: number;

    /** Share of adblock lines accepted without adblock markers (default: 0.1) */
    readonly adblockShare?: number;
}

/**
 * Per-format match counts over one sample. Exposed for diagnostics.
 */
export interface DetectionSample {
    readonly size: number;
    readonly matched: number;
    readonly counts: Readonly<Record<KnownFormat, number>>;
    readonly hasAdblockMarkers: boolean;
}

/** `! comment` or `[Adblock Plus 2.0]` style header */
const ADBLOCK_MARKER = /^(?:!|\[adblock)/i;

/**
 * Format detector.
 *
 * @example
 * ```typescript
 * const detector = new FormatDetector();
 * detector.detect("0.0.0.0 ads.example.com\n0.0.0.0 tracker.example.com\n");
 * // => "HOSTS"
 * ```
 */
export class FormatDetector {
    private readonly config: Required<FormatDetectorConfig>;

    constructor(config: FormatDetectorConfig = {}) {
        this.config = {
            initialSample  : config.initialSample ?? 100,
            growthFactor   : config.growthFactor ?? 4,
            minMatchedShare: config.minMatchedShare ?? 0.1,
            majorityShare  : config.majorityShare ?? 0.5,
            adblockShare   : config.adblockShare ?? 0.1,
        };
    }

    /**
     * Classify a document body.
     */
    detect(body: string): Format {
        const candidates = candidateLines(body);
        if (candidates.length === 0) {
            return "UNKNOWN";
        }

        return this.classify(this.sample(body, candidates));
    }

    /**
     * Build the sample used for classification, expanding it while fewer
     * than minMatchedShare of its lines match any known pattern.
     */
    sample(body: string, candidates: readonly string[] = candidateLines(body)): DetectionSample {
        let size = Math.min(this.config.initialSample, candidates.length);

        for (;;) {
            const result = this.measure(body, candidates.slice(0, size));
            const conclusive = result.matched >= result.size * this.config.minMatchedShare;

            if (conclusive || size >= candidates.length) {
                return result;
            }

            size = Math.min(size * this.config.growthFactor, candidates.length);
        }
    }

    private classify(sample: DetectionSample): Format {
        return FORMAT_PRIORITY.find((format) => this.accepts(format, sample)) ?? "UNKNOWN";
    }

    private accepts(format: KnownFormat, sample: DetectionSample): boolean {
        const share = sample.counts[format] / sample.size;

        switch (format) {
            case "HOSTS":
            case "SURGE_LOON":
                return share >= this.config.majorityShare;
            case "ADBLOCK":
                return sample.counts.ADBLOCK > 0 &&
                    (share >= this.config.adblockShare || sample.hasAdblockMarkers);
            case "PLAIN":
                return sample.counts.PLAIN === sample.size;
        }
    }

    private measure(body: string, lines: readonly string[]): DetectionSample {
        const counts: Record<KnownFormat, number> = { HOSTS: 0, SURGE_LOON: 0, ADBLOCK: 0, PLAIN: 0 };
        const handlers: FormatHandler[] = Object.values(FORMAT_HANDLERS);
        let matched = 0;

        for (const line of lines) {
            let any = false;
            for (const handler of handlers) {
                if (handler.matches(line)) {
                    counts[handler.format]++;
                    any = true;
                }
            }
            if (any) {
                matched++;
            }
        }

        return {
            size             : lines.length,
            matched,
            counts,
            hasAdblockMarkers: this.hasAdblockMarkers(body, lines.length),
        };
    }

    /**
     * Look for adblock comment markers within the sampled region. The
     * region is measured in candidate lines, so scan until that many
     * non-comment lines have been passed.
     */
    private hasAdblockMarkers(body: string, sampled: number): boolean {
        let seen = 0;
        for (const raw of splitLines(body)) {
            const line = raw.trim();
            if (ADBLOCK_MARKER.test(line)) {
                return true;
            }
            if (line && !line.startsWith("#") && !line.startsWith("//") && !line.startsWith(";")) {
                seen++;
                if (seen > sampled) {
                    return false;
                }
            }
        }
        return false;
    }
}

/**
 * Detect with default settings.
 */
export function detectFormat(body: string): Format {
    return new FormatDetector().detect(body);
}
