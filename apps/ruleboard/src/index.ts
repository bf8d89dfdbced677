/**
 * @fileoverview Ruleboard - Main Entry Point
 *
 * Runs the aggregation pipeline once. Meant to be invoked by an
 * external scheduler (cron, a CI workflow) rather than kept running.
 *
 * Environment:
 * - RULEBOARD_CONFIG: configuration file (default: config/ruleboard.yml)
 * - RULEBOARD_OUTPUT_DIR: output directory (default: public)
 * - RULEBOARD_LOG_LEVEL: debug | info | warn | error (default: info)
 *
 * @module ruleboard
 */

// Load .env before anything reads process.env
import "dotenv/config";

import { runCli } from "./cli/index.js";

/**
 * Main entry point
 */
async function main(): Promise<void> {
    process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
    console.error("[FATAL] Run failed:", error);
    process.exitCode = 1;
});
