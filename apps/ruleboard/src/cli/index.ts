/**
 * @fileoverview CLI barrel exports
 *
 * @module cli
 */

export { USAGE, UsageError, parseArgs, type CliArgs } from "./args.js";
export {
    DEFAULT_OUTPUT_DIR,
    attachProgressReporter,
    runCli,
    type CliEnvironment,
} from "./run.js";
