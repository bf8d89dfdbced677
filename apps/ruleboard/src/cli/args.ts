/**
 * @fileoverview Command line arguments
 *
 * @module cli/args
 */

export const USAGE = "Usage: ruleboard [--output-dir <dir>] [--config <path>] [--verbose]";

/**
 * Parsed command line.
 */
export interface CliArgs {
    outputDir?: string;
    configPath?: string;
    verbose: boolean;
    help: boolean;
}

/**
 * Unknown flag or missing flag value.
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UsageError";
    }
}

/**
 * Parse `process.argv.slice(2)`. Accepts `--flag value` and `--flag=value`.
 *
 * @throws UsageError on an unknown flag, a positional argument or a missing value
 *
 * @example
 * ```typescript
 * parseArgs(["--output-dir", "public", "--verbose"]);
 * // { outputDir: "public", verbose: true, help: false }
 * ```
 */
export function parseArgs(argv: readonly string[]): CliArgs {
    const args: CliArgs = { verbose: false, help: false };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const eq = arg.indexOf("=");
        const flag = arg.startsWith("--") && eq !== -1 ? arg.slice(0, eq) : arg;
        const inline = arg.startsWith("--") && eq !== -1 ? arg.slice(eq + 1) : undefined;

        const takeValue = (): string => {
            if (inline !== undefined) {
                if (inline === "") {
                    throw new UsageError(`Missing value for ${flag}`);
                }
                return inline;
            }
            const next = argv[i + 1];
            if (next === undefined || next.startsWith("--")) {
                throw new UsageError(`Missing value for ${flag}`);
            }
            i++;
            return next;
        };

        switch (flag) {
            case "--output-dir":
                args.outputDir = takeValue();
                break;
            case "--config":
                args.configPath = takeValue();
                break;
            case "--verbose":
            case "-v":
                if (inline !== undefined) {
                    throw new UsageError(`${flag} takes no value`);
                }
                args.verbose = true;
                break;
            case "--help":
            case "-h":
                if (inline !== undefined) {
                    throw new UsageError(`${flag} takes no value`);
                }
                args.help = true;
                break;
            default:
                throw new UsageError(flag.startsWith("-") ? `Unknown option: ${flag}` : `Unexpected argument: ${flag}`);
        }
    }

    return args;
}
