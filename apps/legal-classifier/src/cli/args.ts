/**
 * @fileoverview Command-line argument parsing
 *
 * @module cli/args
 */

export type CliCommand =
    | { readonly command: "help" }
    | { readonly command: "seed" }
    | {
        readonly command: "classify";
        readonly files: readonly string[];
        readonly persist: boolean;
        readonly filename?: string;
    };

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UsageError";
    }
}

export const USAGE = `Usage:
  legal-classify [--no-persist] [--filename <name>] <file...>
  legal-classify seed
  legal-classify --help

Options:
  --no-persist        Do not remember classified documents
  --filename <name>   Filename reported for a single input file`;

/**
 * Parse `process.argv.slice(2)`.
 *
 * @throws UsageError for unknown flags or missing files
 */
export function parseCliArgs(args: readonly string[]): CliCommand {
    if (args.includes("--help") || args.includes("-h")) {
        return { command: "help" };
    }
    if (args[0] === "seed") {
        if (args.length > 1) {
            throw new UsageError("seed takes no arguments");
        }
        return { command: "seed" };
    }

    const files: string[] = [];
    let persist = true;
    let filename: string | undefined;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i] ?? "";

        if (arg === "--no-persist") {
            persist = false;
        }
        else if (arg === "--filename") {
            const value = args[i + 1];
            if (value === undefined || value.startsWith("--")) {
                throw new UsageError("--filename needs a value");
            }
            filename = value;
            i++;
        }
        else if (arg.startsWith("--")) {
            throw new UsageError(`Unknown option: ${arg}`);
        }
        else {
            files.push(arg);
        }
    }

    if (files.length === 0) {
        throw new UsageError("No input files");
    }
    if (filename !== undefined && files.length > 1) {
        throw new UsageError("--filename applies to a single input file");
    }

    return {
        command: "classify",
        files,
        persist,
        ...(filename !== undefined && { filename }),
    };
}
