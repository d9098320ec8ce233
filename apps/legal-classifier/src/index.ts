/**
 * @fileoverview Legal Document Classifier - CLI entry point
 *
 * Classifies plain-text documents and prints one JSON result per file.
 * `seed` loads the taxonomy and curated examples into the similarity store.
 *
 * @module legal-classifier
 */

// Load .env before anything reads the environment
import "dotenv/config";

import { basename } from "path";
import { createConsoleLogger, describeError } from "@legal-cascade/engine";
import { PlainTextExtractor } from "./adapters/extraction/PlainTextExtractor.js";
import { createClassifier, type ClassifierApp } from "./bootstrap.js";
import { parseCliArgs, USAGE, UsageError, type CliCommand } from "./cli/args.js";
import { loadSettings } from "./config/settings.js";

async function classifyFiles(
    app: ClassifierApp,
    command: Extract<CliCommand, { command: "classify" }>
): Promise<number> {
    const extractor = new PlainTextExtractor();
    let failures = 0;

    for (const file of command.files) {
        try {
            const text = await extractor.extract(file);
            const result = await app.classifier.classify(text, command.filename ?? basename(file), {
                persist: command.persist,
            });
            console.log(JSON.stringify({ file, ...result }, null, 2));
        }
        catch (error) {
            failures++;
            console.log(JSON.stringify({ file, error: describeError(error) }, null, 2));
        }
    }

    return failures === 0 ? 0 : 1;
}

/**
 * Main entry point
 */
async function main(): Promise<number> {
    let command: CliCommand;
    try {
        command = parseCliArgs(process.argv.slice(2));
    }
    catch (error) {
        if (error instanceof UsageError) {
            console.error(`${error.message}\n\n${USAGE}`);
            return 2;
        }
        throw error;
    }

    if (command.command === "help") {
        console.log(USAGE);
        return 0;
    }

    const settings = loadSettings(process.env);
    const logger = createConsoleLogger({ level: settings.logLevel, stderr: true });
    const app = await createClassifier(settings, { logger });

    const shutdown = (signal: string) => {
        logger.info("Shutting down", { signal });
        app.close().then(
            () => process.exit(130),
            (error: unknown) => {
                logger.error("Shutdown failed", { error: describeError(error) });
                process.exit(1);
            }
        );
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));

    try {
        if (command.command === "seed") {
            console.log(JSON.stringify(await app.seedStore()));
            return 0;
        }

        // Retrieval degrades without seeded collections; classification still runs
        await app.seedStore().catch((error: unknown) => {
            logger.warn("Similarity store not seeded", { error: describeError(error) });
        });
        return await classifyFiles(app, command);
    }
    finally {
        await app.close();
    }
}

main().then(
    code => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error("[FATAL]", describeError(error));
        process.exitCode = 1;
    }
);
