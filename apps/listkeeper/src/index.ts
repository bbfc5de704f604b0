/**
 * @fileoverview Listkeeper - Main Entry Point
 *
 * Console programs over in-memory entity managers: a to-do list, a
 * grocery list, and a quiz.
 *
 * Usage:
 *   listkeeper            launcher menu
 *   listkeeper todo       straight into the to-do list
 *   listkeeper grocery    straight into the grocery list
 *   listkeeper quiz       straight into the quiz
 *
 * @module listkeeper
 */

// Load .env before reading any LISTKEEPER_* variables
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";

import {
    InMemoryEventBus,
    createConsoleLogger,
} from "@listkeeper/core";

import { YamlQuizProvider } from "./domain/index.js";
import { loadConfig } from "./config/index.js";
import {
    ReadlinePrompt,
    createSession,
    isProgramName,
    launch,
    kPROGRAMS,
} from "./console/index.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const config = loadConfig(process.env, join(__dirname, "..", "config", "questions.yml"));
    const logger = createConsoleLogger(config.logLevel);

    const programArg = process.argv[2];
    if (programArg !== undefined && !isProgramName(programArg)) {
        console.error(`Unknown program "${programArg}". Expected one of: ${Object.keys(kPROGRAMS).join(", ")}`);
        process.exitCode = 1;
        return;
    }

    // Trace every manager change at debug level
    const eventBus = new InMemoryEventBus();
    eventBus.subscribe("*", (event) => {
        logger.debug(`[EVENT] ${event.type}`, event.data);
    });

    logger.info("Starting", { program: programArg ?? "launcher", questionsFile: config.questionsFile });

    const prompt = new ReadlinePrompt();
    const session = createSession(
        prompt,
        new YamlQuizProvider({ filePath: config.questionsFile, logger }),
        { logger, eventBus }
    );

    try {
        await launch(session, programArg);
    }
    finally {
        prompt.close();
    }
}

main().catch((error: unknown) => {
    console.error("[FATAL] Listkeeper stopped:", error);
    process.exit(1);
});
