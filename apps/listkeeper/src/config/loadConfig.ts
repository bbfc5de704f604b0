/**
 * @fileoverview Application Configuration
 *
 * Reads the console app's settings from environment variables.
 * The entry point loads `.env` (via dotenv) before calling this.
 *
 * @module config/loadConfig
 */

import { isAbsolute, resolve } from "path";
import { isLogLevel, type LogLevel } from "@listkeeper/core";

/**
 * Application configuration
 */
export interface AppConfig {
    /** Minimum level the console logger prints */
    readonly logLevel: LogLevel;

    /** Absolute path to the quiz questions YAML file */
    readonly questionsFile: string;
}

/**
 * Environment variable names.
 */
export const kENV_LOG_LEVEL = "LISTKEEPER_LOG_LEVEL";
export const kENV_QUESTIONS_FILE = "LISTKEEPER_QUESTIONS_FILE";

const kDEFAULT_LOG_LEVEL: LogLevel = "warn";

/**
 * Build the configuration from an environment map.
 *
 * @param env - Environment variables (normally process.env)
 * @param defaultQuestionsFile - Path used when LISTKEEPER_QUESTIONS_FILE is unset
 * @throws Error if LISTKEEPER_LOG_LEVEL holds an unknown level
 */
export function loadConfig(
    env: Readonly<Record<string, string | undefined>>,
    defaultQuestionsFile: string
): AppConfig {
    const rawLevel = env[kENV_LOG_LEVEL]?.trim().toLowerCase();
    let logLevel = kDEFAULT_LOG_LEVEL;

    if (rawLevel) {
        if (!isLogLevel(rawLevel)) {
            throw new Error(
                `Invalid ${kENV_LOG_LEVEL}: "${rawLevel}" (expected debug, info, warn, error or silent)`
            );
        }
        logLevel = rawLevel;
    }

    const rawQuestionsFile = env[kENV_QUESTIONS_FILE]?.trim();
    const questionsFile = rawQuestionsFile
        ? (isAbsolute(rawQuestionsFile) ? rawQuestionsFile : resolve(rawQuestionsFile))
        : defaultQuestionsFile;

    return { logLevel, questionsFile };
}
