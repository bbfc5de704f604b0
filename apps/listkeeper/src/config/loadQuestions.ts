/**
 * @fileoverview Quiz Question Loader
 *
 * Loads quiz questions from YAML files.
 *
 * @module config/loadQuestions
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { createConsoleLogger, type ManagerLogger } from "@listkeeper/core";
import type { QuestionInput } from "../domain/entities/Question.js";
import { getDefaultQuestions } from "../domain/providers/DefaultQuizProvider.js";

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Load questions from a YAML file.
 *
 * Only the file's shape is checked here. Whether the answer is one of
 * the options is left to the question kind when a game loads them.
 *
 * @param filePath - Path to the questions.yml file
 * @returns Question inputs in file order
 * @throws Error if file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * // questions.yml:
 * // questions:
 * //   - text: Which keyword declares a constant?
 * //     options: [var, const]
 * //     answer: const
 *
 * const questions = loadQuestions("./config/questions.yml");
 * // [{ text: "Which keyword declares a constant?", options: ["var", "const"], correctAnswer: "const" }]
 * ```
 */
export function loadQuestions(filePath: string): QuestionInput[] {
    if (!existsSync(filePath)) {
        throw new Error(`Questions file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = parseYaml(content);

    if (!isRecord(parsed) || !Array.isArray(parsed.questions)) {
        throw new Error("Invalid questions file format: expected { questions: [...] }");
    }

    return parsed.questions.map((raw: unknown, index: number) => {
        if (!isRecord(raw)) {
            throw new Error(`Invalid question at index ${index}: expected a mapping`);
        }

        if (typeof raw.text !== "string") {
            throw new Error(`Invalid question at index ${index}: missing or invalid 'text'`);
        }

        if (!isStringArray(raw.options)) {
            throw new Error(`Invalid question at index ${index}: 'options' must be a list of strings`);
        }

        if (typeof raw.answer !== "string") {
            throw new Error(`Invalid question at index ${index}: missing or invalid 'answer'`);
        }

        const question: QuestionInput = {
            text         : raw.text,
            options      : raw.options,
            correctAnswer: raw.answer,
        };

        return question;
    });
}

/**
 * Load questions with fallback to the built-in set.
 *
 * @param filePath - Path to the questions.yml file
 * @param logger - Receives a warning when falling back
 */
export function loadQuestionsWithFallback(
    filePath: string,
    logger: ManagerLogger = createConsoleLogger("warn")
): QuestionInput[] {
    try {
        return loadQuestions(filePath);
    }
    catch (error) {
        logger.warn("Failed to load questions, using built-in set", {
            filePath,
            error: error instanceof Error ? error.message : String(error),
        });
        return getDefaultQuestions();
    }
}
