/**
 * @fileoverview YAML Quiz Provider
 *
 * Serves questions from a YAML file, falling back to the built-in
 * set when the file is missing or malformed.
 *
 * @module domain/providers/YamlQuizProvider
 */

import type { ManagerLogger } from "@listkeeper/core";
import { loadQuestionsWithFallback } from "../../config/loadQuestions.js";
import type { QuestionInput } from "../entities/Question.js";
import type { QuizProvider } from "./QuizProvider.js";

/**
 * Configuration for YamlQuizProvider
 */
export interface YamlQuizProviderConfig {
    /** Path to the questions.yml file */
    readonly filePath: string;

    /** Receives the fallback warning */
    readonly logger?: ManagerLogger;
}

/**
 * YAML-backed quiz provider.
 *
 * The file is read on every getQuestions() call, so each new game
 * picks up edits.
 *
 * @example
 * ```typescript
 * const provider = new YamlQuizProvider({ filePath: "./config/questions.yml" });
 * const game = new QuizGame(provider);
 * game.load();
 * ```
 */
export class YamlQuizProvider implements QuizProvider {
    readonly id = "yaml-questions";

    private readonly filePath: string;
    private readonly logger: ManagerLogger | undefined;

    constructor(config: YamlQuizProviderConfig) {
        this.filePath = config.filePath;
        this.logger   = config.logger;
    }

    getQuestions(): readonly QuestionInput[] {
        return loadQuestionsWithFallback(this.filePath, this.logger);
    }
}
