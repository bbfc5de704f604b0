/**
 * @fileoverview Quiz Provider Contract
 *
 * Source of question definitions for a quiz game.
 *
 * @module domain/providers/QuizProvider
 */

import type { QuestionInput } from "../entities/Question.js";

/**
 * Quiz provider interface.
 *
 * Providers return raw question inputs; the game validates them
 * and assigns ids when loading.
 */
export interface QuizProvider {
    readonly id: string;

    getQuestions(): readonly QuestionInput[];
}
