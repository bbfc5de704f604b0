/**
 * @fileoverview Default Quiz Provider
 *
 * Built-in question set used when no questions file is available.
 *
 * @module domain/providers/DefaultQuizProvider
 */

import type { QuestionInput } from "../entities/Question.js";
import type { QuizProvider } from "./QuizProvider.js";

/**
 * Get the built-in questions.
 */
export function getDefaultQuestions(): QuestionInput[] {
    return [
        {
            text         : "Which keyword declares a block-scoped constant in TypeScript?",
            options      : ["var", "let", "const", "static"],
            correctAnswer: "const",
        },
        {
            text         : "What does Array.prototype.filter return?",
            options      : ["A new array", "The first match", "A boolean", "The original array"],
            correctAnswer: "A new array",
        },
        {
            text         : "Which type has no values at all?",
            options      : ["unknown", "any", "never", "void"],
            correctAnswer: "never",
        },
    ];
}

/**
 * Provider serving the built-in questions.
 */
export class DefaultQuizProvider implements QuizProvider {
    readonly id = "default-questions";

    getQuestions(): readonly QuestionInput[] {
        return getDefaultQuestions();
    }
}
