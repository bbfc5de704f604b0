/**
 * @fileoverview Quiz Question Entity
 *
 * A multiple-choice question. The correct answer is given by value
 * and stored as an index into the options.
 *
 * @module domain/entities/Question
 */

import {
    createValidationError,
    type Entity,
    type EntityKind,
} from "@listkeeper/core";

/**
 * Minimum number of options a question must offer.
 */
const kMIN_OPTIONS = 2;

/**
 * Quiz question as stored by a quiz game.
 */
export interface Question extends Entity {
    readonly text: string;
    readonly options: readonly string[];
    readonly correctAnswerIndex: number;

    /** Set once the question has been answered or skipped */
    readonly answered: boolean;
}

/**
 * Fields accepted when creating a question.
 */
export interface QuestionInput {
    readonly text: string;
    readonly options: readonly string[];

    /** Must equal one of the options (compared after trimming) */
    readonly correctAnswer: string;
}

/**
 * Whether a zero-based choice is the correct one.
 */
export function isCorrectAnswer(question: Question, choiceIndex: number): boolean {
    return choiceIndex === question.correctAnswerIndex;
}

/**
 * The correct option's text.
 */
export function correctAnswerOf(question: Question): string {
    return question.options[question.correctAnswerIndex];
}

function trimOptions(options: readonly string[]): readonly string[] {
    return Object.freeze(options.map((option) => option.trim()));
}

/**
 * Question kind definition.
 *
 * Validation, in order:
 * - text non-empty
 * - at least two options
 * - every option non-empty
 * - correctAnswer one of the options
 */
export const questionKind: EntityKind<Question, QuestionInput> = {
    name     : "question",
    lifecycle: {
        state: "answered",
        isSet: (question) => question.answered,
        set  : (question) => ({ ...question, answered: true }),
    },

    validate(input) {
        if (!input.text.trim()) {
            return createValidationError("text", "non-empty");
        }
        if (input.options.length < kMIN_OPTIONS) {
            return createValidationError(
                "options",
                "min-items",
                `Options must list at least ${kMIN_OPTIONS} choices.`
            );
        }
        if (input.options.some((option) => !option.trim())) {
            return createValidationError("options", "non-empty", "Options cannot contain an empty choice.");
        }
        if (!trimOptions(input.options).includes(input.correctAnswer.trim())) {
            return createValidationError("correctAnswer", "one-of", "Correct answer not in options.");
        }
        return null;
    },

    create: (id, input) => {
        const options = trimOptions(input.options);
        return {
            id,
            text              : input.text.trim(),
            options,
            correctAnswerIndex: options.indexOf(input.correctAnswer.trim()),
            answered          : false,
        };
    },

    fieldsOf: (question) => ({
        text         : question.text,
        options      : question.options,
        correctAnswer: correctAnswerOf(question),
    }),

    withFields: (question, input) => {
        const options = trimOptions(input.options);
        return {
            ...question,
            text              : input.text.trim(),
            options,
            correctAnswerIndex: options.indexOf(input.correctAnswer.trim()),
        };
    },
};
