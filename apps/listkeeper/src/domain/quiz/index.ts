/**
 * @fileoverview Quiz barrel exports
 *
 * @module domain/quiz
 */

export {
    QuizGame,
    type AnswerResult,
    type AnswerError,
    type QuizSummary,
} from "./QuizGame.js";
