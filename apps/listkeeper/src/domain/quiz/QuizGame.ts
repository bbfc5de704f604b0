/**
 * @fileoverview Quiz Game
 *
 * Scores a run through a provider's questions. Questions live in an
 * EntityManager of the question kind; the `answered` flag makes each
 * one count at most once.
 *
 * @module domain/quiz/QuizGame
 */

import {
    EntityManager,
    createEvent,
    createValidationError,
    failure,
    silentLogger,
    success,
    type AlreadyInStateError,
    type EntityId,
    type EntityManagerOptions,
    type EventBus,
    type ManagerLogger,
    type NotFoundError,
    type Outcome,
    type ValidationError,
} from "@listkeeper/core";
import {
    correctAnswerOf,
    isCorrectAnswer,
    questionKind,
    type Question,
    type QuestionInput,
} from "../entities/Question.js";
import type { QuizProvider } from "../providers/QuizProvider.js";

/**
 * Result of answering one question.
 */
export interface AnswerResult {
    /** The question, now marked answered */
    readonly question: Question;

    readonly correct: boolean;

    /** Text of the correct option */
    readonly correctAnswer: string;

    /** Score after this answer */
    readonly score: number;
}

/**
 * Final tally.
 */
export interface QuizSummary {
    readonly score: number;
    readonly total: number;
}

/**
 * Failures answer() may report.
 */
export type AnswerError = NotFoundError | AlreadyInStateError<Question> | ValidationError;

/**
 * Quiz game.
 *
 * @example
 * ```typescript
 * const game = new QuizGame(new DefaultQuizProvider());
 * game.load();
 *
 * for (const question of game.questions()) {
 *     const outcome = game.answer(question.id, 0);
 *     if (outcome.ok) {
 *         console.log(outcome.value.correct ? "Correct!" : "Wrong!");
 *     }
 * }
 *
 * console.log(game.summary()); // { score: 1, total: 3 }
 * ```
 */
export class QuizGame {
    private questionBank: EntityManager<Question, QuestionInput>;
    private score = 0;

    private readonly logger: ManagerLogger;
    private readonly eventBus: EventBus | null;

    constructor(
        private readonly provider: QuizProvider,
        private readonly options: EntityManagerOptions = {}
    ) {
        this.logger       = options.logger ?? silentLogger;
        this.eventBus     = options.eventBus ?? null;
        this.questionBank = new EntityManager(questionKind, options);
    }

    /**
     * Start a fresh game from the provider's questions.
     *
     * Questions that fail validation are skipped with a warning.
     * Any earlier progress and score are discarded.
     *
     * @returns Number of questions loaded
     */
    load(): number {
        this.questionBank = new EntityManager(questionKind, this.options);
        this.score = 0;

        const inputs = this.provider.getQuestions();
        let skipped = 0;

        inputs.forEach((input, index) => {
            const created = this.questionBank.create(input);
            if (!created.ok) {
                skipped += 1;
                this.logger.warn("Question skipped", {
                    providerId: this.provider.id,
                    index,
                    reason    : created.error.message,
                });
            }
        });

        this.logger.info("Questions loaded", {
            providerId: this.provider.id,
            loaded    : this.questionBank.size,
            skipped,
        });
        this.eventBus?.emit(createEvent("quiz:loaded", { loaded: this.questionBank.size, skipped }));

        return this.questionBank.size;
    }

    /**
     * Loaded questions in provider order.
     */
    questions(): readonly Question[] {
        return this.questionBank.list();
    }

    /**
     * Answer a question.
     *
     * The choice range is checked before the answered flag, so an
     * out-of-range choice leaves the question open for another try.
     *
     * @param id - Question id
     * @param choiceIndex - Zero-based option index
     */
    answer(id: EntityId, choiceIndex: number): Outcome<AnswerResult, AnswerError> {
        const found = this.questionBank.findById(id);
        if (!found.ok) {
            return failure(found.error);
        }

        const optionCount = found.value.options.length;
        if (!Number.isInteger(choiceIndex) || choiceIndex < 0 || choiceIndex >= optionCount) {
            return failure(createValidationError(
                "answer",
                "in-range",
                `Answer must be between 1 and ${optionCount}.`
            ));
        }

        const flagged = this.questionBank.setLifecycleFlag(id);
        if (!flagged.ok) {
            return failure(flagged.error);
        }

        const question = flagged.value;
        const correct = isCorrectAnswer(question, choiceIndex);
        if (correct) {
            this.score += 1;
        }

        this.logger.debug("Question answered", { id, correct, score: this.score });
        this.eventBus?.emit(createEvent("quiz:answered", { id, correct, score: this.score }));

        return success({
            question,
            correct,
            correctAnswer: correctAnswerOf(question),
            score        : this.score,
        });
    }

    /**
     * Mark a question answered without scoring it.
     */
    skip(id: EntityId): Outcome<Question, NotFoundError | AlreadyInStateError<Question>> {
        const flagged = this.questionBank.setLifecycleFlag(id);
        if (flagged.ok) {
            this.logger.debug("Question skipped", { id });
            this.eventBus?.emit(createEvent("quiz:skipped", { id }));
        }
        return flagged;
    }

    /**
     * Current score out of the number of loaded questions.
     */
    summary(): QuizSummary {
        return {
            score: this.score,
            total: this.questionBank.size,
        };
    }
}
