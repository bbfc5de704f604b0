/**
 * @fileoverview Quiz runner
 *
 * Walks the user through a quiz game one question at a time.
 *
 * @module console/quizRunner
 */

import type { QuizGame } from "../domain/quiz/QuizGame.js";
import type { Prompt } from "./Prompt.js";
import { parseInteger } from "./parse.js";
import { describeFailure } from "./render.js";

/**
 * Play one full game.
 *
 * Unreadable or out-of-range answers skip the question. End of input
 * stops asking and goes straight to the score.
 */
export async function runQuiz(game: QuizGame, prompt: Prompt): Promise<void> {
    if (game.load() === 0) {
        prompt.print("No questions available.");
        return;
    }

    prompt.print();
    prompt.print("=== Welcome to the Quiz Game ===");

    const questions = game.questions();
    for (const [index, question] of questions.entries()) {
        prompt.print();
        prompt.print(`Question ${index + 1}: ${question.text}`);
        question.options.forEach((option, optionIndex) => {
            prompt.print(`${optionIndex + 1}. ${option}`);
        });

        const reply = await prompt.ask(`Enter your answer (1-${question.options.length}): `);
        if (reply === null) {
            break;
        }

        const choice = parseInteger(reply);
        const outcome = choice === null ? null : game.answer(question.id, choice - 1);

        if (outcome !== null && outcome.ok) {
            prompt.print(outcome.value.correct
                ? "Correct!"
                : `Wrong! Correct answer: ${outcome.value.correctAnswer}`);
            continue;
        }

        if (outcome !== null && outcome.error.code !== "VALIDATION_ERROR") {
            prompt.print(describeFailure(outcome.error));
            continue;
        }

        game.skip(question.id);
        prompt.print("Invalid input. Skipping question.");
    }

    const { score, total } = game.summary();
    prompt.print();
    prompt.print("=== Quiz Complete ===");
    prompt.print(`Your score: ${score}/${total}`);
}
