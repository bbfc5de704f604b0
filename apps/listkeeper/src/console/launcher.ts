/**
 * @fileoverview Launcher
 *
 * Wires the managers for one console session and maps program names
 * to their runners.
 *
 * @module console/launcher
 */

import {
    EntityManager,
    type EntityManagerOptions,
} from "@listkeeper/core";
import { groceryItemKind, type GroceryItem, type GroceryItemInput } from "../domain/entities/GroceryItem.js";
import { taskKind, type Task, type TaskInput } from "../domain/entities/Task.js";
import type { QuizProvider } from "../domain/providers/QuizProvider.js";
import { QuizGame } from "../domain/quiz/QuizGame.js";
import { createGroceryMenu } from "./groceryMenu.js";
import { runMenu } from "./Menu.js";
import type { Prompt } from "./Prompt.js";
import { runQuiz } from "./quizRunner.js";
import { createTodoMenu } from "./todoMenu.js";

/**
 * Everything one console session owns.
 * Lists survive leaving and re-entering their menu.
 */
export interface ConsoleSession {
    readonly prompt: Prompt;
    readonly tasks: EntityManager<Task, TaskInput>;
    readonly groceries: EntityManager<GroceryItem, GroceryItemInput>;
    readonly quiz: QuizGame;
}

/**
 * Program names accepted on the command line.
 */
export type ProgramName = "todo" | "grocery" | "quiz";

/**
 * Program dispatch table, in launcher menu order.
 */
export const kPROGRAMS: Readonly<Record<ProgramName, {
    readonly label: string;
    run(session: ConsoleSession): Promise<void>;
}>> = {
    todo: {
        label: "To-Do List",
        run  : (session) => runMenu(session.prompt, createTodoMenu(session.tasks, session.prompt)),
    },
    grocery: {
        label: "Grocery List",
        run  : (session) => runMenu(session.prompt, createGroceryMenu(session.groceries, session.prompt)),
    },
    quiz: {
        label: "Quiz",
        run  : (session) => runQuiz(session.quiz, session.prompt),
    },
};

/**
 * Type guard for program names.
 */
export function isProgramName(value: string): value is ProgramName {
    return Object.prototype.hasOwnProperty.call(kPROGRAMS, value);
}

/**
 * Create the managers and game for a session.
 *
 * @param options - Logger and event bus shared by every manager
 */
export function createSession(
    prompt: Prompt,
    quizProvider: QuizProvider,
    options: EntityManagerOptions = {}
): ConsoleSession {
    return {
        prompt,
        tasks    : new EntityManager(taskKind, options),
        groceries: new EntityManager(groceryItemKind, options),
        quiz     : new QuizGame(quizProvider, options),
    };
}

/**
 * Run one program directly, or the launcher menu when none is named.
 */
export async function launch(session: ConsoleSession, program?: ProgramName): Promise<void> {
    if (program) {
        await kPROGRAMS[program].run(session);
        return;
    }

    const names: ProgramName[] = ["todo", "grocery", "quiz"];
    await runMenu(session.prompt, {
        title   : "Listkeeper",
        commands: names.map((name) => ({
            label: kPROGRAMS[name].label,
            run  : () => kPROGRAMS[name].run(session),
        })),
    });
}
