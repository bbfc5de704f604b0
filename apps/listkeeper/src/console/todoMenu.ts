/**
 * @fileoverview To-Do List menu
 *
 * @module console/todoMenu
 */

import type { EntityManager } from "@listkeeper/core";
import type { Task, TaskInput } from "../domain/entities/Task.js";
import type { MenuDefinition } from "./Menu.js";
import type { Prompt } from "./Prompt.js";
import { askId } from "./askId.js";
import { describeFailure, formatTask } from "./render.js";

/**
 * Build the to-do menu over a task manager.
 *
 * Commands: Add, View, Complete, Delete, Edit (Exit appended by runMenu).
 */
export function createTodoMenu(
    tasks: EntityManager<Task, TaskInput>,
    prompt: Prompt
): MenuDefinition {
    return {
        title   : "To-Do List Manager",
        commands: [
            {
                label: "Add Task",
                run  : async () => {
                    const title = (await prompt.ask("Enter task title: ")) ?? "";
                    const description = await prompt.ask(
                        "Enter task description (optional, press Enter to skip): "
                    );

                    const outcome = tasks.create({ title, description });
                    prompt.print(outcome.ok
                        ? `Task added: ${formatTask(outcome.value)}`
                        : describeFailure(outcome.error));
                },
            },
            {
                label: "View Tasks",
                run  : () => {
                    const all = tasks.list();
                    if (all.length === 0) {
                        prompt.print("No tasks available.");
                        return;
                    }
                    prompt.print("=== To-Do List ===");
                    all.forEach((task) => prompt.print(formatTask(task)));
                },
            },
            {
                label: "Complete Task",
                run  : async () => {
                    const id = await askId(prompt, "Enter task ID to complete: ");
                    if (id === null) {
                        return;
                    }

                    const outcome = tasks.setLifecycleFlag(id);
                    prompt.print(outcome.ok
                        ? `Task completed: ${formatTask(outcome.value)}`
                        : describeFailure(outcome.error));
                },
            },
            {
                label: "Delete Task",
                run  : async () => {
                    const id = await askId(prompt, "Enter task ID to delete: ");
                    if (id === null) {
                        return;
                    }

                    const outcome = tasks.deleteById(id);
                    prompt.print(outcome.ok
                        ? `Task deleted: ${formatTask(outcome.value)}`
                        : describeFailure(outcome.error));
                },
            },
            {
                label: "Edit Task",
                run  : async () => {
                    const id = await askId(prompt, "Enter task ID to edit: ");
                    if (id === null) {
                        return;
                    }

                    const found = tasks.findById(id);
                    if (!found.ok) {
                        prompt.print(describeFailure(found.error));
                        return;
                    }

                    const title = (await prompt.ask("Enter new title (press Enter to keep): ")) ?? "";
                    const description = (await prompt.ask(
                        "Enter new description (press Enter to keep, '-' to clear): "
                    )) ?? "";

                    const patch: Partial<TaskInput> = {
                        ...(title.trim() && { title }),
                        ...(description.trim() === "-" && { description: null }),
                        ...(description.trim() && description.trim() !== "-" && { description }),
                    };

                    const outcome = tasks.update(id, patch);
                    prompt.print(outcome.ok
                        ? `Task updated: ${formatTask(outcome.value)}`
                        : describeFailure(outcome.error));
                },
            },
        ],
    };
}
