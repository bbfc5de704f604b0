/**
 * @fileoverview Task Entity
 *
 * To-do list entry: a title, an optional description, and a
 * `completed` flag.
 *
 * @module domain/entities/Task
 */

import {
    createValidationError,
    type Entity,
    type EntityKind,
} from "@listkeeper/core";

/**
 * Task entity as stored by the to-do manager.
 */
export interface Task extends Entity {
    /** Trimmed, never empty */
    readonly title: string;

    /** Trimmed; null when omitted or blank */
    readonly description: string | null;

    readonly completed: boolean;
}

/**
 * Fields accepted when creating or editing a task.
 */
export interface TaskInput {
    readonly title: string;
    readonly description?: string | null;
}

/**
 * Normalize an optional description: blank becomes null.
 */
function normalizeDescription(description: string | null | undefined): string | null {
    const trimmed = description?.trim() ?? "";
    return trimmed ? trimmed : null;
}

/**
 * Task kind definition.
 *
 * Validation: title must be non-empty after trimming.
 *
 * @example
 * ```typescript
 * const tasks = new EntityManager(taskKind);
 * tasks.create({ title: "Write code", description: null });
 * ```
 */
export const taskKind: EntityKind<Task, TaskInput> = {
    name     : "task",
    lifecycle: {
        state: "completed",
        isSet: (task) => task.completed,
        set  : (task) => ({ ...task, completed: true }),
    },

    validate(input) {
        if (!input.title.trim()) {
            return createValidationError("title", "non-empty");
        }
        return null;
    },

    create: (id, input) => ({
        id,
        title      : input.title.trim(),
        description: normalizeDescription(input.description),
        completed  : false,
    }),

    fieldsOf: (task) => ({
        title      : task.title,
        description: task.description,
    }),

    withFields: (task, input) => ({
        ...task,
        title      : input.title.trim(),
        description: normalizeDescription(input.description),
    }),
};
