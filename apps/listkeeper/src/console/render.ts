/**
 * @fileoverview Console rendering
 *
 * One-line text for entities and failures.
 *
 * @module console/render
 */

import type { ManagerError } from "@listkeeper/core";
import type { GroceryItem } from "../domain/entities/GroceryItem.js";
import type { Task } from "../domain/entities/Task.js";

/**
 * Render a failure. Already-in-state is informational and gets no
 * "Error:" prefix.
 *
 * @example
 * ```typescript
 * describeFailure(createNotFoundError("task", 4)); // "Error: Task with ID 4 not found."
 * ```
 */
export function describeFailure(error: ManagerError): string {
    if (error.code === "ALREADY_IN_STATE") {
        return error.message;
    }
    return `Error: ${error.message}`;
}

/**
 * "#1 [x] Write code (tests first)"
 */
export function formatTask(task: Task): string {
    const mark = task.completed ? "x" : " ";
    const description = task.description ? ` (${task.description})` : "";
    return `#${task.id} [${mark}] ${task.title}${description}`;
}

/**
 * "#2 [ ] Milk x2"
 */
export function formatGroceryItem(item: GroceryItem): string {
    const mark = item.purchased ? "x" : " ";
    return `#${item.id} [${mark}] ${item.name} x${item.quantity}`;
}
