/**
 * @fileoverview Grocery List menu
 *
 * @module console/groceryMenu
 */

import type { EntityManager } from "@listkeeper/core";
import type { GroceryItem, GroceryItemInput } from "../domain/entities/GroceryItem.js";
import type { MenuDefinition } from "./Menu.js";
import type { Prompt } from "./Prompt.js";
import { askId } from "./askId.js";
import { parseInteger } from "./parse.js";
import { describeFailure, formatGroceryItem } from "./render.js";

/**
 * Build the grocery menu over a grocery item manager.
 *
 * An unreadable quantity is passed on as 0 so the manager's
 * positive-quantity rule reports it.
 */
export function createGroceryMenu(
    items: EntityManager<GroceryItem, GroceryItemInput>,
    prompt: Prompt
): MenuDefinition {
    return {
        title   : "Grocery List Tracker",
        commands: [
            {
                label: "Add Item",
                run  : async () => {
                    const name = (await prompt.ask("Enter item name: ")) ?? "";
                    const quantity = parseInteger(await prompt.ask("Enter quantity: ")) ?? 0;

                    const outcome = items.create({ name, quantity });
                    prompt.print(outcome.ok
                        ? `Item added: ${formatGroceryItem(outcome.value)}`
                        : describeFailure(outcome.error));
                },
            },
            {
                label: "View Items",
                run  : () => {
                    const all = items.list();
                    if (all.length === 0) {
                        prompt.print("Grocery list is empty.");
                        return;
                    }
                    prompt.print("=== Grocery List ===");
                    all.forEach((item) => prompt.print(formatGroceryItem(item)));
                },
            },
            {
                label: "Remove Item",
                run  : async () => {
                    const id = await askId(prompt, "Enter item ID to remove: ");
                    if (id === null) {
                        return;
                    }

                    const outcome = items.deleteById(id);
                    prompt.print(outcome.ok
                        ? `Item removed: ${formatGroceryItem(outcome.value)}`
                        : describeFailure(outcome.error));
                },
            },
            {
                label: "Mark Item as Purchased",
                run  : async () => {
                    const id = await askId(prompt, "Enter item ID to mark purchased: ");
                    if (id === null) {
                        return;
                    }

                    const outcome = items.setLifecycleFlag(id);
                    prompt.print(outcome.ok
                        ? `Item purchased: ${formatGroceryItem(outcome.value)}`
                        : describeFailure(outcome.error));
                },
            },
            {
                label: "Edit Item",
                run  : async () => {
                    const id = await askId(prompt, "Enter item ID to edit: ");
                    if (id === null) {
                        return;
                    }

                    const found = items.findById(id);
                    if (!found.ok) {
                        prompt.print(describeFailure(found.error));
                        return;
                    }

                    const name = (await prompt.ask("Enter new name (press Enter to keep): ")) ?? "";
                    const rawQuantity = (await prompt.ask("Enter new quantity (press Enter to keep): ")) ?? "";

                    const patch: Partial<GroceryItemInput> = {
                        ...(name.trim() && { name }),
                        ...(rawQuantity.trim() && { quantity: parseInteger(rawQuantity) ?? 0 }),
                    };

                    const outcome = items.update(id, patch);
                    prompt.print(outcome.ok
                        ? `Item updated: ${formatGroceryItem(outcome.value)}`
                        : describeFailure(outcome.error));
                },
            },
        ],
    };
}
