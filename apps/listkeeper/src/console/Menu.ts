/**
 * @fileoverview Console Menu
 *
 * A menu is an explicit dispatch table: numbered commands followed
 * by an Exit entry that is always last.
 *
 * @module console/Menu
 */

import type { Prompt } from "./Prompt.js";
import { parseInteger } from "./parse.js";

/**
 * One menu entry.
 */
export interface MenuCommand {
    readonly label: string;

    run(): Promise<void> | void;
}

/**
 * Menu definition.
 */
export interface MenuDefinition {
    /** Shown as "=== title ===" above the choices */
    readonly title: string;

    /** Numbered from 1, in order; Exit is appended after them */
    readonly commands: readonly MenuCommand[];
}

/**
 * Run a menu until the user picks Exit or input ends.
 *
 * Anything that is not a listed number prints an error and shows the
 * menu again.
 *
 * @example
 * ```typescript
 * await runMenu(prompt, {
 *     title   : "To-Do List Manager",
 *     commands: [
 *         { label: "View Tasks", run: () => showTasks() },
 *     ],
 * });
 * ```
 */
export async function runMenu(prompt: Prompt, menu: MenuDefinition): Promise<void> {
    const exitChoice = menu.commands.length + 1;

    for (;;) {
        prompt.print();
        prompt.print(`=== ${menu.title} ===`);
        menu.commands.forEach((command, index) => {
            prompt.print(`${index + 1}. ${command.label}`);
        });
        prompt.print(`${exitChoice}. Exit`);

        const answer = await prompt.ask(`Enter choice (1-${exitChoice}): `);
        if (answer === null) {
            return;
        }

        const choice = parseInteger(answer);
        if (choice === exitChoice) {
            prompt.print("Exiting...");
            return;
        }

        if (choice === null || choice < 1 || choice > menu.commands.length) {
            prompt.print(`Error: Invalid choice. Please enter 1-${exitChoice}.`);
            continue;
        }

        await menu.commands[choice - 1].run();
    }
}
