/**
 * @fileoverview Id prompt helper
 *
 * @module console/askId
 */

import type { EntityId } from "@listkeeper/core";
import type { Prompt } from "./Prompt.js";
import { parseInteger } from "./parse.js";

/**
 * Ask for an entity id. Prints "Error: Invalid ID." and returns null
 * when the reply is not a whole number.
 */
export async function askId(prompt: Prompt, question: string): Promise<EntityId | null> {
    const id = parseInteger(await prompt.ask(question));
    if (id === null) {
        prompt.print("Error: Invalid ID.");
    }
    return id;
}
