/**
 * @fileoverview Console barrel exports
 *
 * @module console
 */

export { ReadlinePrompt, type Prompt } from "./Prompt.js";
export { runMenu, type MenuCommand, type MenuDefinition } from "./Menu.js";
export { parseInteger } from "./parse.js";
export { createTodoMenu } from "./todoMenu.js";
export { createGroceryMenu } from "./groceryMenu.js";
export { runQuiz } from "./quizRunner.js";
export {
    createSession,
    launch,
    isProgramName,
    kPROGRAMS,
    type ConsoleSession,
    type ProgramName,
} from "./launcher.js";
