/**
 * @fileoverview Domain entities barrel exports
 *
 * @module domain/entities
 */

export {
    taskKind,
    type Task,
    type TaskInput,
} from "./Task.js";

export {
    groceryItemKind,
    type GroceryItem,
    type GroceryItemInput,
} from "./GroceryItem.js";

export {
    questionKind,
    isCorrectAnswer,
    correctAnswerOf,
    type Question,
    type QuestionInput,
} from "./Question.js";
