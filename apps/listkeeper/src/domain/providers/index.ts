/**
 * @fileoverview Domain providers barrel exports
 *
 * @module domain/providers
 */

export type { QuizProvider } from "./QuizProvider.js";

export {
    DefaultQuizProvider,
    getDefaultQuestions,
} from "./DefaultQuizProvider.js";

export {
    YamlQuizProvider,
    type YamlQuizProviderConfig,
} from "./YamlQuizProvider.js";
