/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadQuestions,
    loadQuestionsWithFallback,
} from "./loadQuestions.js";

export {
    loadConfig,
    kENV_LOG_LEVEL,
    kENV_QUESTIONS_FILE,
    type AppConfig,
} from "./loadConfig.js";
