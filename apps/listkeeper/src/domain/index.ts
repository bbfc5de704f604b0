/**
 * @fileoverview Domain barrel exports
 *
 * All entity kinds, providers and the quiz game.
 *
 * @module domain
 */

export * from "./entities/index.js";
export * from "./providers/index.js";
export * from "./quiz/index.js";
