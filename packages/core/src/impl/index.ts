/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of core contracts.
 *
 * @module @listkeeper/core/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
