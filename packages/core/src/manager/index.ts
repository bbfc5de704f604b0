/**
 * @fileoverview Manager barrel exports
 *
 * @module @listkeeper/core/manager
 */

export {
    EntityManager,
    type EntityManagerOptions,
} from "./EntityManager.js";
