/**
 * @fileoverview Contract barrel exports
 *
 * All kind-agnostic interfaces and types that define
 * the entity manager contract.
 *
 * @module @listkeeper/core/contracts
 */

// Entity contract
export type { Entity, EntityId } from "./Entity.js";

// Entity kind contract
export type { EntityKind, LifecycleFlag } from "./EntityKind.js";

// Outcomes and errors
export type {
    Outcome,
    ManagerError,
    ValidationError,
    ValidationConstraint,
    NotFoundError,
    AlreadyInStateError,
} from "./Outcome.js";
export {
    success,
    failure,
    createValidationError,
    createNotFoundError,
    createAlreadyInStateError,
} from "./Outcome.js";

// Logger contract
export type { ManagerLogger, LogLevel } from "./Logger.js";
export {
    createConsoleLogger,
    isLogLevel,
    silentLogger,
} from "./Logger.js";

// EventBus contract
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    EntityEventType,
    QuizEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
