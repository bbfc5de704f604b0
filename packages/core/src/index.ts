/**
 * @fileoverview Listkeeper Core
 *
 * Kind-agnostic, in-memory entity management.
 *
 * The core provides:
 * - EntityManager: ordered storage with per-instance monotonic ids
 * - Typed outcomes instead of thrown errors for expected failures
 * - Entity kinds that carry validation and a one-way lifecycle flag
 * - A synchronous event bus for change notifications
 *
 * @module @listkeeper/core
 * @example
 * ```typescript
 * import {
 *     type EntityKind,
 *     EntityManager,
 *     InMemoryEventBus,
 * } from "@listkeeper/core";
 *
 * // Define a kind, hand it to a manager, call create/list/findById/...
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

// Entity
export type { Entity, EntityId } from "./contracts/index.js";

// Entity kind
export type { EntityKind, LifecycleFlag } from "./contracts/index.js";

// Outcomes and errors
export type {
    Outcome,
    ManagerError,
    ValidationError,
    ValidationConstraint,
    NotFoundError,
    AlreadyInStateError,
} from "./contracts/index.js";
export {
    success,
    failure,
    createValidationError,
    createNotFoundError,
    createAlreadyInStateError,
} from "./contracts/index.js";

// Logger
export type { ManagerLogger, LogLevel } from "./contracts/index.js";
export {
    createConsoleLogger,
    isLogLevel,
    silentLogger,
} from "./contracts/index.js";

// EventBus
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    EntityEventType,
    QuizEventType,
    Subscription,
} from "./contracts/index.js";
export { createEvent } from "./contracts/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { InMemoryEventBus } from "./impl/index.js";

// ============================================================================
// Manager exports
// ============================================================================

export {
    EntityManager,
    type EntityManagerOptions,
} from "./manager/index.js";
