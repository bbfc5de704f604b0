/**
 * @fileoverview EventBus Contract
 *
 * Defines the contract for change notifications out of an EntityManager.
 * The console app subscribes to trace what the managers do; tests
 * subscribe to assert on it.
 *
 * Design decisions:
 * - Synchronous (managers never suspend)
 * - In-memory implementation (no external queue dependency)
 * - Ordering is preserved within a single event type
 *
 * @module @listkeeper/core/contracts/EventBus
 */

/**
 * Event payload base interface.
 * All events must have a type and timestamp.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: string;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Change event types emitted by an EntityManager.
 */
export type EntityEventType =
    | "entity:created"
    | "entity:updated"
    | "entity:flagged"
    | "entity:deleted"
    | "entity:rejected";

/**
 * Event types emitted by a QuizGame.
 */
export type QuizEventType =
    | "quiz:loaded"
    | "quiz:answered"
    | "quiz:skipped";

/**
 * All known event types.
 */
export type EventType = EntityEventType | QuizEventType | string;

/**
 * Event handler function signature.
 */
export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    /** Unsubscribe from the event */
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("entity:created", (event) => {
 *     console.log("Created:", event.data);
 * });
 *
 * const tasks = new EntityManager(taskKind, { eventBus: bus });
 * tasks.create({ title: "Write code" });
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers.
     */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;
}

/**
 * Factory function to create an event payload.
 *
 * @param type - Event type
 * @param data - Optional event data
 * @returns Event payload with timestamp
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        data,
    };
}
