/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * A simple, synchronous, in-memory event bus for a single console session.
 *
 * @module @listkeeper/core/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";

/**
 * In-memory EventBus implementation.
 *
 * Features:
 * - Synchronous event dispatch
 * - Wildcard subscription ("*" for all events)
 * - A throwing handler is logged and does not stop the others
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("entity:deleted", (event) => {
 *     console.log("Deleted:", event.data);
 * });
 *
 * bus.emit(createEvent("entity:deleted", { kind: "task", id: 1 }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private handlers: Map<string, Set<EventHandler>> = new Map();

    /**
     * Emit an event to all subscribers.
     *
     * Specific handlers run first, then handlers registered for "*".
     */
    emit(event: EventPayload): void {
        this.dispatch(this.handlers.get(event.type), event, `EventBus handler error for ${event.type}:`);
        this.dispatch(this.handlers.get("*"), event, "EventBus wildcard handler error:");
    }

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }

        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    private dispatch(handlers: Set<EventHandler> | undefined, event: EventPayload, label: string): void {
        if (!handlers) {
            return;
        }

        // Copy so a handler can unsubscribe mid-dispatch
        for (const handler of [...handlers]) {
            try {
                handler(event);
            }
            catch (error) {
                console.error(label, error);
            }
        }
    }
}
