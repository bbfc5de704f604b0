/**
 * @fileoverview EntityManager
 *
 * Owns an ordered, in-memory collection of entities of one kind.
 *
 * Operation flow:
 * 1. Input validated by the kind
 * 2. Id assigned from the manager's own counter (1, 2, 3, ...)
 * 3. Frozen snapshot stored and returned
 * 4. Change event emitted, if a bus is attached
 *
 * Design principles:
 * - Kind-agnostic: knows nothing about tasks, groceries, or quizzes
 * - Total: expected failures come back as outcomes, never as throws
 * - Observable: emits events on every change and every rejection
 * - Synchronous: no operation suspends or does I/O
 *
 * @module @listkeeper/core/manager/EntityManager
 */

import type { Entity, EntityId } from "../contracts/Entity.js";
import type { EntityKind } from "../contracts/EntityKind.js";
import type {
    AlreadyInStateError,
    NotFoundError,
    Outcome,
    ValidationError,
} from "../contracts/Outcome.js";
import {
    createAlreadyInStateError,
    createNotFoundError,
    failure,
    success,
} from "../contracts/Outcome.js";
import type { EventBus, EntityEventType } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { ManagerLogger } from "../contracts/Logger.js";
import { silentLogger } from "../contracts/Logger.js";

/**
 * EntityManager options.
 */
export interface EntityManagerOptions {
    /** Logger for manager operations (default: silent) */
    readonly logger?: ManagerLogger;

    /** Bus that receives change events (default: none) */
    readonly eventBus?: EventBus;
}

/**
 * EntityManager - the authoritative store for one kind of entity.
 *
 * Not safe for concurrent use; confine each instance to one owner.
 *
 * @typeParam T - Stored entity type
 * @typeParam TInput - Fields accepted by create and update
 *
 * @example
 * ```typescript
 * const tasks = new EntityManager(taskKind);
 *
 * const created = tasks.create({ title: "Write code" });
 * if (created.ok) {
 *     tasks.setLifecycleFlag(created.value.id);
 * }
 *
 * for (const task of tasks.list()) {
 *     console.log(task.id, task.title, task.completed);
 * }
 * ```
 */
export class EntityManager<T extends Entity, TInput extends object> {
    private readonly entities: T[] = [];
    private lastId = 0;

    private readonly logger: ManagerLogger;
    private readonly eventBus: EventBus | null;

    constructor(
        private readonly kind: EntityKind<T, TInput>,
        options: EntityManagerOptions = {}
    ) {
        this.logger   = options.logger ?? silentLogger;
        this.eventBus = options.eventBus ?? null;
    }

    /** Kind name of the managed entities */
    get kindName(): string {
        return this.kind.name;
    }

    /** Number of live entities */
    get size(): number {
        return this.entities.length;
    }

    /** Highest id handed out so far (0 before the first create) */
    get lastAssignedId(): EntityId {
        return this.lastId;
    }

    /**
     * Validate input and append a new entity.
     *
     * On failure the collection and the id counter are unchanged.
     *
     * @param input - The entity's fields
     * @returns The created entity, or the first failed constraint
     */
    create(input: TInput): Outcome<T, ValidationError> {
        const error = this.kind.validate(input);
        if (error) {
            this.reject("create", error);
            return failure(error);
        }

        this.lastId += 1;
        const entity = snapshot(this.kind.create(this.lastId, input));
        this.entities.push(entity);

        this.logger.debug("Entity created", { kind: this.kind.name, id: entity.id });
        this.publish("entity:created", entity.id);

        return success(entity);
    }

    /**
     * All live entities in insertion order.
     *
     * @returns Frozen array of frozen snapshots (empty when nothing is stored)
     */
    list(): readonly T[] {
        return Object.freeze([...this.entities]);
    }

    /**
     * Look up an entity by id.
     */
    findById(id: EntityId): Outcome<T, NotFoundError> {
        const index = this.indexOf(id);
        if (index === -1) {
            return failure(this.notFound(id));
        }
        return success(this.entities[index]);
    }

    /**
     * Set the kind's lifecycle flag (e.g. mark a task completed).
     *
     * An entity already in that state is reported through
     * AlreadyInStateError and left untouched.
     *
     * @returns The updated entity
     */
    setLifecycleFlag(id: EntityId): Outcome<T, NotFoundError | AlreadyInStateError<T>> {
        const index = this.indexOf(id);
        if (index === -1) {
            return failure(this.notFound(id));
        }

        const current = this.entities[index];
        const { lifecycle } = this.kind;

        if (lifecycle.isSet(current)) {
            this.logger.debug("Lifecycle flag already set", {
                kind : this.kind.name,
                id,
                state: lifecycle.state,
            });
            return failure(createAlreadyInStateError(this.kind.name, id, lifecycle.state, current));
        }

        const updated = snapshot(lifecycle.set(current));
        this.entities[index] = updated;

        this.logger.debug("Lifecycle flag set", { kind: this.kind.name, id, state: lifecycle.state });
        this.publish("entity:flagged", id, { state: lifecycle.state });

        return success(updated);
    }

    /**
     * Edit an entity's fields.
     *
     * The patch is merged over the current fields and the result is
     * validated with the same rules as create. The id and the lifecycle
     * flag never change.
     *
     * @param patch - Fields to replace; omitted or undefined fields keep their value
     * @returns The updated entity
     */
    update(id: EntityId, patch: Partial<TInput>): Outcome<T, NotFoundError | ValidationError> {
        const index = this.indexOf(id);
        if (index === -1) {
            return failure(this.notFound(id));
        }

        const current = this.entities[index];
        const merged: TInput = { ...this.kind.fieldsOf(current), ...definedFields(patch) };

        const error = this.kind.validate(merged);
        if (error) {
            this.reject("update", error, id);
            return failure(error);
        }

        const updated = snapshot(this.kind.withFields(current, merged));
        this.entities[index] = updated;

        this.logger.debug("Entity updated", { kind: this.kind.name, id });
        this.publish("entity:updated", id);

        return success(updated);
    }

    /**
     * Remove an entity. Its id is retired and never handed out again.
     *
     * @returns Snapshot of the removed entity
     */
    deleteById(id: EntityId): Outcome<T, NotFoundError> {
        const index = this.indexOf(id);
        if (index === -1) {
            return failure(this.notFound(id));
        }

        const [removed] = this.entities.splice(index, 1);

        this.logger.debug("Entity deleted", { kind: this.kind.name, id });
        this.publish("entity:deleted", id);

        return success(removed);
    }

    private indexOf(id: EntityId): number {
        return this.entities.findIndex((entity) => entity.id === id);
    }

    private notFound(id: EntityId): NotFoundError {
        this.logger.debug("Entity not found", { kind: this.kind.name, id });
        return createNotFoundError(this.kind.name, id);
    }

    private reject(operation: "create" | "update", error: ValidationError, id?: EntityId): void {
        this.logger.debug("Input rejected", {
            kind      : this.kind.name,
            operation,
            field     : error.field,
            constraint: error.constraint,
        });
        this.eventBus?.emit(createEvent("entity:rejected", {
            kind      : this.kind.name,
            operation,
            ...(id !== undefined && { id }),
            field     : error.field,
            constraint: error.constraint,
        }));
    }

    private publish(type: EntityEventType, id: EntityId, extra: Record<string, unknown> = {}): void {
        this.eventBus?.emit(createEvent(type, { kind: this.kind.name, id, ...extra }));
    }
}

/**
 * Copy of a patch without the keys whose value is undefined.
 */
function definedFields<V extends object>(patch: Partial<V>): Partial<V> {
    const fields: Partial<V> = {};
    for (const key in patch) {
        const value = patch[key];
        if (Object.prototype.hasOwnProperty.call(patch, key) && value !== undefined) {
            fields[key] = value;
        }
    }
    return fields;
}

/**
 * Freeze a record in place and hand it back with its type intact.
 */
function snapshot<V extends object>(value: V): V {
    Object.freeze(value);
    return value;
}
