/**
 * Entity Kind Contract
 *
 * Describes one kind of entity to an EntityManager: how to validate its
 * input, how to build a record from input, and which boolean lifecycle
 * flag it carries.
 *
 * The manager stays generic; everything kind-specific lives here.
 */

import type { Entity, EntityId } from "./Entity.js";
import type { ValidationError } from "./Outcome.js";

/**
 * One-way boolean lifecycle flag (false -> true, terminal once true).
 *
 * @typeParam T - Entity type carrying the flag
 */
export interface LifecycleFlag<T extends Entity> {
    /**
     * Name of the state the flag represents ("completed", "purchased").
     * Used in messages and events.
     */
    readonly state: string;

    /** Whether the entity is already in the state */
    isSet(entity: T): boolean;

    /** Return a copy of the entity with the flag set */
    set(entity: T): T;
}

/**
 * Entity kind definition.
 *
 * @typeParam T - Stored entity type
 * @typeParam TInput - Caller-supplied fields for create and update
 *
 * @example
 * ```typescript
 * const noteKind: EntityKind<Note, { body: string }> = {
 *     name: "note",
 *     lifecycle: {
 *         state: "pinned",
 *         isSet: (note) => note.pinned,
 *         set  : (note) => ({ ...note, pinned: true }),
 *     },
 *     validate: (input) => input.body.trim()
 *         ? null
 *         : createValidationError("body", "non-empty"),
 *     create    : (id, input) => ({ id, body: input.body.trim(), pinned: false }),
 *     fieldsOf  : (note) => ({ body: note.body }),
 *     withFields: (note, input) => ({ ...note, body: input.body.trim() }),
 * };
 * ```
 */
export interface EntityKind<T extends Entity, TInput extends object> {
    /** Kind name, lowercase ("task", "grocery-item") */
    readonly name: string;

    readonly lifecycle: LifecycleFlag<T>;

    /**
     * Check input against the kind's rules.
     *
     * @returns The first failed constraint, or null when the input is valid
     */
    validate(input: TInput): ValidationError | null;

    /**
     * Build a new record from validated input.
     * The lifecycle flag starts unset.
     */
    create(id: EntityId, input: TInput): T;

    /** Extract the editable fields of a record */
    fieldsOf(entity: T): TInput;

    /**
     * Replace the editable fields of a record with validated input.
     * The id and the lifecycle flag are kept.
     */
    withFields(entity: T, input: TInput): T;
}
