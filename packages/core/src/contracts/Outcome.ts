/**
 * Outcome Contract
 *
 * Every manager operation returns either a value or a named failure.
 * Expected failures (blank names, missing ids, repeated transitions) are
 * data, not exceptions.
 *
 * Design principles:
 * - Tagged: `ok` discriminates success from failure
 * - Immutable: errors are frozen when created
 * - Descriptive: every error carries a message fit for the console
 */

import type { EntityId } from "./Entity.js";

/**
 * Constraint a field failed.
 *
 * - `non-empty`: text must contain something besides whitespace
 * - `positive-integer`: number must be a whole number above zero
 * - `min-items`: list is shorter than required
 * - `one-of`: value must match one of a set of allowed values
 * - `in-range`: index lies outside the allowed range
 */
export type ValidationConstraint =
    | "non-empty"
    | "positive-integer"
    | "min-items"
    | "one-of"
    | "in-range";

/**
 * Create/update input failed a precondition.
 */
export interface ValidationError {
    readonly code: "VALIDATION_ERROR";

    /** Field that failed (e.g. "title", "quantity") */
    readonly field: string;

    /** Which rule the field broke */
    readonly constraint: ValidationConstraint;

    readonly message: string;
}

/**
 * An operation referenced an id with no live entity.
 */
export interface NotFoundError {
    readonly code: "NOT_FOUND";

    /** Kind name of the manager that was asked */
    readonly kind: string;

    readonly id: EntityId;

    readonly message: string;
}

/**
 * A lifecycle transition was requested on an entity already in the target state.
 * Informational: the entity is returned untouched.
 *
 * @typeParam T - Entity type of the snapshot
 */
export interface AlreadyInStateError<T = unknown> {
    readonly code: "ALREADY_IN_STATE";

    readonly kind: string;

    readonly id: EntityId;

    /** Name of the state the entity is already in (e.g. "completed") */
    readonly state: string;

    /** Snapshot of the entity, unchanged */
    readonly entity: T;

    readonly message: string;
}

/**
 * Any failure a manager may report.
 */
export type ManagerError = ValidationError | NotFoundError | AlreadyInStateError;

/**
 * Result of a manager operation.
 *
 * @typeParam T - Success value
 * @typeParam E - Failure type
 *
 * @example
 * ```typescript
 * const outcome = tasks.findById(3);
 * if (outcome.ok) {
 *     console.log(outcome.value.title);
 * }
 * else {
 *     console.log(outcome.error.message);
 * }
 * ```
 */
export type Outcome<T, E extends ManagerError = ManagerError> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: E };

/**
 * Wrap a success value.
 */
export function success<T>(value: T): { readonly ok: true; readonly value: T } {
    return { ok: true, value };
}

/**
 * Wrap a failure.
 */
export function failure<E extends ManagerError>(error: E): { readonly ok: false; readonly error: E } {
    return { ok: false, error };
}

/**
 * Factory function to create a ValidationError.
 *
 * @param field - Name of the offending field
 * @param constraint - The rule that failed
 * @param message - Optional message; a default is built from field and constraint
 * @returns Frozen ValidationError
 */
export function createValidationError(
    field: string,
    constraint: ValidationConstraint,
    message?: string
): ValidationError {
    const error: ValidationError = {
        code   : "VALIDATION_ERROR",
        field,
        constraint,
        message: message ?? defaultValidationMessage(field, constraint),
    };

    return Object.freeze(error);
}

/**
 * Factory function to create a NotFoundError.
 *
 * @returns Frozen NotFoundError with message "<Kind> with ID <id> not found."
 */
export function createNotFoundError(kind: string, id: EntityId): NotFoundError {
    const error: NotFoundError = {
        code   : "NOT_FOUND",
        kind,
        id,
        message: `${capitalize(kind)} with ID ${id} not found.`,
    };

    return Object.freeze(error);
}

/**
 * Factory function to create an AlreadyInStateError.
 *
 * @returns Frozen AlreadyInStateError with message "<Kind> with ID <id> is already <state>."
 */
export function createAlreadyInStateError<T>(
    kind: string,
    id: EntityId,
    state: string,
    entity: T
): AlreadyInStateError<T> {
    const error: AlreadyInStateError<T> = {
        code   : "ALREADY_IN_STATE",
        kind,
        id,
        state,
        entity,
        message: `${capitalize(kind)} with ID ${id} is already ${state}.`,
    };

    return Object.freeze(error);
}

function defaultValidationMessage(field: string, constraint: ValidationConstraint): string {
    const label = capitalize(field);
    switch (constraint) {
        case "non-empty":
            return `${label} cannot be empty.`;
        case "positive-integer":
            return `${label} must be a positive whole number.`;
        case "min-items":
            return `${label} has too few entries.`;
        case "one-of":
            return `${label} is not one of the allowed values.`;
        case "in-range":
            return `${label} is out of range.`;
    }
}

/**
 * Capitalize the first letter and turn dashes into spaces ("grocery-item" -> "Grocery item").
 */
function capitalize(text: string): string {
    const spaced = text.replace(/-/g, " ");
    return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}
