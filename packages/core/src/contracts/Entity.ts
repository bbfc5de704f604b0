/**
 * Entity Contract
 *
 * The base shape of anything an EntityManager stores.
 * Concrete kinds extend this with their own fields.
 *
 * Entities leave the manager as frozen snapshots. Callers read them
 * but never mutate them; all changes go through manager operations.
 */

/**
 * Base entity that all managed records must satisfy.
 *
 * @example
 * ```typescript
 * interface Note extends Entity {
 *     readonly body: string;
 *     readonly pinned: boolean;
 * }
 * ```
 */
export interface Entity {
    /** Identifier assigned by the owning manager, starting at 1 */
    readonly id: number;
}

/**
 * Entity identifier type.
 * Ids are positive integers, unique within one manager for its whole lifetime.
 */
export type EntityId = Entity["id"];
