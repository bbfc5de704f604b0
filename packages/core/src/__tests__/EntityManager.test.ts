/**
 * @fileoverview Unit tests for EntityManager
 *
 * Tests cover:
 * - Id assignment (monotonic, per instance, never reused)
 * - Validation failures leave state untouched
 * - Not-found handling for every id-based operation
 * - Lifecycle flag transitions and the already-in-state outcome
 * - Field editing through update
 * - Frozen snapshots
 * - Logger and event bus wiring
 *
 * @module @listkeeper/core/__tests__/EntityManager
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { EntityManager } from "../manager/EntityManager.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { createValidationError } from "../contracts/Outcome.js";
import type { Entity } from "../contracts/Entity.js";
import type { EntityKind } from "../contracts/EntityKind.js";
import type { EventPayload } from "../contracts/EventBus.js";

/**
 * Small kind used only by these tests: a chore with a label, an
 * estimate in minutes, and a `done` flag.
 */
interface Chore extends Entity {
    readonly label: string;
    readonly minutes: number;
    readonly done: boolean;
}

interface ChoreInput {
    readonly label: string;
    readonly minutes: number;
}

const choreKind: EntityKind<Chore, ChoreInput> = {
    name     : "chore",
    lifecycle: {
        state: "done",
        isSet: (chore) => chore.done,
        set  : (chore) => ({ ...chore, done: true }),
    },
    validate(input) {
        if (!input.label.trim()) {
            return createValidationError("label", "non-empty");
        }
        if (!Number.isInteger(input.minutes) || input.minutes <= 0) {
            return createValidationError("minutes", "positive-integer");
        }
        return null;
    },
    create    : (id, input) => ({ id, label: input.label.trim(), minutes: input.minutes, done: false }),
    fieldsOf  : (chore) => ({ label: chore.label, minutes: chore.minutes }),
    withFields: (chore, input) => ({ ...chore, label: input.label.trim(), minutes: input.minutes }),
};

/**
 * Create a mock logger for testing.
 */
function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

describe("EntityManager", () => {
    let manager: EntityManager<Chore, ChoreInput>;

    beforeEach(() => {
        manager = new EntityManager(choreKind);
    });

    describe("create", () => {
        // Scenario: Ids count up from 1
        it("should assign strictly increasing ids starting at 1", () => {
            const ids = ["Sweep", "Dust", "Mop", "Vacuum"].map((label) => {
                const outcome = manager.create({ label, minutes: 10 });
                return outcome.ok ? outcome.value.id : -1;
            });

            expect(ids).toEqual([1, 2, 3, 4]);
            expect(manager.lastAssignedId).toBe(4);
        });

        // Scenario: Returned entity carries the kind's normalized fields
        it("should return the created entity with its flag unset", () => {
            const outcome = manager.create({ label: "  Water plants  ", minutes: 5 });

            expect(outcome).toEqual({
                ok   : true,
                value: { id: 1, label: "Water plants", minutes: 5, done: false },
            });
        });

        // Scenario: Blank and whitespace-only labels are rejected
        it.each(["", "   ", "\t\n"])("should reject label %j without touching the collection", (label) => {
            manager.create({ label: "Sweep", minutes: 10 });

            const outcome = manager.create({ label, minutes: 10 });

            expect(outcome.ok).toBe(false);
            if (!outcome.ok) {
                expect(outcome.error.code).toBe("VALIDATION_ERROR");
                expect(outcome.error.field).toBe("label");
                expect(outcome.error.constraint).toBe("non-empty");
                expect(outcome.error.message).toBe("Label cannot be empty.");
            }
            expect(manager.size).toBe(1);
        });

        // Scenario: Rejected input does not consume an id
        it("should not advance the counter on a rejected create", () => {
            manager.create({ label: "Sweep", minutes: 10 });
            manager.create({ label: "Dust", minutes: 0 });
            const next = manager.create({ label: "Dust", minutes: 15 });

            expect(next.ok && next.value.id).toBe(2);
        });

        // Scenario: Counters are per instance
        it("should keep separate counters for separate managers", () => {
            const other = new EntityManager(choreKind);
            manager.create({ label: "Sweep", minutes: 10 });
            manager.create({ label: "Dust", minutes: 10 });

            const outcome = other.create({ label: "Iron", minutes: 20 });

            expect(outcome.ok && outcome.value.id).toBe(1);
        });
    });

    describe("list", () => {
        // Scenario: Fresh manager lists nothing
        it("should return an empty list on a fresh manager", () => {
            expect(manager.list()).toEqual([]);
            expect(manager.size).toBe(0);
            expect(manager.lastAssignedId).toBe(0);
        });

        // Scenario: N creates list N entities in creation order
        it("should list entities in insertion order", () => {
            manager.create({ label: "Sweep", minutes: 10 });
            manager.create({ label: "Dust", minutes: 5 });
            manager.create({ label: "Mop", minutes: 20 });

            expect(manager.list().map((chore) => chore.label)).toEqual(["Sweep", "Dust", "Mop"]);
        });

        // Scenario: Listing is a snapshot, not a live view
        it("should return a frozen array that later creates do not change", () => {
            manager.create({ label: "Sweep", minutes: 10 });
            const listed = manager.list();
            manager.create({ label: "Dust", minutes: 5 });

            expect(listed).toHaveLength(1);
            expect(Object.isFrozen(listed)).toBe(true);
        });
    });

    describe("findById", () => {
        // Scenario: Existing id found
        it("should find a live entity", () => {
            manager.create({ label: "Sweep", minutes: 10 });
            manager.create({ label: "Dust", minutes: 5 });

            const outcome = manager.findById(2);

            expect(outcome.ok && outcome.value.label).toBe("Dust");
        });

        // Scenario: Never-issued id
        it("should return NOT_FOUND for an id never issued", () => {
            const outcome = manager.findById(42);

            expect(outcome).toEqual({
                ok   : false,
                error: { code: "NOT_FOUND", kind: "chore", id: 42, message: "Chore with ID 42 not found." },
            });
        });
    });

    describe("setLifecycleFlag", () => {
        // Scenario: First call transitions, second reports already-in-state
        it("should transition once and then report ALREADY_IN_STATE", () => {
            manager.create({ label: "Sweep", minutes: 10 });

            const first = manager.setLifecycleFlag(1);
            const second = manager.setLifecycleFlag(1);

            expect(first.ok && first.value.done).toBe(true);
            expect(second.ok).toBe(false);
            expect(second.ok ? null : second.error).toMatchObject({
                code   : "ALREADY_IN_STATE",
                state  : "done",
                entity : { id: 1, done: true },
                message: "Chore with ID 1 is already done.",
            });

            const stored = manager.findById(1);
            expect(stored.ok && stored.value.done).toBe(true);
        });

        // Scenario: Unknown id leaves everything alone
        it("should return NOT_FOUND for a missing id", () => {
            manager.create({ label: "Sweep", minutes: 10 });

            const outcome = manager.setLifecycleFlag(2);

            expect(!outcome.ok && outcome.error.code).toBe("NOT_FOUND");
            expect(manager.list()[0].done).toBe(false);
        });
    });

    describe("update", () => {
        beforeEach(() => {
            manager.create({ label: "Sweep", minutes: 10 });
            manager.setLifecycleFlag(1);
        });

        // Scenario: Partial patch keeps omitted fields, id and flag
        it("should merge the patch and keep id and flag", () => {
            const outcome = manager.update(1, { minutes: 25 });

            expect(outcome).toEqual({
                ok   : true,
                value: { id: 1, label: "Sweep", minutes: 25, done: true },
            });
        });

        // Scenario: Keys set to undefined keep their stored value
        it("should treat undefined patch values as omitted", () => {
            const outcome = manager.update(1, { label: undefined, minutes: 30 });

            expect(outcome).toEqual({
                ok   : true,
                value: { id: 1, label: "Sweep", minutes: 30, done: true },
            });
        });

        // Scenario: All-undefined patch is a no-op edit, not a throw
        it("should return the unchanged entity for an all-undefined patch", () => {
            const outcome = manager.update(1, { label: undefined, minutes: undefined });

            expect(outcome.ok && outcome.value).toEqual({ id: 1, label: "Sweep", minutes: 10, done: true });
        });

        // Scenario: Invalid patch is rejected with nothing changed
        it("should reject a blank label and keep the stored entity", () => {
            const outcome = manager.update(1, { label: "  " });

            expect(!outcome.ok && outcome.error.code).toBe("VALIDATION_ERROR");
            const stored = manager.findById(1);
            expect(stored.ok && stored.value.label).toBe("Sweep");
        });

        // Scenario: Missing id
        it("should return NOT_FOUND for a missing id", () => {
            const outcome = manager.update(9, { label: "Dust" });

            expect(!outcome.ok && outcome.error.code).toBe("NOT_FOUND");
        });
    });

    describe("deleteById", () => {
        beforeEach(() => {
            manager.create({ label: "Sweep", minutes: 10 });
        });

        // Scenario: Delete returns the removed snapshot; id then gone
        it("should remove the entity and return its snapshot", () => {
            manager.create({ label: "Dust", minutes: 5 });

            const removed = manager.deleteById(1);

            expect(removed.ok && removed.value).toEqual({ id: 1, label: "Sweep", minutes: 10, done: false });
            expect(!manager.findById(1).ok).toBe(true);
            expect(manager.list().map((chore) => chore.id)).toEqual([2]);
        });

        // Scenario: Deleted ids are never reused
        it("should never hand out a deleted id again", () => {
            manager.create({ label: "Dust", minutes: 5 });
            manager.deleteById(2);
            manager.deleteById(1);

            const next = manager.create({ label: "Mop", minutes: 20 });

            expect(next.ok && next.value.id).toBe(3);
        });

        // Scenario: Deleting twice
        it("should return NOT_FOUND for an already deleted id", () => {
            manager.deleteById(1);

            const again = manager.deleteById(1);
            const flag = manager.setLifecycleFlag(1);

            expect(!again.ok && again.error.code).toBe("NOT_FOUND");
            expect(!flag.ok && flag.error.code).toBe("NOT_FOUND");
        });

    });

    describe("snapshots", () => {
        // Scenario: Returned entities cannot be mutated
        it("should hand out frozen entities", () => {
            const outcome = manager.create({ label: "Sweep", minutes: 10 });

            expect(outcome.ok && Object.isFrozen(outcome.value)).toBe(true);

            manager.setLifecycleFlag(1);
            const found = manager.findById(1);
            expect(found.ok && Object.isFrozen(found.value)).toBe(true);
        });

        // Scenario: Earlier snapshot is unaffected by later transitions
        it("should not change an earlier snapshot when the flag is set", () => {
            const created = manager.create({ label: "Sweep", minutes: 10 });
            manager.setLifecycleFlag(1);

            expect(created.ok && created.value.done).toBe(false);
        });
    });

    describe("logger and events", () => {
        // Scenario: Every change is published with kind and id
        it("should emit an event for each change and rejection", () => {
            const eventBus = new InMemoryEventBus();
            const events: EventPayload[] = [];
            eventBus.subscribe("*", (event) => events.push(event));
            const observed = new EntityManager(choreKind, { eventBus });

            observed.create({ label: "Sweep", minutes: 10 });
            observed.create({ label: "", minutes: 10 });
            observed.setLifecycleFlag(1);
            observed.update(1, { minutes: 12 });
            observed.deleteById(1);

            expect(events.map((event) => event.type)).toEqual([
                "entity:created",
                "entity:rejected",
                "entity:flagged",
                "entity:updated",
                "entity:deleted",
            ]);
            expect(events[1].data).toEqual({
                kind      : "chore",
                operation : "create",
                field     : "label",
                constraint: "non-empty",
            });
            expect(events[2].data).toEqual({ kind: "chore", id: 1, state: "done" });
        });

        // Scenario: Rejected update carries the operation and the id
        it("should include the id in a rejected update event", () => {
            const eventBus = new InMemoryEventBus();
            const rejected: EventPayload[] = [];
            eventBus.subscribe("entity:rejected", (event) => rejected.push(event));
            const observed = new EntityManager(choreKind, { eventBus });
            observed.create({ label: "Sweep", minutes: 10 });

            observed.update(1, { minutes: 0 });

            expect(rejected).toHaveLength(1);
            expect(rejected[0].data).toEqual({
                kind      : "chore",
                operation : "update",
                id        : 1,
                field     : "minutes",
                constraint: "positive-integer",
            });
        });

        // Scenario: No event for not-found or already-in-state
        it("should not emit when nothing changed", () => {
            const eventBus = new InMemoryEventBus();
            const handler = vi.fn();
            const observed = new EntityManager(choreKind, { eventBus });
            observed.create({ label: "Sweep", minutes: 10 });
            observed.setLifecycleFlag(1);
            eventBus.subscribe("*", handler);

            observed.setLifecycleFlag(1);
            observed.deleteById(5);

            expect(handler).not.toHaveBeenCalled();
        });

        // Scenario: Logger receives debug records
        it("should log operations through the supplied logger", () => {
            const logger = createMockLogger();
            const logged = new EntityManager(choreKind, { logger });

            logged.create({ label: "Sweep", minutes: 10 });
            logged.findById(3);

            expect(logger.debug).toHaveBeenCalledWith("Entity created", { kind: "chore", id: 1 });
            expect(logger.debug).toHaveBeenCalledWith("Entity not found", { kind: "chore", id: 3 });
        });
    });
});
