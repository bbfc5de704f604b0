/**
 * @fileoverview Grocery Item Entity
 *
 * Grocery list entry: a name, a quantity, and a `purchased` flag.
 *
 * @module domain/entities/GroceryItem
 */

import {
    createValidationError,
    type Entity,
    type EntityKind,
} from "@listkeeper/core";

/**
 * Grocery item as stored by the grocery manager.
 */
export interface GroceryItem extends Entity {
    readonly name: string;

    /** Whole number, at least 1 */
    readonly quantity: number;

    readonly purchased: boolean;
}

/**
 * Fields accepted when creating or editing a grocery item.
 */
export interface GroceryItemInput {
    readonly name: string;
    readonly quantity: number;
}

/**
 * Grocery item kind definition.
 *
 * Validation, in order:
 * - name non-empty after trimming
 * - quantity a whole number greater than zero
 */
export const groceryItemKind: EntityKind<GroceryItem, GroceryItemInput> = {
    name     : "grocery-item",
    lifecycle: {
        state: "purchased",
        isSet: (item) => item.purchased,
        set  : (item) => ({ ...item, purchased: true }),
    },

    validate(input) {
        if (!input.name.trim()) {
            return createValidationError("name", "non-empty");
        }
        if (!Number.isInteger(input.quantity) || input.quantity <= 0) {
            return createValidationError("quantity", "positive-integer");
        }
        return null;
    },

    create: (id, input) => ({
        id,
        name     : input.name.trim(),
        quantity : input.quantity,
        purchased: false,
    }),

    fieldsOf: (item) => ({
        name    : item.name,
        quantity: item.quantity,
    }),

    withFields: (item, input) => ({
        ...item,
        name    : input.name.trim(),
        quantity: input.quantity,
    }),
};
