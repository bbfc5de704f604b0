/**
 * @fileoverview Input parsing helpers
 *
 * @module console/parse
 */

/**
 * Parse a whole number typed by the user.
 *
 * Surrounding whitespace is ignored. Anything else that is not an
 * optionally signed run of digits gives null.
 *
 * @example
 * ```typescript
 * parseInteger(" 3 ");  // 3
 * parseInteger("-2");   // -2
 * parseInteger("2.5");  // null
 * parseInteger("");     // null
 * ```
 */
export function parseInteger(text: string | null): number | null {
    if (text === null) {
        return null;
    }

    const trimmed = text.trim();
    if (!/^[+-]?\d+$/.test(trimmed)) {
        return null;
    }

    const value = Number(trimmed);
    return Number.isSafeInteger(value) ? value : null;
}
