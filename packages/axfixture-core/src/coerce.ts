/**
 * Value coercions shared by the mapping tables and derived fields
 */

import { TypeCoercionError } from "./errors.js";
import type { JsonValue, NodeId } from "./types.js";

const DECIMAL_INTEGER = /^\s*[+-]?\d+\s*$/;
const HEX_INTEGER = /^\s*([+-]?)(?:0[xX])?([0-9a-fA-F]+)\s*$/;

/**
 * Gate for optional flags: false, null, 0, NaN, "", [] and {} are all "absent"
 */
export function isTruthy(value: JsonValue | undefined): boolean {
    if (value === undefined || value === null) return false;
    if (Array.isArray(value)) return value.length > 0;
    if (typeof value === "object") return Object.keys(value).length > 0;
    return Boolean(value);
}

/**
 * Integer parse: integral numbers, numeric strings and booleans are accepted;
 * fractional numbers are truncated toward zero.
 */
export function toInteger(value: JsonValue, field: string, nodeId?: NodeId): number {
    if (typeof value === "boolean") return value ? 1 : 0;
    if (typeof value === "number" && Number.isFinite(value)) return Math.trunc(value);
    if (typeof value === "string" && DECIMAL_INTEGER.test(value)) {
        return Number.parseInt(value.trim(), 10);
    }
    throw new TypeCoercionError(field, "an integer", value, nodeId);
}

/**
 * Base-16 parse of a color string. A leading `#` is not stripped and is
 * rejected; an optional `0x` prefix is accepted.
 */
export function toColor(value: JsonValue, field: string, nodeId?: NodeId): number {
    const match = typeof value === "string" ? HEX_INTEGER.exec(value) : null;
    if (!match) {
        throw new TypeCoercionError(field, "a hexadecimal color", value, nodeId);
    }
    const magnitude = Number.parseInt(match[2], 16);
    return match[1] === "-" ? -magnitude : magnitude;
}

/**
 * Comma-joined list to its items, order kept
 */
export function splitList(value: JsonValue, field: string, nodeId?: NodeId): string[] {
    if (typeof value !== "string") {
        throw new TypeCoercionError(field, "a comma-separated string", value, nodeId);
    }
    return value.split(",");
}
