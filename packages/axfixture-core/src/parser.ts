/**
 * Structural parsing of the repaired input
 */

import { StructuralParseError } from "./errors.js";
import type { JsonObject, JsonValue } from "./types.js";

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeFailure(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Decode UTF-8 and parse JSON. The top-level value must be an object (the root node).
 */
export function parseDocument(bytes: Uint8Array): JsonObject {
    let text: string;
    try {
        text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    } catch (error) {
        throw new StructuralParseError(`Input is not valid UTF-8: ${describeFailure(error)}`);
    }

    let value: JsonValue;
    try {
        value = JSON.parse(text);
    } catch (error) {
        throw new StructuralParseError(`Input is not valid JSON: ${describeFailure(error)}`);
    }

    if (!isJsonObject(value)) {
        throw new StructuralParseError("Top-level value must be a node object", {
            found: Array.isArray(value) ? "array" : typeof value,
        });
    }
    return value;
}
