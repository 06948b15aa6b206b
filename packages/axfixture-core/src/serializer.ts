import type { OutputDocument } from "./types.js";

const NON_ASCII = /[\u0080-\uffff]/g;

function escapeCodeUnit(char: string): string {
    return `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`;
}

/**
 * Render the document as indented JSON. Keys keep their insertion order and
 * non-ASCII characters are written as \u escapes, so fixtures diff cleanly.
 */
export function serializeDocument(doc: OutputDocument): string {
    return `${JSON.stringify(doc, null, 2).replace(NON_ASCII, escapeCodeUnit)}\n`;
}
