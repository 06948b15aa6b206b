import { describe, expect, it } from "vitest";
import { StructuralParseError } from "./errors.js";
import { isJsonObject, parseDocument } from "./parser.js";

const encoder = new TextEncoder();

describe("parseDocument", () => {
    it("should parse a nested node object", () => {
        const root = parseDocument(encoder.encode('{"id": 1, "children": [{"id": 2}]}'));
        expect(root).toEqual({ id: 1, children: [{ id: 2 }] });
    });

    it("should reject invalid JSON", () => {
        expect(() => parseDocument(encoder.encode('{"id": 1,'))).toThrow(StructuralParseError);
    });

    it("should reject invalid UTF-8", () => {
        const bytes = new Uint8Array([0x7b, 0x22, 0xff, 0x22, 0x3a, 0x31, 0x7d]);
        expect(() => parseDocument(bytes)).toThrow("Input is not valid UTF-8");
    });

    it("should reject a top-level array", () => {
        expect(() => parseDocument(encoder.encode("[1, 2]"))).toThrow(
            "Top-level value must be a node object"
        );
    });
});

describe("isJsonObject", () => {
    it("should only accept plain objects", () => {
        expect(isJsonObject({})).toBe(true);
        expect(isJsonObject([])).toBe(false);
        expect(isJsonObject(null)).toBe(false);
        expect(isJsonObject("node")).toBe(false);
        expect(isJsonObject(undefined)).toBe(false);
    });
});
