import { describe, expect, it } from "vitest";
import { MalformedEscapeError } from "./errors.js";
import { repairPercentEscapes } from "./preprocess.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function repair(text: string): string {
    return decoder.decode(repairPercentEscapes(encoder.encode(text)));
}

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error("expected an error to be thrown");
}

describe("repairPercentEscapes", () => {
    it("should pass text without escapes through unchanged", () => {
        expect(repair('{"name": "OK"}')).toBe('{"name": "OK"}');
    });

    it("should replace each escape with the byte it encodes", () => {
        expect(repair("a%41b%2Cc")).toBe("aAb,c");
    });

    it("should accept lowercase hex digits", () => {
        expect(repair("%7e")).toBe("~");
    });

    it("should join escaped bytes into multi-byte UTF-8 characters", () => {
        expect(repair('"caf%C3%A9"')).toBe('"café"');
    });

    it("should not rescan decoded bytes", () => {
        expect(repair("%2541")).toBe("%41");
    });

    it("should reject non-hex digits", () => {
        expect(() => repair('{"a": "%G1"}')).toThrow(MalformedEscapeError);
    });

    it("should report the offset of a malformed escape", () => {
        expect(captureError(() => repair("abc%4"))).toMatchObject({
            name: "MalformedEscapeError",
            operation: "preprocess",
            context: { offset: 3, sequence: "%4" },
        });
    });

    it("should reject a trailing percent sign", () => {
        expect(() => repair("100%")).toThrow('Malformed percent-escape "%" at byte 3');
    });
});
