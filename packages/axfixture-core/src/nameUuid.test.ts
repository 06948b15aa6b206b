import { describe, expect, it } from "vitest";
import { nameBasedUuid } from "./nameUuid.js";

const DNS_NAMESPACE = "6ba7b810-9dad-11d1-80b4-00c04fd430c8";

describe("nameBasedUuid", () => {
    it("should match the RFC 4122 version 5 algorithm", () => {
        expect(nameBasedUuid(DNS_NAMESPACE, "python.org")).toBe(
            "886313e1-3b8a-5372-9b90-0c9aee199e5d"
        );
    });

    it("should be deterministic", () => {
        expect(nameBasedUuid(DNS_NAMESPACE, "a.json")).toBe(nameBasedUuid(DNS_NAMESPACE, "a.json"));
    });

    it("should set version and variant bits", () => {
        const uuid = nameBasedUuid(DNS_NAMESPACE, "fixtures/tree.json");
        expect(uuid).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    });

    it("should reject an invalid namespace", () => {
        expect(() => nameBasedUuid("not-a-uuid", "x")).toThrow("Invalid namespace UUID: not-a-uuid");
    });
});
