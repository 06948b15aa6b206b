/**
 * Name-based (version 5, SHA-1) UUIDs
 */

import { createHash } from "crypto";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function uuidToBytes(uuid: string): Buffer {
    if (!UUID_PATTERN.test(uuid)) {
        throw new Error(`Invalid namespace UUID: ${uuid}`);
    }
    return Buffer.from(uuid.replace(/-/g, ""), "hex");
}

function formatUuid(bytes: Buffer): string {
    const hex = bytes.toString("hex");
    return [
        hex.slice(0, 8),
        hex.slice(8, 12),
        hex.slice(12, 16),
        hex.slice(16, 20),
        hex.slice(20, 32),
    ].join("-");
}

/**
 * UUID derived only from `namespace` and `name` (UTF-8), so the same pair
 * always yields the same id
 */
export function nameBasedUuid(namespace: string, name: string): string {
    const digest = createHash("sha1")
        .update(uuidToBytes(namespace))
        .update(name, "utf8")
        .digest();

    const bytes = digest.subarray(0, 16);
    bytes[6] = (bytes[6] & 0x0f) | 0x50; // version 5
    bytes[8] = (bytes[8] & 0x3f) | 0x80; // RFC 4122 variant
    return formatUuid(bytes);
}
