/**
 * Byte-level repair applied before parsing.
 *
 * The dumping harness writes some raw bytes as `%XX` escapes inside an
 * otherwise valid JSON document. Each escape is replaced by the byte it
 * encodes; decoded bytes are not rescanned.
 */

import { MalformedEscapeError } from "./errors.js";

const PERCENT = 0x25;

function hexDigitValue(byte: number | undefined): number | undefined {
    if (byte === undefined) return undefined;
    if (byte >= 0x30 && byte <= 0x39) return byte - 0x30; // 0-9
    if (byte >= 0x41 && byte <= 0x46) return byte - 0x41 + 10; // A-F
    if (byte >= 0x61 && byte <= 0x66) return byte - 0x61 + 10; // a-f
    return undefined;
}

export function repairPercentEscapes(input: Uint8Array): Uint8Array {
    const output = new Uint8Array(input.length);
    let length = 0;

    for (let i = 0; i < input.length; i++) {
        const byte = input[i];
        if (byte !== PERCENT) {
            output[length++] = byte;
            continue;
        }

        const high = hexDigitValue(input[i + 1]);
        const low = hexDigitValue(input[i + 2]);
        if (high === undefined || low === undefined) {
            const sequence = String.fromCharCode(...input.subarray(i, i + 3));
            throw new MalformedEscapeError(i, sequence);
        }
        output[length++] = high * 16 + low;
        i += 2;
    }

    return output.slice(0, length);
}
