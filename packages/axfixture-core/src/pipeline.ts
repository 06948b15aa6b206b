/**
 * Full in-memory pipeline: repair, parse, assemble, serialize. No I/O.
 */

import { parseDocument } from "./parser.js";
import { repairPercentEscapes } from "./preprocess.js";
import { serializeDocument } from "./serializer.js";
import { assembleTree } from "./treeAssembler.js";
import type { OutputDocument } from "./types.js";

export function convertSource(input: Uint8Array, outputName: string): OutputDocument {
    const root = parseDocument(repairPercentEscapes(input));
    return assembleTree(root, outputName);
}

export function convertBytes(input: Uint8Array, outputName: string): string {
    return serializeDocument(convertSource(input, outputName));
}
