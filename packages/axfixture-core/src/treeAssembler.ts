/**
 * Tree Assembler - drives the conversion from the root and builds the output document
 */

import { StructuralParseError } from "./errors.js";
import { nameBasedUuid } from "./nameUuid.js";
import { convertNode, readNodeId } from "./nodeConverter.js";
import type { NodeId, OutputDocument, SourceNode, TargetNode } from "./types.js";

/**
 * Fixed namespace for tree ids; changing it changes every fixture's tree id
 */
export const TREE_ID_NAMESPACE = "6a529f27-3bc6-4609-80a6-370f5fd07030";

export const SOURCE_STRING_ENCODING = "utf16";

export function assembleTree(root: SourceNode, outputName: string): OutputDocument {
    const rootId = readNodeId(root);
    const accumulator: TargetNode[] = [];
    convertNode(root, rootId, accumulator);

    const seen = new Set<NodeId>();
    const nodes = accumulator.map((node): [NodeId, TargetNode] => {
        if (seen.has(node.id)) {
            throw new StructuralParseError(`Duplicate node id ${node.id}`, { nodeId: node.id });
        }
        seen.add(node.id);
        return [node.id, node];
    });

    return {
        nodes,
        tree: {
            id: nameBasedUuid(TREE_ID_NAMESPACE, outputName),
            sourceStringEncoding: SOURCE_STRING_ENCODING,
        },
        root: rootId,
    };
}
