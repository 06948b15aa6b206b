/**
 * Node Converter - one source node to one target node, recursing into children.
 *
 * The flat node list and the root id are passed in explicitly. A node is
 * pushed onto the list before its children are converted, so the list ends
 * up in pre-order.
 */

import { isTruthy, splitList, toColor, toInteger } from "./coerce.js";
import {
    ArrayLengthMismatchError,
    MissingRequiredFieldError,
    StructuralParseError,
    TypeCoercionError,
} from "./errors.js";
import { isJsonObject } from "./parser.js";
import { ATTRIBUTE_TABLES, translateRole, type AttributeRule } from "./rules.js";
import type {
    Bounds,
    JsonValue,
    NodeId,
    SourceNode,
    TargetNode,
    TargetValue,
    WordBoundary,
} from "./types.js";

const ORIENTATIONS = ["horizontal", "vertical"] as const;
const BOLD_BIT = 2;
const ITALIC_BIT = 4;

function has(source: SourceNode, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(source, key);
}

function required(source: SourceNode, key: string, nodeId?: NodeId): JsonValue {
    if (!has(source, key)) {
        throw new MissingRequiredFieldError(key, nodeId);
    }
    return source[key];
}

/**
 * Read and validate a node's identity
 */
export function readNodeId(source: SourceNode): NodeId {
    const id = required(source, "id");
    if (typeof id !== "number" || !Number.isInteger(id)) {
        throw new TypeCoercionError("id", "an integer node id", id);
    }
    return id;
}

function readRole(source: SourceNode, id: NodeId): string {
    const role = required(source, "internalRole", id);
    if (typeof role !== "string") {
        throw new TypeCoercionError("internalRole", "a string", role, id);
    }
    return translateRole(role);
}

function readCoordinate(source: SourceNode, key: string, id: NodeId): number {
    const value = required(source, key, id);
    if (typeof value !== "number") {
        throw new TypeCoercionError(key, "a number", value, id);
    }
    return value;
}

function readBounds(source: SourceNode, id: NodeId, rootId: NodeId): Bounds {
    const bounds: Bounds = {
        rect: {
            left: readCoordinate(source, "boundsX", id),
            top: readCoordinate(source, "boundsY", id),
            width: readCoordinate(source, "boundsWidth", id),
            height: readCoordinate(source, "boundsHeight", id),
        },
    };
    const container = source["boundsOffsetContainerId"];
    if (container !== undefined && container !== null && container !== rootId) {
        bounds.offsetContainer = container;
    }
    return bounds;
}

function convertValue(rule: AttributeRule, value: JsonValue, id: NodeId): JsonValue {
    switch (rule.kind) {
        case "copy":
            return value;
        case "integer":
            return toInteger(value, rule.source, id);
        case "color":
            return toColor(value, rule.source, id);
    }
}

function applyAttributeTables(source: SourceNode, node: TargetNode): void {
    for (const table of ATTRIBUTE_TABLES) {
        for (const rule of table) {
            if (!has(source, rule.source)) continue;
            const value = source[rule.source];
            if (rule.gate === "truthy" && !isTruthy(value)) continue;
            node[rule.target] = convertValue(rule, value, node.id);
        }
    }
}

// ============================================================================
// Derived fields
// ============================================================================

function deriveExpanded(source: SourceNode): boolean | undefined {
    if (isTruthy(source["expanded"])) return true;
    if (isTruthy(source["collapsed"])) return false;
    return undefined;
}

function deriveOrientation(source: SourceNode): string | undefined {
    return ORIENTATIONS.find((orientation) => isTruthy(source[orientation]));
}

function deriveInvalidState(source: SourceNode, id: NodeId): TargetValue {
    const state = source["invalidState"];
    if (state === "other") {
        return { other: required(source, "ariaInvalidValue", id) };
    }
    return state;
}

function deriveWords(source: SourceNode, id: NodeId): WordBoundary[] {
    const starts = source["wordStarts"];
    const ends = required(source, "wordEnds", id);
    if (!Array.isArray(starts)) {
        throw new TypeCoercionError("wordStarts", "an array", starts, id);
    }
    if (!Array.isArray(ends)) {
        throw new TypeCoercionError("wordEnds", "an array", ends, id);
    }
    if (starts.length !== ends.length) {
        throw new ArrayLengthMismatchError(id, starts.length, ends.length);
    }
    return starts.map((start, i) => ({ start, end: ends[i] }));
}

function applyDerivedFields(source: SourceNode, node: TargetNode): void {
    const expanded = deriveExpanded(source);
    if (expanded !== undefined) {
        node.expanded = expanded;
    }

    const orientation = deriveOrientation(source);
    if (orientation !== undefined) {
        node.orientation = orientation;
    }

    if (has(source, "invalidState")) {
        node.invalidState = deriveInvalidState(source, node.id);
    }

    if (has(source, "restriction")) {
        const restriction = source["restriction"];
        if (typeof restriction !== "string") {
            throw new TypeCoercionError("restriction", "a string", restriction, node.id);
        }
        node[restriction] = true;
    }

    if (has(source, "textStyle")) {
        const style = toInteger(source["textStyle"], "textStyle", node.id);
        if (style & BOLD_BIT) node.bold = true;
        if (style & ITALIC_BIT) node.italic = true;
    }

    if (has(source, "wordStarts")) {
        node.words = deriveWords(source, node.id);
    }
}

function readChildren(source: SourceNode, id: NodeId): SourceNode[] {
    const children = source["children"];
    if (!isTruthy(children)) return [];
    if (!Array.isArray(children)) {
        throw new StructuralParseError(`Node ${id} has a "children" field that is not an array`, {
            nodeId: id,
        });
    }
    return children.map((child, index) => {
        if (!isJsonObject(child)) {
            throw new StructuralParseError(`Child ${index} of node ${id} is not a node object`, {
                nodeId: id,
                index,
            });
        }
        return child;
    });
}

/**
 * Convert `source` and its descendants, appending every produced node to
 * `accumulator` in pre-order. Returns the node produced for `source`.
 */
export function convertNode(
    source: SourceNode,
    rootId: NodeId,
    accumulator: TargetNode[]
): TargetNode {
    const id = readNodeId(source);
    const node: TargetNode = {
        id,
        role: readRole(source, id),
        bounds: readBounds(source, id, rootId),
    };
    accumulator.push(node);

    if (has(source, "actions")) {
        node.actions = splitList(source["actions"], "actions", id);
    }

    applyAttributeTables(source, node);
    applyDerivedFields(source, node);

    const children = readChildren(source, id);
    if (children.length > 0) {
        node.children = children.map((child) => convertNode(child, rootId, accumulator).id);
    }

    return node;
}
