/**
 * Types for @axfixture/core
 * Source nodes are kept as plain JSON; target nodes use the normalized schema
 */


// ============================================================================
// Generic JSON values
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
    [key: string]: JsonValue;
}

/**
 * One record of the dumped tree. Read-only; children are embedded under `children`.
 */
export type SourceNode = JsonObject;


// ============================================================================
// Target schema
// ============================================================================

/**
 * Caller-assigned node identity, copied verbatim from the source
 */
export type NodeId = number;

export interface Rect {
    left: number;
    top: number;
    width: number;
    height: number;
}

/**
 * The root is the implicit offset container, so `offsetContainer` is only
 * present when it names some other node.
 */
export interface Bounds {
    rect: Rect;
    offsetContainer?: JsonValue;
}

export interface WordBoundary {
    start: JsonValue;
    end: JsonValue;
}

export interface OtherInvalidState {
    other: JsonValue;
}

export type TargetValue = JsonValue | Bounds | WordBoundary[] | OtherInvalidState;

/**
 * Normalized node. Attribute keys beyond `id`, `role` and `bounds` come
 * from the mapping tables and derived fields; `children` holds child ids
 * and is only set when the source node has children.
 */
export interface TargetNode {
    id: NodeId;
    role: string;
    bounds: Bounds;
    [attribute: string]: TargetValue;
}

export interface TreeInfo {
    id: string;
    sourceStringEncoding: string;
}

export interface OutputDocument {
    /** (id, node) pairs in pre-order */
    nodes: [NodeId, TargetNode][];
    tree: TreeInfo;
    root: NodeId;
}
