/**
 * @axfixture/core
 *
 * Converts dumped accessibility trees into the normalized fixture schema
 */

// Pipeline
export { convertBytes, convertSource } from "./pipeline.js";
export { repairPercentEscapes } from "./preprocess.js";
export { parseDocument } from "./parser.js";
export { assembleTree, SOURCE_STRING_ENCODING, TREE_ID_NAMESPACE } from "./treeAssembler.js";
export { convertNode } from "./nodeConverter.js";
export { serializeDocument } from "./serializer.js";
export { nameBasedUuid } from "./nameUuid.js";

// Mapping tables
export {
    ATTRIBUTE_TABLES,
    COLOR_RULES,
    INTEGER_RULES,
    PRESENCE_RULES,
    ROLE_RENAMES,
    TRUTHY_RULES,
    translateRole,
} from "./rules.js";
export type { AttributeGate, AttributeKind, AttributeRule } from "./rules.js";

// Errors
export {
    ArrayLengthMismatchError,
    ConversionError,
    InputReadError,
    MalformedEscapeError,
    MissingRequiredFieldError,
    OutputWriteError,
    StructuralParseError,
    TypeCoercionError,
} from "./errors.js";
export type { ConversionStage } from "./errors.js";

// Types
export type {
    Bounds,
    JsonObject,
    JsonPrimitive,
    JsonValue,
    NodeId,
    OtherInvalidState,
    OutputDocument,
    Rect,
    SourceNode,
    TargetNode,
    TargetValue,
    TreeInfo,
    WordBoundary,
} from "./types.js";
