/**
 * Error types for the conversion pipeline.
 * Nothing here is recovered from: every error aborts the run.
 */

/**
 * Pipeline stage that raised an error
 */
export type ConversionStage = "read" | "preprocess" | "parse" | "convert" | "write";

/**
 * Base class for conversion failures
 */
export class ConversionError extends Error {
    readonly operation: ConversionStage;
    readonly context?: Record<string, unknown>;

    constructor(
        message: string,
        operation: ConversionStage,
        context?: Record<string, unknown>
    ) {
        super(message);
        this.name = "ConversionError";
        this.operation = operation;
        this.context = context;
    }
}

export class InputReadError extends ConversionError {
    constructor(path: string, reason: string) {
        super(`Cannot read input file "${path}": ${reason}`, "read", { path });
        this.name = "InputReadError";
    }
}

/**
 * A `%` not followed by two hex digits
 */
export class MalformedEscapeError extends ConversionError {
    constructor(offset: number, sequence: string) {
        super(`Malformed percent-escape "${sequence}" at byte ${offset}`, "preprocess", {
            offset,
            sequence,
        });
        this.name = "MalformedEscapeError";
    }
}

export class StructuralParseError extends ConversionError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, "parse", context);
        this.name = "StructuralParseError";
    }
}

export class MissingRequiredFieldError extends ConversionError {
    constructor(field: string, nodeId?: unknown) {
        super(
            nodeId === undefined
                ? `Missing required field "${field}"`
                : `Node ${String(nodeId)} is missing required field "${field}"`,
            "convert",
            { field, nodeId }
        );
        this.name = "MissingRequiredFieldError";
    }
}

export class TypeCoercionError extends ConversionError {
    constructor(field: string, expected: string, value: unknown, nodeId?: unknown) {
        super(
            `Field "${field}"${nodeId === undefined ? "" : ` of node ${String(nodeId)}`} ` +
                `is not ${expected}: ${JSON.stringify(value)}`,
            "convert",
            { field, expected, value, nodeId }
        );
        this.name = "TypeCoercionError";
    }
}

/**
 * `wordStarts` and `wordEnds` of different lengths
 */
export class ArrayLengthMismatchError extends ConversionError {
    constructor(nodeId: unknown, starts: number, ends: number) {
        super(
            `Node ${String(nodeId)} has ${starts} wordStarts but ${ends} wordEnds`,
            "convert",
            { nodeId, starts, ends }
        );
        this.name = "ArrayLengthMismatchError";
    }
}

export class OutputWriteError extends ConversionError {
    constructor(path: string, reason: string) {
        super(`Cannot write output file "${path}": ${reason}`, "write", { path });
        this.name = "OutputWriteError";
    }
}
