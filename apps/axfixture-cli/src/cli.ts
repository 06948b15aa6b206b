/**
 * The `convert` command: read the dump, convert it in memory, write the fixture.
 */

import { existsSync, readFileSync, renameSync, rmSync, writeFileSync } from "fs";

import {
    ConversionError,
    convertSource,
    InputReadError,
    OutputWriteError,
    serializeDocument,
} from "@axfixture/core";

import { formatBytes, logConversionError, logInfo } from "./log.js";

export const USAGE = "Usage: axfixture convert <input-path> <output-path>";

/** Exit codes */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface ConversionSummary {
    nodeCount: number;
    treeId: string;
    bytesWritten: number;
}

function describeFailure(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function readInput(path: string): Uint8Array {
    try {
        return new Uint8Array(readFileSync(path));
    } catch (error) {
        throw new InputReadError(path, describeFailure(error));
    }
}

/**
 * Write through a sibling temp file and rename it into place, so a failed
 * write never leaves a partial fixture behind
 */
function writeOutput(path: string, text: string): number {
    const tempPath = `${path}.${process.pid}.tmp`;
    const data = Buffer.from(text, "utf8");
    try {
        writeFileSync(tempPath, data);
        renameSync(tempPath, path);
    } catch (error) {
        if (existsSync(tempPath)) {
            rmSync(tempPath, { force: true });
        }
        throw new OutputWriteError(path, describeFailure(error));
    }
    return data.length;
}

/**
 * Convert `inputPath` into `outputPath`. The tree id is derived from
 * `outputPath` exactly as given.
 */
export function convertFile(inputPath: string, outputPath: string): ConversionSummary {
    const input = readInput(inputPath);
    logInfo(`CONVERT input="${inputPath}" size=${formatBytes(input.length)}`);

    const document = convertSource(input, outputPath);
    const bytesWritten = writeOutput(outputPath, serializeDocument(document));

    const summary: ConversionSummary = {
        nodeCount: document.nodes.length,
        treeId: document.tree.id,
        bytesWritten,
    };
    logInfo(
        `WROTE output="${outputPath}" nodes=${summary.nodeCount} tree=${summary.treeId} ` +
            `size=${formatBytes(bytesWritten)}`
    );
    return summary;
}

/**
 * Run the command line (arguments after the executable) and return the exit code
 */
export function runCli(args: readonly string[]): number {
    const [command, inputPath, outputPath, ...rest] = args;
    if (command !== "convert" || !inputPath || !outputPath || rest.length > 0) {
        console.error(USAGE);
        return EXIT_USAGE;
    }

    try {
        convertFile(inputPath, outputPath);
        return EXIT_OK;
    } catch (error) {
        if (error instanceof ConversionError) {
            logConversionError(error);
            return EXIT_FAILURE;
        }
        throw error;
    }
}
