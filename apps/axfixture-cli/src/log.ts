/**
 * Console logging with timestamps
 */

import { ConversionError } from "@axfixture/core";

export function timestamp(): string {
    return new Date().toISOString();
}

export function formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
    return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

export function logInfo(message: string): void {
    console.log(`[${timestamp()}] ${message}`);
}

/**
 * Report a failed run on stderr, with the error's stage and context
 */
export function logConversionError(error: ConversionError): void {
    console.error(`[${timestamp()}] FAILED ${error.name} (${error.operation}): ${error.message}`);
    if (error.context) {
        console.error(`[${timestamp()}] context ${JSON.stringify(error.context)}`);
    }
}
