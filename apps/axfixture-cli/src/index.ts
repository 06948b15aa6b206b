#!/usr/bin/env node
/**
 * axfixture CLI
 *
 * Library exports and entry point for `axfixture convert <input> <output>`
 */

import { realpathSync } from "fs";
import { pathToFileURL } from "url";

import { runCli } from "./cli.js";

export { convertFile, runCli, USAGE, type ConversionSummary } from "./cli.js";

// Only run when this file is the process entry point
const entry = process.argv[1];
const isMainModule = entry !== undefined && import.meta.url === pathToFileURL(realpathSync(entry)).href;

if (isMainModule) {
    process.exitCode = runCli(process.argv.slice(2));
}
