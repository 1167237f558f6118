/**
 * Resolve a CPython version against index.json
 *
 * Usage: npm run lookup -- <X.Y | X.Y.Z> [--index path]
 */

import * as fs from "node:fs/promises";
import type { VersionIndex } from "./types.js";
import { assertVersionIndex, getPositionalArg, getStringArg, hasHelpFlag, setupSignalHandlers } from "./utils.js";
import { resolveVersion } from "./versions.js";

const DEFAULT_INDEX = "index.json";

export interface LookupOptions {
  version: string;
  indexPath: string;
  showHelp: boolean;
}

function showUsage(): void {
  console.log("Usage: npm run lookup -- <X.Y | X.Y.Z> [--index path]");
  console.log("");
  console.log("Print the archive URL for a version; X.Y picks the newest X.Y.Z.");
  console.log("");
  console.log("Options:");
  console.log(`  --index <path>       Index file (default: ${DEFAULT_INDEX})`);
  console.log("  --help, -h           Show this help message");
}

export function parseArgs(args: string[] = process.argv.slice(2)): LookupOptions {
  return {
    version: getPositionalArg(args, ["--index"]),
    indexPath: getStringArg(args, "--index", DEFAULT_INDEX),
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Read and validate an index file.
 *
 * @throws {Error} If the file is missing, not JSON, or not a version index
 */
export async function readIndex(indexPath: string): Promise<VersionIndex> {
  const data: unknown = JSON.parse(await fs.readFile(indexPath, "utf-8"));
  assertVersionIndex(data);
  return data;
}

export async function main(): Promise<void> {
  const { version, indexPath, showHelp } = parseArgs();

  if (showHelp) {
    showUsage();
    process.exit(0);
  }

  if (!version) {
    showUsage();
    process.exit(1);
  }

  try {
    const index = await readIndex(indexPath);
    const resolved = resolveVersion(index, version);
    console.log(`${resolved.version} ${resolved.url}`);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  setupSignalHandlers("Lookup");
  void main();
}
