/**
 * Build index.json from python-build-standalone release listings
 *
 * Usage: npm run build-index [-- options]
 * Example: npm run build-index -- --source html --arch aarch64-apple-darwin
 *
 * Options:
 *   --source <s>    manifest (default) or html
 *   --url <url>     Override the source URL
 *   --arch <triple> Target triple (default: x86_64-unknown-linux-gnu)
 *   --output <path> Output file (default: index.json)
 */

import * as fs from "node:fs/promises";
import { DEFAULT_ARCH } from "./config.js";
import { loadEntries } from "./manifest.js";
import type { IndexSource, ManifestEntry, VersionIndex } from "./types.js";
import {
  escapeRegex,
  getNullableStringArg,
  getStringArg,
  hasHelpFlag,
  onInterrupt,
  setupSignalHandlers,
  validateUrl,
} from "./utils.js";
import { summarizeBranches } from "./versions.js";

export { DEFAULT_ARCH };
export const DEFAULT_OUTPUT = "index.json";
const SOURCES: readonly IndexSource[] = ["manifest", "html"];

/** Configuration options for the builder */
export interface BuildOptions {
  source: IndexSource;
  /** Source URL override, null for the source's default */
  url: string | null;
  arch: string;
  output: string;
  showHelp: boolean;
}

/**
 * Print usage information for the build-index command.
 */
function showUsage(): void {
  console.log("Usage: npm run build-index [-- options]");
  console.log("");
  console.log("Regenerate index.json (CPython version → install_only archive URL).");
  console.log("");
  console.log("Options:");
  console.log("  --source <s>         manifest (default) or html");
  console.log("  --url <url>          Override the source URL");
  console.log(`  --arch <triple>      Target triple (default: ${DEFAULT_ARCH})`);
  console.log(`  --output <path>      Output file (default: ${DEFAULT_OUTPUT})`);
  console.log("  --help, -h           Show this help message");
}

/**
 * Parse command line arguments for the build-index command.
 *
 * @throws {Error} If --source names an unknown source
 */
export function parseArgs(args: string[] = process.argv.slice(2)): BuildOptions {
  const source = getStringArg(args, "--source", "manifest");
  if (!isIndexSource(source)) {
    throw new Error(`Unknown source "${source}" (expected ${SOURCES.join(" or ")})`);
  }

  return {
    source,
    url: getNullableStringArg(args, "--url"),
    arch: getStringArg(args, "--arch", DEFAULT_ARCH),
    output: getStringArg(args, "--output", DEFAULT_OUTPUT),
    showHelp: hasHelpFlag(args),
  };
}

function isIndexSource(value: string): value is IndexSource {
  return SOURCES.some((source) => source === value);
}

/**
 * Pattern for install_only archives of one target triple.
 * Group 1 captures the full CPython version.
 */
export function archivePattern(arch: string): RegExp {
  return new RegExp(`^cpython-(\\d+\\.\\d+\\.\\d+)\\+.*${escapeRegex(arch)}.*install_only`);
}

/**
 * Map each CPython version to the first matching archive URL.
 * Entry order decides between several archives of one version.
 */
export function buildIndex(entries: ManifestEntry[], arch: string = DEFAULT_ARCH): VersionIndex {
  const pattern = archivePattern(arch);
  const index: VersionIndex = {};

  for (const entry of entries) {
    const match = pattern.exec(entry.filename);
    if (!match) continue;

    const version = match[1];
    if (!Object.hasOwn(index, version)) {
      index[version] = entry.download_url;
    }
  }

  return index;
}

/**
 * Render index.json: two-space indent, trailing newline.
 */
export function serializeIndex(index: VersionIndex): string {
  return `${JSON.stringify(index, null, 2)}\n`;
}

/**
 * File the index is written to before it replaces the output.
 */
export function tempOutputPath(output: string): string {
  return `${output}.tmp`;
}

/**
 * Fetch, build and write the index. The file is written beside the output
 * and renamed over it, so readers never see a partial index.json.
 *
 * @returns The index that was written
 * @throws {Error} If the source fails or yields no versions; the output file is left untouched
 */
export async function generate(options: BuildOptions): Promise<VersionIndex> {
  const entries = await loadEntries(options.source, options.url);
  const index = buildIndex(entries, options.arch);
  const count = Object.keys(index).length;

  if (count === 0) {
    throw new Error(`No ${options.arch} install_only builds found in ${entries.length} entries`);
  }

  const tempPath = tempOutputPath(options.output);
  await fs.writeFile(tempPath, serializeIndex(index), "utf-8");
  await fs.rename(tempPath, options.output);
  return index;
}

/**
 * Main entry point for the builder.
 *
 * @throws Exits with code 1 on invalid options or any build failure
 */
export async function main(): Promise<void> {
  let options: BuildOptions;
  try {
    options = parseArgs();
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    showUsage();
    process.exit(1);
  }

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  if (options.url !== null) {
    const urlValidation = validateUrl(options.url);
    if (!urlValidation.isValid) {
      console.error(`Error: ${urlValidation.error}`);
      process.exit(1);
    }
  }

  const tempPath = tempOutputPath(options.output);
  onInterrupt(() => fs.rm(tempPath, { force: true }));

  try {
    console.log(`Loading ${options.source} listing...`);
    const index = await generate(options);
    console.log(`✔ ${options.output} generated: ${Object.keys(index).length} versions (from ${options.source})`);

    const latest = summarizeBranches(index).map(([, version]) => version);
    console.log(`  Latest per branch: ${latest.join(", ")}`);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  setupSignalHandlers("Index build");
  void main();
}
