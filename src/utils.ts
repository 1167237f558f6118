/**
 * Utility functions shared by the builder, the refresh runner, lookup and the index client
 * Extracted for testability
 */

import type { Manifest, VersionIndex } from "./types.js";

/** Callback for cleanup actions when process is interrupted */
type CleanupCallback = () => void | Promise<void>;

/** Registered cleanup callbacks for SIGINT handling */
const cleanupCallbacks: CleanupCallback[] = [];

/** Flag to prevent multiple SIGINT handlers from running */
let isExiting = false;

/**
 * Register a cleanup callback to be called when the process receives SIGINT.
 * Multiple callbacks can be registered and will be called in order.
 *
 * @param callback - Async or sync function to call during cleanup
 */
export function onInterrupt(callback: CleanupCallback): void {
  cleanupCallbacks.push(callback);
}

/**
 * Setup graceful shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * Displays a clean message instead of a stack trace when interrupted.
 * Should be called once at the start of the main entry point.
 *
 * @param commandName - Name of the command for the exit message (e.g., "Index build")
 */
export function setupSignalHandlers(commandName: string): void {
  const handler = async (signal: string) => {
    if (isExiting) return;
    isExiting = true;

    console.log(`\n${commandName} interrupted.`);

    for (const callback of cleanupCallbacks) {
      try {
        await callback();
      } catch (error) {
        console.error("Cleanup failed:", error instanceof Error ? error.message : error);
      }
    }

    // 128 + signal number (SIGINT = 2, SIGTERM = 15)
    const exitCode = signal === "SIGINT" ? 130 : 143;
    process.exit(exitCode);
  };

  process.on("SIGINT", () => void handler("SIGINT"));
  process.on("SIGTERM", () => void handler("SIGTERM"));
}

/**
 * Escape a literal string for use inside a RegExp.
 *
 * @example
 * escapeRegex('x86_64-unknown-linux-gnu') // 'x86_64-unknown-linux-gnu'
 * escapeRegex('a.b+c') // 'a\\.b\\+c'
 */
export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Wait for specified milliseconds.
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Format duration in milliseconds to human-readable string
 *
 * @example
 * formatDuration(65000) // '1m 5s'
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

// ============================================================================
// HTTP
// ============================================================================

/** Error raised for a non-2xx HTTP response */
export class HttpError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    statusText: string,
  ) {
    super(`HTTP ${status} ${statusText} for ${url}`);
    this.name = "HttpError";
  }
}

/** Options for fetchWithRetry */
export interface RetryOptions {
  /** Number of retries after the first attempt (default: 3) */
  retries?: number;
  /** Base backoff delay in ms, doubled on every retry (default: 1000) */
  baseDelay?: number;
  /** Per-request timeout in ms (default: 30000) */
  timeout?: number;
  /** Extra request headers */
  headers?: Record<string, string>;
}

/**
 * Whether an HTTP status is worth retrying.
 * Rate limiting (429) and server errors (5xx) are transient.
 */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Fetch a URL, retrying network errors and transient HTTP statuses
 * with exponential backoff (baseDelay, 2x, 4x, ...).
 *
 * @returns The first successful response
 * @throws {HttpError} For a non-retryable status, or a retryable one after the last attempt
 */
export async function fetchWithRetry(url: string, options: RetryOptions = {}): Promise<Response> {
  const { retries = 3, baseDelay = 1000, timeout = 30000, headers = {} } = options;

  let lastError: unknown;
  for (let attempt = 0; attempt <= retries; attempt++) {
    if (attempt > 0) {
      await delay(baseDelay * 2 ** (attempt - 1));
    }

    let response: Response;
    try {
      response = await fetch(url, { headers, signal: AbortSignal.timeout(timeout) });
    } catch (error) {
      lastError = error;
      continue;
    }

    if (response.ok) {
      return response;
    }

    lastError = new HttpError(url, response.status, response.statusText);
    if (!isRetryableStatus(response.status)) {
      break;
    }
  }

  throw lastError;
}

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/**
 * Check if help flag is present in arguments.
 */
export function hasHelpFlag(args: string[]): boolean {
  return args.includes("--help") || args.includes("-h");
}

/**
 * Get a string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param flag - Flag to look for (e.g., '--arch')
 * @param defaultValue - Default value if flag not found
 */
export function getStringArg(args: string[], flag: string, defaultValue: string): string {
  let result = defaultValue;
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1] && !args[i + 1].startsWith("--")) {
      result = args[i + 1];
    }
  }
  return result;
}

/**
 * Get a nullable string argument value from command line arguments.
 *
 * @returns The argument value or null if not found
 */
export function getNullableStringArg(args: string[], flag: string): string | null {
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1] && !args[i + 1].startsWith("--")) {
      return args[i + 1];
    }
  }
  return null;
}

/**
 * Get the first positional (non-flag) argument.
 * Skips values that follow flags (e.g., in '--index out.json 3.12', skips 'out.json').
 *
 * @param knownFlags - Flags that take values (to skip their values)
 * @returns The first non-flag argument or empty string
 */
export function getPositionalArg(args: string[], knownFlags: string[] = []): string {
  let skipNext = false;
  for (const arg of args) {
    if (skipNext) {
      skipNext = false;
      continue;
    }
    if (knownFlags.includes(arg)) {
      skipNext = true;
      continue;
    }
    if (!arg.startsWith("--") && !arg.startsWith("-")) {
      return arg;
    }
  }
  return "";
}

/**
 * Collect every "--flag value" pair whose flag is in the given list.
 * Used to forward options from one command to another unchanged.
 *
 * @example
 * pickFlagPairs(['--arch', 'x', '--no-push'], ['--arch']) // ['--arch', 'x']
 */
export function pickFlagPairs(args: string[], flags: string[]): string[] {
  const picked: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (flags.includes(args[i]) && args[i + 1] && !args[i + 1].startsWith("--")) {
      picked.push(args[i], args[i + 1]);
      i++;
    }
  }
  return picked;
}

// ============================================================================
// Validation Helpers
// ============================================================================

/** Result of a structural validation */
export type ValidationResult = { isValid: true } | { isValid: false; error: string };

/**
 * Validate that a string is a valid HTTP/HTTPS URL.
 *
 * @example
 * validateUrl('https://example.com') // { isValid: true }
 * validateUrl('not-a-url') // { isValid: false, error: 'Invalid URL format' }
 */
export function validateUrl(url: string): ValidationResult {
  if (!url) {
    return { isValid: false, error: "URL is required" };
  }

  try {
    const parsed = new URL(url);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return { isValid: false, error: "URL must use http or https protocol" };
    }
    return { isValid: true };
  } catch {
    return { isValid: false, error: "Invalid URL format" };
  }
}

/**
 * Validate the structure of a python-build-standalone manifest.
 * Only the fields the builder reads are checked.
 *
 * @example
 * validateManifest({ files: [] }) // { isValid: true }
 * validateManifest({}) // { isValid: false, error: 'Missing or invalid field: files (expected array)' }
 */
export function validateManifest(data: unknown): ValidationResult {
  if (!isRecord(data)) {
    return { isValid: false, error: "manifest must be an object" };
  }

  const files = data.files;
  if (!Array.isArray(files)) {
    return { isValid: false, error: "Missing or invalid field: files (expected array)" };
  }

  for (let i = 0; i < files.length; i++) {
    const entry: unknown = files[i];
    if (!isRecord(entry)) {
      return { isValid: false, error: `files[${i}] must be an object` };
    }
    if (typeof entry.filename !== "string") {
      return { isValid: false, error: `files[${i}].filename must be a string` };
    }
    if (typeof entry.download_url !== "string") {
      return { isValid: false, error: `files[${i}].download_url must be a string` };
    }
  }

  return { isValid: true };
}

/** Keys of index.json: full versions only */
const INDEX_KEY_PATTERN = /^\d+\.\d+\.\d+$/;

/**
 * Validate the structure of index.json: an object mapping X.Y.Z versions to URLs.
 */
export function validateIndex(data: unknown): ValidationResult {
  if (!isRecord(data)) {
    return { isValid: false, error: "index.json must be an object" };
  }

  for (const [version, url] of Object.entries(data)) {
    if (!INDEX_KEY_PATTERN.test(version)) {
      return { isValid: false, error: `index key "${version}" is not an X.Y.Z version` };
    }
    if (typeof url !== "string") {
      return { isValid: false, error: `index["${version}"] must be a string` };
    }
  }

  return { isValid: true };
}

/**
 * Throw unless data is a manifest.
 *
 * @throws {Error} 'Invalid manifest: <reason>'
 */
export function assertManifest(data: unknown): asserts data is Manifest {
  const result = validateManifest(data);
  if (!result.isValid) {
    throw new Error(`Invalid manifest: ${result.error}`);
  }
}

/**
 * Throw unless data is a version index.
 *
 * @throws {Error} 'Invalid index: <reason>'
 */
export function assertVersionIndex(data: unknown): asserts data is VersionIndex {
  const result = validateIndex(data);
  if (!result.isValid) {
    throw new Error(`Invalid index: ${result.error}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
