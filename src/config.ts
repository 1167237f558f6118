/**
 * Client configuration, read from the environment
 *
 *   CPYTHON_BUILDS_INDEX_URL  Where the published index.json lives
 *   CPYTHON_BUILDS_ARCH       Target triple builds must match
 *   CPYTHON_BUILDS_HOME       Directory builds are installed into
 */

import * as os from "node:os";
import * as path from "node:path";
import { validateUrl } from "./utils.js";

export const DEFAULT_ARCH = "x86_64-unknown-linux-gnu";

export const DEFAULT_INDEX_URL =
  "https://raw.githubusercontent.com/cpython-build-index/cpython-build-index/main/index.json";

/** How long a downloaded index is used before it is fetched again */
export const CACHE_TTL_MS = 12 * 60 * 60 * 1000;

export interface ClientConfig {
  indexUrl: string;
  arch: string;
  /** Installed builds live in <home>/<X.Y.Z> */
  home: string;
  /** Local copy of the published index */
  cacheFile: string;
  cacheTtl: number;
}

/**
 * Build the client configuration. Unset or empty variables take their defaults.
 *
 * @throws {Error} If CPYTHON_BUILDS_INDEX_URL is not an http(s) URL
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, homeDir: string = os.homedir()): ClientConfig {
  const indexUrl = env.CPYTHON_BUILDS_INDEX_URL || DEFAULT_INDEX_URL;
  const urlValidation = validateUrl(indexUrl);
  if (!urlValidation.isValid) {
    throw new Error(`CPYTHON_BUILDS_INDEX_URL: ${urlValidation.error}`);
  }

  return {
    indexUrl,
    arch: env.CPYTHON_BUILDS_ARCH || DEFAULT_ARCH,
    home: env.CPYTHON_BUILDS_HOME || path.join(homeDir, ".cpython-builds"),
    cacheFile: path.join(homeDir, ".cache", "cpython-build-index", "index.json"),
    cacheTtl: CACHE_TTL_MS,
  };
}
