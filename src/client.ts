/**
 * Client side of the index
 *
 * Keeps a cached copy of the published index.json and installs the
 * builds it lists: each archive's python/ tree is unpacked into
 * <home>/<X.Y.Z>, so <home>/<X.Y.Z>/bin/python is the interpreter.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as tar from "tar";
import type { ClientConfig } from "./config.js";
import { USER_AGENT } from "./manifest.js";
import type { VersionIndex } from "./types.js";
import { assertVersionIndex, fetchWithRetry, onInterrupt } from "./utils.js";
import { resolveVersion } from "./versions.js";

/** Archives are tens of megabytes; allow more than the default request timeout */
const ARCHIVE_TIMEOUT = 5 * 60 * 1000;

/** Top-level directory of an install_only archive */
const ARCHIVE_ROOT = "python";

export interface InstalledBuild {
  version: string;
  python: string;
}

export interface InstallResult extends InstalledBuild {
  /** False when the build was already there */
  installed: boolean;
}

export function pythonPath(home: string, version: string): string {
  return path.join(home, version, "bin", "python");
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

// ============================================================================
// Index cache
// ============================================================================

/**
 * Whether the cached index exists and is younger than the TTL.
 */
export async function isCacheFresh(cacheFile: string, ttl: number, now: number = Date.now()): Promise<boolean> {
  try {
    const { mtimeMs } = await fs.stat(cacheFile);
    return now - mtimeMs < ttl;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

/**
 * Download the published index and store it as the cache.
 *
 * @throws {Error} If the download fails or the body is not a version index
 */
export async function downloadIndex(config: ClientConfig): Promise<VersionIndex> {
  const response = await fetchWithRetry(config.indexUrl, { headers: { "User-Agent": USER_AGENT } });
  const text = await response.text();
  const data: unknown = JSON.parse(text);
  assertVersionIndex(data);

  await fs.mkdir(path.dirname(config.cacheFile), { recursive: true });
  await fs.writeFile(config.cacheFile, text, "utf-8");
  return data;
}

async function readCachedIndex(cacheFile: string): Promise<VersionIndex | null> {
  try {
    const data: unknown = JSON.parse(await fs.readFile(cacheFile, "utf-8"));
    assertVersionIndex(data);
    return data;
  } catch (error) {
    console.error(`Ignoring cached index: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

/**
 * The cached index while it is fresh, a new download otherwise.
 * A cache that no longer parses is downloaded again.
 */
export async function loadIndex(config: ClientConfig, now: number = Date.now()): Promise<VersionIndex> {
  if (await isCacheFresh(config.cacheFile, config.cacheTtl, now)) {
    const cached = await readCachedIndex(config.cacheFile);
    if (cached !== null) return cached;
  }
  return downloadIndex(config);
}

/**
 * Drop the cache and download the index again.
 */
export async function updateIndex(config: ClientConfig): Promise<VersionIndex> {
  await fs.rm(config.cacheFile, { force: true });
  return downloadIndex(config);
}

// ============================================================================
// Installed builds
// ============================================================================

/**
 * Builds under home that have an interpreter, in version order.
 */
export async function listInstalled(home: string): Promise<InstalledBuild[]> {
  let names: string[];
  try {
    names = await fs.readdir(home);
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }

  const builds: InstalledBuild[] = [];
  for (const name of names) {
    if (name.startsWith(".")) continue;
    const python = pythonPath(home, name);
    if (await exists(python)) {
      builds.push({ version: name, python });
    }
  }

  return builds.sort((a, b) => a.version.localeCompare(b.version, undefined, { numeric: true }));
}

/**
 * Filename at the end of an archive URL.
 */
export function archiveName(url: string): string {
  const segment = new URL(url).pathname.split("/").pop() ?? "";
  return decodeURIComponent(segment);
}

/**
 * Fail unless the archive was built for the configured target triple.
 */
export function checkArch(url: string, arch: string): void {
  const name = archiveName(url);
  if (!name.includes(arch)) {
    throw new Error(`${name} is not a ${arch} build; point CPYTHON_BUILDS_INDEX_URL at an index for ${arch}`);
  }
}

/**
 * Unpack the python/ tree of an archive into dest, without the python/ prefix.
 */
export async function extractPython(archive: string, dest: string): Promise<void> {
  await tar.x({
    file: archive,
    cwd: dest,
    strip: 1,
    filter: (entryPath) => entryPath === ARCHIVE_ROOT || entryPath.startsWith(`${ARCHIVE_ROOT}/`),
  });
}

/**
 * Make sure bin/python exists in an unpacked tree. Archives that only
 * ship bin/python3 get a python symlink next to it.
 *
 * @throws {Error} If the tree has no interpreter at all
 */
async function ensurePythonLink(tree: string, name: string): Promise<void> {
  const bin = path.join(tree, "bin");
  if (await exists(path.join(bin, "python"))) return;
  if (!(await exists(path.join(bin, "python3")))) {
    throw new Error(`${name} has no ${ARCHIVE_ROOT}/bin/python`);
  }
  await fs.symlink("python3", path.join(bin, "python"));
}

async function downloadArchive(url: string, file: string): Promise<void> {
  const response = await fetchWithRetry(url, { headers: { "User-Agent": USER_AGENT }, timeout: ARCHIVE_TIMEOUT });
  await fs.writeFile(file, new Uint8Array(await response.arrayBuffer()));
}

/**
 * Install the build a version resolves to, unless it is already installed.
 *
 * The archive is downloaded and unpacked in a staging directory under home,
 * then renamed into place, so an interrupted install leaves no half-built
 * <home>/<X.Y.Z> behind.
 *
 * @param requested - X.Y (newest on the branch) or X.Y.Z
 */
export async function install(config: ClientConfig, index: VersionIndex, requested: string): Promise<InstallResult> {
  const { version, url } = resolveVersion(index, requested);
  const python = pythonPath(config.home, version);
  if (await exists(python)) {
    return { version, python, installed: false };
  }

  checkArch(url, config.arch);
  const name = archiveName(url);

  await fs.mkdir(config.home, { recursive: true });
  const staging = await fs.mkdtemp(path.join(config.home, ".staging-"));
  onInterrupt(() => fs.rm(staging, { recursive: true, force: true }));

  try {
    const archive = path.join(staging, name);
    console.log(`Downloading ${name}...`);
    await downloadArchive(url, archive);

    const tree = path.join(staging, ARCHIVE_ROOT);
    await fs.mkdir(tree);
    await extractPython(archive, tree);
    await ensurePythonLink(tree, name);

    const target = path.join(config.home, version);
    await fs.rm(target, { recursive: true, force: true });
    await fs.rename(tree, target);
  } finally {
    await fs.rm(staging, { recursive: true, force: true });
  }

  return { version, python, installed: true };
}
