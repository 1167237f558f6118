/**
 * Version resolution against index.json
 */

import type { VersionIndex } from "./types.js";

/** Minor branch, e.g. '3.12' */
const BRANCH_PATTERN = /^\d+\.\d+$/;

/** Full version, e.g. '3.12.10' */
const FULL_PATTERN = /^\d+\.\d+\.\d+$/;

/** A version picked from the index */
export interface ResolvedVersion {
  version: string;
  url: string;
}

export function isBranch(value: string): boolean {
  return BRANCH_PATTERN.test(value);
}

export function isFullVersion(value: string): boolean {
  return FULL_PATTERN.test(value);
}

/**
 * Compare dotted numeric versions component by component.
 * Missing components count as 0.
 *
 * @returns Negative if a < b, positive if a > b, 0 if equal
 *
 * @example
 * compareVersions('3.12.10', '3.12.9') // > 0
 */
export function compareVersions(a: string, b: string): number {
  const left = a.split(".").map(Number);
  const right = b.split(".").map(Number);
  const length = Math.max(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/**
 * Newest full version on a minor branch.
 *
 * @example
 * latestForBranch({ '3.12.9': '…', '3.12.10': '…' }, '3.12') // '3.12.10'
 */
export function latestForBranch(index: VersionIndex, branch: string): string | null {
  const prefix = `${branch}.`;
  let latest: string | null = null;

  for (const version of Object.keys(index)) {
    if (!version.startsWith(prefix)) continue;
    if (latest === null || compareVersions(version, latest) > 0) {
      latest = version;
    }
  }
  return latest;
}

/**
 * Resolve 'X.Y' (newest on the branch) or 'X.Y.Z' (exact) to a download URL.
 *
 * @throws {Error} If the request is malformed or nothing in the index matches
 */
export function resolveVersion(index: VersionIndex, requested: string): ResolvedVersion {
  let version = requested;

  if (isBranch(requested)) {
    const latest = latestForBranch(index, requested);
    if (latest === null) {
      throw new Error(`No builds for ${requested}.x in index.`);
    }
    version = latest;
  } else if (!isFullVersion(requested)) {
    throw new Error("Version must be X.Y or X.Y.Z");
  }

  const url = Object.hasOwn(index, version) ? index[version] : undefined;
  if (url === undefined) {
    throw new Error(`${version} absent from index.`);
  }
  return { version, url };
}

/**
 * Newest full version per minor branch, oldest branch first.
 *
 * @example
 * summarizeBranches({ '3.11.2': 'a', '3.12.1': 'b', '3.11.9': 'c' })
 * // [['3.11', '3.11.9'], ['3.12', '3.12.1']]
 */
export function summarizeBranches(index: VersionIndex): Array<[string, string]> {
  const newest = new Map<string, string>();

  for (const version of Object.keys(index)) {
    const branch = version.split(".").slice(0, 2).join(".");
    const current = newest.get(branch);
    if (current === undefined || compareVersions(version, current) > 0) {
      newest.set(branch, version);
    }
  }

  return [...newest.entries()].sort(([a], [b]) => compareVersions(a, b));
}
