/**
 * Git operations for the refresh job
 *
 * Thin wrappers over the git CLI. Every command throws on a non-zero exit,
 * which aborts the job.
 */

import { execFileSync } from "node:child_process";

/** Fixed message of the index refresh commit */
export const COMMIT_MESSAGE = "chore(index): refresh via HTML parser";

/**
 * Run git and return its trimmed stdout.
 */
export function git(args: string[], cwd?: string): string {
  return execFileSync("git", args, { cwd, encoding: "utf-8" }).trim();
}

/**
 * Whether the working directory is inside a git work tree.
 * Anything other than a clean "true" counts as no.
 */
export function isWorkTree(cwd?: string): boolean {
  try {
    return git(["rev-parse", "--is-inside-work-tree"], cwd) === "true";
  } catch {
    return false;
  }
}

export function isShallow(cwd?: string): boolean {
  return git(["rev-parse", "--is-shallow-repository"], cwd) === "true";
}

/**
 * Make sure the clone carries full history.
 *
 * @returns True if history had to be fetched
 */
export function ensureFullHistory(cwd?: string): boolean {
  if (!isShallow(cwd)) return false;
  git(["fetch", "--unshallow"], cwd);
  return true;
}

/**
 * Whether a path differs from HEAD in the working tree.
 * Untracked files count as changed.
 */
export function hasChanges(file: string, cwd?: string): boolean {
  return git(["status", "--porcelain", "--", file], cwd) !== "";
}

/**
 * Stage and commit a single path, leaving anything else staged untouched.
 */
export function commitFile(file: string, message: string, cwd?: string): void {
  git(["add", "--", file], cwd);
  git(["commit", "-m", message, "--", file], cwd);
}

export function push(cwd?: string): void {
  git(["push"], cwd);
}

/**
 * Drop the last commit but keep its changes staged, so the next run
 * still sees the file as changed.
 */
export function undoLastCommit(cwd?: string): void {
  git(["reset", "--soft", "HEAD~1"], cwd);
}
