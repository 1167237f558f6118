/**
 * Run the index refresh job: checkout → setup → install → build → commit if changed
 *
 * Usage: npm run refresh [-- options]
 *
 * The same sequence the scheduled workflow runs, for use from a local clone.
 */

import { execFileSync } from "node:child_process";
import { COMMIT_MESSAGE, commitFile, ensureFullHistory, hasChanges, isWorkTree, push, undoLastCommit } from "./git.js";
import { formatDuration, hasHelpFlag, pickFlagPairs, setupSignalHandlers } from "./utils.js";

/** Artifact the job keeps up to date */
export const INDEX_FILE = "index.json";

/** Node.js major the job is pinned to */
export const PINNED_NODE_MAJOR = 20;

/** Builder options passed through unchanged */
const BUILDER_FLAGS = ["--source", "--url", "--arch"];

export interface StepTiming {
  step: string;
  duration: number;
}

export interface RefreshOptions {
  skipInstall: boolean;
  push: boolean;
  /** Extra arguments for the builder */
  builderArgs: string[];
  showHelp: boolean;
}

export interface RefreshResult {
  timings: StepTiming[];
  /** Whether index.json changed and was committed */
  committed: boolean;
  pushed: boolean;
}

/**
 * Parse command line arguments from an array
 * Exported for testing
 */
export function parseArgs(args: string[] = process.argv.slice(2)): RefreshOptions {
  return {
    skipInstall: args.includes("--skip-install"),
    push: !args.includes("--no-push"),
    builderArgs: pickFlagPairs(args, BUILDER_FLAGS),
    showHelp: hasHelpFlag(args),
  };
}

function showUsage(): void {
  console.log("Usage: npm run refresh [-- options]");
  console.log("");
  console.log(`Regenerate ${INDEX_FILE} and commit it if it changed.`);
  console.log("");
  console.log("Options:");
  console.log("  --skip-install       Do not run npm install");
  console.log("  --no-push            Commit without pushing");
  console.log("  --source <s>         Passed to build-index (manifest or html)");
  console.log("  --url <url>          Passed to build-index");
  console.log("  --arch <triple>      Passed to build-index");
  console.log("  --help, -h           Show this help message");
}

/**
 * Run one step with a description header and timing
 * Exported for testing
 */
export function runStep(description: string, action: () => void): StepTiming {
  console.log(`\n${"=".repeat(50)}`);
  console.log(`Step: ${description}`);
  console.log("=".repeat(50));

  const start = Date.now();
  action();
  const duration = Date.now() - start;

  console.log(`\n  Completed in ${formatDuration(duration)}`);

  return { step: description, duration };
}

/**
 * Run a program as a step. Arguments go to the program as they are,
 * with no shell in between.
 * Exported for testing
 */
export function run(file: string, args: string[], description: string): StepTiming {
  return runStep(description, () => {
    execFileSync(file, args, { stdio: "inherit" });
  });
}

/**
 * Fail unless the running Node.js major matches the pinned one.
 *
 * @param version - A process.versions.node style string (e.g., '20.11.1')
 */
export function checkRuntime(version: string, pinnedMajor: number = PINNED_NODE_MAJOR): void {
  const major = Number.parseInt(version.split(".")[0], 10);
  if (major !== pinnedMajor) {
    throw new Error(`Node.js ${pinnedMajor} required, running ${version}`);
  }
}

/**
 * npx arguments that run the builder with forwarded options.
 */
export function builderCommand(builderArgs: string[]): string[] {
  return ["tsx", "src/build-index.ts", ...builderArgs];
}

/**
 * Run every step in order. Any step that throws aborts the job before
 * the commit step, so a failed build never produces a commit. A failed
 * push undoes the commit, leaving index.json changed for the next run.
 *
 * @param runtimeVersion - Node.js version checked by the setup step
 */
export function refresh(options: RefreshOptions, runtimeVersion: string = process.versions.node): RefreshResult {
  const timings: StepTiming[] = [];
  let committed = false;
  let pushed = false;

  timings.push(
    runStep("Checkout", () => {
      if (!isWorkTree()) {
        throw new Error("Not inside a git work tree");
      }
      if (ensureFullHistory()) {
        console.log("  Fetched full history");
      }
    }),
  );

  timings.push(runStep("Setup", () => checkRuntime(runtimeVersion)));

  if (options.skipInstall) {
    console.log("\nSkipping dependency install");
  } else {
    timings.push(run("npm", ["install", "--no-audit", "--no-fund"], "Installing dependencies"));
  }

  timings.push(run("npx", builderCommand(options.builderArgs), `Building ${INDEX_FILE}`));

  timings.push(
    runStep("Commit if changed", () => {
      if (!hasChanges(INDEX_FILE)) {
        console.log(`  ${INDEX_FILE} unchanged, nothing to commit`);
        return;
      }

      commitFile(INDEX_FILE, COMMIT_MESSAGE);
      committed = true;
      console.log(`  Committed ${INDEX_FILE}: ${COMMIT_MESSAGE}`);

      if (options.push) {
        try {
          push();
        } catch (error) {
          undoLastCommit();
          console.log("  Push failed, commit undone");
          throw error;
        }
        pushed = true;
        console.log("  Pushed");
      }
    }),
  );

  return { timings, committed, pushed };
}

export function main(): void {
  const options = parseArgs();

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  console.log("Starting index refresh...");

  try {
    const { timings, committed, pushed } = refresh(options);
    const totalDuration = timings.reduce((sum, { duration }) => sum + duration, 0);

    console.log("\n" + "=".repeat(50));
    console.log("Refresh complete!");
    console.log("=".repeat(50));

    console.log("\nTiming Summary:");
    console.log("-".repeat(35));
    for (const { step, duration } of timings) {
      console.log(`  ${step.padEnd(24)} ${formatDuration(duration)}`);
    }
    console.log("-".repeat(35));
    console.log(`  ${"Total".padEnd(24)} ${formatDuration(totalDuration)}`);

    if (!committed) {
      console.log(`\nNo changes to ${INDEX_FILE}.`);
    } else if (!pushed) {
      console.log(`\nCommitted ${INDEX_FILE} locally (not pushed).`);
    }
  } catch (error) {
    console.error("\nRefresh failed:", error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  setupSignalHandlers("Index refresh");
  main();
}
