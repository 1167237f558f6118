/**
 * Install and manage CPython builds listed in the published index
 *
 * Usage: npm run builds -- <command> [version]
 * Example: npm run builds -- install 3.12
 *
 * Commands:
 *   install <X.Y | X.Y.Z>  Download and unpack a build
 *   use <X.Y | X.Y.Z>      Install if needed, then point Poetry's environment at it
 *   list                   Show installed builds
 *   update-index           Download the index again, ignoring the cache
 */

import { execFileSync } from "node:child_process";
import { install, listInstalled, loadIndex, updateIndex } from "./client.js";
import { type ClientConfig, loadConfig } from "./config.js";
import { hasHelpFlag, setupSignalHandlers } from "./utils.js";

const COMMANDS = ["install", "use", "list", "update-index"] as const;
export type Command = (typeof COMMANDS)[number];

export interface BuildsOptions {
  /** Empty when no command was given */
  command: string;
  version: string;
  showHelp: boolean;
}

function showUsage(): void {
  console.log("Usage: npm run builds -- <command> [version]");
  console.log("");
  console.log("Commands:");
  console.log("  install <X.Y | X.Y.Z>  Download and unpack a build");
  console.log("  use <X.Y | X.Y.Z>      Install if needed, then run poetry env use");
  console.log("  list                   Show installed builds");
  console.log("  update-index           Download the index again, ignoring the cache");
  console.log("");
  console.log("Environment:");
  console.log("  CPYTHON_BUILDS_INDEX_URL  Index to read");
  console.log("  CPYTHON_BUILDS_ARCH       Target triple (default: x86_64-unknown-linux-gnu)");
  console.log("  CPYTHON_BUILDS_HOME       Install directory (default: ~/.cpython-builds)");
}

export function parseArgs(args: string[] = process.argv.slice(2)): BuildsOptions {
  const positionals = args.filter((arg) => !arg.startsWith("-"));
  return {
    command: positionals[0] ?? "",
    version: positionals[1] ?? "",
    showHelp: hasHelpFlag(args),
  };
}

export function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/**
 * Point the Poetry project in the working directory at an interpreter.
 */
export function usePoetry(python: string): void {
  execFileSync("poetry", ["env", "use", python], { stdio: "inherit" });
}

/**
 * Run one command.
 *
 * @throws {Error} If a version is missing or any step fails
 */
export async function runCommand(command: Command, version: string, config: ClientConfig): Promise<void> {
  switch (command) {
    case "install":
    case "use": {
      if (!version) {
        throw new Error(`${command} needs a version (X.Y or X.Y.Z)`);
      }
      const index = await loadIndex(config);
      const result = await install(config, index, version);
      console.log(result.installed ? `✔  ${result.python}` : `✔  ${result.python} (already installed)`);

      if (command === "use") {
        usePoetry(result.python);
      }
      return;
    }

    case "list": {
      const builds = await listInstalled(config.home);
      if (builds.length === 0) {
        console.log(`No builds installed in ${config.home}`);
        return;
      }
      for (const { version: installed, python } of builds) {
        console.log(`${installed} → ${python}`);
      }
      return;
    }

    case "update-index": {
      const index = await updateIndex(config);
      console.log(`✔  Index updated: ${Object.keys(index).length} versions`);
      return;
    }
  }
}

export async function main(): Promise<void> {
  const { command, version, showHelp } = parseArgs();

  if (showHelp) {
    showUsage();
    process.exit(0);
  }

  if (!isCommand(command)) {
    if (command) {
      console.error(`Error: Unknown command "${command}"`);
    }
    showUsage();
    process.exit(1);
  }

  try {
    await runCommand(command, version, loadConfig());
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  setupSignalHandlers("builds");
  void main();
}
