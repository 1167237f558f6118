import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  COMMIT_MESSAGE,
  commitFile,
  ensureFullHistory,
  git,
  hasChanges,
  isShallow,
  isWorkTree,
  push,
  undoLastCommit,
} from "./git.js";

// Mock child_process
vi.mock("node:child_process", () => ({
  execFileSync: vi.fn(),
}));

import { execFileSync } from "node:child_process";

const gitOptions = { cwd: undefined, encoding: "utf-8" };

describe("COMMIT_MESSAGE", () => {
  it("is the fixed refresh message", () => {
    expect(COMMIT_MESSAGE).toBe("chore(index): refresh via HTML parser");
  });
});

describe("git", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("runs git with the given args and trims stdout", () => {
    vi.mocked(execFileSync).mockReturnValueOnce("  abc123\n");

    expect(git(["rev-parse", "HEAD"], "/repo")).toBe("abc123");
    expect(execFileSync).toHaveBeenCalledWith("git", ["rev-parse", "HEAD"], { cwd: "/repo", encoding: "utf-8" });
  });

  it("propagates command failures", () => {
    vi.mocked(execFileSync).mockImplementationOnce(() => {
      throw new Error("Command failed: git push");
    });

    expect(() => push()).toThrow("Command failed: git push");
  });
});

describe("isWorkTree", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("is true inside a work tree", () => {
    vi.mocked(execFileSync).mockReturnValueOnce("true\n");

    expect(isWorkTree()).toBe(true);
    expect(execFileSync).toHaveBeenCalledWith("git", ["rev-parse", "--is-inside-work-tree"], gitOptions);
  });

  it("is false when git fails", () => {
    vi.mocked(execFileSync).mockImplementationOnce(() => {
      throw new Error("fatal: not a git repository");
    });

    expect(isWorkTree()).toBe(false);
  });

  it("is false inside a .git directory", () => {
    vi.mocked(execFileSync).mockReturnValueOnce("false\n");

    expect(isWorkTree()).toBe(false);
  });
});

describe("ensureFullHistory", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("fetches the rest of history for a shallow clone", () => {
    vi.mocked(execFileSync).mockReturnValueOnce("true\n").mockReturnValueOnce("");

    expect(ensureFullHistory()).toBe(true);
    expect(execFileSync).toHaveBeenNthCalledWith(1, "git", ["rev-parse", "--is-shallow-repository"], gitOptions);
    expect(execFileSync).toHaveBeenNthCalledWith(2, "git", ["fetch", "--unshallow"], gitOptions);
  });

  it("does nothing for a full clone", () => {
    vi.mocked(execFileSync).mockReturnValueOnce("false\n");

    expect(ensureFullHistory()).toBe(false);
    expect(execFileSync).toHaveBeenCalledTimes(1);
  });

  it("isShallow reads rev-parse output", () => {
    vi.mocked(execFileSync).mockReturnValueOnce("false\n");
    expect(isShallow()).toBe(false);
  });
});

describe("hasChanges", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("limits status to the given path", () => {
    vi.mocked(execFileSync).mockReturnValueOnce("");

    expect(hasChanges("index.json")).toBe(false);
    expect(execFileSync).toHaveBeenCalledWith("git", ["status", "--porcelain", "--", "index.json"], gitOptions);
  });

  it("reports a modified file", () => {
    vi.mocked(execFileSync).mockReturnValueOnce(" M index.json\n");
    expect(hasChanges("index.json")).toBe(true);
  });

  it("reports an untracked file", () => {
    vi.mocked(execFileSync).mockReturnValueOnce("?? index.json\n");
    expect(hasChanges("index.json")).toBe(true);
  });
});

describe("commitFile", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("stages and commits only the given path", () => {
    vi.mocked(execFileSync).mockReturnValue("");

    commitFile("index.json", COMMIT_MESSAGE);

    expect(execFileSync).toHaveBeenCalledTimes(2);
    expect(execFileSync).toHaveBeenNthCalledWith(1, "git", ["add", "--", "index.json"], gitOptions);
    expect(execFileSync).toHaveBeenNthCalledWith(
      2,
      "git",
      ["commit", "-m", "chore(index): refresh via HTML parser", "--", "index.json"],
      gitOptions,
    );
  });

  it("does not commit when staging fails", () => {
    vi.mocked(execFileSync).mockImplementationOnce(() => {
      throw new Error("Command failed: git add");
    });

    expect(() => commitFile("index.json", COMMIT_MESSAGE)).toThrow("Command failed: git add");
    expect(execFileSync).toHaveBeenCalledTimes(1);
  });
});

describe("undoLastCommit", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("soft-resets one commit so the changes stay staged", () => {
    vi.mocked(execFileSync).mockReturnValueOnce("");

    undoLastCommit();

    expect(execFileSync).toHaveBeenCalledTimes(1);
    expect(execFileSync).toHaveBeenCalledWith("git", ["reset", "--soft", "HEAD~1"], gitOptions);
  });
});
