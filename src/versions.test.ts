import { describe, expect, it } from "vitest";
import {
  compareVersions,
  isBranch,
  isFullVersion,
  latestForBranch,
  resolveVersion,
  summarizeBranches,
} from "./versions.js";

const index = {
  "3.12.9": "https://example.com/cpython-3.12.9.tar.gz",
  "3.12.10": "https://example.com/cpython-3.12.10.tar.gz",
  "3.11.12": "https://example.com/cpython-3.11.12.tar.gz",
  "3.9.22": "https://example.com/cpython-3.9.22.tar.gz",
};

describe("isBranch / isFullVersion", () => {
  it("recognizes X.Y branches", () => {
    expect(isBranch("3.12")).toBe(true);
    expect(isBranch("3.12.1")).toBe(false);
    expect(isBranch("3")).toBe(false);
  });

  it("recognizes X.Y.Z versions", () => {
    expect(isFullVersion("3.12.10")).toBe(true);
    expect(isFullVersion("3.12")).toBe(false);
    expect(isFullVersion("3.12.1rc1")).toBe(false);
  });
});

describe("compareVersions", () => {
  it("compares numerically, not lexically", () => {
    expect(compareVersions("3.12.10", "3.12.9")).toBeGreaterThan(0);
    expect(compareVersions("3.9.22", "3.10.0")).toBeLessThan(0);
  });

  it("treats missing components as zero", () => {
    expect(compareVersions("3.12", "3.12.0")).toBe(0);
  });
});

describe("latestForBranch", () => {
  it("picks the newest patch release", () => {
    expect(latestForBranch(index, "3.12")).toBe("3.12.10");
  });

  it("does not match a longer minor with the same prefix", () => {
    expect(latestForBranch({ "3.1.5": "a", "3.12.0": "b" }, "3.1")).toBe("3.1.5");
  });

  it("returns null for an unknown branch", () => {
    expect(latestForBranch(index, "3.8")).toBeNull();
  });
});

describe("resolveVersion", () => {
  it("resolves a branch to its newest build", () => {
    expect(resolveVersion(index, "3.12")).toEqual({
      version: "3.12.10",
      url: "https://example.com/cpython-3.12.10.tar.gz",
    });
  });

  it("resolves an exact version", () => {
    expect(resolveVersion(index, "3.12.9")).toEqual({
      version: "3.12.9",
      url: "https://example.com/cpython-3.12.9.tar.gz",
    });
  });

  it("rejects malformed versions", () => {
    expect(() => resolveVersion(index, "latest")).toThrow("Version must be X.Y or X.Y.Z");
    expect(() => resolveVersion(index, "3")).toThrow("Version must be X.Y or X.Y.Z");
  });

  it("reports a branch with no builds", () => {
    expect(() => resolveVersion(index, "3.8")).toThrow("No builds for 3.8.x in index.");
  });

  it("reports a missing exact version", () => {
    expect(() => resolveVersion(index, "3.12.1")).toThrow("3.12.1 absent from index.");
  });
});

describe("summarizeBranches", () => {
  it("lists the newest version per branch, oldest branch first", () => {
    expect(summarizeBranches(index)).toEqual([
      ["3.9", "3.9.22"],
      ["3.11", "3.11.12"],
      ["3.12", "3.12.10"],
    ]);
  });

  it("returns nothing for an empty index", () => {
    expect(summarizeBranches({})).toEqual([]);
  });
});
