import { describe, it, expect } from "vitest";
import { ignoredDirectories, ignoredFiles, relativeIgnored, union } from "../plugins/lib/ignore.ts";
import { defaultSettings, type Settings } from "../plugins/lib/settings.ts";
import { FakeProjects } from "./fake_host.ts";

const root = "/work/app/";

function makeProjects(): FakeProjects {
  const projects = new FakeProjects({
    [root]: {
      ignoredFiles: ["/work/app/secret.env", "/elsewhere/x.log"],
      ignoredDirectories: ["/work/app/build/", "/work/app/node_modules/"],
    },
  });
  projects.suffixes = [".o", ".pyc"];
  return projects;
}

function makeSettings(overrides: Partial<Settings> = {}): Settings {
  return {
    ...defaultSettings(),
    grepFindIgnoredFiles: ["*.o", "*~"],
    grepFindIgnoredDirectories: [".git", "build"],
    ...overrides,
  };
}

describe("union", () => {
  it("keeps the first occurrence of each entry in order", () => {
    expect(union(["a", "b"], ["b", "c"], ["a"])).toEqual(["a", "b", "c"]);
  });

  it("is empty without lists", () => {
    expect(union()).toEqual([]);
  });
});

describe("relativeIgnored", () => {
  it("makes paths root-relative and drops the trailing slash", () => {
    expect(relativeIgnored("/r/", ["/r/a/", "/r/b.txt", "/x/"])).toEqual(["a", "b.txt", "/x"]);
  });
});

describe("ignoredFiles", () => {
  it("combines project ignores, global suffixes and the grep list", () => {
    expect(ignoredFiles(makeProjects(), root, makeSettings())).toEqual([
      "secret.env",
      "/elsewhere/x.log",
      "*.o",
      "*.pyc",
      "*~",
    ]);
  });

  it("uses only the grep list with the search-tool strategy", () => {
    expect(ignoredFiles(makeProjects(), root, makeSettings({ ignoreStrategy: "search-tool" }))).toEqual(["*.o", "*~"]);
  });
});

describe("ignoredDirectories", () => {
  it("combines project ignores and the grep list", () => {
    expect(ignoredDirectories(makeProjects(), root, makeSettings())).toEqual(["build", "node_modules", ".git"]);
  });

  it("uses only the grep list with the search-tool strategy", () => {
    expect(ignoredDirectories(makeProjects(), root, makeSettings({ ignoreStrategy: "search-tool" }))).toEqual([
      ".git",
      "build",
    ]);
  });
});
