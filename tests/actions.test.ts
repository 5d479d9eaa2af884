import { describe, it, expect } from "vitest";
import { defaultAction, findAction, hackActions, type Action, type ActionList } from "../plugins/lib/actions.ts";

// ── Helpers ───────────────────────────────────────────────────────────────────

const open: Action<string> = () => {};
const openOther: Action<string> = () => {};
const grep: Action<string> = () => {};
const projectGrep: Action<string> = () => {};
const dired: Action<string> = () => {};

const generic: ActionList<string> = [
  ["Find file", open],
  ["Find file other window", openOther],
  ["Grep files", grep],
];

const descriptions = (list: ActionList<string>): string[] => list.map(([d]) => d);

// ── Tests ─────────────────────────────────────────────────────────────────────

describe("hackActions", () => {
  it("deletes an action given on its own", () => {
    const result = hackActions(generic, openOther);

    expect(result).toEqual([
      ["Find file", open],
      ["Grep files", grep],
    ]);
  });

  it("substitutes an action and keeps its description", () => {
    const result = hackActions(generic, [grep, projectGrep]);

    expect(result[2]).toEqual(["Grep files", projectGrep]);
  });

  it("renames an action", () => {
    const result = hackActions(generic, [grep, "Grep in projects `C-s'"]);

    expect(descriptions(result)).toEqual(["Find file", "Find file other window", "Grep in projects `C-s'"]);
    expect(result[2][1]).toBe(grep);
  });

  it("substitutes and renames the same entry by its original action", () => {
    const result = hackActions(generic, [grep, projectGrep], [grep, "Grep in projects"]);

    expect(result[2]).toEqual(["Grep in projects", projectGrep]);
  });

  it("appends required actions in order", () => {
    const result = hackActions(generic, ["Open Dired `C-c d'", dired], ["Find file again", open]);

    expect(descriptions(result)).toEqual([
      "Find file",
      "Find file other window",
      "Grep files",
      "Open Dired `C-c d'",
    ]);
    expect(result[3][1]).toBe(dired);
  });

  it("does not append a required action a substitution already put in", () => {
    const result = hackActions(generic, [grep, projectGrep], ["Grep project", projectGrep]);

    expect(result).toHaveLength(3);
  });

  it("leaves the input list untouched", () => {
    hackActions(generic, open, [grep, "Renamed"], ["Dired", dired]);

    expect(descriptions(generic)).toEqual(["Find file", "Find file other window", "Grep files"]);
    expect(generic[0][1]).toBe(open);
  });

  it("returns a copy when there is nothing to do", () => {
    const result = hackActions(generic);

    expect(result).toEqual(generic);
    expect(result).not.toBe(generic);
  });
});

describe("defaultAction", () => {
  it("is the first action", () => {
    expect(defaultAction(generic)).toBe(open);
  });

  it("is null for an empty list", () => {
    expect(defaultAction<string>([])).toBeNull();
  });
});

describe("findAction", () => {
  it("finds an action by description", () => {
    expect(findAction(generic, "Grep files")).toBe(grep);
    expect(findAction(generic, "Missing")).toBeNull();
  });
});
