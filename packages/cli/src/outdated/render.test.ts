// pattern: Unit Test
import { Chalk } from "chalk";
import { describe, expect, it } from "vitest";

import { canonicalizeName } from "../python/names.js";

import {
  renderEmptyResult,
  renderOutdatedJson,
  renderOutdatedReport,
  sectionRows,
  tableHeaders,
} from "./render.js";

import type { DescribedEntry, OutdatedCheckResult } from "./types.js";

const paint = new Chalk({ level: 0 });

function entry(
  overrides: Omit<Partial<DescribedEntry>, "name"> & { name: string }
): DescribedEntry {
  return {
    current: "1.0",
    latest: "2.0",
    isDirect: true,
    latestStatus: "upgradable",
    constraint: null,
    dependents: [],
    summary: "",
    ...overrides,
    name: canonicalizeName(overrides.name),
  };
}

const a = entry({ name: "a", summary: "Package a" });
const b = entry({
  name: "b",
  latest: "1.1",
  isDirect: false,
  latestStatus: "constrained",
  constraint: "<1.1",
  dependents: [canonicalizeName("a")],
});

function result(overrides: Partial<OutdatedCheckResult>): OutdatedCheckResult {
  return {
    projectDir: "/work/demo",
    lockedPackageCount: 2,
    outdatedKnown: true,
    checkedCount: 2,
    metadataAvailable: false,
    entries: [],
    sections: [],
    ...overrides,
  };
}

describe("tableHeaders", () => {
  it("adds Constraint and Dependents when showing why", () => {
    expect(tableHeaders(true)).toEqual([
      "Package",
      "Current",
      "Latest",
      "Constraint",
      "Dependents",
      "Description",
    ]);
    expect(tableHeaders(false)).toEqual([
      "Package",
      "Current",
      "Latest",
      "Description",
    ]);
  });
});

describe("sectionRows", () => {
  const options = { showHeaders: false, showWhy: true, paint };

  it("produces one row per entry in the main group", () => {
    expect(sectionRows({ group: "", entries: [a, b] }, options)).toEqual([
      ["a", "1.0", "2.0", "", "", "Package a"],
      ["b", "1.0", "1.1", "<1.1", "a", ""],
    ]);
  });

  it("titles named groups and drops why columns when asked", () => {
    expect(
      sectionRows(
        { group: "dev", entries: [a] },
        { ...options, showWhy: false }
      )
    ).toEqual([
      ["[group:dev]", "", "", ""],
      ["a", "1.0", "2.0", "Package a"],
    ]);
  });

  it("lays out ancestor buckets with indented members", () => {
    expect(
      sectionRows(
        {
          group: "",
          entries: [a, b],
          ancestorBuckets: [
            { kind: "unknown", members: [b] },
            { kind: "ancestor", ancestor: "a", head: a, members: [b] },
            { kind: "ancestor", ancestor: "c", head: null, members: [b] },
            { kind: "lone", entry: a },
          ],
        },
        { ...options, showWhy: false }
      )
    ).toEqual([
      ["Unknown ancestor", "", "", ""],
      ["  b", "1.0", "1.1", ""],
      ["a", "1.0", "2.0", "Package a"],
      ["  b", "1.0", "1.1", ""],
      ["c", "", "", ""],
      ["  b", "1.0", "1.1", ""],
      ["a", "1.0", "2.0", "Package a"],
    ]);
  });
});

describe("renderEmptyResult", () => {
  it("explains that uv could not be asked", () => {
    expect(renderEmptyResult(result({ outdatedKnown: false }), paint)).toBe(
      [
        "No outdated packages found.",
        "Note: Could not check for outdated packages (no virtual environment).",
        "Total packages in uv.lock: 2",
      ].join("\n")
    );
  });

  it("reports totals when uv answered", () => {
    expect(renderEmptyResult(result({ checkedCount: 0 }), paint)).toBe(
      [
        "No outdated packages found.",
        "Total packages: 2",
        "Checked 0 packages for updates",
      ].join("\n")
    );
  });
});

describe("renderOutdatedReport", () => {
  it("renders the empty message when nothing is outdated", () => {
    expect(
      renderOutdatedReport(result({}), { showHeaders: true, showWhy: true, paint })
    ).toBe(renderEmptyResult(result({}), paint));
  });

  it("renders headers, rows and group titles", () => {
    const output = renderOutdatedReport(
      result({
        entries: [a, b],
        sections: [
          { group: "", entries: [a] },
          { group: "dev", entries: [b] },
        ],
      }),
      { showHeaders: true, showWhy: false, paint }
    );
    const lines = output.split("\n");

    expect(lines.some(line => /^Package\s+Current\s+Latest\s+Description/.test(line))).toBe(
      true
    );
    expect(lines.some(line => /^a\s+1\.0\s+2\.0\s+Package a/.test(line))).toBe(true);
    expect(lines.some(line => line.startsWith("[group:dev]"))).toBe(true);
    expect(lines.some(line => /^b\s+1\.0\s+1\.1/.test(line))).toBe(true);
  });
});

describe("renderOutdatedJson", () => {
  it("lists packages per group with the main group as null", () => {
    const parsed: unknown = JSON.parse(
      renderOutdatedJson(
        result({
          entries: [a, b],
          sections: [
            { group: "", entries: [a] },
            { group: "dev", entries: [b] },
          ],
        })
      )
    );

    expect(parsed).toEqual({
      projectDir: "/work/demo",
      lockedPackageCount: 2,
      outdatedKnown: true,
      checkedCount: 2,
      metadataAvailable: false,
      groups: [
        { group: null, packages: [{ ...a }] },
        { group: "dev", packages: [{ ...b }] },
      ],
    });
  });
});
