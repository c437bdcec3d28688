// pattern: Unit Test
import { describe, expect, it } from "vitest";

import type { Lockfile } from "../lockfile/index.js";
import type { InstalledPackage } from "../metadata/types.js";
import { canonicalizeName, type PackageName } from "../python/names.js";

import { buildGraph, UNKNOWN_VERSION } from "./build-graph.js";

const name = (raw: string): PackageName => canonicalizeName(raw);

const lockfile: Lockfile = {
  version: 1,
  package: [
    {
      name: "A",
      version: "1.0",
      dependencies: ["b", { name: "C_Lib" }],
      "optional-dependencies": { socks: [{ name: "pysocks" }] },
    },
    { name: "b", version: "1.0", dependencies: [{ name: "ghost" }] },
    { name: "c-lib", version: "2.0" },
    { name: "pysocks", version: "1.7" },
    {
      name: "proj",
      "dev-dependencies": { dev: [{ name: "b" }] },
    },
  ],
};

const metadata = new Map<PackageName, InstalledPackage>([
  [
    name("a"),
    {
      name: name("a"),
      version: "1.0",
      summary: "A library",
      requiresDist: ["b>=1.0,<2", "pysocks>=1.5; extra == 'socks'"],
      providesExtra: ["socks"],
    },
  ],
]);

describe("buildGraph", () => {
  it("creates one node per lock entry keyed by canonical name", () => {
    const graph = buildGraph(lockfile, metadata);

    expect([...graph.keys()]).toEqual(["a", "b", "c-lib", "pysocks", "proj"]);
    expect(graph.get(name("proj"))?.version).toBe(UNKNOWN_VERSION);
  });

  it("takes summaries and exact requirement strings from installed metadata", () => {
    const graph = buildGraph(lockfile, metadata);
    const a = graph.get(name("a"));

    expect(a?.summary).toBe("A library");
    expect(
      a?.requires.get("")?.dependencies.map(req => [req.name, req.specifier])
    ).toEqual([
      ["b", ">=1.0,<2"],
      ["c-lib", ""],
    ]);

    const socks = a?.requires.get("socks")?.dependencies;
    expect(socks?.map(req => req.name)).toEqual(["pysocks"]);
    expect(socks?.[0]?.marker).toBe("extra == 'socks'");
  });

  it("records dependents with the group that declares the edge", () => {
    const graph = buildGraph(lockfile, metadata);

    expect(graph.get(name("b"))?.dependents).toEqual([
      { through: "", packageName: "a" },
      { through: "dev", packageName: "proj" },
    ]);
    expect(graph.get(name("pysocks"))?.dependents).toEqual([
      { through: "socks", packageName: "a" },
    ]);
  });

  it("keeps requirements on names without a lock entry but adds no node", () => {
    const graph = buildGraph(lockfile, metadata);

    expect(
      graph.get(name("b"))?.requires.get("")?.dependencies.map(req => req.name)
    ).toEqual(["ghost"]);
    expect(graph.has(name("ghost"))).toBe(false);
  });

  it("builds the same nodes without metadata, with empty summaries and bare requirements", () => {
    const graph = buildGraph(lockfile, new Map());

    expect(graph.size).toBe(5);
    for (const pkg of graph.values()) {
      expect(pkg.name.length).toBeGreaterThan(0);
      expect(pkg.version.length).toBeGreaterThan(0);
      expect(pkg.summary).toBe("");
    }
    expect(
      graph.get(name("a"))?.requires.get("")?.dependencies[0]?.specifier
    ).toBe("");
  });

  it("handles a lockfile without packages", () => {
    expect(buildGraph({ version: 1 }, new Map()).size).toBe(0);
  });
});
