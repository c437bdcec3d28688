// pattern: Unit Test
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { canonicalizeName } from "../python/names.js";
import { ConfigurationError } from "../utils/errors.js";

import { loadManifest, parseManifest } from "./pyproject.js";

const PYPROJECT = `[project]
name = "demo"
version = "0.1.0"
dependencies = [
    "Requests[socks]>=2.31",
    "click",
]

[project.optional-dependencies]
yaml = ["PyYAML>=6"]
empty = []

[dependency-groups]
dev = [
    "pytest>=8",
    "requests",
]
lint = ["ruff"]
ci = [{ include-group = "lint" }]
`;

describe("parseManifest", () => {
  it("indexes every declared dependency by canonical name", () => {
    const manifest = parseManifest(PYPROJECT, "/project/pyproject.toml");

    expect([...manifest.direct.keys()].sort()).toEqual([
      "click",
      "pytest",
      "pyyaml",
      "requests",
      "ruff",
    ]);
    expect(manifest.direct.get(canonicalizeName("PyYAML"))?.specifier).toBe(
      ">=6"
    );
  });

  it("records membership per group, allowing a name in several groups", () => {
    const { groups } = parseManifest(PYPROJECT, "/project/pyproject.toml");

    expect(groups.get("")).toEqual(new Set(["requests", "click"]));
    expect(groups.get("yaml")).toEqual(new Set(["pyyaml"]));
    expect(groups.get("dev")).toEqual(new Set(["pytest", "requests"]));
    expect(groups.get("lint")).toEqual(new Set(["ruff"]));
    expect(groups.has("empty")).toBe(false);
    expect(groups.has("ci")).toBe(false);
  });

  it("accepts a manifest without a project table", () => {
    const manifest = parseManifest(
      '[dependency-groups]\ndocs = ["mkdocs"]\n',
      "/project/pyproject.toml"
    );

    expect(manifest.groups.has("")).toBe(false);
    expect([...manifest.direct.keys()]).toEqual(["mkdocs"]);
  });

  it("rejects structurally invalid dependency lists", () => {
    expect(() =>
      parseManifest('[project]\ndependencies = "click"\n', "/project/pyproject.toml")
    ).toThrow(ConfigurationError);
  });
});

describe("loadManifest", () => {
  let projectDir: string;

  beforeEach(async () => {
    projectDir = await mkdtemp(join(tmpdir(), "lockdrift-manifest-"));
  });

  afterEach(async () => {
    await rm(projectDir, { recursive: true, force: true });
  });

  it("raises a ConfigurationError when pyproject.toml is missing", async () => {
    await expect(loadManifest(projectDir)).rejects.toThrow(
      `pyproject.toml not found in ${projectDir}`
    );
  });
});
