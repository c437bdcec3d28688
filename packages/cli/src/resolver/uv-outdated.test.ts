// pattern: Imperative Shell
import { chmod, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import pino from "pino";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { fetchOutdatedReport, parseOutdatedReport } from "./uv-outdated.js";

const logger = pino({ level: "silent" });

describe("parseOutdatedReport", () => {
  it("indexes entries by canonical name", () => {
    const report = parseOutdatedReport(
      JSON.stringify([
        {
          name: "Django",
          version: "4.2.0",
          latest_version: "5.1.2",
          latest_filetype: "wheel",
        },
      ])
    );

    expect(report).toEqual({
      available: true,
      packages: new Map([
        [
          "django",
          { name: "django", version: "4.2.0", latestVersion: "5.1.2" },
        ],
      ]),
    });
  });

  it("treats empty output as nothing outdated", () => {
    expect(parseOutdatedReport("  \n")).toEqual({
      available: true,
      packages: new Map(),
    });
  });

  it("reports malformed JSON as unavailable", () => {
    const report = parseOutdatedReport("not json");

    expect(report.available).toBe(false);
  });

  it("reports entries missing fields as unavailable", () => {
    expect(parseOutdatedReport('[{"name": "x", "version": "1"}]')).toEqual({
      available: false,
      reason:
        "unexpected uv output: /0: must have required property 'latest_version'",
    });
  });
});

describe("fetchOutdatedReport", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "lockdrift-resolver-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function fakeUv(script: string): Promise<string> {
    const uvPath = join(tempDir, "fake-uv");
    await writeFile(uvPath, `#!/bin/sh\n${script}\n`);
    await chmod(uvPath, 0o755);
    return uvPath;
  }

  it("runs uv pip list with VIRTUAL_ENV cleared", async () => {
    const uvBin = await fakeUv(
      [
        'if [ "$*" = "pip list --outdated --format=json" ] && [ -z "$VIRTUAL_ENV" ]; then',
        `  echo '[{"name":"Requests","version":"2.0.0","latest_version":"2.32.3"}]'`,
        "else",
        "  exit 9",
        "fi",
      ].join("\n")
    );

    const report = await fetchOutdatedReport(tempDir, logger, uvBin);

    expect(report).toEqual({
      available: true,
      packages: new Map([
        [
          "requests",
          { name: "requests", version: "2.0.0", latestVersion: "2.32.3" },
        ],
      ]),
    });
  });

  it("reports a nonzero exit as unavailable", async () => {
    const uvBin = await fakeUv('echo "No virtual environment found" >&2\nexit 2');

    expect(await fetchOutdatedReport(tempDir, logger, uvBin)).toEqual({
      available: false,
      reason: "No virtual environment found",
    });
  });

  it("reports a missing uv executable as unavailable", async () => {
    const report = await fetchOutdatedReport(
      tempDir,
      logger,
      join(tempDir, "missing-uv")
    );

    expect(report.available).toBe(false);
  });
});
