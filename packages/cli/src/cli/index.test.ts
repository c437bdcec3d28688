// pattern: Unit Test
import { describe, expect, it } from "vitest";

import {
  getDefaultLogLevel,
  isNonInteractive,
  parseLogFormat,
  parseLogLevel,
  rootCommand,
} from "./index.js";

describe("parseLogLevel", () => {
  it("accepts known levels", () => {
    expect(parseLogLevel("debug")).toBe("debug");
  });

  it("rejects unknown levels", () => {
    expect(() => parseLogLevel("verbose")).toThrow(
      "Invalid log level: verbose. Valid levels are: error, warn, info, debug, trace"
    );
  });
});

describe("parseLogFormat", () => {
  it("accepts nice and json", () => {
    expect(parseLogFormat("nice")).toBe("nice");
    expect(parseLogFormat("json")).toBe("json");
  });

  it("rejects other formats", () => {
    expect(() => parseLogFormat("xml")).toThrow(
      "Invalid log format: xml. Valid formats are: nice, json"
    );
  });
});

describe("environment defaults", () => {
  it("reads the log level from LOCKDRIFT_LOG_LEVEL", () => {
    expect(getDefaultLogLevel({ LOCKDRIFT_LOG_LEVEL: "trace" })).toBe("trace");
    expect(getDefaultLogLevel({ LOCKDRIFT_LOG_LEVEL: "loud" })).toBe("info");
    expect(getDefaultLogLevel({})).toBe("info");
  });

  it("is non-interactive without a TTY or when forced", () => {
    expect(isNonInteractive({}, false)).toBe(true);
    expect(isNonInteractive({ LOCKDRIFT_NON_INTERACTIVE: "1" }, true)).toBe(true);
    expect(isNonInteractive({}, true)).toBe(false);
  });
});

describe("rootCommand", () => {
  it("runs outdated by default", () => {
    expect(rootCommand.name()).toBe("lockdrift");
    expect(rootCommand.commands.map(command => command.name())).toEqual([
      "outdated",
    ]);
  });
});
