// pattern: Unit Test
import { describe, expect, it } from "vitest";

import { CLI_LOGGER, initializeLogger, setCliLogLevel } from "./instance.js";

describe("CLI_LOGGER", () => {
  it("refuses to log before initialization", () => {
    expect(() => CLI_LOGGER.info("too early")).toThrow(
      "CLI logger used before initializeLogger()"
    );
    expect(() => setCliLogLevel("debug")).toThrow(
      "CLI logger used before initializeLogger()"
    );
  });

  it("follows the installed logger and its level", () => {
    initializeLogger("json", true);
    setCliLogLevel("warn");

    expect(CLI_LOGGER.level).toBe("warn");
    expect(CLI_LOGGER.isLevelEnabled("info")).toBe(false);
    expect(CLI_LOGGER.isLevelEnabled("error")).toBe(true);
  });
});
