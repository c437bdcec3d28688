// pattern: Unit Test
import { describe, expect, it } from "vitest";

import {
  hasEnvironmentMarker,
  markerExtras,
  parseRequirement,
} from "./requirement.js";

describe("parseRequirement", () => {
  it("parses name, extras, specifier and marker", () => {
    const requirement = parseRequirement(
      'Requests[Socks, security]>=2.31, <3 ; python_version >= "3.9"'
    );

    expect(requirement.name).toBe("requests");
    expect(requirement.rawName).toBe("Requests");
    expect(requirement.extras).toEqual(["socks", "security"]);
    expect(requirement.specifier).toBe(">=2.31,<3");
    expect(requirement.marker).toBe('python_version >= "3.9"');
  });

  it("accepts parenthesised specifiers", () => {
    expect(parseRequirement("zope.interface (>=5.0)").specifier).toBe(">=5.0");
    expect(parseRequirement("zope.interface (>=5.0)").name).toBe(
      "zope-interface"
    );
  });

  it("reads a bare name as unconstrained", () => {
    const requirement = parseRequirement("flask");

    expect(requirement.specifier).toBe("");
    expect(requirement.marker).toBeNull();
    expect(requirement.extras).toEqual([]);
  });

  it("drops the URL of a direct reference but keeps its marker", () => {
    const requirement = parseRequirement(
      "mylib @ https://example.invalid/mylib-1.0.tar.gz ; sys_platform == 'linux'"
    );

    expect(requirement.name).toBe("mylib");
    expect(requirement.specifier).toBe("");
    expect(requirement.marker).toBe("sys_platform == 'linux'");
  });

  it("falls back to the leading name for unreadable input", () => {
    const requirement = parseRequirement("-weird_thing>=1");

    expect(requirement.name).toBe("-weird-thing");
    expect(requirement.specifier).toBe("");
  });
});

describe("markerExtras", () => {
  it("collects extras named on either side of the comparison", () => {
    const requirement = parseRequirement(
      "pysocks>=1.5; extra == 'Socks_Proxy' or \"cli\" == extra"
    );

    expect(markerExtras(requirement)).toEqual(["socks-proxy", "cli"]);
  });

  it("returns nothing for unconditional requirements", () => {
    expect(markerExtras(parseRequirement("idna>=2.5"))).toEqual([]);
    expect(
      markerExtras(parseRequirement('idna; python_version < "3.10"'))
    ).toEqual([]);
  });
});

describe("hasEnvironmentMarker", () => {
  it("is false without a marker or with extra conditions only", () => {
    expect(hasEnvironmentMarker(parseRequirement("idna>=2.5"))).toBe(false);
    expect(
      hasEnvironmentMarker(
        parseRequirement("pysocks>=1.5; extra == 'socks' or (\"cli\" == extra)")
      )
    ).toBe(false);
  });

  it("is true when the marker tests the environment", () => {
    expect(
      hasEnvironmentMarker(parseRequirement('numpy<1.27; python_version < "3.12"'))
    ).toBe(true);
    expect(
      hasEnvironmentMarker({
        marker: "extra == 'gpu' and sys_platform == 'linux'",
      })
    ).toBe(true);
  });
});
