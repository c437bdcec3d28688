import { describe, expect, it } from "vitest";

import { canonicalizeExtra, canonicalizeName } from "./names.js";

describe("canonicalizeName", () => {
  it("lowercases and collapses separator runs", () => {
    expect(canonicalizeName("Django")).toBe("django");
    expect(canonicalizeName("DJANGO.CORS.HEADERS")).toBe("django-cors-headers");
    expect(canonicalizeName("django_cors__headers")).toBe("django-cors-headers");
    expect(canonicalizeName("Django-._CORS-Headers")).toBe("django-cors-headers");
  });

  it("is idempotent", () => {
    for (const raw of ["Foo.Bar_baz", "zope.interface", "A--B", "ruamel.yaml.clib"]) {
      const once = canonicalizeName(raw);
      expect(canonicalizeName(once)).toBe(once);
    }
  });

  it("trims surrounding whitespace", () => {
    expect(canonicalizeName("  Requests ")).toBe("requests");
  });
});

describe("canonicalizeExtra", () => {
  it("normalizes extra names like package names", () => {
    expect(canonicalizeExtra("Socks_Proxy")).toBe("socks-proxy");
  });
});
