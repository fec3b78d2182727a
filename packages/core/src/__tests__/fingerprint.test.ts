import { describe, it, expect } from "vitest";
import { computeFingerprint } from "../cache/fingerprint.js";
import { canonicalJson } from "../utils/canonical-json.js";

describe("canonicalJson", () => {
  it("sorts keys recursively", () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { f: 1, e: 0 }], c: "x" } })).toBe(
      '{"a":{"c":"x","d":[2,{"e":0,"f":1}]},"b":1}',
    );
  });

  it("drops undefined members and maps non-finite numbers to null", () => {
    expect(canonicalJson({ a: undefined, b: NaN, c: null })).toBe('{"b":null,"c":null}');
  });

  it("serializes dates as ISO strings", () => {
    expect(canonicalJson({ at: new Date(0) })).toBe('{"at":"1970-01-01T00:00:00.000Z"}');
  });
});

describe("computeFingerprint", () => {
  it("ignores argument key order", () => {
    const a = computeFingerprint("get_file_contents", { repo: "octo/demo", path: "README.md", branch: "main" });
    const b = computeFingerprint("get_file_contents", { branch: "main", path: "README.md", repo: "octo/demo" });
    expect(a).toBe(b);
  });

  it("is a sha256 hex digest", () => {
    expect(computeFingerprint("get_repository", { repo: "octo/demo" })).toMatch(/^[0-9a-f]{64}$/);
  });

  it("differs by tool id and by argument value", () => {
    const base = computeFingerprint("list_branches", { repo: "octo/demo" });
    expect(computeFingerprint("get_repository", { repo: "octo/demo" })).not.toBe(base);
    expect(computeFingerprint("list_branches", { repo: "octo/other" })).not.toBe(base);
  });
});
