import { describe, it, expect } from "vitest";
import {
  sha256Bytes,
  sha256String,
  contentHash,
  canonicalJsonStringify,
  merkleRoot,
} from "../src/shared/hash.js";

describe("SHA-256 Hashing", () => {
  it("sha256Bytes produces known hash for known input", () => {
    // SHA-256 of empty string
    const empty = sha256Bytes(Buffer.from(""));
    expect(empty).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
  });

  it("sha256String hashes UTF-8 strings", () => {
    expect(sha256String("test")).toBe(
      "9f86d081884c7d659a2feaa0c55ad015a3bf4f1b2b0b822cd15d6c15b0f00a08"
    );
  });

  it("hashes a file buffer and its text the same way", () => {
    const text = "timestamp,height\n2020-10-01T00:00:00Z,20\n";
    expect(sha256Bytes(Buffer.from(text, "utf-8"))).toBe(sha256String(text));
  });
});

describe("Canonical JSON", () => {
  it("sorts keys at all nesting levels", () => {
    const obj = { z: { b: 2, a: 1 }, a: [{ y: 1, x: 2 }] };
    expect(canonicalJsonStringify(obj)).toBe('{"a":[{"x":2,"y":1}],"z":{"a":1,"b":2}}');
  });

  it("writes dates as ISO strings", () => {
    const reading = { timestamp: new Date(Date.UTC(2020, 9, 3, 14, 30)), height: 22.5 };
    expect(canonicalJsonStringify(reading)).toBe(
      '{"height":22.5,"timestamp":"2020-10-03T14:30:00.000Z"}'
    );
  });

  it("drops undefined properties", () => {
    expect(canonicalJsonStringify({ a: 1, floorHeight: undefined })).toBe('{"a":1}');
  });
});

describe("Content Hash", () => {
  it("produces consistent hash regardless of key order", () => {
    expect(contentHash({ a: 1, b: 2 })).toBe(contentHash({ b: 2, a: 1 }));
  });

  it("distinguishes summaries that differ in one count", () => {
    expect(contentHash({ truePositives: 1 })).not.toBe(contentHash({ truePositives: 2 }));
  });
});

describe("Merkle Root", () => {
  it("returns hash of empty string for empty array", () => {
    expect(merkleRoot([])).toBe(sha256String(""));
  });

  it("returns the single hash for array of one", () => {
    const hash = sha256String("only");
    expect(merkleRoot([hash])).toBe(hash);
  });

  it("combines two hashes into a root", () => {
    const h1 = sha256String("a");
    const h2 = sha256String("b");
    expect(merkleRoot([h1, h2])).toBe(sha256String(h1 + h2));
  });

  it("handles odd number of hashes by duplicating last", () => {
    const h1 = sha256String("a");
    const h2 = sha256String("b");
    const h3 = sha256String("c");
    const expected = sha256String(sha256String(h1 + h2) + sha256String(h3 + h3));
    expect(merkleRoot([h1, h2, h3])).toBe(expected);
  });
});
