import { describe, it, expect } from "vitest";
import { sha256Bytes, sha256String } from "../src/shared/hash.js";

describe("SHA-256 Hashing", () => {
  it("sha256Bytes produces consistent 64-char hex for same input", () => {
    const bytes = new TextEncoder().encode("hello world");
    const h1 = sha256Bytes(bytes);
    expect(sha256Bytes(bytes)).toBe(h1);
    expect(h1).toMatch(/^[a-f0-9]{64}$/);
  });

  it("sha256Bytes produces known hash for empty input", () => {
    expect(sha256Bytes(new Uint8Array(0))).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });

  it("sha256String hashes UTF-8 strings", () => {
    expect(sha256String("test")).toBe("9f86d081884c7d659a2feaa0c55ad015a3bf4f1b2b0b822cd15d6c15b0f00a08");
  });

  it("sha256String agrees with sha256Bytes over the UTF-8 encoding", () => {
    const s = "Grüße {{name}}";
    expect(sha256String(s)).toBe(sha256Bytes(new TextEncoder().encode(s)));
  });
});
