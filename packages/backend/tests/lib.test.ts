import { describe, it, expect, vi, afterEach } from "vitest";
import jwt from "jsonwebtoken";
import { decodeBase64, keyFingerprint, pairKeyFor } from "../src/lib/crypto.js";
import { generateInviteCode } from "../src/lib/codes.js";
import { retryAfterSeconds } from "../src/services/rate-limit.js";
import { generateToken, tokenLifetime } from "../src/middleware/auth.js";
import { config } from "../src/config.js";

vi.mock("../src/db/connection.js", async () => {
  const { createTestDb } = await import("./helpers/db.js");
  return createTestDb();
});

describe("pairKeyFor", () => {
  it("should not depend on argument order", () => {
    const a = "11111111-1111-4111-8111-111111111111";
    const b = "22222222-2222-4222-8222-222222222222";

    expect(pairKeyFor(a, b)).toBe(pairKeyFor(b, a));
    expect(pairKeyFor(a, b)).toHaveLength(64);
  });
});

describe("keyFingerprint", () => {
  it("should keep the first 16 hex characters of the digest", () => {
    expect(keyFingerprint("abc")).toBe("ba7816bf8f01cfea");
  });
});

describe("decodeBase64", () => {
  it("should decode padded base64", () => {
    expect(decodeBase64("aGVsbG8=")?.toString()).toBe("hello");
    expect(decodeBase64("aGk=")?.toString()).toBe("hi");
  });

  it("should reject empty and malformed input", () => {
    expect(decodeBase64("")).toBeNull();
    expect(decodeBase64("abc$")).toBeNull();
    expect(decodeBase64("a")).toBeNull();
    expect(decodeBase64("aGk")).toBeNull();
    expect(decodeBase64("_-8=")).toBeNull();
  });
});

describe("generateInviteCode", () => {
  it("should produce 12 uppercase url-safe characters", () => {
    expect(generateInviteCode()).toMatch(/^[A-Z0-9_-]{12}$/);
  });
});

describe("retryAfterSeconds", () => {
  const now = new Date("2026-01-01T00:00:10Z");

  it("should count down to when the oldest message leaves the window", () => {
    expect(retryAfterSeconds(new Date("2026-01-01T00:00:05.500Z"), 10_000, now)).toBe(6);
  });

  it("should never ask for less than a second", () => {
    expect(retryAfterSeconds(new Date("2026-01-01T00:00:00Z"), 10_000, now)).toBe(1);
    expect(retryAfterSeconds(null, 60_000, now)).toBe(60);
  });
});

describe("token lifetime", () => {
  const payload = { userId: "11111111-1111-4111-8111-111111111111", username: "alice" };
  const defaultExpiry = config.jwt.expiry;

  afterEach(() => {
    config.jwt.expiry = defaultExpiry;
  });

  it("should read a bare number as seconds", () => {
    expect(tokenLifetime("3600")).toBe(3600);
  });

  it("should pass any other value through as a duration", () => {
    expect(tokenLifetime("1.5h")).toBe("1.5h");
  });

  it.each([
    ["1.5h", 5400],
    ["2 days", 172_800],
    ["10 minutes", 600],
    ["1y", 31_557_600],
    ["900", 900],
  ])("should sign tokens that live for %s", (expiry, lifetime) => {
    config.jwt.expiry = expiry;

    const decoded = jwt.decode(generateToken(payload));
    if (decoded === null || typeof decoded === "string") throw new Error("expected a payload");

    expect(decoded.userId).toBe(payload.userId);
    expect((decoded.exp ?? 0) - (decoded.iat ?? 0)).toBe(lifetime);
  });

  it("should refuse to sign with an unreadable duration", () => {
    config.jwt.expiry = "soon";

    expect(() => generateToken(payload)).toThrow();
  });
});
