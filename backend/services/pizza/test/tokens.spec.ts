// backend/services/pizza/test/tokens.spec.ts
import { describe, it, expect, vi } from "vitest";
import bcrypt from "bcrypt";
import jwt from "jsonwebtoken";
import {
  issueAccessToken,
  issueRefreshToken,
  verifyAccessToken,
  verifyRefreshToken,
} from "../src/security/tokens";
import { hashPassword, verifyPassword } from "../src/security/password";

const SUBJECT = "mario@example.com";

describe("tokens", () => {
  it("access tokens verify back to their subject", () => {
    expect(verifyAccessToken(issueAccessToken(SUBJECT))).toBe(SUBJECT);
  });

  it("refresh tokens verify only as refresh tokens", () => {
    const refresh = issueRefreshToken(SUBJECT);
    expect(verifyRefreshToken(refresh)).toBe(SUBJECT);
    expect(verifyAccessToken(refresh)).toBeNull();
    expect(verifyRefreshToken(issueAccessToken(SUBJECT))).toBeNull();
  });

  it("rejects a token with the wrong typ claim even under the right secret", () => {
    const token = jwt.sign({ typ: "refresh" }, "test-secret", { subject: SUBJECT });
    expect(verifyAccessToken(token)).toBeNull();
  });

  it("rejects an expired token", () => {
    const exp = Math.floor(Date.now() / 1000) - 60;
    const token = jwt.sign({ typ: "access", sub: SUBJECT, exp }, "test-secret");
    expect(verifyAccessToken(token)).toBeNull();
  });

  it("rejects a token without a subject", () => {
    const token = jwt.sign({ typ: "access" }, "test-secret");
    expect(verifyAccessToken(token)).toBeNull();
  });

  it("rejects garbage", () => {
    expect(verifyAccessToken("a.b.c")).toBeNull();
  });
});

describe("passwords", () => {
  it("hashes with a salt and verifies", async () => {
    const a = await hashPassword("secret1");
    const b = await hashPassword("secret1");
    expect(a).not.toBe("secret1");
    expect(a).not.toBe(b);
    expect(await verifyPassword("secret1", a)).toBe(true);
    expect(await verifyPassword("secret2", a)).toBe(false);
  });

  it("an unknown user costs one compare and never matches", async () => {
    const compare = vi.spyOn(bcrypt, "compare");
    try {
      expect(await verifyPassword("secret1", null)).toBe(false);
      expect(compare).toHaveBeenCalledTimes(1);
    } finally {
      compare.mockRestore();
    }
  });
});
