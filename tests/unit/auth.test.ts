import jwt from "jsonwebtoken";
import { describe, expect, it } from "vitest";
import {
  hashPassword,
  signOAuthState,
  signToken,
  verifyOAuthState,
  verifyPassword,
  verifyToken,
} from "../../server/auth";

describe("passwords", () => {
  it("verifies the original password only", () => {
    const hash = hashPassword("correct horse");
    expect(hash).not.toBe("correct horse");
    expect(verifyPassword("correct horse", hash)).toBe(true);
    expect(verifyPassword("wrong horse", hash)).toBe(false);
  });
});

describe("tokens", () => {
  it("round-trips the identity", () => {
    const token = signToken({ userId: "user-1", email: "ada@example.com" });
    expect(verifyToken(token)).toEqual({ userId: "user-1", email: "ada@example.com" });
  });

  it("rejects a token signed with another secret", () => {
    const token = jwt.sign({ userId: "user-1", email: "ada@example.com" }, "another-secret-entirely");
    expect(() => verifyToken(token)).toThrow();
  });

  it("rejects a payload without a user id", () => {
    const token = jwt.sign({ email: "ada@example.com" }, "test-secret-key-for-testing-only");
    expect(() => verifyToken(token)).toThrow("Invalid token payload shape");
  });

  it("rejects an expired token", () => {
    const token = signToken({ userId: "user-1", email: "ada@example.com" }, -60);
    expect(() => verifyToken(token)).toThrow();
  });
});

describe("OAuth state", () => {
  it("is bound to its provider", () => {
    const state = signOAuthState("google");
    expect(verifyOAuthState(state, "google")).toBe(true);
    expect(verifyOAuthState(state, "github")).toBe(false);
  });

  it("rejects garbage", () => {
    expect(verifyOAuthState("not-a-token", "google")).toBe(false);
  });
});
