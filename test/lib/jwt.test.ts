import { describe, it, expect } from "vitest";
import jwt from "jsonwebtoken";
import { getTokenFromRequest, signToken, verifyToken } from "../../src/lib/jwt.js";

const SECRET = "test-secret";

describe("jwt", () => {
  it("round-trips the subject", () => {
    const payload = verifyToken(signToken("alice", SECRET), SECRET);
    expect(payload?.sub).toBe("alice");
  });

  it("returns null for a wrong secret", () => {
    expect(verifyToken(signToken("alice", SECRET), "other-secret")).toBeNull();
  });

  it("returns null when the token has no subject", () => {
    const token = jwt.sign({ role: "keeper" }, SECRET);
    expect(verifyToken(token, SECRET)).toBeNull();
  });

  it("returns null for expired tokens", () => {
    const token = jwt.sign({ sub: "alice", exp: Math.floor(Date.now() / 1000) - 10 }, SECRET);
    expect(verifyToken(token, SECRET)).toBeNull();
  });

  it("extracts bearer tokens", () => {
    expect(getTokenFromRequest("Bearer abc")).toBe("abc");
    expect(getTokenFromRequest("bearer abc")).toBe("abc");
    expect(getTokenFromRequest("Basic abc")).toBeNull();
    expect(getTokenFromRequest(undefined)).toBeNull();
  });
});
