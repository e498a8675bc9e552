import jwt from "jsonwebtoken";
import { describe, expect, it } from "vitest";
import { issueCsrfToken, verifyCsrfToken } from "../csrf";

const SECRET = "test-csrf-secret-value";

describe("csrf tokens", () => {
  it("verifies a token for the session it was issued to", () => {
    const token = issueCsrfToken("session-1", SECRET, 60);
    expect(verifyCsrfToken(token, "session-1", SECRET)).toBe(true);
  });

  it("rejects the token for any other session", () => {
    const token = issueCsrfToken("session-1", SECRET, 60);
    expect(verifyCsrfToken(token, "session-2", SECRET)).toBe(false);
  });

  it("rejects a token signed with another secret", () => {
    const token = issueCsrfToken("session-1", "another-test-secret", 60);
    expect(verifyCsrfToken(token, "session-1", SECRET)).toBe(false);
  });

  it("rejects an expired token", () => {
    const token = jwt.sign({ sid: "session-1", purpose: "csrf", exp: Math.floor(Date.now() / 1000) - 10 }, SECRET);
    expect(verifyCsrfToken(token, "session-1", SECRET)).toBe(false);
  });

  it("rejects a signed token minted for another purpose", () => {
    const token = jwt.sign({ sid: "session-1", purpose: "login" }, SECRET);
    expect(verifyCsrfToken(token, "session-1", SECRET)).toBe(false);
  });

  it("rejects garbage", () => {
    expect(verifyCsrfToken("not-a-token", "session-1", SECRET)).toBe(false);
  });
});
