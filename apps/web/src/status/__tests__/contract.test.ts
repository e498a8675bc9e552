import { describe, expect, it } from "vitest";
import { encodeStatusChange, oppositeStatus, parseStatus, readStatusChangePayload } from "../contract";

describe("status contract", () => {
  it("only accepts the two statuses", () => {
    expect(parseStatus("done")).toBe("done");
    expect(parseStatus("scheduled")).toBe("scheduled");
    expect(parseStatus("cancelled")).toBeNull();
    expect(parseStatus(undefined)).toBeNull();
  });

  it("flips", () => {
    expect(oppositeStatus("done")).toBe("scheduled");
    expect(oppositeStatus("scheduled")).toBe("done");
  });

  it("encodes the form body, leaving out an empty next", () => {
    expect(encodeStatusChange({ status: "done", csrfToken: "test-csrf" })).toBe("status=done&csrf_token=test-csrf");
    expect(encodeStatusChange({ status: "scheduled", csrfToken: "a b", next: "/x?y=1" })).toBe(
      "status=scheduled&csrf_token=a+b&next=%2Fx%3Fy%3D1"
    );
  });

  it("reads JSON payloads", () => {
    expect(readStatusChangePayload('{"ok":true,"status":"done"}')).toEqual({ ok: true, status: "done" });
    expect(readStatusChangePayload('{"ok":false,"error":"not_found"}')).toEqual({ ok: false, error: "not_found" });
  });

  it("returns null for text that is not JSON", () => {
    expect(readStatusChangePayload("<html></html>")).toBeNull();
    expect(readStatusChangePayload("")).toBeNull();
  });

  it("returns an empty payload for JSON that is not an object", () => {
    expect(readStatusChangePayload("[1,2]")).toEqual({});
    expect(readStatusChangePayload("null")).toEqual({});
  });
});
