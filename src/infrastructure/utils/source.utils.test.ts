import { describe, it, expect } from "vitest";
import { isNotFoundError, joinRemote } from "./source.utils.js";

describe("isNotFoundError", () => {
  it("recognises fs, SFTP and S3 not-found errors", () => {
    expect(isNotFoundError(Object.assign(new Error("x"), { code: "ENOENT" }))).toBe(true);
    expect(isNotFoundError(Object.assign(new Error("x"), { code: 2 }))).toBe(true);
    expect(isNotFoundError(Object.assign(new Error("x"), { name: "NoSuchKey" }))).toBe(true);
    expect(isNotFoundError(new Error("_list: No such file: /101"))).toBe(true);
  });

  it("rejects other failures", () => {
    expect(isNotFoundError(new Error("Permission denied"))).toBe(false);
    expect(isNotFoundError("ENOENT")).toBe(false);
    expect(isNotFoundError(null)).toBe(false);
  });
});

describe("joinRemote", () => {
  it("joins segments with single slashes", () => {
    expect(joinRemote("101", "20250102", "a.csv")).toBe("101/20250102/a.csv");
    expect(joinRemote("/upload/", "/101/", "")).toBe("/upload/101");
  });
});
