import { describe, expect, it } from "vitest";
import {
  DocumentIOError,
  InvalidResponseError,
  RateLimitedError,
  UnreachableError,
  isRetryable,
  toErrorInfo
} from "./errors.js";

describe("isRetryable", () => {
  it("retries only transport failures and rate limits", () => {
    expect(isRetryable(new UnreachableError("down"))).toBe(true);
    expect(isRetryable(new RateLimitedError("busy", 1000))).toBe(true);
    expect(isRetryable(new InvalidResponseError("garbled"))).toBe(false);
    expect(isRetryable(new Error("other"))).toBe(false);
  });
});

describe("toErrorInfo", () => {
  it("keeps the code of known errors", () => {
    expect(toErrorInfo(new DocumentIOError("Failed to read a.txt."))).toEqual({
      code: "IO_ERROR",
      message: "Failed to read a.txt."
    });
  });

  it("maps file system errors to IO_ERROR", () => {
    const error = Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
    expect(toErrorInfo(error)).toEqual({ code: "IO_ERROR", message: "EACCES: permission denied" });
  });

  it("labels anything else as unexpected", () => {
    expect(toErrorInfo(new Error("boom"))).toEqual({ code: "UNEXPECTED", message: "boom" });
    expect(toErrorInfo("boom")).toEqual({ code: "UNEXPECTED", message: "Unexpected error." });
  });

  it("names errors after their class", () => {
    expect(new UnreachableError("down").name).toBe("UnreachableError");
  });
});
