import { describe, it, expect } from "vitest";
import {
  createErrorResult,
  createLoadErrorResult,
  createSuccessResult,
  describeError,
  errorCode,
  formatErrorText,
  loadError
} from "./errorHandling.js";

describe("loadError", () => {
  it("should omit details when none are given", () => {
    expect(loadError("not_found", "gone")).toEqual({ kind: "not_found", message: "gone" });
    expect("details" in loadError("not_found", "gone")).toBe(false);
  });
});

describe("formatErrorText", () => {
  it("should append details as indented JSON", () => {
    expect(formatErrorText("Bad input", { row: 2 })).toBe('Error: Bad input\n\nDetails: {\n  "row": 2\n}');
    expect(formatErrorText("Bad input")).toBe("Error: Bad input");
  });
});

describe("describeError", () => {
  it("should read messages from anything thrown", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(describeError("plain")).toBe("plain");
    expect(describeError(42)).toBe("42");
  });
});

describe("errorCode", () => {
  it("should read string codes only", () => {
    expect(errorCode(Object.assign(new Error("x"), { code: "ENOENT" }))).toBe("ENOENT");
    expect(errorCode({ code: 5 })).toBeUndefined();
    expect(errorCode(null)).toBeUndefined();
  });
});

describe("tool results", () => {
  it("should wrap errors as MCP error content", () => {
    const value = createErrorResult("Nope", { a: 1 }).unwrap();

    expect(value).toEqual({
      content: [{ type: "text", text: 'Error: Nope\n\nDetails: {\n  "a": 1\n}' }],
      isError: true
    });
  });

  it("should merge the kind of a load error into its details", () => {
    const value = createLoadErrorResult(loadError("malformed", "Broken", { record: 3 })).unwrap();

    expect(value.content).toEqual([
      { type: "text", text: 'Error: Broken\n\nDetails: {\n  "kind": "malformed",\n  "record": 3\n}' }
    ]);
  });

  it("should stringify success data unless it is already text", () => {
    expect(createSuccessResult({ ok: true }).unwrap().content).toEqual([{ type: "text", text: '{\n  "ok": true\n}' }]);
    expect(createSuccessResult("done").unwrap().content).toEqual([{ type: "text", text: "done" }]);
  });
});
