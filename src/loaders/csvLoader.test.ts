import { describe, it, expect } from "vitest";
import { decodeText, parseCsvText, readCsv } from "./csvLoader.js";
import { MISSING, getRows, textCell } from "../cleaning/table.js";

const t = textCell;

describe("decodeText", () => {
  it("should decode UTF-8 and drop a byte order mark", () => {
    const bytes = new Uint8Array([0xef, 0xbb, 0xbf, ...new TextEncoder().encode("name\ncafé")]);

    const decoded = decodeText(bytes).unwrap();

    expect(decoded).toEqual({ text: "name\ncafé", encoding: "utf-8" });
  });

  it("should fall back to Windows-1252 when the bytes are not UTF-8", () => {
    // "café" with é as the single byte 0xE9
    const bytes = new Uint8Array([0x63, 0x61, 0x66, 0xe9]);

    expect(decodeText(bytes).unwrap()).toEqual({ text: "café", encoding: "windows-1252" });
  });

  it("should fail when no encoding accepts the bytes", () => {
    const result = decodeText(new Uint8Array([0xe9]), ["utf-8"]);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe("decode_failed");
      expect(result.error.details).toEqual({ tried: ["utf-8"] });
    }
  });
});

describe("parseCsvText", () => {
  it("should read the first record as the header", () => {
    const table = parseCsvText("id,name\n1,Alice\n2,Bob\n").unwrap();

    expect(table.columns.map(c => c.name)).toEqual(["id", "name"]);
    expect(getRows(table)).toEqual([[t("1"), t("Alice")], [t("2"), t("Bob")]]);
  });

  it("should keep whitespace and read missing-value tokens as missing", () => {
    const table = parseCsvText("a,b\n  x ,NA\n,y\n").unwrap();

    expect(getRows(table)).toEqual([[t("  x "), MISSING], [MISSING, t("y")]]);
  });

  it("should handle quoted delimiters and newlines", () => {
    const table = parseCsvText('a,b\n"1,5","line\nbreak"\n').unwrap();

    expect(getRows(table)).toEqual([[t("1,5"), t("line\nbreak")]]);
  });

  it("should guess a semicolon delimiter", () => {
    const table = parseCsvText("a;b\n1;2\n3;4\n").unwrap();

    expect(table.columns.map(c => c.name)).toEqual(["a", "b"]);
    expect(table.rowCount).toBe(2);
  });

  it("should skip blank lines and pad short records", () => {
    const table = parseCsvText("a,b,c\n1,2,3\n\n4\n").unwrap();

    expect(getRows(table)).toEqual([[t("1"), t("2"), t("3")], [t("4"), MISSING, MISSING]]);
  });

  it("should normalize blank and repeated headers", () => {
    const table = parseCsvText("id,,id\n1,2,3\n").unwrap();
    expect(table.columns.map(c => c.name)).toEqual(["id", "Column_B", "id.1"]);
  });

  it("should reject records longer than the header", () => {
    const result = parseCsvText("a,b\n1,2\n1,2,3\n");

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({
        kind: "malformed",
        message: "Expected 2 fields in record 3, saw 3",
        details: { record: 3 }
      });
    }
  });

  it("should reject an unterminated quote", () => {
    const result = parseCsvText('a,b\n"1,2\n');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe("malformed");
      expect(result.error.message.startsWith("Malformed CSV: ")).toBe(true);
    }
  });

  it("should reject an empty file", () => {
    const result = parseCsvText("");

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("No columns to parse from file");
    }
  });

  it("should return a header-only file as a table without rows", () => {
    const table = parseCsvText("a,b\n").unwrap();

    expect(table.rowCount).toBe(0);
    expect(table.columns.map(c => c.name)).toEqual(["a", "b"]);
  });
});

describe("readCsv", () => {
  it("should report the encoding that decoded the file", () => {
    const bytes = new Uint8Array([...new TextEncoder().encode("city\n"), 0x4d, 0xe1, 0x6c, 0x61, 0x67, 0x61]);

    const { table, encoding } = readCsv(bytes).unwrap();

    expect(encoding).toBe("windows-1252");
    expect(table.columns[0].cells).toEqual([t("Málaga")]);
  });
});
