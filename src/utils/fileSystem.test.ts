import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import {
  defaultOutputPath,
  detectFormat,
  fileExists,
  formatFileSize,
  formatTimestamp,
  writeFileAtomic
} from "./fileSystem.js";

describe("detectFormat", () => {
  it("should classify supported extensions case-insensitively", () => {
    expect(detectFormat("data/sales.csv")).toBe("csv");
    expect(detectFormat("Sales.XLSX")).toBe("xlsx");
    expect(detectFormat("old.xls")).toBe("xls");
  });

  it("should return null for anything else", () => {
    expect(detectFormat("notes.txt")).toBeNull();
    expect(detectFormat("README")).toBeNull();
    expect(detectFormat("archive.csv.gz")).toBeNull();
  });
});

describe("formatTimestamp", () => {
  it("should format local time as YYYYMMDD_HHMMSS", () => {
    expect(formatTimestamp(new Date(2024, 0, 15, 9, 30, 5))).toBe("20240115_093005");
    expect(formatTimestamp(new Date(2023, 11, 31, 23, 59, 59))).toBe("20231231_235959");
  });
});

describe("defaultOutputPath", () => {
  const now = new Date(2024, 0, 15, 9, 30, 5);

  it("should name the report after the input file", () => {
    expect(defaultOutputPath("data/sales.csv", ".", now)).toBe("sales_cleaned_20240115_093005.xlsx");
  });

  it("should place the report in the output directory", () => {
    expect(defaultOutputPath("/in/q1.report.xlsx", "out", now)).toBe(
      path.join("out", "q1.report_cleaned_20240115_093005.xlsx")
    );
  });
});

describe("formatFileSize", () => {
  it("should format sizes with binary units", () => {
    expect(formatFileSize(0)).toBe("0 B");
    expect(formatFileSize(512)).toBe("512 B");
    expect(formatFileSize(1536)).toBe("1.5 KB");
    expect(formatFileSize(2048)).toBe("2.0 KB");
  });
});

describe("file writes", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "file-system-"));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should create missing directories and replace existing files", async () => {
    const target = path.join(dir, "a", "b", "out.bin");

    await writeFileAtomic(target, new Uint8Array([1, 2, 3]));
    await writeFileAtomic(target, new Uint8Array([4]));

    expect([...(await fs.readFile(target))]).toEqual([4]);
    expect(await fs.readdir(path.dirname(target))).toEqual(["out.bin"]);
  });

  it("should tell whether a file exists", async () => {
    const target = path.join(dir, "exists.txt");
    await fs.writeFile(target, "x");

    expect(await fileExists(target)).toBe(true);
    expect(await fileExists(path.join(dir, "missing.txt"))).toBe(false);
  });

  it("should report a file without read permission as existing", async () => {
    const target = path.join(dir, "locked.txt");
    await fs.writeFile(target, "x");
    await fs.chmod(target, 0o000);

    expect(await fileExists(target)).toBe(true);
  });
});
