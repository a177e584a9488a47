/**
 * Tests for cleanDataset tool
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import ExcelJS from "exceljs";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { cleanDatasetTool } from "./cleanDataset.js";

function responseText(value: CallToolResult): string {
  const [first] = value.content;
  return first?.type === "text" ? first.text : "";
}

describe("cleanDataset", () => {
  let server: Server;
  let tool: ReturnType<typeof cleanDatasetTool>;
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "clean-dataset-"));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    server = new Server(
      { name: "test-server", version: "1.0.0" },
      { capabilities: { tools: {} } }
    );
    tool = cleanDatasetTool(server);
  });

  it("should have correct metadata", () => {
    expect(tool.name).toBe("clean_dataset");
    expect(tool.description).toContain("Summary");
    expect(tool.annotations?.title).toBe("Clean Dataset");
    expect(tool.inputSchema().required).toEqual(["inputPath"]);
  });

  it("should clean a file and write the report", async () => {
    const inputPath = path.join(dir, "sales.csv");
    const outputPath = path.join(dir, "sales-report.xlsx");
    await fs.writeFile(inputPath, "region,amount\nNorth,\"1,200\"\nSouth,$300\nNorth,\"1,200\"\n,\n");

    const result = await tool.callback({ inputPath, outputPath });

    expect(result.isOk()).toBe(true);
    const value = result.unwrap();
    expect(value.isError).toBe(false);

    const payload = JSON.parse(responseText(value));
    expect(payload.outputPath).toBe(outputPath);
    expect(payload.rows).toEqual({ original: 4, cleaned: 2 });
    expect(payload.columns).toEqual({ original: 2, cleaned: 2 });
    expect(payload.steps).toContain("✓ Converted column 'amount' to numeric");

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(outputPath);
    const data = workbook.getWorksheet("Cleaned Data");
    expect(data?.getCell("B2").value).toBe(1200);
    expect(data?.getCell("B3").value).toBe(300);
    expect(workbook.getWorksheet("Summary")?.getCell("A1").value).toBe("Metric");
  });

  it("should reject a report path that is not .xlsx", async () => {
    const value = (await tool.execute({ inputPath: "a.csv", outputPath: "a.csv" })).unwrap();

    expect(value.isError).toBe(true);
    expect(responseText(value)).toContain("Output file must have an .xlsx extension");
  });

  it("should return load failures as error results", async () => {
    const inputPath = path.join(dir, "data.json");

    const value = (await tool.callback({ inputPath })).unwrap();

    expect(value.isError).toBe(true);
    expect(responseText(value)).toContain("Unsupported file format: .json");
  });

  it("should return save failures as error results", async () => {
    const inputPath = path.join(dir, "ok.csv");
    const blocker = path.join(dir, "blocker");
    await fs.writeFile(inputPath, "a\nx\n");
    await fs.writeFile(blocker, "");

    const value = (await tool.callback({ inputPath, outputPath: path.join(blocker, "r.xlsx") })).unwrap();

    expect(value.isError).toBe(true);
    expect(responseText(value)).toContain("Could not save Excel report");
  });
});
