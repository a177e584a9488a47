/**
 * Command-line interface
 *
 * Parses arguments, runs the cleanup and maps the outcome to an exit
 * code. Output goes through the `CliIO` so tests can capture it.
 */

import { parseArgs } from "util";
import { z } from "zod";
import { Err, Ok, Result } from "ts-results-es";
import { cleanupDataset } from "./cleanup.js";
import { describeError, formatErrorText } from "./utils/errorHandling.js";
import { fileExists, formatFileSize } from "./utils/fileSystem.js";
import { setLogLevel } from "./utils/logger.js";

export const USAGE = `Usage: tabular-cleanup <input_file> [options]

Clean a CSV or Excel file and write an Excel report with the cleaned data
and a before/after summary.

Arguments:
  input_file            Path to input CSV or Excel file

Options:
  -o, --output <path>   Path to output Excel file (optional)
  -v, --verbose         Enable verbose output
  -h, --help            Show this help`;

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

const argsSchema = z.object({
  inputPath: z.string().trim().min(1, "Input file path cannot be empty"),
  outputPath: z.string().trim().min(1, "Output path cannot be empty")
    .refine(value => value.toLowerCase().endsWith(".xlsx"), "Output file must have an .xlsx extension")
    .optional(),
  verbose: z.boolean().default(false)
});

export type CliOptions = z.infer<typeof argsSchema>;

export type ParsedCommand = { command: "help" } | { command: "run"; options: CliOptions };

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line)
};

/**
 * Parse command-line arguments (without the node and script entries)
 *
 * @returns The command to run, or a message describing what is wrong
 */
export function parseCliArgs(argv: string[]): Result<ParsedCommand, string> {
  let parsed: ReturnType<typeof parseRaw>;
  try {
    parsed = parseRaw(argv);
  } catch (error) {
    return Err(describeError(error));
  }

  if (parsed.values.help) {
    return Ok({ command: "help" });
  }

  if (parsed.positionals.length !== 1) {
    return Err(parsed.positionals.length === 0
      ? "the following arguments are required: input_file"
      : `unrecognized arguments: ${parsed.positionals.slice(1).join(" ")}`);
  }

  const validated = argsSchema.safeParse({
    inputPath: parsed.positionals[0],
    outputPath: parsed.values.output,
    verbose: parsed.values.verbose
  });

  if (!validated.success) {
    return Err(validated.error.issues.map(issue => issue.message).join("; "));
  }

  return Ok({ command: "run", options: validated.data });
}

function parseRaw(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      output: { type: "string", short: "o" },
      verbose: { type: "boolean", short: "v" },
      help: { type: "boolean", short: "h" }
    }
  });
}

/**
 * Run the cleanup for parsed options
 *
 * @returns The process exit code
 */
export async function runCli(options: CliOptions, io: CliIO = consoleIO, now?: Date): Promise<number> {
  if (options.verbose) {
    setLogLevel("debug");
  }

  if (!(await fileExists(options.inputPath))) {
    io.err(`✗ Error: Input file '${options.inputPath}' not found`);
    return EXIT_FAILURE;
  }

  io.out("🚀 Data Cleanup and Excel Report Generator");
  io.out("=".repeat(50));
  io.out(`Input file: ${options.inputPath}`);

  const outcome = await cleanupDataset({
    inputPath: options.inputPath,
    outputPath: options.outputPath,
    now
  });

  if (outcome.isErr()) {
    const failure = outcome.error;
    if (failure.stage === "load") {
      io.err(`✗ Error loading file: ${failure.error.message}`);
      if (options.verbose && failure.error.details) {
        io.err(formatErrorText(failure.error.message, failure.error.details));
      }
    } else {
      io.err(`✗ Error saving Excel report to ${failure.outputPath}: ${failure.message}`);
    }
    return EXIT_FAILURE;
  }

  const { progress, report } = outcome.value;
  for (const line of progress) {
    io.out(line);
  }

  io.out(`✓ Excel report saved successfully: ${report.outputPath} (${formatFileSize(report.bytesWritten)})`);
  io.out("");
  io.out("=".repeat(50));
  io.out("🎉 Process completed successfully!");
  io.out(`📁 Output file: ${report.outputPath}`);
  return EXIT_SUCCESS;
}

/**
 * Parse arguments and run; the returned code is what the process exits with
 */
export async function main(argv: string[], io: CliIO = consoleIO): Promise<number> {
  const command = parseCliArgs(argv);
  if (command.isErr()) {
    io.err(USAGE);
    io.err(`error: ${command.error}`);
    return EXIT_FAILURE;
  }

  if (command.value.command === "help") {
    io.out(USAGE);
    return EXIT_SUCCESS;
  }

  try {
    return await runCli(command.value.options, io);
  } catch (error) {
    io.err(`✗ Unexpected error: ${describeError(error)}`);
    return EXIT_FAILURE;
  }
}
