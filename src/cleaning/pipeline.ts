/**
 * Cleaning pipeline
 *
 * Runs the five passes in order, repeating the round until the table
 * stops changing, and captures statistics before and after. Everything is
 * returned from one call; the pipeline keeps no state between runs.
 */

import { Table, tablesEqual } from "./table.js";
import { PASSES, PassReport } from "./passes.js";
import { TableStats, computeStats } from "./statistics.js";
import { SummaryRow, buildSummaryRows } from "./summary.js";

export type RoundReport = PassReport & { round: number };

export interface CleaningResult {
  table: Table;
  original: Readonly<TableStats>;
  cleaned: Readonly<TableStats>;
  /** Every pass of every round, in execution order */
  passes: RoundReport[];
  /** Number of rounds run, including the final one that changed nothing */
  rounds: number;
}

/**
 * Runs one round of all five passes
 */
export function runRound(table: Table, round = 1): { table: Table; passes: RoundReport[] } {
  let current = table;
  const passes: RoundReport[] = [];

  for (const pass of PASSES) {
    const { table: next, report } = pass(current);
    passes.push({ ...report, round });
    current = next;
  }

  return { table: current, passes };
}

/**
 * Cleans a table and returns it with both statistics snapshots.
 *
 * Later rounds only run when an earlier one left behind something a pass
 * would still change, such as a row that became empty after coercion or
 * two rows that became equal once their numbers were parsed. Each round
 * can only remove rows or columns or turn text cells into other kinds, so
 * the loop ends.
 *
 * @example
 * ```typescript
 * const { table, original, cleaned } = runCleaning(loaded);
 * console.log(`${original.totalRows} -> ${cleaned.totalRows} rows`);
 * ```
 */
export function runCleaning(table: Table): CleaningResult {
  const original = computeStats(table);

  let current = table;
  const passes: RoundReport[] = [];
  let rounds = 0;

  for (;;) {
    rounds++;
    const outcome = runRound(current, rounds);
    passes.push(...outcome.passes);

    const settled = tablesEqual(outcome.table, current);
    current = outcome.table;
    if (settled) break;
  }

  return {
    table: current,
    original,
    cleaned: computeStats(current),
    passes,
    rounds
  };
}

/**
 * Cleans a table, discarding the statistics
 */
export function clean(table: Table): Table {
  return runCleaning(table).table;
}

/**
 * Summary rows for a finished cleaning run
 */
export function summarize(result: CleaningResult): SummaryRow[] {
  return buildSummaryRows(result.original, result.cleaned);
}
