#!/usr/bin/env node
import "dotenv/config";
import Table from "cli-table3";
import { Command } from "commander";
import fs from "fs-extra";

import { formatCsv, parseCsv } from "../dataset/csv";
import type { TabularRow } from "../dataset/types";
import { needsRepair, repairRecord, validateRepositoryIdentity } from "../keys/project-key";
import { isDirectInvocation } from "../shared/cli";

export interface CorruptedRow {
  /** 1-based line in the file, counting the header. */
  line: number;
  row: TabularRow;
  issues: string[];
}

export interface RowFix {
  line: number;
  before: TabularRow;
  after: TabularRow;
}

export interface RepairPlan {
  total: number;
  corrupted: CorruptedRow[];
  fixes: RowFix[];
}

export function detectIssues(row: TabularRow): string[] {
  const owner = row.owner ?? "";
  const name = row.name ?? "";
  const issues: string[] = [];
  if (owner.trim() === "") {
    issues.push("owner empty");
  }
  if (name.trim() === "") {
    issues.push("name empty");
  }
  if (/[/\\]/.test(owner) || /[/\\]/.test(name)) {
    issues.push("contains a path separator");
  }
  return issues;
}

/** Finds corrupted rows and the ones the two known repair patterns can fix. Rows are not modified. */
export function planRepairs(rows: readonly TabularRow[]): RepairPlan {
  const corrupted: CorruptedRow[] = [];
  const fixes: RowFix[] = [];

  rows.forEach((row, index) => {
    const line = index + 2;
    if (!needsRepair(row)) {
      return;
    }
    corrupted.push({ line, row, issues: detectIssues(row) });
    const repaired = repairRecord(row);
    if (repaired && validateRepositoryIdentity(repaired).valid) {
      fixes.push({ line, before: row, after: repaired });
    }
  });

  return { total: rows.length, corrupted, fixes };
}

export function applyRepairs(rows: readonly TabularRow[], plan: RepairPlan): TabularRow[] {
  const byLine = new Map(plan.fixes.map((fix) => [fix.line, fix.after]));
  return rows.map((row, index) => byLine.get(index + 2) ?? row);
}

export function fixedPathFor(input: string): string {
  return /\.csv$/i.test(input) ? input.replace(/\.csv$/i, "_fixed.csv") : `${input}_fixed.csv`;
}

function describeRow(row: TabularRow): string {
  return `owner='${row.owner ?? ""}', name='${row.name ?? ""}', full_name='${row.full_name ?? ""}'`;
}

async function main() {
  const program = new Command();

  program
    .description("Find and repair rows whose owner/name were corrupted in a flat dataset file")
    .requiredOption("--csv <path>", "Flat dataset file to inspect")
    .option("--apply", "Write the repaired rows to <input>_fixed.csv (default: dry run)", false)
    .parse(process.argv);

  const options = program.opts<{ csv: string; apply: boolean }>();
  const { header, rows } = parseCsv(await fs.readFile(options.csv, "utf8"));
  console.log(`📂 ${rows.length} rows in ${options.csv}`);

  const plan = planRepairs(rows);
  const unfixable = plan.corrupted.length - plan.fixes.length;
  console.log(`📊 ${plan.corrupted.length} corrupted, ${plan.fixes.length} fixable, ${unfixable} left as-is`);

  if (plan.corrupted.length > 0) {
    const table = new Table({ head: ["Line", "Issues", "Row"] });
    for (const entry of plan.corrupted.slice(0, 10)) {
      table.push([entry.line, entry.issues.join(", "), describeRow(entry.row)]);
    }
    console.log(table.toString());
  }

  if (plan.fixes.length > 0) {
    const table = new Table({ head: ["Line", "Before", "After"] });
    for (const fix of plan.fixes) {
      table.push([fix.line, `${fix.before.owner ?? ""}/${fix.before.name ?? ""}`, `${fix.after.owner}/${fix.after.name}`]);
    }
    console.log(table.toString());
  }

  if (plan.fixes.length === 0) {
    console.log("\n✅ Nothing to repair");
    return;
  }
  if (!options.apply) {
    console.log("\n💡 Dry run. Pass --apply to write the repaired file.");
    return;
  }

  const columns = [...header];
  for (const column of ["owner", "name"]) {
    if (!columns.includes(column)) {
      columns.push(column);
    }
  }
  const output = fixedPathFor(options.csv);
  await fs.outputFile(output, formatCsv(columns, applyRepairs(rows, plan)), "utf8");
  console.log(`\n✅ Wrote ${output} (${plan.fixes.length} row(s) repaired)`);
}

if (isDirectInvocation(import.meta.url)) {
  main().catch((error) => {
    console.error("\n❌ Repair failed:", error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
