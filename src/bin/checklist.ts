// src/bin/checklist.ts — Quality checklist command
// Generates one checklist per constitution, or reports completion with --report.

import { existsSync, readdirSync } from "node:fs";
import { join, relative } from "node:path";
import type { Checklist } from "../types.js";
import { EXIT_FAILURE, EXIT_OK } from "../types.js";
import { dateStamp, writeFileSafe } from "../fs-utils.js";
import { loadConstitutions } from "../constitution.js";
import { buildChecklist, calculateCompletion, checklistFileName, parseChecklistFile, renderChecklist } from "../checklist.js";
import type { CommandContext } from "./context.js";

export interface ChecklistTotals {
  files: number;
  items: number;
  checked: number;
}

export function checklistTotals(checklists: Checklist[]): ChecklistTotals {
  return {
    files: checklists.length,
    items: checklists.reduce((n, c) => n + c.items.length, 0),
    checked: checklists.reduce((n, c) => n + c.items.filter((i) => i.checked).length, 0),
  };
}

function reportCompletion(ctx: CommandContext): number {
  const { paths, sink } = ctx;
  const files = existsSync(paths.checklistsDir)
    ? readdirSync(paths.checklistsDir).filter((f) => f.endsWith("-checklist.md")).sort()
    : [];
  if (files.length === 0) {
    sink.error("No checklists found. Run 'deckspec checklist' to generate them.");
    return EXIT_FAILURE;
  }

  const checklists: Checklist[] = [];
  for (const f of files) {
    const path = join(paths.checklistsDir, f);
    try {
      checklists.push(parseChecklistFile(path));
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      ctx.warnings.push({ level: "warn", module: "checklist", message: `Skipped checklist: ${msg}`, file: path });
    }
  }

  for (const c of checklists) {
    const done = c.items.filter((i) => i.checked).length;
    sink.write(`  ${c.name.padEnd(32)} ${done}/${c.items.length}  ${calculateCompletion(c).toFixed(1)}%`);
  }
  const totals = checklistTotals(checklists);
  const overall = totals.items === 0 ? 0 : (totals.checked / totals.items) * 100;
  sink.write("");
  sink.info(`Overall: ${totals.checked}/${totals.items} items (${overall.toFixed(1)}%) across ${totals.files} checklist(s)`);
  return EXIT_OK;
}

export async function runChecklist(ctx: CommandContext): Promise<number> {
  const { args, paths, sink, config } = ctx;
  if (args.report) return reportCompletion(ctx);

  const constitutions = loadConstitutions(paths.specDir, config.exclude, ctx.warnings);
  if (constitutions.length === 0) {
    sink.error("No constitutions found. Run 'deckspec decompose' first.");
    return EXIT_FAILURE;
  }

  const today = dateStamp(ctx.now);
  let written = 0;
  for (const c of constitutions) {
    const target = join(paths.checklistsDir, checklistFileName(c.name));
    if (existsSync(target) && !args.force) {
      sink.verbose(`Kept existing ${relative(paths.projectDir, target)}`);
      continue;
    }
    const checklist = buildChecklist(c, relative(paths.projectDir, c.path), today);
    writeFileSafe(target, renderChecklist(checklist));
    written++;
    sink.write(`  ${relative(paths.projectDir, target)} (${checklist.items.length} items)`);
  }

  const kept = constitutions.length - written;
  sink.success(`Wrote ${written} checklist(s)${kept > 0 ? `, kept ${kept} existing (use --force to regenerate)` : ""}`);
  return EXIT_OK;
}
