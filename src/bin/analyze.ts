// src/bin/analyze.ts — Traceability analysis command

import { relative } from "node:path";
import type { AnalysisReport } from "../types.js";
import { EXIT_FAILURE, EXIT_OK } from "../types.js";
import { fixVersionMismatches, runAnalysis, type AnalyzeOptions } from "../analyzer.js";
import { allIssues, hasErrors, saveAnalysisReport } from "../analysis-report.js";
import type { CommandContext } from "./context.js";

function printSummary(ctx: CommandContext, report: AnalysisReport): void {
  const { sink } = ctx;
  sink.write("");
  sink.write(`  Constitutions: ${report.constitutionCount}`);
  sink.write(`  Links:         ${report.linkCount}`);
  sink.write(`  Errors:        ${report.errors.length}`);
  sink.write(`  Warnings:      ${report.warnings.length}`);
  sink.write(`  Info:          ${report.infos.length}`);
  sink.write("");
  for (const issue of allIssues(report)) {
    const line = `${issue.issueId} ${issue.message}`;
    if (issue.severity === "error") sink.error(line);
    else if (issue.severity === "warning") sink.warn(line);
    else sink.verbose(line);
  }
}

export async function runAnalyze(ctx: CommandContext): Promise<number> {
  const { args, paths, sink } = ctx;
  const options: AnalyzeOptions = { paths, sink, exclude: ctx.config.exclude, warnings: ctx.warnings, now: ctx.now };

  const firstRunStart = ctx.warnings.length;
  let run = await runAnalysis(options);
  const firstRunEnd = ctx.warnings.length;
  if (args.fix) {
    const fixed = fixVersionMismatches(run, ctx.warnings);
    for (const p of fixed) sink.success(`Set version of ${relative(paths.projectDir, p)}`);
    if (fixed.length > 0) {
      sink.info(`Fixed ${fixed.length} version mismatch(es), re-analyzing`);
      // The re-run reports the same loader warnings again.
      ctx.warnings.splice(firstRunStart, firstRunEnd - firstRunStart);
      run = await runAnalysis(options);
    } else {
      sink.info("No version mismatches to fix");
    }
  }

  printSummary(ctx, run.report);
  const reportPath = saveAnalysisReport(run.report, paths.changelogDir);
  sink.info(`Report saved to ${relative(paths.projectDir, reportPath)}`);

  if (hasErrors(run.report)) {
    sink.error(`Analysis found ${run.report.errors.length} error(s)`);
    return EXIT_FAILURE;
  }
  sink.success("No errors found");
  return EXIT_OK;
}
