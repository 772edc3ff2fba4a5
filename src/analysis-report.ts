// src/analysis-report.ts — Analysis report model and markdown output

import { join } from "node:path";
import type {
  AnalysisIssue,
  AnalysisReport,
  ConflictRecord,
  LinkValidationResult,
  OrphanedPrinciple,
  ValidationError,
  ValidationInfo,
  ValidationWarning,
  VersionMismatch,
} from "./types.js";
import { dateStamp, writeFileSafe } from "./fs-utils.js";

export interface ReportFindings {
  brokenLinks: Exclude<LinkValidationResult, { state: "valid" }>[];
  conflicts: ConflictRecord[];
  coverageGaps: string[];
  versionMismatches: VersionMismatch[];
  cycles: string[][];
  orphans: OrphanedPrinciple[];
}

export interface ReportContext {
  deckPath: string;
  deckVersion: string;
  constitutionCount: number;
  linkCount: number;
  generatedAt?: Date;
}

function issueId(prefix: string, n: number): string {
  return `${prefix}${String(n).padStart(3, "0")}`;
}

/**
 * Turn check results into issues. Warnings share one sequence: conflicts
 * first, then coverage gaps.
 */
export function buildAnalysisReport(context: ReportContext, findings: ReportFindings): AnalysisReport {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];
  const infos: ValidationInfo[] = [];

  for (const broken of findings.brokenLinks) {
    errors.push({
      severity: "error",
      issueId: issueId("ERR", errors.length + 1),
      category: "broken-link",
      message: broken.message,
      filePath: broken.link.sourceFile,
      lineNumber: broken.link.sourceLine,
      suggestion: broken.suggestion,
    });
  }

  for (const conflict of findings.conflicts) {
    warnings.push({
      severity: "warning",
      issueId: issueId("WARN", warnings.length + 1),
      category: "conflict",
      message: `Conflict: ${conflict.description}`,
      suggestion: "Review both principles and reword or remove one",
    });
  }

  for (const sectionId of findings.coverageGaps) {
    warnings.push({
      severity: "warning",
      issueId: issueId("WARN", warnings.length + 1),
      category: "coverage",
      message: `Pitch deck section '${sectionId}' is not referenced by any constitution`,
      filePath: context.deckPath,
      suggestion: `Add a link to ../deck/pitch-deck.md#${sectionId} from the constitution it informs`,
    });
  }

  findings.versionMismatches.forEach((m, i) => {
    errors.push({
      severity: "error",
      issueId: issueId("VMIS", i + 1),
      category: "version-mismatch",
      message: `${m.constitution} is at version ${m.constitutionVersion} but the pitch deck is at ${m.deckVersion}`,
      suggestion: "Run 'deckspec analyze --fix' or re-run 'deckspec decompose --force'",
    });
  });

  findings.cycles.forEach((cycle, i) => {
    errors.push({
      severity: "error",
      issueId: issueId("CIRC", i + 1),
      category: "circular-dependency",
      message: `Circular dependency: ${cycle.join(" → ")}`,
      suggestion: "Remove one of the feature-to-feature links in the cycle",
    });
  });

  findings.orphans.forEach((o, i) => {
    infos.push({
      severity: "info",
      issueId: issueId("INFO", i + 1),
      category: "orphan",
      message: `Principle ${o.constitution}#${o.principleId} is not referenced by any feature`,
      suggestion: "Link a feature constitution to it, or remove it if it no longer applies",
    });
  });

  return {
    generatedAt: context.generatedAt ?? new Date(),
    deckPath: context.deckPath,
    deckVersion: context.deckVersion,
    constitutionCount: context.constitutionCount,
    linkCount: context.linkCount,
    errors,
    warnings,
    infos,
  };
}

export function allIssues(report: AnalysisReport): AnalysisIssue[] {
  return [...report.errors, ...report.warnings, ...report.infos];
}

export function hasErrors(report: AnalysisReport): boolean {
  return report.errors.length > 0;
}

// ─── Markdown ────────────────────────────────────────────────────────────────

function renderIssue(issue: AnalysisIssue): string[] {
  const lines = [`### ${issue.issueId}: ${issue.message}`, ""];
  if (issue.filePath) {
    lines.push(`- **File**: ${issue.filePath}${issue.lineNumber !== undefined ? `:${issue.lineNumber}` : ""}`);
  }
  if (issue.suggestion) lines.push(`- **Suggestion**: ${issue.suggestion}`);
  lines.push("");
  return lines;
}

function nextSteps(report: AnalysisReport): string[] {
  const steps: string[] = [];
  if (report.errors.some((e) => e.category === "broken-link")) {
    steps.push("Fix broken links, or re-run 'deckspec decompose --force' to regenerate them");
  }
  if (report.errors.some((e) => e.category === "version-mismatch")) {
    steps.push("Run 'deckspec analyze --fix' to align constitution versions with the pitch deck");
  }
  if (report.errors.some((e) => e.category === "circular-dependency")) {
    steps.push("Break circular feature dependencies");
  }
  if (report.warnings.length > 0) steps.push("Review conflicts and coverage gaps");
  if (report.infos.length > 0) steps.push("Link or remove orphaned principles");
  if (steps.length === 0) steps.push("No action needed. Run 'deckspec checklist' to review quality");
  return steps;
}

export function renderAnalysisReport(report: AnalysisReport): string {
  const lines: string[] = [];
  lines.push("# Analysis Report");
  lines.push("");
  lines.push(`**Date**: ${dateStamp(report.generatedAt)}`);
  lines.push(`**Pitch deck**: ${report.deckPath} (version ${report.deckVersion})`);
  lines.push(`**Constitutions analyzed**: ${report.constitutionCount}`);
  lines.push(`**Links validated**: ${report.linkCount}`);
  lines.push("");
  lines.push("## Summary");
  lines.push("");
  lines.push(`- Errors: ${report.errors.length}`);
  lines.push(`- Warnings: ${report.warnings.length}`);
  lines.push(`- Info: ${report.infos.length}`);
  lines.push("");

  const groups: Array<[string, AnalysisIssue[]]> = [
    ["Errors", report.errors],
    ["Warnings", report.warnings],
    ["Info", report.infos],
  ];
  for (const [title, issues] of groups) {
    lines.push(`## ${title}`);
    lines.push("");
    if (issues.length === 0) {
      lines.push("None.");
      lines.push("");
      continue;
    }
    for (const issue of issues) lines.push(...renderIssue(issue));
  }

  lines.push("## Next Steps");
  lines.push("");
  nextSteps(report).forEach((step, i) => lines.push(`${i + 1}. ${step}`));
  lines.push("");
  return lines.join("\n");
}

export function analysisReportPath(changelogDir: string, date: Date): string {
  return join(changelogDir, `${dateStamp(date)}-analyze-report.md`);
}

/** Write the report to the changelog; a later run on the same day replaces it. */
export function saveAnalysisReport(report: AnalysisReport, changelogDir: string): string {
  const path = analysisReportPath(changelogDir, report.generatedAt);
  writeFileSafe(path, renderAnalysisReport(report));
  return path;
}
