// src/analyzer.ts — Analysis pipeline
// deck + constitutions → link validation (concurrent) → graph checks → report.

import { relative } from "node:path";
import type { AnalysisReport, Constitution, PitchDeck, Warning } from "./types.js";
import type { OutputSink } from "./output.js";
import type { WorkspacePaths } from "./workspace.js";
import { parsePitchDeck } from "./pitch-deck.js";
import { allLinks, loadConstitutions } from "./constitution.js";
import { isBroken, summarizeValidation, validateLinks } from "./traceability.js";
import {
  checkCoverage,
  detectCircularDependencies,
  detectConflicts,
  getOrphanedPrinciples,
  validateVersionConsistency,
} from "./consistency-checker.js";
import { buildAnalysisReport } from "./analysis-report.js";
import { formatVersion } from "./version-tracker.js";
import { writeVersionToFile } from "./frontmatter.js";

export interface AnalyzeOptions {
  paths: WorkspacePaths;
  sink: OutputSink;
  exclude?: string[];
  warnings?: Warning[];
  now?: Date;
}

export interface AnalysisRun {
  deck: PitchDeck;
  constitutions: Constitution[];
  report: AnalysisReport;
}

/**
 * Run every check over the workspace. Broken links and other findings become
 * report issues; only an unreadable deck stops the run.
 */
export async function runAnalysis(options: AnalyzeOptions): Promise<AnalysisRun> {
  const { paths, sink } = options;
  const warnings = options.warnings ?? [];

  const deck = parsePitchDeck(paths.deckFile);
  sink.verbose(`Pitch deck version ${formatVersion(deck.version)}, ${deck.sections.length} sections`);

  const constitutions = loadConstitutions(paths.specDir, options.exclude ?? [], warnings);
  sink.verbose(`Parsed ${constitutions.length} constitutions`);
  if (constitutions.length === 0) {
    warnings.push({
      level: "warn",
      module: "analyzer",
      message: "No constitutions found. Run 'deckspec decompose' first",
      file: paths.specDir,
    });
  }

  const links = allLinks(constitutions);
  const start = performance.now();
  const results = await validateLinks(links);
  const summary = summarizeValidation(results);
  sink.verbose(
    `Validated ${links.length} links in ${Math.round(performance.now() - start)}ms ` +
      `(${summary.valid} valid, ${summary.broken_file} broken file, ${summary.broken_section} broken section, ${summary.missing_source} missing source)`,
  );

  const conflicts = detectConflicts(constitutions);
  const coverageGaps = checkCoverage(deck, constitutions);
  const versionMismatches = validateVersionConsistency(deck, constitutions);
  const cycles = detectCircularDependencies(constitutions);
  const orphans = getOrphanedPrinciples(constitutions);
  sink.verbose(`Conflicts: ${conflicts.length}`);
  sink.verbose(`Coverage gaps: ${coverageGaps.length}`);
  sink.verbose(`Version mismatches: ${versionMismatches.length}`);
  sink.verbose(`Cycles: ${cycles.length}`);
  sink.verbose(`Orphaned principles: ${orphans.length}`);

  const report = buildAnalysisReport(
    {
      deckPath: relative(paths.projectDir, deck.path),
      deckVersion: formatVersion(deck.version),
      constitutionCount: constitutions.length,
      linkCount: links.length,
      generatedAt: options.now,
    },
    {
      brokenLinks: results.filter(isBroken),
      conflicts,
      coverageGaps,
      versionMismatches,
      cycles,
      orphans,
    },
  );

  return { deck, constitutions, report };
}

/**
 * Stamp the deck version into every constitution that differs from it.
 * Returns the rewritten paths; a file that cannot be rewritten is a warning.
 */
export function fixVersionMismatches(run: AnalysisRun, warnings: Warning[] = []): string[] {
  const fixed: string[] = [];
  const target = formatVersion(run.deck.version);
  for (const c of run.constitutions) {
    if (formatVersion(c.version) === target) continue;
    try {
      writeVersionToFile(c.path, run.deck.version);
      fixed.push(c.path);
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({ level: "error", module: "analyzer", message: `Could not fix version: ${msg}`, file: c.path });
    }
  }
  return fixed;
}
