// src/decomposition.ts — Decomposition entry points
// Each mode ends with a validated Sequoia deck that is handed to the generator.

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { DecompositionMode, DecompositionResult, PitchDeck, Warning } from "./types.js";
import { StructuralError, UserCancelledError } from "./types.js";
import type { OutputSink } from "./output.js";
import type { Prompter } from "./prompter.js";
import type { ConstitutionRenderer } from "./templates/constitution.js";
import type { WorkspacePaths } from "./workspace.js";
import { strategicPath } from "./workspace.js";
import { dateStamp, writeFileSafe } from "./fs-utils.js";
import { slugify } from "./markdown-parser.js";
import { loadSequoiaDeck, parsePitchDeckContent, renderDeckMarkdown, requireSequoiaSections, validatePitchDeck } from "./pitch-deck.js";
import { SECTION_IDS, SEQUOIA_SECTIONS, STRATEGIC_NAMES, isSectionId } from "./sequoia.js";
import { INITIAL_VERSION } from "./version-tracker.js";
import { generateConstitutions } from "./constitution-generator.js";

// ─── PDF extraction ──────────────────────────────────────────────────────────

export interface PdfSection {
  title: string;
  content: string;
  page?: number;
}

/** Black box that turns a PDF into titled text blocks. */
export interface PdfTextExtractor {
  extract(pdfPath: string): Promise<PdfSection[]>;
}

export const LOW_CONFIDENCE_THRESHOLD = 0.7;

/** Used when no extractor is configured: no PDF library ships with the CLI. */
export const unsupportedPdfExtractor: PdfTextExtractor = {
  extract: async (pdfPath) => {
    throw new StructuralError(
      `Cannot extract text from ${pdfPath}: PDF extraction is not available`,
      pdfPath,
      "Convert the PDF to markdown with one '## ' heading per section, then run 'deckspec decompose --from-file <file.md>'",
    );
  },
};

/**
 * 0.5 base, plus up to 0.3 for section count and up to 0.2 for sections with
 * real content. Capped at 1.
 */
export function extractionConfidence(sections: PdfSection[]): number {
  let confidence = 0.5;
  if (sections.length >= 10) confidence += 0.3;
  else if (sections.length >= 5) confidence += 0.15;

  const withContent = sections.filter((s) => s.content.length > 20).length;
  if (withContent >= 8) confidence += 0.2;
  else if (withContent >= 5) confidence += 0.1;

  return Math.min(confidence, 1);
}

/**
 * Map extracted blocks onto canonical sections: by slug of the block title
 * first, then the remaining blocks fill the remaining sections in order.
 */
export function mapPdfSections(sections: PdfSection[]): Partial<Record<string, string>> {
  const content: Partial<Record<string, string>> = {};
  const unmatched: PdfSection[] = [];
  for (const section of sections) {
    const id = slugify(section.title);
    if (isSectionId(id) && content[id] === undefined) content[id] = section.content;
    else unmatched.push(section);
  }
  const free = SECTION_IDS.filter((id) => content[id] === undefined);
  unmatched.forEach((section, i) => {
    const id = free[i];
    if (id) content[id] = section.content;
  });
  return content;
}

export function pdfToMarkdown(sections: PdfSection[]): string {
  return renderDeckMarkdown(mapPdfSections(sections), INITIAL_VERSION, {
    created: "[NEEDS REVIEW]",
    updated: "[NEEDS REVIEW]",
    type: "pitch-deck",
    source: "PDF extraction",
  });
}

// ─── Orchestration ───────────────────────────────────────────────────────────

export interface DecomposeOptions {
  paths: WorkspacePaths;
  sink: OutputSink;
  dryRun?: boolean;
  force?: boolean;
  maxFeatures?: number;
  renderer?: ConstitutionRenderer;
  prompter?: Prompter;
  pdfExtractor?: PdfTextExtractor;
  warnings?: Warning[];
  now?: Date;
}

/** Strategic constitutions already on disk. */
export function existingConstitutions(paths: WorkspacePaths): string[] {
  return STRATEGIC_NAMES.map((name) => strategicPath(paths, name)).filter((p) => existsSync(p));
}

async function deckFromFile(path: string, options: DecomposeOptions): Promise<PitchDeck> {
  const { paths, sink } = options;
  const source = resolve(path);
  const deck = loadSequoiaDeck(source, "from-file");
  if (source !== paths.deckFile) {
    if (!options.dryRun) {
      writeFileSafe(paths.deckFile, readFileSync(source, "utf-8"));
      sink.verbose(`Copied ${source} to ${paths.deckFile}`);
    }
    deck.path = paths.deckFile;
  }
  return deck;
}

async function deckFromPdf(path: string, options: DecomposeOptions, warnings: Warning[]): Promise<PitchDeck> {
  const { paths, sink } = options;
  const extractor = options.pdfExtractor ?? unsupportedPdfExtractor;
  const source = resolve(path);
  sink.info(`Extracting text from ${source}`);
  const sections = await extractor.extract(source);
  const confidence = extractionConfidence(sections);
  sink.info(`Extracted ${sections.length} sections (confidence ${Math.round(confidence * 100)}%)`);

  if (sections.length < SECTION_IDS.length) {
    warnings.push({
      level: "warn",
      module: "decomposition",
      message: `Only ${sections.length} sections detected (expected ${SECTION_IDS.length})`,
      file: source,
    });
  }
  if (confidence < LOW_CONFIDENCE_THRESHOLD) {
    warnings.push({
      level: "warn",
      module: "decomposition",
      message: `Extraction confidence ${Math.round(confidence * 100)}% is low; review ${paths.deckFile} and re-run with --from-file`,
      file: source,
    });
  }

  const markdown = pdfToMarkdown(sections);
  if (!options.dryRun) writeFileSafe(paths.deckFile, markdown);
  const deck = parsePitchDeckContent(markdown, paths.deckFile, "from-pdf");
  requireSequoiaSections(deck);
  return deck;
}

async function deckFromInterview(options: DecomposeOptions): Promise<PitchDeck> {
  const { paths, sink, prompter } = options;
  if (!prompter) throw new StructuralError("Interactive decomposition needs a terminal prompt");

  sink.info(`Answer ${SEQUOIA_SECTIONS.length} questions to build a Sequoia-format pitch deck. Leave an answer empty to mark it [TBD].`);
  const answers: Partial<Record<string, string>> = {};
  for (const [i, section] of SEQUOIA_SECTIONS.entries()) {
    sink.write("");
    sink.write(`(${i + 1}/${SEQUOIA_SECTIONS.length}) ${section.title}`);
    sink.write(`  ${section.hint}`);
    const answer = (await prompter.ask(section.prompt)).trim();
    answers[section.id] = answer === "" ? "[TBD]" : answer;
  }

  if (!options.dryRun && !(await prompter.confirm("Proceed with decomposition?", true))) {
    throw new UserCancelledError();
  }

  const today = dateStamp(options.now);
  const markdown = renderDeckMarkdown(answers, INITIAL_VERSION, {
    created: today,
    updated: today,
    type: "pitch-deck",
    source: "interactive",
  });
  if (!options.dryRun) writeFileSafe(paths.deckFile, markdown);
  return parsePitchDeckContent(markdown, paths.deckFile, "interactive");
}

/**
 * Build or load the deck for a mode, then generate constitutions. Existing
 * strategic constitutions stop the run unless forced or dry.
 */
export async function decompose(mode: DecompositionMode, options: DecomposeOptions): Promise<DecompositionResult> {
  const warnings = options.warnings ?? [];

  if (!options.force && !options.dryRun) {
    const existing = existingConstitutions(options.paths);
    if (existing.length > 0) {
      throw new StructuralError(
        `${existing.length} strategic constitution(s) already exist in ${options.paths.memoryDir}`,
        existing[0],
        "Re-run with --force to overwrite them, or --dry-run to preview",
      );
    }
  }

  let deck: PitchDeck;
  switch (mode.kind) {
    case "from-file":
      deck = await deckFromFile(mode.path, options);
      break;
    case "from-pdf":
      deck = await deckFromPdf(mode.path, options, warnings);
      break;
    case "interactive":
      deck = await deckFromInterview(options);
      break;
  }

  warnings.push(...validatePitchDeck(deck));
  options.sink.verbose(`Deck ${deck.path} has ${deck.sections.length} sections`);

  return generateConstitutions(deck, mode.kind, {
    paths: options.paths,
    renderer: options.renderer,
    dryRun: options.dryRun,
    maxFeatures: options.maxFeatures,
    warnings,
    now: options.now,
  });
}
