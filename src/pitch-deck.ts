// src/pitch-deck.ts — Pitch deck document model
// Parse, query, mutate and persist the versioned pitch deck.

import { readFileSync, statSync } from "node:fs";
import { writeFileSafe } from "./fs-utils.js";
import { StructuralError } from "./types.js";
import type { DocumentMetadata, PitchDeck, Section, SemanticVersion, SourceMode, VersionBump, Warning } from "./types.js";
import { extractSections } from "./markdown-parser.js";
import { parseFrontmatter, pickMetadata, renderFrontmatter, splitFrontmatter } from "./frontmatter.js";
import { bumpVersion, parseVersion } from "./version-tracker.js";
import { SECTION_IDS, SEQUOIA_SECTIONS } from "./sequoia.js";

// ─── Parsing ─────────────────────────────────────────────────────────────────

/**
 * Parse pitch-deck markdown. The version frontmatter is mandatory.
 */
export function parsePitchDeckContent(
  content: string,
  path: string,
  sourceMode: SourceMode = "manual",
  lastModified: Date = new Date(),
): PitchDeck {
  const block = splitFrontmatter(content);
  if (!block) {
    throw new StructuralError(
      `Pitch deck ${path} has no version in frontmatter`,
      path,
      "Start the file with a frontmatter block:\n---\nversion: 1.0.0\n---",
    );
  }
  const data = parseFrontmatter(block.yaml, path);
  if (data.version === undefined) {
    throw new StructuralError(
      `Pitch deck ${path} has no version in frontmatter`,
      path,
      "Add a 'version: 1.0.0' line to the frontmatter",
    );
  }

  return {
    path,
    version: parseVersion(data.version, path),
    sections: extractSections(block.body, block.bodyLineOffset),
    metadata: pickMetadata(data),
    lastModified,
    sourceMode,
  };
}

export function parsePitchDeck(path: string, sourceMode: SourceMode = "manual"): PitchDeck {
  let content: string;
  let lastModified: Date;
  try {
    content = readFileSync(path, "utf-8");
    lastModified = statSync(path).mtime;
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new StructuralError(`Cannot read pitch deck ${path}: ${msg}`, path, "Run 'deckspec decompose' to create one");
  }
  return parsePitchDeckContent(content, path, sourceMode, lastModified);
}

/**
 * Throw unless every canonical section id is present.
 */
export function requireSequoiaSections(deck: PitchDeck): void {
  const present = new Set(deck.sections.map((s) => s.id));
  const missing = SECTION_IDS.filter((id) => !present.has(id));
  if (missing.length === 0) return;
  throw new StructuralError(
    `Missing required sections: ${[...missing].sort().join(", ")}`,
    deck.path,
    `Expected sections (as '## ' headings): ${SEQUOIA_SECTIONS.map((s) => s.title).join(", ")}`,
  );
}

/** Parse and require all ten canonical sections. */
export function loadSequoiaDeck(path: string, sourceMode: SourceMode = "manual"): PitchDeck {
  const deck = parsePitchDeck(path, sourceMode);
  requireSequoiaSections(deck);
  return deck;
}

// ─── Queries ─────────────────────────────────────────────────────────────────

export function getSection(deck: PitchDeck, sectionId: string): Section | undefined {
  return deck.sections.find((s) => s.id === sectionId);
}

/** Section content, or "" when the deck has no such section. */
export function sectionText(deck: PitchDeck, sectionId: string): string {
  return getSection(deck, sectionId)?.content ?? "";
}

const PLACEHOLDERS = ["[tbd]", "[x]", "[todo]", "[needs input]", "..."];

const VAGUE_PATTERNS = [
  "[tbd]",
  "[x]",
  "[todo]",
  "[needs clarification]",
  "[needs input]",
  "tbd",
  "to be determined",
  "coming soon",
  "...",
  "etc.",
  "and more",
  "and so on",
];

/** Whitespace-only, or equal to / starting with a placeholder token. */
export function isSectionEmpty(section: Section): boolean {
  const content = section.content.trim().toLowerCase();
  if (content === "") return true;
  return PLACEHOLDERS.some((p) => content === p || content.startsWith(p));
}

/**
 * Vague phrases found in the section, in their original casing.
 */
export function detectVagueness(section: Section): string[] {
  const lower = section.content.toLowerCase();
  const found: string[] = [];
  for (const pattern of VAGUE_PATTERNS) {
    const at = lower.indexOf(pattern);
    if (at !== -1) found.push(section.content.slice(at, at + pattern.length));
  }
  return found;
}

export function wordCount(section: Section): number {
  const trimmed = section.content.trim();
  return trimmed === "" ? 0 : trimmed.split(/\s+/).length;
}

/**
 * Content warnings for canonical sections. Never fatal.
 */
export function validatePitchDeck(deck: PitchDeck): Warning[] {
  const warnings: Warning[] = [];
  for (const id of SECTION_IDS) {
    const section = getSection(deck, id);
    if (!section) continue;
    if (isSectionEmpty(section)) {
      warnings.push({
        level: "warn",
        module: "pitch-deck",
        message: `Section '${id}' is empty or contains only placeholders`,
        file: deck.path,
      });
    } else if (wordCount(section) < 10) {
      warnings.push({
        level: "info",
        module: "pitch-deck",
        message: `Section '${id}' is very short (${wordCount(section)} words); extraction may find little`,
        file: deck.path,
      });
    }
  }
  return warnings;
}

// ─── Mutation ────────────────────────────────────────────────────────────────

/**
 * Replace a section's content. Throws when the section does not exist.
 */
export function updateSection(deck: PitchDeck, sectionId: string, content: string): void {
  const index = deck.sections.findIndex((s) => s.id === sectionId);
  const current = deck.sections[index];
  if (index === -1 || !current) {
    throw new StructuralError(`Section '${sectionId}' not found in pitch deck`, deck.path);
  }
  deck.sections[index] = { ...current, content };
}

export function bumpDeckVersion(deck: PitchDeck, bump: VersionBump): SemanticVersion {
  deck.version = bumpVersion(deck.version, bump);
  return deck.version;
}

/**
 * Append a clarification answer to a section and PATCH-bump the deck.
 */
export function applyClarification(deck: PitchDeck, sectionId: string, answer: string): SemanticVersion {
  const current = getSection(deck, sectionId);
  if (!current) {
    throw new StructuralError(`Section '${sectionId}' not found in pitch deck`, deck.path);
  }
  const base = current.content.trimEnd();
  updateSection(deck, sectionId, base ? `${base}\n\n${answer}` : answer);
  return bumpDeckVersion(deck, "PATCH");
}

// ─── Persistence ─────────────────────────────────────────────────────────────

export function serializePitchDeck(deck: PitchDeck): string {
  const body = deck.sections
    .map((s) => {
      const heading = `${"#".repeat(s.level)} ${s.title}`;
      return s.content ? `${heading}\n\n${s.content}\n` : `${heading}\n`;
    })
    .join("\n");
  return `${renderFrontmatter(deck.version, deck.metadata)}\n${body}`;
}

export interface SaveOptions {
  /** Stamp the `updated` key with this date (YYYY-MM-DD). */
  updated?: string;
}

export function savePitchDeck(deck: PitchDeck, options: SaveOptions = {}): void {
  if (options.updated) deck.metadata = { ...deck.metadata, updated: options.updated };
  writeFileSafe(deck.path, serializePitchDeck(deck));
  deck.lastModified = new Date();
}

// ─── Construction ────────────────────────────────────────────────────────────

/**
 * Build deck markdown from section content keyed by canonical id. Sections
 * without content get a [TBD] placeholder.
 */
export function renderDeckMarkdown(
  content: Partial<Record<string, string>>,
  version: SemanticVersion,
  metadata: DocumentMetadata = {},
): string {
  const body = SEQUOIA_SECTIONS.map((s) => {
    const text = content[s.id]?.trim();
    return `## ${s.title}\n\n${text ? text : "[TBD]"}\n`;
  }).join("\n");
  return `${renderFrontmatter(version, metadata)}\n${body}`;
}
