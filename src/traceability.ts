// src/traceability.ts — Traceability links and link validation
// A link is valid when its source exists, its target exists, and its anchor
// (if any) names a heading in the target. Checks run in that order.

import { access, readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import type {
  ConstitutionKind,
  LinkState,
  LinkType,
  LinkValidationResult,
  MarkdownLink,
  TraceabilityLink,
} from "./types.js";
import { buildHeadingIndex } from "./markdown-parser.js";
import { splitFrontmatter } from "./frontmatter.js";

export type DocumentKind = ConstitutionKind | "pitch";

const EXTERNAL_URL = /^[a-z][a-z0-9+.-]*:/i;

function toPosix(path: string): string {
  return path.replace(/\\/g, "/");
}

/** Kind of document a file belongs to, from the directory that holds it. */
export function documentKindOf(filePath: string): DocumentKind | null {
  const parts = toPosix(filePath).split("/");
  const dir = parts[parts.length - 2] ?? "";
  const base = parts[parts.length - 1] ?? "";
  if (dir === "deck" || base === "pitch-deck.md") return "pitch";
  if (dir === "memory" || base.endsWith("-constitution.md")) return "strategic";
  if (dir === "features" || /^\d{3}-/.test(base)) return "feature";
  return null;
}

/**
 * Kind of document a link URL points at. Anchor-only and sibling links
 * point into the source's own kind. External URLs return null.
 */
export function linkTargetKind(url: string, sourceKind: DocumentKind): DocumentKind | null {
  if (EXTERNAL_URL.test(url) || url.startsWith("/")) return null;
  const filePart = splitLinkUrl(url).file;
  if (filePart === "") return sourceKind;
  const p = toPosix(filePart);
  if (/(^|\/)deck\//.test(p) || p.endsWith("pitch-deck.md")) return "pitch";
  if (/(^|\/)memory\//.test(p)) return "strategic";
  if (/(^|\/)features\//.test(p)) return "feature";
  if (!p.includes("/")) return sourceKind;
  return null;
}

export function inferLinkType(source: DocumentKind, target: DocumentKind): LinkType {
  if (source === "pitch") return "pitch-to-strategic";
  if (source === "strategic") {
    if (target === "pitch") return "strategic-to-pitch";
    if (target === "feature") return "strategic-to-feature";
    return "strategic-to-strategic";
  }
  if (target === "pitch") return "feature-to-pitch";
  if (target === "feature") return "feature-to-feature";
  return "feature-to-strategic";
}

export function splitLinkUrl(url: string): { file: string; section?: string } {
  const hash = url.indexOf("#");
  if (hash === -1) return { file: url };
  const section = url.slice(hash + 1);
  return section ? { file: url.slice(0, hash), section } : { file: url.slice(0, hash) };
}

function decodePath(path: string): string {
  try {
    return decodeURI(path);
  } catch {
    return path;
  }
}

/**
 * Build a traceability link from a markdown link. The target resolves
 * relative to the source file; an empty file part means the source itself.
 */
export function toTraceabilityLink(sourceFile: string, link: MarkdownLink): TraceabilityLink | null {
  const sourceKind = documentKindOf(sourceFile);
  if (!sourceKind) return null;
  const targetKind = linkTargetKind(link.url, sourceKind);
  if (!targetKind) return null;

  const { file, section } = splitLinkUrl(link.url);
  const targetFile = file === "" ? sourceFile : resolve(dirname(sourceFile), decodePath(file));
  const traced: TraceabilityLink = {
    sourceFile,
    sourceLine: link.line,
    targetFile,
    type: inferLinkType(sourceKind, targetKind),
    text: link.text,
  };
  if (section) traced.targetSection = section;
  return traced;
}

// ─── Validation ──────────────────────────────────────────────────────────────

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Validations in flight at once. */
export const LINK_VALIDATION_CONCURRENCY = 32;

const TRANSIENT_READ_CODES = new Set(["EMFILE", "ENFILE", "EAGAIN"]);
const READ_ATTEMPTS = 5;

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
}

async function readTarget(filePath: string): Promise<string> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await readFile(filePath, "utf-8");
    } catch (err: unknown) {
      const code = errorCode(err);
      if (attempt >= READ_ATTEMPTS || code === undefined || !TRANSIENT_READ_CODES.has(code)) throw err;
      await sleep(10 * attempt);
    }
  }
}

async function headingIdsOf(filePath: string): Promise<Map<string, number>> {
  const content = await readTarget(filePath);
  const block = splitFrontmatter(content);
  return block ? buildHeadingIndex(block.body, block.bodyLineOffset) : buildHeadingIndex(content);
}

/**
 * Validate one link. Never throws: read failures become broken_file results.
 */
export async function validateLink(link: TraceabilityLink): Promise<LinkValidationResult> {
  if (!(await exists(link.sourceFile))) {
    return {
      state: "missing_source",
      link,
      message: `Source file does not exist: ${link.sourceFile}`,
      suggestion: "Re-run analysis after restoring or regenerating the source document",
    };
  }

  if (!(await exists(link.targetFile))) {
    return {
      state: "broken_file",
      link,
      message: `Target file does not exist: ${link.targetFile}`,
      suggestion: `Create ${link.targetFile} or update link in ${link.sourceFile}:${link.sourceLine}`,
    };
  }

  if (link.targetSection) {
    let headings: Map<string, number>;
    try {
      headings = await headingIdsOf(link.targetFile);
    } catch (err: unknown) {
      if (errorCode(err) === "ENOENT") {
        return {
          state: "broken_file",
          link,
          message: `Target file does not exist: ${link.targetFile}`,
          suggestion: `Create ${link.targetFile} or update link in ${link.sourceFile}:${link.sourceLine}`,
        };
      }
      const msg = err instanceof Error ? err.message : String(err);
      return {
        state: "broken_file",
        link,
        message: `Failed to read target file ${link.targetFile}: ${msg}`,
        suggestion: `Check permissions on ${link.targetFile}`,
      };
    }
    if (!headings.has(link.targetSection)) {
      const available = [...headings.keys()];
      return {
        state: "broken_section",
        link,
        message: `Section '#${link.targetSection}' not found in ${link.targetFile}`,
        suggestion: `Available sections: ${available.slice(0, 5).join(", ")}`,
        availableSections: available,
      };
    }
  }

  return { state: "valid", link, message: "Link is valid" };
}

/**
 * Validate links on a fixed pool of workers. Results keep the input order,
 * and a failed read only affects its own link.
 */
export async function validateLinks(
  links: TraceabilityLink[],
  concurrency: number = LINK_VALIDATION_CONCURRENCY,
): Promise<LinkValidationResult[]> {
  const results: LinkValidationResult[] = [];
  let next = 0;

  async function worker(): Promise<void> {
    while (next < links.length) {
      const index = next++;
      const link = links[index];
      if (link) results[index] = await validateLink(link);
    }
  }

  const size = Math.min(Math.max(1, Math.floor(concurrency)), links.length);
  await Promise.all(Array.from({ length: size }, () => worker()));
  return results;
}

export function summarizeValidation(results: LinkValidationResult[]): Record<LinkState, number> {
  const summary: Record<LinkState, number> = { valid: 0, broken_file: 0, broken_section: 0, missing_source: 0 };
  for (const r of results) summary[r.state]++;
  return summary;
}

export function isBroken(
  result: LinkValidationResult,
): result is Exclude<LinkValidationResult, { state: "valid" }> {
  return result.state !== "valid";
}
