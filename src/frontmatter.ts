// src/frontmatter.ts — YAML frontmatter read/write
// A document starts with "---\n", the block ends at "\n---\n" (or a final "\n---").

import { readFileSync, writeFileSync } from "node:fs";
import { parse as parseYaml, parseDocument, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { StructuralError } from "./types.js";
import type { DocumentMetadata, SemanticVersion } from "./types.js";
import { formatVersion, parseVersion } from "./version-tracker.js";

export interface FrontmatterBlock {
  /** Raw YAML between the delimiters. */
  yaml: string;
  body: string;
  /** Lines taken by the frontmatter block, delimiters included. */
  bodyLineOffset: number;
}

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v));

const FrontmatterSchema = z
  .object({
    version: scalar.optional(),
    created: scalar.optional().catch(undefined),
    updated: scalar.optional().catch(undefined),
    type: scalar.optional().catch(undefined),
    source: scalar.optional().catch(undefined),
  })
  .passthrough();

export type FrontmatterData = z.infer<typeof FrontmatterSchema>;

export function normalizeNewlines(content: string): string {
  return content.replace(/\r\n?/g, "\n");
}

/**
 * Split a document into frontmatter and body. Returns null when the document
 * does not open with a frontmatter block.
 */
export function splitFrontmatter(content: string): FrontmatterBlock | null {
  const text = normalizeNewlines(content);
  if (!text.startsWith("---\n")) return null;

  let end = text.indexOf("\n---\n", 3);
  let bodyStart: number;
  if (end !== -1) {
    bodyStart = end + 5;
  } else {
    end = text.indexOf("\n---", 3);
    if (end === -1) return null;
    bodyStart = end + 4;
  }

  const head = text.slice(0, bodyStart);
  return {
    yaml: end > 4 ? text.slice(4, end) : "",
    body: text.slice(bodyStart),
    bodyLineOffset: head.split("\n").length - (head.endsWith("\n") ? 1 : 0),
  };
}

/**
 * Parse frontmatter YAML into known keys. Malformed YAML is a structural error.
 */
export function parseFrontmatter(yaml: string, filePath?: string): FrontmatterData {
  let raw: unknown;
  try {
    raw = yaml.trim() === "" ? {} : parseYaml(yaml);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new StructuralError(
      `Malformed YAML frontmatter: ${msg}`,
      filePath,
      "Fix the YAML between the leading '---' lines",
    );
  }
  const result = FrontmatterSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "invalid structure";
    throw new StructuralError(
      `Malformed YAML frontmatter (${where})`,
      filePath,
      "Frontmatter must be a mapping with a scalar version key",
    );
  }
  return result.data;
}

export function pickMetadata(data: FrontmatterData): DocumentMetadata {
  const metadata: DocumentMetadata = {};
  if (data.created !== undefined) metadata.created = data.created;
  if (data.updated !== undefined) metadata.updated = data.updated;
  if (data.type !== undefined) metadata.type = data.type;
  if (data.source !== undefined) metadata.source = data.source;
  return metadata;
}

/**
 * Render a frontmatter block. Key order: version, then metadata, then extras.
 */
export function renderFrontmatter(
  version: SemanticVersion,
  metadata: DocumentMetadata = {},
  extra: Record<string, string | number> = {},
): string {
  const data: Record<string, string | number> = { version: formatVersion(version) };
  for (const key of ["created", "updated", "type", "source"] as const) {
    const value = metadata[key];
    if (value !== undefined) data[key] = value;
  }
  Object.assign(data, extra);
  return `---\n${stringifyYaml(data)}---\n`;
}

/**
 * Version stamped in a file's frontmatter, or null when the file has no
 * frontmatter or no version key.
 */
export function readVersionFromFile(filePath: string): SemanticVersion | null {
  const block = splitFrontmatter(readFileSync(filePath, "utf-8"));
  if (!block) return null;
  const data = parseFrontmatter(block.yaml, filePath);
  return data.version === undefined ? null : parseVersion(data.version, filePath);
}

/**
 * Rewrite only the version key of a file's frontmatter, keeping every other
 * key and comment. A file without frontmatter gets one.
 */
export function writeVersionToFile(filePath: string, version: SemanticVersion): void {
  const content = normalizeNewlines(readFileSync(filePath, "utf-8"));
  const block = splitFrontmatter(content);
  if (!block) {
    writeFileSync(filePath, renderFrontmatter(version) + "\n" + content);
    return;
  }
  const doc = parseDocument(block.yaml);
  if (doc.errors.length > 0) {
    throw new StructuralError(
      `Malformed YAML frontmatter: ${doc.errors[0]?.message ?? "parse error"}`,
      filePath,
    );
  }
  doc.set("version", formatVersion(version));
  writeFileSync(filePath, `---\n${doc.toString()}---\n${block.body}`);
}
