// src/constitution.ts — Constitution parser
// Reads generated (or hand-edited) constitutions back from disk. Nothing is
// re-derived from the deck: principles and links come from the file alone.

import { readFileSync } from "node:fs";
import type {
  Constitution,
  ConstitutionKind,
  ExtractionMethod,
  MarkdownLink,
  Principle,
  Section,
  TraceabilityLink,
  Warning,
} from "./types.js";
import { StructuralError } from "./types.js";
import { extractLinks, extractSections } from "./markdown-parser.js";
import { parseFrontmatter, splitFrontmatter } from "./frontmatter.js";
import { INITIAL_VERSION, parseVersion } from "./version-tracker.js";
import { documentKindOf, toTraceabilityLink } from "./traceability.js";
import { discoverConstitutionFiles } from "./file-discovery.js";
import { fileStem } from "./fs-utils.js";

/** Strategic when stored under memory/, feature when under features/ or NNN-prefixed. */
export function constitutionKindOf(filePath: string): ConstitutionKind {
  return documentKindOf(filePath) === "feature" ? "feature" : "strategic";
}

export function isPrincipleSection(section: Section): boolean {
  return section.id.includes("principle") || /^(fp|sp)\d/.test(section.id);
}

// ─── Principle fields ────────────────────────────────────────────────────────

const FIELD = /^\s*(?:[-*]\s+)?\*\*(Rule|Confidence|Method|Test|Rationale)\*\*:\s*(.*)$/;
const METHODS: readonly ExtractionMethod[] = ["heuristic", "manual", "derived"];

function isExtractionMethod(value: string): value is ExtractionMethod {
  return METHODS.some((method) => method === value);
}

function ruleLine(content: string): string {
  const lines = content.split("\n").map((l) => l.trim());
  const mustLine = lines.find((l) => l.toUpperCase().includes("MUST"));
  if (mustLine) return mustLine.replace(/^(?:[-*]\s+)?\*\*Rule\*\*:\s*/, "");
  return content.slice(0, 100);
}

function principleFromSection(section: Section, links: MarkdownLink[]): Principle {
  const principle: Principle = {
    id: section.id,
    title: section.title,
    rule: ruleLine(section.content),
    sourceLink: "",
    confidence: 1,
    method: "manual",
  };

  const sourceLink = links.find((l) => l.line >= section.lineStart && l.line <= section.lineEnd);
  if (sourceLink) principle.sourceLink = sourceLink.url;

  for (const line of section.content.split("\n")) {
    const field = FIELD.exec(line);
    if (!field?.[2]) continue;
    const value = field[2].trim();
    switch (field[1]) {
      case "Confidence": {
        const n = Number.parseFloat(value);
        if (!Number.isNaN(n) && n >= 0 && n <= 1) principle.confidence = n;
        break;
      }
      case "Method":
        if (isExtractionMethod(value)) principle.method = value;
        break;
      case "Test":
        principle.testCriteria = value;
        break;
      case "Rationale":
        principle.rationale = value;
        break;
    }
  }
  return principle;
}

// ─── Links ───────────────────────────────────────────────────────────────────

/**
 * Upstream: links to the deck or a strategic constitution, plus links from a
 * feature to another feature. Downstream: strategic to feature.
 */
function partitionLinks(
  kind: ConstitutionKind,
  links: TraceabilityLink[],
): { upstream: TraceabilityLink[]; downstream: TraceabilityLink[] } {
  const upstream: TraceabilityLink[] = [];
  const downstream: TraceabilityLink[] = [];
  for (const link of links) {
    if (link.targetFile === link.sourceFile) continue;
    if (kind === "strategic" && link.type === "strategic-to-feature") downstream.push(link);
    else upstream.push(link);
  }
  return { upstream, downstream };
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

export function parseConstitutionContent(content: string, filePath: string): Constitution {
  const block = splitFrontmatter(content);
  const body = block ? block.body : content;
  const offset = block ? block.bodyLineOffset : 0;

  let version = INITIAL_VERSION;
  if (block) {
    const data = parseFrontmatter(block.yaml, filePath);
    if (data.version !== undefined) version = parseVersion(data.version, filePath);
  }

  const kind = constitutionKindOf(filePath);
  const sections = extractSections(body, offset);
  const mdLinks = extractLinks(body, offset);
  const principles = sections.filter(isPrincipleSection).map((s) => principleFromSection(s, mdLinks));

  const traced: TraceabilityLink[] = [];
  for (const l of mdLinks) {
    const link = toTraceabilityLink(filePath, l);
    if (link) traced.push(link);
  }
  const { upstream, downstream } = partitionLinks(kind, traced);

  return {
    path: filePath,
    kind,
    name: fileStem(filePath),
    version,
    principles,
    upstreamLinks: upstream,
    downstreamLinks: downstream,
  };
}

export function parseConstitution(filePath: string): Constitution {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new StructuralError(`Cannot read constitution ${filePath}: ${msg}`, filePath);
  }
  return parseConstitutionContent(content, filePath);
}

/**
 * Parse every constitution in a spec directory. A file that fails to parse is
 * reported as a warning and left out.
 */
export function loadConstitutions(specDir: string, exclude: string[] = [], warnings: Warning[] = []): Constitution[] {
  const constitutions: Constitution[] = [];
  for (const file of discoverConstitutionFiles(specDir, exclude, warnings)) {
    try {
      constitutions.push(parseConstitution(file));
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({ level: "error", module: "constitution", message: msg, file });
    }
  }
  return constitutions;
}

/** Every traceability link of a set of constitutions, upstream first per file. */
export function allLinks(constitutions: Constitution[]): TraceabilityLink[] {
  return constitutions.flatMap((c) => [...c.upstreamLinks, ...c.downstreamLinks]);
}
