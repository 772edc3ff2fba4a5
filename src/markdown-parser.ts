// src/markdown-parser.ts — Section/Heading Parser
// Walks the block-level token tree from marked. Every heading opens a section
// that runs until the next heading of any depth. Text before the first heading
// belongs to no section and is dropped.

import { marked, type Token, type Tokens } from "marked";
import type { MarkdownLink, Section } from "./types.js";

/**
 * URL-safe slug: lowercase, drop everything except word characters, spaces
 * and hyphens, collapse runs of spaces/hyphens, trim hyphens.
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\w\s-]/g, "")
    .replace(/[-\s]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

// ─── Token helpers ───────────────────────────────────────────────────────────

function isHeading(token: Token): token is Tokens.Heading {
  return token.type === "heading";
}

function isLink(token: Token): token is Tokens.Link {
  return token.type === "link";
}

function isList(token: Token): token is Tokens.List {
  return token.type === "list";
}

function isTable(token: Token): token is Tokens.Table {
  return token.type === "table";
}

function countNewlines(text: string): number {
  let n = 0;
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) n++;
  }
  return n;
}

function lineCount(text: string): number {
  if (text.length === 0) return 0;
  const lines = text.split("\n").length;
  return text.endsWith("\n") ? lines - 1 : lines;
}

interface PositionedToken {
  token: Token;
  /** 1-based line where the token's raw text starts. */
  line: number;
}

/**
 * Lex markdown and attach a starting line to each top-level token.
 * `lineOffset` is the number of lines that precede `markdown` in its file
 * (e.g. a frontmatter block).
 */
function lexWithLines(markdown: string, lineOffset: number): PositionedToken[] {
  const source = markdown.replace(/\r\n?/g, "\n");
  const tokens = marked.lexer(source);
  const positioned: PositionedToken[] = [];
  let consumed = 0;
  for (const token of tokens) {
    positioned.push({ token, line: lineOffset + consumed + 1 });
    consumed += countNewlines(token.raw);
  }
  return positioned;
}

// ─── Sections ────────────────────────────────────────────────────────────────

/**
 * Parse markdown into ordered sections. Section ids are slugs of the heading text.
 */
export function extractSections(markdown: string, lineOffset = 0): Section[] {
  const positioned = lexWithLines(markdown, lineOffset);
  const lastLine = lineOffset + lineCount(markdown.replace(/\r\n?/g, "\n"));

  interface OpenSection {
    heading: Tokens.Heading;
    line: number;
    body: string[];
  }

  const open: OpenSection[] = [];
  for (const { token, line } of positioned) {
    if (isHeading(token)) {
      open.push({ heading: token, line, body: [] });
      continue;
    }
    const current = open[open.length - 1];
    if (current) current.body.push(token.raw);
  }

  return open.map((s, i) => {
    const next = open[i + 1];
    const lineEnd = next ? next.line - 1 : lastLine;
    const title = s.heading.text.trim();
    return {
      id: slugify(title),
      title,
      level: s.heading.depth,
      content: s.body.join("").trim(),
      lineStart: s.line,
      lineEnd: Math.max(lineEnd, s.line),
    };
  });
}

/**
 * Heading id → 1-based line. A later duplicate heading replaces an earlier one.
 */
export function buildHeadingIndex(markdown: string, lineOffset = 0): Map<string, number> {
  const index = new Map<string, number>();
  for (const { token, line } of lexWithLines(markdown, lineOffset)) {
    if (isHeading(token)) index.set(slugify(token.text.trim()), line);
  }
  return index;
}

// ─── Links ───────────────────────────────────────────────────────────────────

function collectLinks(tokens: Token[] | undefined, out: Tokens.Link[]): void {
  if (!tokens) return;
  for (const token of tokens) {
    if (isLink(token)) {
      out.push(token);
      continue;
    }
    if (isList(token)) {
      for (const item of token.items) collectLinks(item.tokens, out);
      continue;
    }
    if (isTable(token)) {
      for (const cell of token.header) collectLinks(cell.tokens, out);
      for (const row of token.rows) {
        for (const cell of row) collectLinks(cell.tokens, out);
      }
      continue;
    }
    if ("tokens" in token) collectLinks(token.tokens, out);
  }
}

/**
 * Every inline `[text](url)` link in the document, in order, with its line.
 * Autolinks and images are not traceability links and are skipped.
 */
export function extractLinks(markdown: string, lineOffset = 0): MarkdownLink[] {
  const links: MarkdownLink[] = [];
  for (const { token, line } of lexWithLines(markdown, lineOffset)) {
    const found: Tokens.Link[] = [];
    collectLinks([token], found);
    let cursor = 0;
    for (const link of found) {
      if (!link.raw.startsWith("[")) continue;
      const at = token.raw.indexOf(link.raw, cursor);
      const linkLine = at === -1 ? line : line + countNewlines(token.raw.slice(0, at));
      if (at !== -1) cursor = at + link.raw.length;
      links.push({ text: link.text, url: link.href, line: linkLine });
    }
  }
  return links;
}
