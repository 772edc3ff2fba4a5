// src/extractors/principle-extractor.ts — Principle Extractor
// Sentence-level regex signals, each with a fixed base confidence.

import type { Principle, PrincipleSignal } from "../types.js";
import { sectionRationale } from "../sequoia.js";

interface PrinciplePattern {
  signal: PrincipleSignal;
  regex: RegExp;
  confidence: number;
  /** "match" keeps only the captured span; "sentence" keeps the whole sentence. */
  keep: "match" | "sentence";
  description: string;
}

// Order matters: principles are emitted per sentence in this order.
export const PRINCIPLE_PATTERNS: readonly PrinciplePattern[] = [
  {
    signal: "value-prop",
    regex: /\b([A-Z][A-Z\s]{2,}[A-Z])\b/g,
    confidence: 0.85,
    keep: "match",
    description: "ALL-CAPS emphasis marking a value proposition",
  },
  {
    signal: "numeric-constraint",
    regex: /(\d+(?:\.\d+)?%?\s*(?:commission|fee|rate|percent|margin|of|users|customers|revenue))/gi,
    confidence: 0.9,
    keep: "sentence",
    description: "Numeric business constraint or metric",
  },
  {
    signal: "comparative",
    regex: /\b(better|cheaper|faster|easier|more|less|superior|compared to|than|vs\.?)\s+\w+/gi,
    confidence: 0.75,
    keep: "sentence",
    description: "Comparative statement of competitive advantage",
  },
  {
    signal: "imperative",
    regex: /\b(must|ensure|require|should|need to|will|guarantee|maintain)\s+\w+/gi,
    confidence: 0.8,
    keep: "sentence",
    description: "Imperative statement of a requirement",
  },
  {
    signal: "market-number",
    regex: /([\d,]+(?:\.\d+)?(?:\s*(?:million|billion|thousand|M|B|K))?\s*(?:users|customers|people|businesses|market|revenue|\$))/gi,
    confidence: 0.85,
    keep: "match",
    description: "Market size or user metric",
  },
];

export const BULLET_PATTERN = /^[\s]*[-*•][\s]+(.+)$|^[\s]*\d+\.[\s]+(.+)$/;

const MAX_SENTENCE_LENGTH = 200;
const BULLET_CONFIDENCE = 0.75;

export function splitSentences(text: string): string[] {
  return text
    .split(/[.!?]+\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 10);
}

export function principleId(n: number): string {
  return `principle-${String(n).padStart(3, "0")}`;
}

/** Rule statement for a principle text. Text already phrased with MUST is kept as-is. */
export function ruleStatement(text: string): string {
  return /\bmust\b/i.test(text) ? text : `Decisions MUST uphold: ${text}`;
}

function makePrinciple(text: string, sectionId: string, confidence: number, signal: PrincipleSignal): Principle {
  return {
    id: "",
    title: text,
    rule: ruleStatement(text),
    sourceLink: `pitch-deck.md#${sectionId}`,
    confidence,
    method: "heuristic",
    signal,
  };
}

function normalizeForDedupe(text: string): string {
  return text.toLowerCase().trim().replace(/[.,;:!?]/g, "");
}

/** Drop case/punctuation duplicates (first wins) and number the survivors. */
export function dedupePrinciples(principles: Principle[]): Principle[] {
  const seen = new Set<string>();
  const kept: Principle[] = [];
  for (const p of principles) {
    const key = normalizeForDedupe(p.title);
    if (seen.has(key)) continue;
    seen.add(key);
    kept.push({ ...p, id: principleId(kept.length + 1) });
  }
  return kept;
}

/**
 * Extract principles from free text. Zero matches yields an empty list.
 */
export function extractPrinciples(text: string, sectionId: string): Principle[] {
  const found: Principle[] = [];
  for (const sentence of splitSentences(text)) {
    for (const pattern of PRINCIPLE_PATTERNS) {
      for (const match of sentence.matchAll(pattern.regex)) {
        let statement: string;
        if (pattern.keep === "match") {
          statement = (match[1] ?? match[0]).trim();
        } else {
          if (sentence.length > MAX_SENTENCE_LENGTH) continue;
          statement = sentence;
        }
        if (statement) found.push(makePrinciple(statement, sectionId, pattern.confidence, pattern.signal));
      }
    }
  }
  return dedupePrinciples(found);
}

/**
 * One principle per bullet or numbered list item longer than five characters.
 */
export function extractBulletPrinciples(text: string, sectionId: string): Principle[] {
  const found: Principle[] = [];
  for (const line of text.split("\n")) {
    const match = BULLET_PATTERN.exec(line);
    if (!match) continue;
    const content = (match[1] ?? match[2] ?? "").trim();
    if (content.length > 5) found.push(makePrinciple(content, sectionId, BULLET_CONFIDENCE, "bullet"));
  }
  return found.map((p, i) => ({ ...p, id: principleId(i + 1) }));
}

export function hasBulletList(text: string): boolean {
  return text.split("\n").some((line) => BULLET_PATTERN.test(line));
}

export function enrichWithRationale(principle: Principle, sectionId: string): Principle {
  return { ...principle, rationale: sectionRationale(sectionId) };
}
