// src/extractors/feature-detector.ts — Feature Detector
// Candidate features from Product and Solution text. Each pass is independent;
// the orchestrator merges, caps and ranks them.

import type { DetectedFeature, FeaturePriority, Warning } from "../types.js";
import { loadVocabulary } from "../vocabulary.js";
import { BULLET_PATTERN } from "./principle-extractor.js";

export type FeatureCandidate = Omit<DetectedFeature, "id" | "priority">;

export type FeaturePass = (productText: string, solutionText: string) => FeatureCandidate[];

export const DEFAULT_MAX_FEATURES = 10;

const BULLET_CONFIDENCE = 0.85;
const ACTION_VERB_CONFIDENCE = 0.7;
const KEYWORD_CONFIDENCE = 0.6;

// ─── Text helpers ────────────────────────────────────────────────────────────

export function toKebabCase(text: string): string {
  return text
    .replace(/[^\w\s-]/g, "")
    .replace(/\s+/g, "-")
    .toLowerCase()
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/** First letter upper, the rest lower. */
export function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Feature title from a bullet: strip a feature/capability/component prefix,
 * keep the first four words, drop punctuation. Null when too short.
 */
export function featureTitleFromBullet(content: string): string | null {
  const stripped = content.replace(/^(feature:|capability:|component:)\s*/i, "");
  const title = stripped
    .split(/\s+/)
    .filter(Boolean)
    .slice(0, 4)
    .join(" ")
    .replace(/[^\w\s-]/g, "")
    .trim();
  return title.length > 3 ? title : null;
}

// ─── Passes ──────────────────────────────────────────────────────────────────

function bulletCandidates(text: string, sectionId: string): FeatureCandidate[] {
  const candidates: FeatureCandidate[] = [];
  for (const line of text.split("\n")) {
    const match = BULLET_PATTERN.exec(line);
    if (!match) continue;
    const content = (match[1] ?? match[2] ?? "").trim();
    if (content.length <= 5) continue;
    const title = featureTitleFromBullet(content);
    if (!title) continue;
    candidates.push({
      name: toKebabCase(title),
      title,
      description: content,
      sourceSectionId: sectionId,
      confidence: BULLET_CONFIDENCE,
      keywords: [title.toLowerCase()],
    });
  }
  return candidates;
}

const productBullets: FeaturePass = (product) => bulletCandidates(product, "product");

const solutionBullets: FeaturePass = (_product, solution) => bulletCandidates(solution, "solution");

const actionVerbs: FeaturePass = (product) => {
  const candidates: FeatureCandidate[] = [];
  for (const verb of loadVocabulary().actionVerbs) {
    const regex = new RegExp(`\\b${escapeRegExp(verb)}\\s+(\\w+(?:\\s+\\w+)?)`, "gi");
    for (const match of product.matchAll(regex)) {
      const object = match[1] ?? "";
      const title = `${capitalize(verb)} ${capitalize(object)}`;
      candidates.push({
        name: toKebabCase(title),
        title,
        description: `Feature: ${title}`,
        sourceSectionId: "product",
        confidence: ACTION_VERB_CONFIDENCE,
        keywords: [verb, object.toLowerCase()],
      });
    }
  }
  return candidates;
};

const keywordMatches: FeaturePass = (_product, solution) => {
  const candidates: FeatureCandidate[] = [];
  for (const keyword of loadVocabulary().featureKeywords) {
    const regex = new RegExp(`\\b${escapeRegExp(keyword)}(?:s)?\\b`, "i");
    if (!regex.test(solution)) continue;
    const title = `${capitalize(keyword)} Management`;
    candidates.push({
      name: toKebabCase(title),
      title,
      description: `Feature: ${title}`,
      sourceSectionId: "solution",
      confidence: KEYWORD_CONFIDENCE,
      keywords: [keyword],
    });
  }
  return candidates;
};

/** Passes in tie-break order: earlier passes win confidence ties. */
const FEATURE_PASSES: Record<string, FeaturePass> = {
  productBullets,
  solutionBullets,
  actionVerbs,
  keywordMatches,
};

// ─── Ranking ─────────────────────────────────────────────────────────────────

function byConfidenceDesc(a: FeatureCandidate, b: FeatureCandidate): number {
  return b.confidence - a.confidence;
}

export function priorityForRank(rank: number): FeaturePriority {
  if (rank < 3) return "P1";
  if (rank < 7) return "P2";
  return "P3";
}

/**
 * Dedupe by name, cap to the highest-confidence `max`, then rank by
 * confidence and assign priorities and sequential ids. Sorting is stable.
 */
export function rankFeatures(candidates: FeatureCandidate[], max = DEFAULT_MAX_FEATURES): DetectedFeature[] {
  const seen = new Set<string>();
  let unique = candidates.filter((c) => {
    const key = c.name.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  if (unique.length > max) unique = [...unique].sort(byConfidenceDesc).slice(0, max);

  return [...unique].sort(byConfidenceDesc).map((c, i) => ({
    ...c,
    id: String(i + 1).padStart(3, "0"),
    priority: priorityForRank(i),
  }));
}

/**
 * Detect candidate features. A failing pass is reported as a warning and
 * the remaining passes still run.
 */
export function detectFeatures(
  productText: string,
  solutionText: string,
  options: { max?: number; warnings?: Warning[] } = {},
): DetectedFeature[] {
  const candidates: FeatureCandidate[] = [];
  for (const [name, pass] of Object.entries(FEATURE_PASSES)) {
    try {
      candidates.push(...pass(productText, solutionText));
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      options.warnings?.push({
        level: "warn",
        module: "feature-detector",
        message: `Feature pass "${name}" failed: ${msg}`,
      });
    }
  }
  return rankFeatures(candidates, options.max ?? DEFAULT_MAX_FEATURES);
}
