// src/constitution-generator.ts — Constitution Generator
// Runs the extractors against the section→constitution mapping and writes
// 4 strategic and up to maxFeatures feature constitutions through a renderer.

import { join } from "node:path";
import type {
  DecompositionError,
  DecompositionMode,
  DecompositionResult,
  DetectedFeature,
  PitchDeck,
  Principle,
  StrategicName,
  Warning,
} from "./types.js";
import { writeFileSafe, dateStamp } from "./fs-utils.js";
import { extractLinks } from "./markdown-parser.js";
import { sectionText } from "./pitch-deck.js";
import { STRATEGIC_NAMES, STRATEGIC_SOURCES } from "./sequoia.js";
import {
  dedupePrinciples,
  enrichWithRationale,
  extractBulletPrinciples,
  extractPrinciples,
  hasBulletList,
} from "./extractors/principle-extractor.js";
import { DEFAULT_MAX_FEATURES, detectFeatures } from "./extractors/feature-detector.js";
import { entitiesForFeature, extractEntities } from "./extractors/entity-extractor.js";
import { generateSuccessCriteria } from "./extractors/success-criteria.js";
import {
  markdownRenderer,
  principleHeading,
  type ConstitutionRenderer,
  type FeatureDocument,
  type FeatureRef,
  type PrincipleRef,
  type RenderedPrinciple,
  type StrategicDocument,
} from "./templates/constitution.js";
import { featureFileName, strategicPath, type WorkspacePaths } from "./workspace.js";

export interface GenerateOptions {
  paths: WorkspacePaths;
  renderer?: ConstitutionRenderer;
  dryRun?: boolean;
  maxFeatures?: number;
  warnings?: Warning[];
  now?: Date;
}

const MAX_DEPENDENCIES = 3;
const MIN_KEYWORD_LENGTH = 4;

// ─── Strategic principles ────────────────────────────────────────────────────

function sectionIdOf(principle: Principle): string {
  const hash = principle.sourceLink.indexOf("#");
  return hash === -1 ? "" : principle.sourceLink.slice(hash + 1);
}

/**
 * Principles of one strategic constitution. List-formatted sections yield one
 * principle per item; prose goes through the sentence patterns. Ids restart
 * at 001 for each constitution.
 */
export function strategicPrinciples(deck: PitchDeck, name: StrategicName): RenderedPrinciple[] {
  const collected: Principle[] = [];
  for (const sectionId of STRATEGIC_SOURCES[name]) {
    const text = sectionText(deck, sectionId);
    const found = hasBulletList(text) ? extractBulletPrinciples(text, sectionId) : extractPrinciples(text, sectionId);
    collected.push(...found.map((p) => enrichWithRationale(p, sectionId)));
  }
  return dedupePrinciples(collected).map((principle, i) => {
    const { heading, anchor } = principleHeading(i + 1, principle);
    return { principle, sectionId: sectionIdOf(principle), heading, anchor };
  });
}

/**
 * Strategic principles sharing a keyword with the feature, product first.
 * Falls back to the first product principle.
 */
export function featureDependencies(
  feature: DetectedFeature,
  strategic: ReadonlyMap<StrategicName, RenderedPrinciple[]>,
): PrincipleRef[] {
  const keywords = [...feature.keywords, ...feature.title.split(/\s+/)]
    .map((k) => k.toLowerCase())
    .filter((k) => k.length >= MIN_KEYWORD_LENGTH);

  const order: StrategicName[] = ["product", ...STRATEGIC_NAMES.filter((n) => n !== "product")];
  const deps: PrincipleRef[] = [];
  for (const name of order) {
    for (const rendered of strategic.get(name) ?? []) {
      if (deps.length >= MAX_DEPENDENCIES) return deps;
      const text = `${rendered.principle.title} ${rendered.principle.rule}`.toLowerCase();
      if (keywords.some((k) => text.includes(k))) {
        deps.push({ constitution: name, anchor: rendered.anchor, title: rendered.principle.title });
      }
    }
  }
  if (deps.length > 0) return deps;

  const first = strategic.get("product")?.[0];
  return first ? [{ constitution: "product", anchor: first.anchor, title: first.principle.title }] : [];
}

// ─── Generation ──────────────────────────────────────────────────────────────

function emptyResult(mode: DecompositionMode["kind"], dryRun: boolean, warnings: Warning[]): DecompositionResult {
  return {
    mode,
    dryRun,
    createdFiles: [],
    strategicCount: 0,
    featureCount: 0,
    principleCount: 0,
    linkCount: 0,
    entityCount: 0,
    derivedCriteriaCount: 0,
    placeholderCriteriaCount: 0,
    warnings,
    errors: [],
  };
}

export function isSuccess(result: DecompositionResult): boolean {
  return result.errors.length === 0;
}

/**
 * Generate every constitution for a deck. A render or write failure for one
 * file is recorded as a recoverable error and the rest are still produced.
 */
export function generateConstitutions(
  deck: PitchDeck,
  mode: DecompositionMode["kind"],
  options: GenerateOptions,
): DecompositionResult {
  const renderer = options.renderer ?? markdownRenderer;
  const dryRun = options.dryRun ?? false;
  const warnings = options.warnings ?? [];
  const generated = dateStamp(options.now);
  const result = emptyResult(mode, dryRun, warnings);

  const emit = (filePath: string, render: () => string, section?: string) => {
    try {
      const markdown = render();
      result.linkCount += extractLinks(markdown).length;
      if (!dryRun) writeFileSafe(filePath, markdown);
      result.createdFiles.push(filePath);
      return true;
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      const error: DecompositionError = {
        code: "RENDER_FAILED",
        message: `Failed to generate ${filePath}: ${msg}`,
        suggestion: "Fix the reported problem and re-run 'deckspec decompose --force'",
        recoverable: true,
      };
      if (section) error.section = section;
      result.errors.push(error);
      return false;
    }
  };

  // Strategic principles first: features link to them.
  const strategic = new Map<StrategicName, RenderedPrinciple[]>();
  for (const name of STRATEGIC_NAMES) {
    strategic.set(name, strategicPrinciples(deck, name));
  }

  const productText = sectionText(deck, "product");
  const solutionText = sectionText(deck, "solution");
  const businessText = sectionText(deck, "business-model");

  const features = detectFeatures(productText, solutionText, {
    max: options.maxFeatures ?? DEFAULT_MAX_FEATURES,
    warnings,
  });
  if (features.length === 0) {
    warnings.push({
      level: "warn",
      module: "constitution-generator",
      message: "No features detected in the Product or Solution sections",
      file: deck.path,
    });
  }
  const entities = extractEntities(productText, solutionText, businessText);

  const featureDocs: FeatureDocument[] = features.map((feature) => ({
    feature,
    fileName: featureFileName(feature),
    version: deck.version,
    generated,
    dependencies: featureDependencies(feature, strategic),
    entities: entitiesForFeature(feature, entities),
    criteria: generateSuccessCriteria({
      featureId: feature.id,
      featureTitle: feature.title,
      businessText,
      productText,
    }),
  }));

  for (const name of STRATEGIC_NAMES) {
    const principles = strategic.get(name) ?? [];
    const downstream: FeatureRef[] = featureDocs
      .filter((doc) => doc.dependencies.some((d) => d.constitution === name))
      .map((doc) => ({ id: doc.feature.id, title: doc.feature.title, fileName: doc.fileName }));
    const doc: StrategicDocument = {
      name,
      version: deck.version,
      generated,
      sourceSections: [...STRATEGIC_SOURCES[name]],
      principles,
      downstream,
    };
    if (emit(strategicPath(options.paths, name), () => renderer.renderStrategic(doc))) {
      result.strategicCount++;
      result.principleCount += principles.length;
    }
  }

  for (const doc of featureDocs) {
    if (!emit(join(options.paths.featuresDir, doc.fileName), () => renderer.renderFeature(doc), doc.feature.sourceSectionId)) {
      continue;
    }
    result.featureCount++;
    result.entityCount += doc.entities.length;
    for (const c of doc.criteria) {
      if (c.kind === "derived") result.derivedCriteriaCount++;
      else result.placeholderCriteriaCount++;
    }
  }

  return result;
}
