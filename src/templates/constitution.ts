// src/templates/constitution.ts — Markdown renderers for constitutions
// Output must stay parseable by constitution.ts: principle headings slug to
// "principle-…" or "fp…", rule lines carry MUST, and every traceability link
// is a relative markdown link.

import type {
  DetectedFeature,
  ExtractedEntity,
  Principle,
  SemanticVersion,
  StrategicName,
  SuccessCriterion,
} from "../types.js";
import { renderFrontmatter } from "../frontmatter.js";
import { slugify } from "../markdown-parser.js";
import { STRATEGIC_TITLES, getSectionDefinition, strategicFileName } from "../sequoia.js";

// ─── Inputs ──────────────────────────────────────────────────────────────────

export interface PrincipleRef {
  constitution: StrategicName;
  anchor: string;
  title: string;
}

export interface FeatureRef {
  id: string;
  title: string;
  fileName: string;
}

export interface RenderedPrinciple {
  principle: Principle;
  sectionId: string;
  heading: string;
  anchor: string;
}

export interface StrategicDocument {
  name: StrategicName;
  version: SemanticVersion;
  generated: string;
  sourceSections: string[];
  principles: RenderedPrinciple[];
  downstream: FeatureRef[];
}

export interface FeatureDocument {
  feature: DetectedFeature;
  fileName: string;
  version: SemanticVersion;
  generated: string;
  dependencies: PrincipleRef[];
  entities: ExtractedEntity[];
  criteria: SuccessCriterion[];
}

/** Template-rendering collaborator used by the generator. */
export interface ConstitutionRenderer {
  renderStrategic(doc: StrategicDocument): string;
  renderFeature(doc: FeatureDocument): string;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

const DECK_LINK = "../deck/pitch-deck.md";
const MAX_HEADING_TITLE = 60;

/** Single-line text without markdown links, safe for headings and rule lines. */
export function plainText(text: string): string {
  return text
    .replace(/!?\[([^\]]*)\]\([^)]*\)/g, "$1")
    .replace(/\s+/g, " ")
    .trim();
}

export function headingTitle(text: string): string {
  const plain = plainText(text);
  return plain.length > MAX_HEADING_TITLE ? `${plain.slice(0, MAX_HEADING_TITLE - 3).trimEnd()}...` : plain;
}

/** Heading and anchor for the n-th principle (1-based) of a strategic constitution. */
export function principleHeading(n: number, principle: Principle): { heading: string; anchor: string } {
  const heading = `Principle ${n}: ${headingTitle(principle.title)}`;
  return { heading, anchor: slugify(heading) };
}

function sectionTitle(sectionId: string): string {
  return getSectionDefinition(sectionId)?.title ?? sectionId;
}

function deckLink(sectionId: string): string {
  return `[${sectionTitle(sectionId)}](${DECK_LINK}#${sectionId})`;
}

// ─── Strategic ───────────────────────────────────────────────────────────────

export function renderStrategicConstitution(doc: StrategicDocument): string {
  const title = STRATEGIC_TITLES[doc.name];
  const lines: string[] = [];

  lines.push(
    renderFrontmatter(doc.version, { created: doc.generated, updated: doc.generated, type: "strategic-constitution" }).trimEnd(),
  );
  lines.push("");
  lines.push(`# ${title} Constitution`);
  lines.push("");
  lines.push(`Strategic constraints on every feature, derived from the pitch deck.`);
  lines.push("");
  lines.push("## Source");
  lines.push("");
  for (const sectionId of doc.sourceSections) lines.push(`- ${deckLink(sectionId)}`);
  lines.push("");

  if (doc.principles.length === 0) {
    lines.push("## Open Items");
    lines.push("");
    lines.push("No principles were extracted. Add detail to the source sections and re-run decomposition.");
    lines.push("");
  }

  for (const { principle, sectionId, heading } of doc.principles) {
    lines.push(`## ${heading}`);
    lines.push("");
    lines.push(`**Rule**: ${plainText(principle.rule)}`);
    lines.push("");
    if (principle.rationale) lines.push(`**Rationale**: ${principle.rationale}`);
    lines.push(`**Confidence**: ${principle.confidence.toFixed(2)}`);
    lines.push(`**Method**: ${principle.method}`);
    lines.push(`**Source**: ${deckLink(sectionId)}`);
    lines.push("");
  }

  lines.push("## Traceability");
  lines.push("");
  if (doc.downstream.length === 0) {
    lines.push("No feature constitutions depend on this document yet.");
  } else {
    for (const f of doc.downstream) lines.push(`- [Feature ${f.id}: ${plainText(f.title)}](../features/${f.fileName})`);
  }
  lines.push("");

  return lines.join("\n");
}

// ─── Feature ─────────────────────────────────────────────────────────────────

function renderCriterion(c: SuccessCriterion): string[] {
  switch (c.kind) {
    case "derived":
      return [
        `- **${c.id}**: ${c.text}`,
        `  - Rationale: ${c.rationale}`,
        `  - Test: ${c.test}`,
        `  - Confidence: ${c.confidence.toFixed(2)}`,
      ];
    case "placeholder":
      return [
        `- **${c.id}**: ${c.text}`,
        `  - Business goal: ${c.businessGoal}`,
        ...c.suggestedApproaches.map((a) => `  - Suggested: ${a}`),
      ];
  }
}

export function renderFeatureConstitution(doc: FeatureDocument): string {
  const { feature } = doc;
  const lines: string[] = [];

  lines.push(
    renderFrontmatter(
      doc.version,
      { created: doc.generated, updated: doc.generated, type: "feature-constitution" },
      { feature_id: feature.id, priority: feature.priority },
    ).trimEnd(),
  );
  lines.push("");
  lines.push(`# Feature ${feature.id}: ${plainText(feature.title)}`);
  lines.push("");
  lines.push("## Overview");
  lines.push("");
  lines.push(plainText(feature.description));
  lines.push("");
  lines.push(`**Priority**: ${feature.priority}`);
  lines.push(`**Confidence**: ${feature.confidence.toFixed(2)}`);
  lines.push(`**Source**: ${deckLink(feature.sourceSectionId)}`);
  lines.push("");

  lines.push("## Dependencies");
  lines.push("");
  for (const dep of doc.dependencies) {
    lines.push(`- [${plainText(dep.title)}](../memory/${strategicFileName(dep.constitution)}#${dep.anchor})`);
  }
  lines.push(`- ${deckLink(feature.sourceSectionId)}`);
  lines.push("");

  lines.push("## Entities");
  lines.push("");
  if (doc.entities.length === 0) lines.push("No entities detected for this feature.");
  for (const entity of doc.entities) {
    lines.push(`### ${entity.name}`);
    lines.push("");
    lines.push(`- Rationale: ${entity.rationale}`);
    lines.push(`- Attributes: ${entity.attributes}`);
    lines.push(`- Constraints: ${entity.constraints}`);
    lines.push(`- States: ${entity.states}`);
    for (const rel of entity.relationships) {
      const note = rel.description ? ` (${rel.description})` : "";
      lines.push(`- Relationship: ${rel.type} ${rel.target}${note}`);
    }
    lines.push("");
  }
  if (doc.entities.length === 0) lines.push("");

  lines.push("## Success Criteria");
  lines.push("");
  for (const c of doc.criteria) lines.push(...renderCriterion(c));
  lines.push("");

  const firstDep = doc.dependencies[0];
  lines.push(`## FP1: Scope`);
  lines.push("");
  lines.push(`**Rule**: This feature MUST deliver: ${plainText(feature.description)}`);
  lines.push("");
  lines.push(`## FP2: Strategic Alignment`);
  lines.push("");
  if (firstDep) {
    lines.push(`**Rule**: Behaviour MUST stay consistent with ${plainText(firstDep.title)}`);
  } else {
    lines.push(`**Rule**: Behaviour MUST stay consistent with the ${sectionTitle(feature.sourceSectionId)} section of the pitch deck`);
  }
  lines.push("");

  return lines.join("\n");
}

export const markdownRenderer: ConstitutionRenderer = {
  renderStrategic: renderStrategicConstitution,
  renderFeature: renderFeatureConstitution,
};
