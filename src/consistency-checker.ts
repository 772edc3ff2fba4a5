// src/consistency-checker.ts — Graph checks over parsed constitutions
// Conflicts, deck coverage, version consistency, circular feature
// dependencies and orphaned strategic principles. All checks are pure.

import type {
  ConflictRecord,
  Constitution,
  OrphanedPrinciple,
  PitchDeck,
  Principle,
  VersionMismatch,
} from "./types.js";
import { formatVersion, versionsEqual } from "./version-tracker.js";
import { fileStem } from "./fs-utils.js";

// ─── Conflicts ───────────────────────────────────────────────────────────────

/** Antonym pairs checked as case-insensitive substrings. */
export const CONFLICT_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ["mobile", "desktop"],
  ["b2b", "b2c"],
  ["enterprise", "consumer"],
  ["free", "paid"],
  ["freemium", "paid-only"],
  ["self-service", "sales-led"],
  ["low-price", "premium"],
  ["fast", "thorough"],
  ["simple", "feature-rich"],
];

function principleText(p: Principle): string {
  return `${p.rule} ${p.title}`.toLowerCase();
}

function opposingWords(t1: string, t2: string, [w1, w2]: readonly [string, string]): [string, string] | null {
  if (t1.includes(w1) && t2.includes(w2)) return [w1, w2];
  if (t1.includes(w2) && t2.includes(w1)) return [w2, w1];
  return null;
}

/**
 * Lexical conflicts between principles of different strategic constitutions.
 * Each pair of constitutions is visited once; each antonym pair is checked in
 * both directions.
 */
export function detectConflicts(constitutions: Constitution[]): ConflictRecord[] {
  const strategic = constitutions.filter((c) => c.kind === "strategic");
  const conflicts: ConflictRecord[] = [];

  for (let i = 0; i < strategic.length; i++) {
    for (let j = i + 1; j < strategic.length; j++) {
      const a = strategic[i];
      const b = strategic[j];
      if (!a || !b) continue;
      for (const p1 of a.principles) {
        const t1 = principleText(p1);
        for (const p2 of b.principles) {
          const t2 = principleText(p2);
          for (const pair of CONFLICT_PAIRS) {
            const words = opposingWords(t1, t2, pair);
            if (!words) continue;
            conflicts.push({
              constitution: a.name,
              principleId: p1.id,
              description: `${a.name}#${p1.id} mentions '${words[0]}' but ${b.name}#${p2.id} mentions '${words[1]}'`,
            });
          }
        }
      }
    }
  }
  return conflicts;
}

// ─── Coverage ────────────────────────────────────────────────────────────────

/**
 * Deck section ids that no constitution links to, in deck order.
 */
export function checkCoverage(deck: PitchDeck, constitutions: Constitution[]): string[] {
  const referenced = new Set<string>();
  for (const c of constitutions) {
    for (const link of c.upstreamLinks) {
      if (link.targetSection) referenced.add(link.targetSection);
    }
  }
  return deck.sections.map((s) => s.id).filter((id) => !referenced.has(id));
}

// ─── Versions ────────────────────────────────────────────────────────────────

/** Exact equality with the deck version; anything else is a mismatch. */
export function validateVersionConsistency(deck: PitchDeck, constitutions: Constitution[]): VersionMismatch[] {
  return constitutions
    .filter((c) => !versionsEqual(c.version, deck.version))
    .map((c) => ({
      constitution: c.name,
      constitutionVersion: formatVersion(c.version),
      deckVersion: formatVersion(deck.version),
    }));
}

// ─── Cycles ──────────────────────────────────────────────────────────────────

const FEATURES_MARKER = /(^|[\\/])features[\\/]/;

/**
 * Adjacency list keyed by constitution name. Edges follow upstream links into
 * other feature constitutions; self-references are not edges.
 */
export function buildDependencyGraph(constitutions: Constitution[]): Map<string, string[]> {
  const graph = new Map<string, string[]>();
  for (const c of constitutions) {
    const edges: string[] = [];
    for (const link of c.upstreamLinks) {
      if (!FEATURES_MARKER.test(link.targetFile)) continue;
      const target = fileStem(link.targetFile);
      if (target !== c.name && !edges.includes(target)) edges.push(target);
    }
    graph.set(c.name, edges);
  }
  return graph;
}

interface Frame {
  node: string;
  next: number;
}

/**
 * Depth-first search with an explicit stack. A back edge to a node on the
 * current path yields the cycle from that node round to itself.
 */
export function detectCircularDependencies(constitutions: Constitution[]): string[][] {
  const graph = buildDependencyGraph(constitutions);
  const visited = new Set<string>();
  const onPath = new Set<string>();
  const cycles: string[][] = [];

  for (const start of graph.keys()) {
    if (visited.has(start)) continue;

    const path: string[] = [start];
    const stack: Frame[] = [{ node: start, next: 0 }];
    visited.add(start);
    onPath.add(start);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (!frame) break;
      const neighbors = graph.get(frame.node) ?? [];
      const neighbor = neighbors[frame.next];

      if (neighbor === undefined) {
        stack.pop();
        path.pop();
        onPath.delete(frame.node);
        continue;
      }
      frame.next++;

      if (onPath.has(neighbor)) {
        cycles.push([...path.slice(path.indexOf(neighbor)), neighbor]);
      } else if (!visited.has(neighbor)) {
        visited.add(neighbor);
        onPath.add(neighbor);
        path.push(neighbor);
        stack.push({ node: neighbor, next: 0 });
      }
    }
  }
  return cycles;
}

// ─── Orphans ─────────────────────────────────────────────────────────────────

/**
 * Strategic principles that no upstream link targets by (file stem, section).
 */
export function getOrphanedPrinciples(constitutions: Constitution[]): OrphanedPrinciple[] {
  const referenced = new Set<string>();
  for (const c of constitutions) {
    for (const link of c.upstreamLinks) {
      if (link.targetSection) referenced.add(`${fileStem(link.targetFile)}#${link.targetSection}`);
    }
  }

  const orphans: OrphanedPrinciple[] = [];
  for (const c of constitutions) {
    if (c.kind !== "strategic") continue;
    for (const p of c.principles) {
      if (!referenced.has(`${c.name}#${p.id}`)) orphans.push({ constitution: c.name, principleId: p.id });
    }
  }
  return orphans;
}
