import { describe, it, expect } from "vitest";
import {
  buildDependencyGraph,
  checkCoverage,
  detectCircularDependencies,
  detectConflicts,
  getOrphanedPrinciples,
  validateVersionConsistency,
} from "../src/consistency-checker.js";
import { parseConstitutionContent } from "../src/constitution.js";
import { parsePitchDeckContent } from "../src/pitch-deck.js";
import { SAMPLE_DECK } from "./helpers.js";

const PRODUCT = `---
version: 1.0.0
---
# Product Constitution

## Source

- [Solution](../deck/pitch-deck.md#solution)

## Principle 1: Mobile first

**Rule**: The app MUST work on mobile devices
**Confidence**: 0.85
**Method**: heuristic
**Source**: [Solution](../deck/pitch-deck.md#solution)

## Principle 2: Offline

**Rule**: Listings MUST load offline
`;

const MARKET = `---
version: 0.9.0
---
# Market Constitution

## Source

- [Market Potential](../deck/pitch-deck.md#market-potential)

## Principle 1: Desktop buyers

**Rule**: Sales MUST target desktop users
`;

const FEATURE_A = `# Feature A

- [Mobile first](../memory/product-constitution.md#principle-1-mobile-first)
- [B scope](002-b.md#fp1-scope)
`;

const FEATURE_B = `# Feature B

- [A](../features/001-a.md)
- [Own scope](002-b.md#fp1-scope)
`;

const product = parseConstitutionContent(PRODUCT, "/w/.specify/memory/product-constitution.md");
const market = parseConstitutionContent(MARKET, "/w/.specify/memory/market-constitution.md");
const featureA = parseConstitutionContent(FEATURE_A, "/w/.specify/features/001-a.md");
const featureB = parseConstitutionContent(FEATURE_B, "/w/.specify/features/002-b.md");
const all = [product, market, featureA, featureB];
const deck = parsePitchDeckContent(SAMPLE_DECK, "/w/.specify/deck/pitch-deck.md");

describe("parsed constitutions", () => {
  it("reads principle fields back from the file", () => {
    expect(product.principles[0]).toEqual({
      id: "principle-1-mobile-first",
      title: "Principle 1: Mobile first",
      rule: "The app MUST work on mobile devices",
      sourceLink: "../deck/pitch-deck.md#solution",
      confidence: 0.85,
      method: "heuristic",
    });
    expect(product.principles[1]?.method).toBe("manual");
  });

  it("drops self-references from the link lists", () => {
    expect(featureB.upstreamLinks.map((l) => l.targetFile)).toEqual(["/w/.specify/features/001-a.md"]);
  });
});

describe("detectConflicts", () => {
  it("flags antonyms across strategic constitutions", () => {
    expect(detectConflicts(all)).toEqual([
      {
        constitution: "product-constitution",
        principleId: "principle-1-mobile-first",
        description:
          "product-constitution#principle-1-mobile-first mentions 'mobile' but market-constitution#principle-1-desktop-buyers mentions 'desktop'",
      },
    ]);
  });

  it("ignores principles within one constitution", () => {
    expect(detectConflicts([product])).toEqual([]);
  });
});

describe("checkCoverage", () => {
  it("lists unreferenced deck sections in deck order", () => {
    expect(checkCoverage(deck, all)).toEqual([
      "company-purpose",
      "problem",
      "why-now",
      "competition",
      "product",
      "business-model",
      "team",
      "financials",
    ]);
  });
});

describe("validateVersionConsistency", () => {
  it("reports every constitution not at the deck version", () => {
    expect(validateVersionConsistency(deck, all)).toEqual([
      { constitution: "market-constitution", constitutionVersion: "0.9.0", deckVersion: "1.0.0" },
    ]);
  });
});

describe("circular dependencies", () => {
  it("builds edges between feature constitutions only", () => {
    const graph = buildDependencyGraph(all);
    expect(graph.get("001-a")).toEqual(["002-b"]);
    expect(graph.get("002-b")).toEqual(["001-a"]);
    expect(graph.get("product-constitution")).toEqual([]);
  });

  it("reports a two-node cycle once", () => {
    expect(detectCircularDependencies(all)).toEqual([["001-a", "002-b", "001-a"]]);
  });

  it("finds nothing in an acyclic set", () => {
    expect(detectCircularDependencies([product, featureA])).toEqual([]);
  });
});

describe("getOrphanedPrinciples", () => {
  it("lists strategic principles no link targets", () => {
    expect(getOrphanedPrinciples(all)).toEqual([
      { constitution: "product-constitution", principleId: "principle-2-offline" },
      { constitution: "market-constitution", principleId: "principle-1-desktop-buyers" },
    ]);
  });
});
