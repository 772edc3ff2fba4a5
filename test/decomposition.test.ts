import { describe, it, expect, afterEach } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import {
  decompose,
  existingConstitutions,
  extractionConfidence,
  mapPdfSections,
  pdfToMarkdown,
  unsupportedPdfExtractor,
  type PdfSection,
  type PdfTextExtractor,
} from "../src/decomposition.js";
import { generateConstitutions, isSuccess } from "../src/constitution-generator.js";
import { markdownRenderer, type ConstitutionRenderer } from "../src/templates/constitution.js";
import { parsePitchDeck, parsePitchDeckContent, sectionText } from "../src/pitch-deck.js";
import { parseConstitution } from "../src/constitution.js";
import { createBufferedSink } from "../src/output.js";
import { createScriptedPrompter } from "../src/prompter.js";
import { workspacePaths } from "../src/workspace.js";
import { SEQUOIA_SECTIONS } from "../src/sequoia.js";
import { StructuralError, UserCancelledError, type Warning } from "../src/types.js";
import { SAMPLE_DECK, cleanupFixture, setupFixture } from "./helpers.js";

const FIXTURE = "decomposition-test";
const NOW = new Date(2024, 0, 15);

const FEATURE_FILES = [
  "001-user-registration.md",
  "002-listing-management.md",
  "003-booking-system.md",
  "004-payment-management.md",
  "005-review-management.md",
];

afterEach(() => cleanupFixture(FIXTURE));

function workspaceWithDeck() {
  const dir = setupFixture(FIXTURE, { ".specify/deck/pitch-deck.md": SAMPLE_DECK });
  return workspacePaths(dir);
}

describe("generateConstitutions", () => {
  it("writes four strategic and one file per detected feature", () => {
    const paths = workspaceWithDeck();
    const deck = parsePitchDeck(paths.deckFile);
    const result = generateConstitutions(deck, "from-file", { paths, now: NOW });

    expect(result.errors).toEqual([]);
    expect(isSuccess(result)).toBe(true);
    expect(result.strategicCount).toBe(4);
    expect(result.featureCount).toBe(5);
    expect(result.placeholderCriteriaCount).toBe(5);
    expect(result.createdFiles.slice(4)).toEqual(FEATURE_FILES.map((f) => join(paths.featuresDir, f)));
    for (const file of result.createdFiles) expect(existsSync(file)).toBe(true);
  });

  it("stamps the deck version and generation date", () => {
    const paths = workspaceWithDeck();
    generateConstitutions(parsePitchDeck(paths.deckFile), "from-file", { paths, now: NOW });
    const product = readFileSync(join(paths.memoryDir, "product-constitution.md"), "utf-8");
    expect(product.startsWith("---\nversion: 1.0.0\ncreated: 2024-01-15\nupdated: 2024-01-15\ntype: strategic-constitution\n---\n")).toBe(true);
    expect(product).toContain("- [Solution](../deck/pitch-deck.md#solution)\n- [Product](../deck/pitch-deck.md#product)");
  });

  it("links features to a strategic principle and back", () => {
    const paths = workspaceWithDeck();
    generateConstitutions(parsePitchDeck(paths.deckFile), "from-file", { paths, now: NOW });
    const feature = parseConstitution(join(paths.featuresDir, "001-user-registration.md"));
    expect(feature.kind).toBe("feature");
    const strategicLinks = feature.upstreamLinks.filter((l) => l.type === "feature-to-strategic");
    expect(strategicLinks.map((l) => l.targetFile)).toEqual([join(paths.memoryDir, "product-constitution.md")]);
    expect(strategicLinks[0]?.targetSection).toMatch(/^principle-\d+-user-registration$/);
    const product = parseConstitution(join(paths.memoryDir, "product-constitution.md"));
    expect(product.downstreamLinks.map((l) => l.targetFile)).toContain(join(paths.featuresDir, "001-user-registration.md"));
  });

  it("records render failures and keeps going", () => {
    const paths = workspaceWithDeck();
    const failing: ConstitutionRenderer = {
      renderStrategic: markdownRenderer.renderStrategic,
      renderFeature: () => {
        throw new Error("template missing");
      },
    };
    const result = generateConstitutions(parsePitchDeck(paths.deckFile), "from-file", { paths, renderer: failing, now: NOW });

    expect(isSuccess(result)).toBe(false);
    expect(result.strategicCount).toBe(4);
    expect(result.featureCount).toBe(0);
    expect(result.errors).toHaveLength(5);
    expect(result.errors[0]).toEqual({
      code: "RENDER_FAILED",
      message: `Failed to generate ${join(paths.featuresDir, FEATURE_FILES[0] ?? "")}: template missing`,
      suggestion: "Fix the reported problem and re-run 'deckspec decompose --force'",
      recoverable: true,
      section: "product",
    });
    expect(result.errors[3]?.section).toBe("solution");
  });

  it("writes nothing on a dry run", () => {
    const paths = workspaceWithDeck();
    const result = generateConstitutions(parsePitchDeck(paths.deckFile), "from-file", { paths, dryRun: true, now: NOW });
    expect(result.createdFiles).toHaveLength(9);
    expect(existsSync(paths.memoryDir)).toBe(false);
    expect(existsSync(paths.featuresDir)).toBe(false);
  });

  it("caps the feature count", () => {
    const paths = workspaceWithDeck();
    const result = generateConstitutions(parsePitchDeck(paths.deckFile), "from-file", { paths, maxFeatures: 2, dryRun: true });
    expect(result.featureCount).toBe(2);
  });
});

describe("decompose", () => {
  it("copies a deck from elsewhere into the workspace", async () => {
    const dir = setupFixture(FIXTURE, { "input/deck.md": SAMPLE_DECK });
    const paths = workspacePaths(join(dir, "project"));
    const result = await decompose(
      { kind: "from-file", path: join(dir, "input", "deck.md") },
      { paths, sink: createBufferedSink(), now: NOW },
    );
    expect(result.mode).toBe("from-file");
    expect(readFileSync(paths.deckFile, "utf-8")).toBe(SAMPLE_DECK);
    expect(existingConstitutions(paths)).toHaveLength(4);
  });

  it("refuses to overwrite constitutions unless forced", async () => {
    const paths = workspaceWithDeck();
    const sink = createBufferedSink();
    await decompose({ kind: "from-file", path: paths.deckFile }, { paths, sink, now: NOW });

    await expect(decompose({ kind: "from-file", path: paths.deckFile }, { paths, sink })).rejects.toThrow(
      `4 strategic constitution(s) already exist in ${paths.memoryDir}`,
    );
    const forced = await decompose({ kind: "from-file", path: paths.deckFile }, { paths, sink, force: true, now: NOW });
    expect(isSuccess(forced)).toBe(true);
  });

  it("rejects a deck without the canonical sections", async () => {
    const dir = setupFixture(FIXTURE, { "deck.md": "---\nversion: 1.0.0\n---\n\n## Problem\n\nHosts pay too much.\n" });
    await expect(
      decompose({ kind: "from-file", path: join(dir, "deck.md") }, { paths: workspacePaths(dir), sink: createBufferedSink() }),
    ).rejects.toThrow(
      "Missing required sections: business-model, company-purpose, competition, financials, market-potential, product, solution, team, why-now",
    );
  });

  it("builds the deck from interview answers", async () => {
    const dir = setupFixture(FIXTURE);
    const paths = workspacePaths(dir);
    const answers = SEQUOIA_SECTIONS.map((s) => (s.id === "product" ? "Guests search listings" : ""));
    const prompter = createScriptedPrompter(answers);

    const result = await decompose({ kind: "interactive" }, { paths, sink: createBufferedSink(), prompter, now: NOW });

    expect(prompter.asked).toHaveLength(11);
    expect(prompter.asked.at(-1)).toBe("Proceed with decomposition?");
    expect(result.createdFiles).toContain(join(paths.featuresDir, "001-search-listings.md"));
    const deck = parsePitchDeck(paths.deckFile);
    expect(sectionText(deck, "product")).toBe("Guests search listings");
    expect(sectionText(deck, "team")).toBe("[TBD]");
    expect(deck.metadata.source).toBe("interactive");
  });

  it("cancels when the interview is declined", async () => {
    const paths = workspacePaths(setupFixture(FIXTURE));
    const prompter = createScriptedPrompter(SEQUOIA_SECTIONS.map(() => "x"), [false]);
    await expect(decompose({ kind: "interactive" }, { paths, sink: createBufferedSink(), prompter })).rejects.toBeInstanceOf(
      UserCancelledError,
    );
    expect(existsSync(paths.deckFile)).toBe(false);
  });

  it("decomposes text from a PDF extractor and warns on low confidence", async () => {
    const dir = setupFixture(FIXTURE);
    const paths = workspacePaths(dir);
    const extractor: PdfTextExtractor = {
      extract: async () => [
        { title: "Problem", content: "Travelers overpay for short stays in most cities." },
        { title: "Product", content: "- User registration\n- Booking system" },
        { title: "Cover", content: "Acme Stays" },
      ],
    };
    const warnings: Warning[] = [];

    const result = await decompose(
      { kind: "from-pdf", path: join(dir, "deck.pdf") },
      { paths, sink: createBufferedSink(), pdfExtractor: extractor, warnings, now: NOW },
    );

    expect(result.featureCount).toBe(2);
    expect(warnings.slice(0, 2).map((w) => w.message)).toEqual([
      "Only 3 sections detected (expected 10)",
      `Extraction confidence 50% is low; review ${paths.deckFile} and re-run with --from-file`,
    ]);
    const deck = parsePitchDeck(paths.deckFile);
    expect(sectionText(deck, "company-purpose")).toBe("Acme Stays");
    expect(deck.metadata.source).toBe("PDF extraction");
  });

  it("explains that PDF extraction needs a converted file by default", async () => {
    await expect(unsupportedPdfExtractor.extract("/tmp/deck.pdf")).rejects.toBeInstanceOf(StructuralError);
  });
});

describe("PDF helpers", () => {
  function blocks(n: number, content: string): PdfSection[] {
    return Array.from({ length: n }, (_, i) => ({ title: `Slide ${i + 1}`, content }));
  }

  it("scores extraction confidence from section count and content", () => {
    expect(extractionConfidence([])).toBe(0.5);
    expect(extractionConfidence(blocks(10, "a long enough block of slide text"))).toBe(1);
    expect(extractionConfidence(blocks(5, "a long enough block of slide text"))).toBeCloseTo(0.75);
    expect(extractionConfidence(blocks(12, "short"))).toBeCloseTo(0.8);
  });

  it("maps blocks by title, then fills remaining sections in order", () => {
    expect(
      mapPdfSections([
        { title: "Problem", content: "P" },
        { title: "Intro", content: "I" },
        { title: "Problem", content: "P2" },
      ]),
    ).toEqual({ problem: "P", "company-purpose": "I", solution: "P2" });
  });

  it("renders a full deck with review markers", () => {
    const deck = parsePitchDeckContent(pdfToMarkdown([{ title: "Team", content: "Two founders" }]), "/w/deck.md");
    expect(deck.sections).toHaveLength(10);
    expect(deck.metadata.created).toBe("[NEEDS REVIEW]");
    expect(sectionText(deck, "team")).toBe("Two founders");
  });
});
