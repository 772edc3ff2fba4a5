import { describe, it, expect } from "vitest";
import { buildHeadingIndex, extractLinks, extractSections, slugify } from "../src/markdown-parser.js";

describe("slugify", () => {
  it("lowercases and hyphenates words", () => {
    expect(slugify("Market Size")).toBe("market-size");
  });

  it("drops punctuation", () => {
    expect(slugify("What's the Problem?")).toBe("whats-the-problem");
  });

  it("collapses runs of spaces and hyphens and trims them", () => {
    expect(slugify("  Why -- Now  ")).toBe("why-now");
  });

  it("keeps digits and underscores", () => {
    expect(slugify("Principle 2: Fast_Path")).toBe("principle-2-fast_path");
  });
});

describe("extractSections", () => {
  const doc = "Intro text\n\n# Title\n\nBody line\n\n## Sub Part\n\nMore\n";

  it("drops text before the first heading", () => {
    const sections = extractSections(doc);
    expect(sections.map((s) => s.id)).toEqual(["title", "sub-part"]);
  });

  it("records heading level and trimmed content", () => {
    const [title, sub] = extractSections(doc);
    expect(title).toMatchObject({ title: "Title", level: 1, content: "Body line" });
    expect(sub).toMatchObject({ title: "Sub Part", level: 2, content: "More" });
  });

  it("computes 1-based line ranges", () => {
    const [title, sub] = extractSections(doc);
    expect(title?.lineStart).toBe(3);
    expect(title?.lineEnd).toBe(6);
    expect(sub?.lineStart).toBe(7);
    expect(sub?.lineEnd).toBe(9);
  });

  it("shifts lines by the offset", () => {
    const [title] = extractSections(doc, 4);
    expect(title?.lineStart).toBe(7);
  });

  it("ends a section at the next heading of any depth", () => {
    const sections = extractSections("## A\n\nalpha\n\n### B\n\nbeta\n\n## C\n\ngamma\n");
    expect(sections.map((s) => [s.id, s.content])).toEqual([
      ["a", "alpha"],
      ["b", "beta"],
      ["c", "gamma"],
    ]);
  });

  it("keeps list markup in section content", () => {
    const [product] = extractSections("## Product\n\n- One thing\n- Two things\n");
    expect(product?.content).toBe("- One thing\n- Two things");
  });

  it("returns nothing for a document without headings", () => {
    expect(extractSections("just text\n")).toEqual([]);
  });
});

describe("buildHeadingIndex", () => {
  it("maps heading ids to lines", () => {
    const index = buildHeadingIndex("# One\n\ntext\n\n## Two\n");
    expect(index.get("one")).toBe(1);
    expect(index.get("two")).toBe(5);
  });
});

describe("extractLinks", () => {
  it("finds inline links with their lines", () => {
    const md = "# A\n\nSee [deck](../deck/pitch-deck.md#problem) and\n[other](x.md).\n";
    expect(extractLinks(md)).toEqual([
      { text: "deck", url: "../deck/pitch-deck.md#problem", line: 3 },
      { text: "other", url: "x.md", line: 4 },
    ]);
  });

  it("finds links inside list items", () => {
    const md = "## Dependencies\n\n- [Product](../memory/product-constitution.md#principle-1)\n";
    expect(extractLinks(md)).toEqual([
      { text: "Product", url: "../memory/product-constitution.md#principle-1", line: 3 },
    ]);
  });

  it("skips autolinks", () => {
    expect(extractLinks("Visit <https://example.com> today\n")).toEqual([]);
  });
});
