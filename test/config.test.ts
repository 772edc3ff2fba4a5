import { describe, it, expect, afterEach } from "vitest";
import { join } from "node:path";
import { parseCliArgs, resolveConfig } from "../src/config.js";
import { selectMode } from "../src/bin/decompose.js";
import { workspacePaths } from "../src/workspace.js";
import { StructuralError, type Warning } from "../src/types.js";
import { SAMPLE_DECK, cleanupFixture, setupFixture } from "./helpers.js";

const FIXTURE = "config-test";

afterEach(() => cleanupFixture(FIXTURE));

describe("parseCliArgs", () => {
  it("takes the first positional as the command", async () => {
    const args = await parseCliArgs(["decompose", "--from-file", "deck.md", "--dry-run", "-v"]);
    expect(args.command).toBe("decompose");
    expect(args.fromFile).toBe("deck.md");
    expect(args.dryRun).toBe(true);
    expect(args.verbose).toBe(true);
    expect(args.force).toBe(false);
  });

  it("reads short aliases and string flags", async () => {
    const args = await parseCliArgs(["clarify", "-s", "problem", "-c", "cfg.json", "--dir", "app"]);
    expect(args).toMatchObject({ command: "clarify", section: "problem", config: "cfg.json", dir: "app" });
  });

  it("treats a string flag without a value as absent", async () => {
    const args = await parseCliArgs(["decompose", "--from-pdf"]);
    expect(args.fromPdf).toBeUndefined();
  });
});

describe("resolveConfig", () => {
  it("uses defaults without a config file", async () => {
    const dir = setupFixture(FIXTURE);
    const config = resolveConfig(await parseCliArgs([]), [], dir);
    expect(config).toEqual({
      projectDir: dir,
      specDir: ".specify",
      exclude: [],
      maxQuestions: 5,
      maxFeatures: 10,
      verbose: false,
      quiet: false,
    });
  });

  it("reads deckspec.config.json", async () => {
    const dir = setupFixture(FIXTURE, {
      "deckspec.config.json": JSON.stringify({ specDir: "specs", maxFeatures: 3, exclude: ["features/9*"] }),
    });
    const config = resolveConfig(await parseCliArgs([]), [], dir);
    expect(config).toMatchObject({ specDir: "specs", maxFeatures: 3, exclude: ["features/9*"] });
  });

  it("falls back to the package.json key", async () => {
    const dir = setupFixture(FIXTURE, {
      "package.json": JSON.stringify({ name: "startup", deckspec: { maxQuestions: 2, verbose: true } }),
    });
    const config = resolveConfig(await parseCliArgs([]), [], dir);
    expect(config.maxQuestions).toBe(2);
    expect(config.verbose).toBe(true);
  });

  it("warns about and ignores an invalid config", async () => {
    const dir = setupFixture(FIXTURE, { "deckspec.config.json": JSON.stringify({ maxFeatures: 0 }) });
    const warnings: Warning[] = [];
    const config = resolveConfig(await parseCliArgs([]), warnings, dir);
    expect(config.maxFeatures).toBe(10);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.message.startsWith(`Ignoring invalid config ${join(dir, "deckspec.config.json")}: maxFeatures:`)).toBe(true);
  });

  it("rejects unknown keys", async () => {
    const dir = setupFixture(FIXTURE, { "deckspec.config.json": JSON.stringify({ colour: "blue" }) });
    const warnings: Warning[] = [];
    resolveConfig(await parseCliArgs([]), warnings, dir);
    expect(warnings[0]?.message).toContain("Ignoring invalid config");
  });

  it("warns about unreadable JSON", async () => {
    const dir = setupFixture(FIXTURE, { "deckspec.config.json": "{ not json" });
    const warnings: Warning[] = [];
    resolveConfig(await parseCliArgs([]), warnings, dir);
    expect(warnings[0]?.message.startsWith(`Failed to parse config file ${join(dir, "deckspec.config.json")}`)).toBe(true);
  });

  it("warns about a missing explicit config", async () => {
    const dir = setupFixture(FIXTURE);
    const warnings: Warning[] = [];
    resolveConfig(await parseCliArgs(["--config", "nope.json"]), warnings, dir);
    expect(warnings.map((w) => w.message)).toEqual(["Config file not found: nope.json"]);
  });

  it("resolves --dir against the working directory and lets -v win", async () => {
    const dir = setupFixture(FIXTURE, { "app/deckspec.config.json": JSON.stringify({ verbose: false }) });
    const config = resolveConfig(await parseCliArgs(["--dir", "app", "-v", "-q"]), [], dir);
    expect(config.projectDir).toBe(join(dir, "app"));
    expect(config.verbose).toBe(true);
    expect(config.quiet).toBe(true);
  });
});

describe("selectMode", () => {
  it("rejects more than one mode flag", async () => {
    const paths = workspacePaths(setupFixture(FIXTURE));
    const args = await parseCliArgs(["decompose", "--interactive", "--from-file", "deck.md"]);
    expect(() => selectMode(args, paths)).toThrow(StructuralError);
  });

  it("resolves file flags against the working directory", async () => {
    const dir = setupFixture(FIXTURE);
    const paths = workspacePaths(dir);
    const args = await parseCliArgs(["decompose", "--from-pdf", "deck.pdf"]);
    expect(selectMode(args, paths, dir)).toEqual({ kind: "from-pdf", path: join(dir, "deck.pdf") });
  });

  it("falls back to the workspace deck", async () => {
    const paths = workspacePaths(setupFixture(FIXTURE, { ".specify/deck/pitch-deck.md": SAMPLE_DECK }));
    expect(selectMode(await parseCliArgs(["decompose"]), paths)).toEqual({ kind: "from-file", path: paths.deckFile });
  });

  it("explains what to do without any deck", async () => {
    const paths = workspacePaths(setupFixture(FIXTURE));
    const args = await parseCliArgs(["decompose"]);
    expect(() => selectMode(args, paths)).toThrow(`No pitch deck at ${paths.deckFile}`);
  });
});
