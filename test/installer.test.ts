import { describe, it, expect, afterEach } from "vitest";
import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { RollbackJournal, TEMPLATE_FILES, checkWorkspace, installWorkspace } from "../src/installer.js";
import { workspaceDirectories, workspacePaths } from "../src/workspace.js";
import { createBufferedSink } from "../src/output.js";
import { InstallationError } from "../src/types.js";
import { cleanupFixture, setupFixture } from "./helpers.js";

const FIXTURE = "installer-test";

afterEach(() => cleanupFixture(FIXTURE));

describe("RollbackJournal", () => {
  it("undoes creations newest first", () => {
    const dir = setupFixture(FIXTURE);
    const journal = new RollbackJournal();
    const a = join(dir, "a");
    const b = join(a, "b");
    const f = join(b, "f.md");
    journal.createDir(a);
    journal.createDir(b);
    journal.createFile(f, (p) => writeFileSync(p, "x"));
    expect(journal.size).toBe(3);

    expect(journal.rollback()).toEqual({ removed: [f, b, a], skipped: [] });
    expect(existsSync(a)).toBe(false);
  });

  it("never journals paths that already existed", () => {
    const dir = setupFixture(FIXTURE, { "keep.md": "mine" });
    const journal = new RollbackJournal();
    journal.createDir(dir);
    journal.createFile(join(dir, "keep.md"), (p) => writeFileSync(p, "theirs"));
    expect(journal.size).toBe(0);
  });

  it("removes a new file whose write failed part way", () => {
    const dir = setupFixture(FIXTURE);
    const journal = new RollbackJournal();
    const partial = join(dir, "partial.md");
    expect(() =>
      journal.createFile(partial, (p) => {
        writeFileSync(p, "half");
        throw new Error("ENOSPC: no space left on device");
      }),
    ).toThrow("ENOSPC");

    expect(journal.rollback()).toEqual({ removed: [partial], skipped: [] });
    expect(existsSync(partial)).toBe(false);
  });

  it("skips a journaled file that was never written", () => {
    const dir = setupFixture(FIXTURE);
    const journal = new RollbackJournal();
    expect(() =>
      journal.createFile(join(dir, "never.md"), () => {
        throw new Error("EACCES: permission denied");
      }),
    ).toThrow("EACCES");
    expect(journal.rollback()).toEqual({ removed: [], skipped: [] });
  });

  it("leaves directories that gained other files", () => {
    const dir = setupFixture(FIXTURE);
    const journal = new RollbackJournal();
    const created = join(dir, "created");
    journal.createDir(created);
    writeFileSync(join(created, "user-file.md"), "x");

    expect(journal.rollback()).toEqual({ removed: [], skipped: [created] });
    expect(existsSync(created)).toBe(true);
  });

  it("forgets everything on commit", () => {
    const dir = setupFixture(FIXTURE);
    const journal = new RollbackJournal();
    journal.createDir(join(dir, "x"));
    journal.commit();
    expect(journal.rollback()).toEqual({ removed: [], skipped: [] });
    expect(existsSync(join(dir, "x"))).toBe(true);
  });
});

describe("installWorkspace", () => {
  it("creates every directory and template", () => {
    const paths = workspacePaths(setupFixture(FIXTURE));
    const result = installWorkspace(paths, { sink: createBufferedSink() });

    expect(result.created).toEqual([
      ...workspaceDirectories(paths),
      ...TEMPLATE_FILES.map((name) => join(paths.templatesDir, name)),
    ]);
    expect(checkWorkspace(paths).every((c) => c.present)).toBe(true);
  });

  it("keeps existing templates unless forced", () => {
    const paths = workspacePaths(setupFixture(FIXTURE));
    installWorkspace(paths, { sink: createBufferedSink() });

    const again = installWorkspace(paths, { sink: createBufferedSink() });
    expect(again.created).toEqual([]);
    expect(again.skipped).toHaveLength(3);

    const forced = installWorkspace(paths, { sink: createBufferedSink(), force: true });
    expect(forced.overwritten).toHaveLength(3);
  });

  it("rolls back what it created when a template cannot be copied", () => {
    const dir = setupFixture(FIXTURE);
    const paths = workspacePaths(dir);
    const sink = createBufferedSink();

    let caught: unknown;
    try {
      installWorkspace(paths, { sink, templateSource: join(dir, "no-templates") });
    } catch (err: unknown) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(InstallationError);
    if (!(caught instanceof InstallationError)) return;
    expect(caught.rolledBack).toEqual([...workspaceDirectories(paths)].reverse());
    expect(caught.message).toMatch(/7 created path\(s\) rolled back\.$/);
    expect(existsSync(paths.specDir)).toBe(false);
    expect(sink.lines).toContain("[warn] Installation failed, rolling back");
  });

  it("does not remove a workspace that existed before", () => {
    const dir = setupFixture(FIXTURE);
    const paths = workspacePaths(dir);
    mkdirSync(paths.deckDir, { recursive: true });

    expect(() => installWorkspace(paths, { sink: createBufferedSink(), templateSource: join(dir, "none") })).toThrow(
      InstallationError,
    );
    expect(existsSync(paths.deckDir)).toBe(true);
    expect(existsSync(paths.memoryDir)).toBe(false);
  });
});

describe("checkWorkspace", () => {
  it("names each component and reports it missing", () => {
    const paths = workspacePaths(setupFixture(FIXTURE));
    const status = checkWorkspace(paths);
    expect(status.map((c) => c.name)).toEqual([
      "workspace",
      "deck/",
      "memory/",
      "features/",
      "checklists/",
      "changelog/",
      "templates/",
      "templates/pitch-deck-template.md",
      "templates/strategic-constitution-template.md",
      "templates/feature-constitution-template.md",
    ]);
    expect(status.some((c) => c.present)).toBe(false);
  });
});
