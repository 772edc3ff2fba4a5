// src/installer.ts — Workspace scaffolding with rollback
// Every path created during one install is journaled; on failure the journal
// is undone newest-first. Paths that existed before are never journaled, and
// a directory that is no longer empty is left in place.

import { copyFileSync, existsSync, mkdirSync, readdirSync, rmdirSync, unlinkSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { Warning } from "./types.js";
import { InstallationError } from "./types.js";
import type { OutputSink } from "./output.js";
import { workspaceDirectories, type WorkspacePaths } from "./workspace.js";

export const TEMPLATE_FILES = [
  "pitch-deck-template.md",
  "strategic-constitution-template.md",
  "feature-constitution-template.md",
] as const;

export const BUNDLED_TEMPLATES_DIR = fileURLToPath(new URL("../data/templates/", import.meta.url));

// ─── Journal ─────────────────────────────────────────────────────────────────

export interface JournalEntry {
  kind: "file" | "dir";
  path: string;
}

export interface RollbackOutcome {
  removed: string[];
  skipped: string[];
}

export class RollbackJournal {
  private readonly entries: JournalEntry[] = [];

  get size(): number {
    return this.entries.length;
  }

  /** Create a directory; journaled only when it did not exist. */
  createDir(path: string): void {
    if (existsSync(path)) return;
    mkdirSync(path);
    this.entries.push({ kind: "dir", path });
  }

  /**
   * Run a writer for a file; journaled only when the file did not exist.
   * The entry is recorded before writing, so a partial write is rolled back.
   */
  createFile(path: string, write: (path: string) => void): void {
    if (!existsSync(path)) this.entries.push({ kind: "file", path });
    write(path);
  }

  /**
   * Undo in reverse creation order. Failures to remove an entry are
   * reported as warnings and the remaining entries are still processed.
   */
  rollback(warnings: Warning[] = []): RollbackOutcome {
    const outcome: RollbackOutcome = { removed: [], skipped: [] };
    while (this.entries.length > 0) {
      const entry = this.entries.pop();
      if (!entry || !existsSync(entry.path)) continue;
      try {
        if (entry.kind === "file") {
          unlinkSync(entry.path);
          outcome.removed.push(entry.path);
        } else if (readdirSync(entry.path).length === 0) {
          rmdirSync(entry.path);
          outcome.removed.push(entry.path);
        } else {
          outcome.skipped.push(entry.path);
        }
      } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        warnings.push({ level: "warn", module: "installer", message: `Could not remove: ${msg}`, file: entry.path });
        outcome.skipped.push(entry.path);
      }
    }
    return outcome;
  }

  /** Forget every entry; used once the install has succeeded. */
  commit(): void {
    this.entries.length = 0;
  }
}

// ─── Install ─────────────────────────────────────────────────────────────────

export interface InstallOptions {
  sink: OutputSink;
  force?: boolean;
  templateSource?: string;
  warnings?: Warning[];
}

export interface InstallResult {
  created: string[];
  overwritten: string[];
  skipped: string[];
}

/**
 * Create the workspace directories and copy the templates. Existing
 * templates are kept unless forced. Any failure rolls back this run.
 */
export function installWorkspace(paths: WorkspacePaths, options: InstallOptions): InstallResult {
  const { sink } = options;
  const source = options.templateSource ?? BUNDLED_TEMPLATES_DIR;
  const journal = new RollbackJournal();
  const result: InstallResult = { created: [], overwritten: [], skipped: [] };

  try {
    for (const dir of workspaceDirectories(paths)) {
      const existed = existsSync(dir);
      journal.createDir(dir);
      if (!existed) {
        result.created.push(dir);
        sink.verbose(`Created ${dir}`);
      }
    }

    for (const name of TEMPLATE_FILES) {
      const target = join(paths.templatesDir, name);
      const existed = existsSync(target);
      if (existed && !options.force) {
        result.skipped.push(target);
        continue;
      }
      journal.createFile(target, (p) => copyFileSync(join(source, name), p));
      (existed ? result.overwritten : result.created).push(target);
      sink.verbose(`${existed ? "Overwrote" : "Wrote"} ${target}`);
    }
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    sink.warn("Installation failed, rolling back");
    const outcome = journal.rollback(options.warnings);
    for (const p of outcome.skipped) sink.warn(`Left in place (not empty): ${p}`);
    throw new InstallationError(
      `Installation failed: ${msg}. ${outcome.removed.length} created path(s) rolled back.`,
      outcome.removed,
      err instanceof Error ? err : undefined,
    );
  }

  journal.commit();
  return result;
}

export interface ComponentStatus {
  name: string;
  path: string;
  present: boolean;
}

/** Presence of every directory and template `init` creates. */
export function checkWorkspace(paths: WorkspacePaths): ComponentStatus[] {
  const dirs = workspaceDirectories(paths).map((p) => ({
    name: p === paths.specDir ? "workspace" : `${p.slice(paths.specDir.length + 1)}/`,
    path: p,
    present: existsSync(p),
  }));
  const templates = TEMPLATE_FILES.map((name) => {
    const p = join(paths.templatesDir, name);
    return { name: `templates/${name}`, path: p, present: existsSync(p) };
  });
  return [...dirs, ...templates];
}
