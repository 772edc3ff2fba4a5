// src/file-discovery.ts — Constitution file discovery
// Strategic constitutions live in memory/, feature constitutions in features/.
// Exclude globs (picomatch) match paths relative to the spec directory.

import { existsSync, readdirSync, realpathSync, statSync } from "node:fs";
import { join, relative, resolve } from "node:path";
import picomatch from "picomatch";
import type { Warning } from "./types.js";

export const CONSTITUTION_DIRS = ["memory", "features"] as const;

const MARKDOWN_EXTENSION = /\.md$/;

/**
 * Markdown files under the constitution directories of a spec directory,
 * sorted, with user exclusions applied.
 */
export function discoverConstitutionFiles(
  specDir: string,
  excludePatterns: string[] = [],
  warnings: Warning[] = [],
): string[] {
  const absSpecDir = resolve(specDir);
  const files: string[] = [];
  for (const dir of CONSTITUTION_DIRS) {
    const full = join(absSpecDir, dir);
    if (!existsSync(full)) continue;
    collectMarkdown(full, absSpecDir, files, warnings);
  }
  return filterAndSort(files, absSpecDir, excludePatterns);
}

/**
 * Flat scan of one directory. Symlinks are followed only when they stay
 * inside the spec directory.
 */
function collectMarkdown(dir: string, specDir: string, results: string[], warnings: Warning[]): void {
  let entries;
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "file-discovery",
      message: `Cannot read directory: ${msg}`,
      file: dir,
    });
    return;
  }

  for (const entry of entries) {
    if (!MARKDOWN_EXTENSION.test(entry.name)) continue;
    const fullPath = join(dir, entry.name);

    if (entry.isFile()) {
      results.push(fullPath);
    } else if (entry.isSymbolicLink()) {
      try {
        const realPath = realpathSync(fullPath);
        if (!realPath.startsWith(realpathSync(specDir))) {
          warnings.push({
            level: "info",
            module: "file-discovery",
            message: `Symlink ${relative(specDir, fullPath)} points outside the spec directory, skipped`,
            file: fullPath,
          });
          continue;
        }
        if (statSync(realPath).isFile()) results.push(fullPath);
      } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        warnings.push({
          level: "warn",
          module: "file-discovery",
          message: `Cannot resolve symlink: ${msg}`,
          file: fullPath,
        });
      }
    }
  }
}

function filterAndSort(files: string[], specDir: string, excludePatterns: string[]): string[] {
  if (excludePatterns.length === 0) {
    return files.sort();
  }

  const isExcluded = picomatch(excludePatterns, { dot: true });
  return files
    .filter((f) => {
      const rel = relative(specDir, f).replace(/\\/g, "/");
      return !isExcluded(rel);
    })
    .sort();
}
