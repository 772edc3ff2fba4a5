// src/workspace.ts — Workspace layout under the spec directory

import { join, resolve } from "node:path";
import type { DetectedFeature, StrategicName } from "./types.js";
import { strategicFileName } from "./sequoia.js";

export const DEFAULT_SPEC_DIR = ".specify";

export interface WorkspacePaths {
  projectDir: string;
  specDir: string;
  deckDir: string;
  deckFile: string;
  memoryDir: string;
  featuresDir: string;
  checklistsDir: string;
  changelogDir: string;
  templatesDir: string;
}

export function workspacePaths(projectDir: string, specDir = DEFAULT_SPEC_DIR): WorkspacePaths {
  const root = resolve(projectDir);
  const spec = resolve(root, specDir);
  const deckDir = join(spec, "deck");
  return {
    projectDir: root,
    specDir: spec,
    deckDir,
    deckFile: join(deckDir, "pitch-deck.md"),
    memoryDir: join(spec, "memory"),
    featuresDir: join(spec, "features"),
    checklistsDir: join(spec, "checklists"),
    changelogDir: join(spec, "changelog"),
    templatesDir: join(spec, "templates"),
  };
}

/** Directories `init` creates, parents first. */
export function workspaceDirectories(paths: WorkspacePaths): string[] {
  return [
    paths.specDir,
    paths.deckDir,
    paths.memoryDir,
    paths.featuresDir,
    paths.checklistsDir,
    paths.changelogDir,
    paths.templatesDir,
  ];
}

export function strategicPath(paths: WorkspacePaths, name: StrategicName): string {
  return join(paths.memoryDir, strategicFileName(name));
}

export function featureFileName(feature: Pick<DetectedFeature, "id" | "name">): string {
  return `${feature.id}-${feature.name}.md`;
}
