// src/version-tracker.ts — Semantic versions for decks and constitutions

import { StructuralError } from "./types.js";
import type { SemanticVersion, VersionBump } from "./types.js";

const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)$/;

export const INITIAL_VERSION: SemanticVersion = { major: 1, minor: 0, patch: 0 };

/**
 * Parse "MAJOR.MINOR.PATCH". Anything else is a structural error.
 */
export function parseVersion(text: string, filePath?: string): SemanticVersion {
  const match = VERSION_PATTERN.exec(text.trim());
  if (!match) {
    throw new StructuralError(
      `Invalid semantic version: ${text}`,
      filePath,
      "Use the MAJOR.MINOR.PATCH form, e.g. version: 1.0.0",
    );
  }
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
  };
}

export function formatVersion(version: SemanticVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

/** Negative when a < b, zero when equal, positive when a > b. */
export function compareVersions(a: SemanticVersion, b: SemanticVersion): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}

export function versionsEqual(a: SemanticVersion, b: SemanticVersion): boolean {
  return compareVersions(a, b) === 0;
}

export function bumpVersion(version: SemanticVersion, bump: VersionBump): SemanticVersion {
  switch (bump) {
    case "MAJOR":
      return { major: version.major + 1, minor: 0, patch: 0 };
    case "MINOR":
      return { major: version.major, minor: version.minor + 1, patch: 0 };
    case "PATCH":
      return { major: version.major, minor: version.minor, patch: version.patch + 1 };
  }
}
