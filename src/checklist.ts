// src/checklist.ts — Quality checklists
// One checklist per constitution. Completion is computed from the items every time.

import { readFileSync } from "node:fs";
import type { Checklist, ChecklistItem, Constitution, ConstitutionKind } from "./types.js";
import { StructuralError } from "./types.js";

type ItemTemplate = [category: string, description: string];

const STRATEGIC_ITEMS: readonly ItemTemplate[] = [
  ["Completeness", "Every source section of the pitch deck is linked from this constitution"],
  ["Completeness", "Each principle states a rule with MUST or MUST NOT"],
  ["Completeness", "Each principle has a rationale"],
  ["Traceability", "Every principle links back to a pitch deck section"],
  ["Traceability", "All links resolve (run deckspec analyze)"],
  ["Traceability", "Version matches the pitch deck version"],
  ["Clarity", "Principles are specific enough to reject a conflicting feature"],
  ["Clarity", "No placeholder text ([TBD], [TODO]) remains"],
  ["Consistency", "No principle contradicts a principle in another strategic constitution"],
  ["Consistency", "Low-confidence principles have been reviewed by a person"],
];

const FEATURE_ITEMS: readonly ItemTemplate[] = [
  ["Completeness", "Overview describes the user-facing outcome"],
  ["Completeness", "Priority reflects business impact"],
  ["Completeness", "Feature principles state rules with MUST or MUST NOT"],
  ["Traceability", "Links to at least one strategic principle"],
  ["Traceability", "Links to the pitch deck section it came from"],
  ["Traceability", "All links resolve (run deckspec analyze)"],
  ["Traceability", "Version matches the pitch deck version"],
  ["Testability", "Every derived success criterion has a test"],
  ["Testability", "Placeholder success criteria have been replaced with measurable targets"],
  ["Testability", "Acceptance scenarios can be automated"],
  ["Data Model", "Entities cover every noun the feature manipulates"],
  ["Data Model", "Entity relationships are correct"],
  ["Data Model", "Entity constraints and states are defined"],
  ["Clarity", "No placeholder text ([TBD], [TODO]) remains"],
  ["Clarity", "Does not depend on a feature that depends on it"],
];

export function checklistItemId(n: number): string {
  return `CHK${String(n).padStart(3, "0")}`;
}

export function buildChecklist(constitution: Constitution, constitutionFile: string, generated: string): Checklist {
  const templates = constitution.kind === "strategic" ? STRATEGIC_ITEMS : FEATURE_ITEMS;
  return {
    name: constitution.name,
    constitutionFile,
    kind: constitution.kind,
    generated,
    items: templates.map(([category, description], i) => ({
      id: checklistItemId(i + 1),
      description,
      checked: false,
      category,
    })),
  };
}

/** Percentage of checked items; 0 for an empty checklist. */
export function calculateCompletion(checklist: Pick<Checklist, "items">): number {
  if (checklist.items.length === 0) return 0;
  const checked = checklist.items.filter((i) => i.checked).length;
  return (checked / checklist.items.length) * 100;
}

export function checklistFileName(constitutionName: string): string {
  return `${constitutionName}-checklist.md`;
}

// ─── Markdown ────────────────────────────────────────────────────────────────

export function renderChecklist(checklist: Checklist): string {
  const lines: string[] = [];
  lines.push(`# Quality Checklist: ${checklist.name}`);
  lines.push("");
  lines.push(`**Constitution**: ${checklist.constitutionFile}`);
  lines.push(`**Type**: ${checklist.kind}`);
  lines.push(`**Generated**: ${checklist.generated}`);
  lines.push(`**Completion**: ${calculateCompletion(checklist).toFixed(1)}%`);
  lines.push("");

  const categories: string[] = [];
  for (const item of checklist.items) {
    if (!categories.includes(item.category)) categories.push(item.category);
  }
  for (const category of categories) {
    const items = checklist.items.filter((i) => i.category === category);
    lines.push(`## ${category} (${items.length} items)`);
    lines.push("");
    for (const item of items) lines.push(`- [${item.checked ? "x" : " "}] ${item.id} ${item.description}`);
    lines.push("");
  }
  return lines.join("\n");
}

const ITEM_LINE = /^\s*[-*]\s+\[([ xX])\]\s+(?:(CHK\d+)\s+)?(.+?)\s*$/;
const CATEGORY_LINE = /^##\s+(.+?)(?:\s+\(\d+ items?\))?\s*$/;
const FIELD_LINE = /^\*\*(Constitution|Type|Generated)\*\*:\s*(.*)$/;

export function parseChecklistContent(content: string, filePath = "<checklist>"): Checklist {
  const lines = content.replace(/\r\n?/g, "\n").split("\n");
  const title = lines.find((l) => l.startsWith("# "));
  if (!title) {
    throw new StructuralError(`Checklist ${filePath} has no title heading`, filePath, "Regenerate it with 'deckspec checklist --force'");
  }

  let constitutionFile = "";
  let kind: ConstitutionKind = "strategic";
  let generated = "";
  let category = "General";
  const items: ChecklistItem[] = [];

  for (const line of lines) {
    const field = FIELD_LINE.exec(line);
    if (field) {
      const value = (field[2] ?? "").trim();
      if (field[1] === "Constitution") constitutionFile = value;
      else if (field[1] === "Type") kind = value === "feature" ? "feature" : "strategic";
      else generated = value;
      continue;
    }
    const heading = CATEGORY_LINE.exec(line);
    if (heading?.[1]) {
      category = heading[1];
      continue;
    }
    const item = ITEM_LINE.exec(line);
    if (item?.[3]) {
      items.push({
        id: item[2] ?? checklistItemId(items.length + 1),
        description: item[3],
        checked: item[1] !== " ",
        category,
      });
    }
  }

  return {
    name: title.replace(/^#\s+(Quality Checklist:\s*)?/, "").trim(),
    constitutionFile,
    kind,
    generated,
    items,
  };
}

export function parseChecklistFile(filePath: string): Checklist {
  return parseChecklistContent(readFileSync(filePath, "utf-8"), filePath);
}
