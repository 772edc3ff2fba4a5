// src/ambiguity-detector.ts — Vague section detection and clarification questions

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { ClarificationQuestion, PitchDeck, QuestionPriority, Section } from "./types.js";
import { detectVagueness, getSection, isSectionEmpty, wordCount } from "./pitch-deck.js";
import { sectionPriority } from "./sequoia.js";

export const MIN_WORDS = 20;
export const DEFAULT_MAX_QUESTIONS = 5;
export const CUSTOM_ANSWER = "Custom answer";

const PRIORITY_ORDER: Record<QuestionPriority, number> = { HIGH: 0, MEDIUM: 1, LOW: 2 };

// ─── Question templates ──────────────────────────────────────────────────────

const QuestionTemplateSchema = z.object({
  text: z.string().min(1),
  suggestedAnswers: z.array(z.string()),
});

const QuestionTemplatesSchema = z.record(QuestionTemplateSchema);

export type QuestionTemplate = z.infer<typeof QuestionTemplateSchema>;

const QUESTIONS_FILE = new URL("../data/questions.json", import.meta.url);

let templates: Record<string, QuestionTemplate> | undefined;

function questionTemplates(): Record<string, QuestionTemplate> {
  if (!templates) {
    templates = QuestionTemplatesSchema.parse(JSON.parse(readFileSync(QUESTIONS_FILE, "utf-8")));
  }
  return templates;
}

// ─── Detection ───────────────────────────────────────────────────────────────

/** Empty, containing a vague phrase, or shorter than MIN_WORDS. */
export function isVague(section: Section): boolean {
  return isSectionEmpty(section) || detectVagueness(section).length > 0 || wordCount(section) < MIN_WORDS;
}

function byPriority<T>(items: T[], priorityOf: (item: T) => QuestionPriority): T[] {
  // Array.prototype.sort is stable, so ties keep document order.
  return [...items].sort((a, b) => PRIORITY_ORDER[priorityOf(a)] - PRIORITY_ORDER[priorityOf(b)]);
}

/**
 * Vague sections, HIGH priority first. With a target, only that section is
 * considered; an unknown target yields nothing.
 */
export function detectVagueSections(deck: PitchDeck, targetSection?: string): Section[] {
  let candidates: Section[];
  if (targetSection) {
    const section = getSection(deck, targetSection);
    candidates = section ? [section] : [];
  } else {
    candidates = deck.sections;
  }
  return byPriority(candidates.filter(isVague), (s) => sectionPriority(s.id));
}

export function questionId(n: number): string {
  return `CLQ${String(n).padStart(3, "0")}`;
}

export function generateQuestion(section: Section, id: string): ClarificationQuestion {
  const template = questionTemplates()[section.id];
  return {
    id,
    text: template ? template.text : `Please provide details for the '${section.title}' section.`,
    sectionId: section.id,
    priority: sectionPriority(section.id),
    suggestedAnswers: template ? [...template.suggestedAnswers, CUSTOM_ANSWER] : [CUSTOM_ANSWER],
  };
}

export function generateQuestions(sections: Section[]): ClarificationQuestion[] {
  return sections.map((s, i) => generateQuestion(s, questionId(i + 1)));
}

/** Stable priority sort, then cap. */
export function prioritizeQuestions(
  questions: ClarificationQuestion[],
  maxQuestions = DEFAULT_MAX_QUESTIONS,
): ClarificationQuestion[] {
  return byPriority(questions, (q) => q.priority).slice(0, Math.max(0, maxQuestions));
}
