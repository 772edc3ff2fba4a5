// src/clarification.ts — Clarification session
// Asks prioritized questions, folds answers into the deck, and renders the
// changelog entry for the session.

import type { ClarificationAnswer, ClarificationQuestion, PitchDeck } from "./types.js";
import type { OutputSink } from "./output.js";
import type { Prompter } from "./prompter.js";
import { CUSTOM_ANSWER } from "./ambiguity-detector.js";
import { applyClarification } from "./pitch-deck.js";
import { formatVersion } from "./version-tracker.js";

export type AnswerChoice =
  | { kind: "skip" }
  | { kind: "custom" }
  | { kind: "answer"; text: string };

function optionLetter(index: number): string {
  return String.fromCharCode("a".charCodeAt(0) + index);
}

/**
 * Interpret one reply: empty skips, a letter picks a suggestion, anything
 * else is taken as the answer itself.
 */
export function resolveChoice(question: ClarificationQuestion, reply: string): AnswerChoice {
  const text = reply.trim();
  if (text === "") return { kind: "skip" };
  if (/^[a-z]$/i.test(text)) {
    const suggestion = question.suggestedAnswers[text.toLowerCase().charCodeAt(0) - "a".charCodeAt(0)];
    if (suggestion === CUSTOM_ANSWER) return { kind: "custom" };
    if (suggestion !== undefined) return { kind: "answer", text: suggestion };
  }
  return { kind: "answer", text };
}

export function renderQuestion(question: ClarificationQuestion, index: number, total: number): string[] {
  const lines = [`[${index}/${total}] ${question.id} (${question.priority}) ${question.text}`];
  question.suggestedAnswers.forEach((s, i) => lines.push(`  ${optionLetter(i)}) ${s}`));
  return lines;
}

export interface SessionEntry {
  question: ClarificationQuestion;
  answer: ClarificationAnswer;
  version: string;
}

export interface ClarificationSession {
  fromVersion: string;
  toVersion: string;
  entries: SessionEntry[];
  skipped: string[];
}

/**
 * Ask each question in turn. Every accepted answer is appended to its section
 * and bumps the deck by one PATCH. The deck is mutated but not saved.
 */
export async function runClarificationSession(
  deck: PitchDeck,
  questions: ClarificationQuestion[],
  prompter: Prompter,
  sink: OutputSink,
): Promise<ClarificationSession> {
  const session: ClarificationSession = {
    fromVersion: formatVersion(deck.version),
    toVersion: formatVersion(deck.version),
    entries: [],
    skipped: [],
  };

  for (const [i, question] of questions.entries()) {
    sink.write("");
    for (const line of renderQuestion(question, i + 1, questions.length)) sink.write(line);

    let choice = resolveChoice(question, await prompter.ask("Choose an option letter, type an answer, or press Enter to skip"));
    if (choice.kind === "custom") {
      const custom = (await prompter.ask("Your answer")).trim();
      choice = custom === "" ? { kind: "skip" } : { kind: "answer", text: custom };
    }
    if (choice.kind !== "answer") {
      session.skipped.push(question.id);
      sink.verbose(`Skipped ${question.id}`);
      continue;
    }

    const version = formatVersion(applyClarification(deck, question.sectionId, choice.text));
    session.entries.push({
      question,
      answer: { questionId: question.id, sectionId: question.sectionId, answer: choice.text },
      version,
    });
    session.toVersion = version;
    sink.success(`Updated '${question.sectionId}' (version ${version})`);
  }

  return session;
}

export function renderClarificationLog(session: ClarificationSession, date: string): string {
  const lines: string[] = [];
  lines.push(`## Clarification Session ${date}`);
  lines.push("");
  lines.push(`**Deck version**: ${session.fromVersion} → ${session.toVersion}`);
  lines.push(`**Answered**: ${session.entries.length}`);
  lines.push(`**Skipped**: ${session.skipped.length}`);
  lines.push("");
  for (const entry of session.entries) {
    lines.push(`### ${entry.question.id}: ${entry.question.text}`);
    lines.push("");
    lines.push(`- **Section**: ${entry.answer.sectionId}`);
    lines.push(`- **Answer**: ${entry.answer.answer}`);
    lines.push(`- **Version**: ${entry.version}`);
    lines.push("");
  }
  return lines.join("\n");
}
