// src/bin/clarify.ts — Pitch deck clarification command

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { EXIT_FAILURE, EXIT_OK, StructuralError } from "../types.js";
import { dateStamp, writeFileSafe } from "../fs-utils.js";
import { getSection, parsePitchDeck, savePitchDeck } from "../pitch-deck.js";
import { detectVagueSections, generateQuestions, prioritizeQuestions } from "../ambiguity-detector.js";
import { renderClarificationLog, renderQuestion, runClarificationSession } from "../clarification.js";
import type { CommandContext } from "./context.js";

export function clarifyLogPath(changelogDir: string, date: string): string {
  return join(changelogDir, `${date}-clarify.md`);
}

export async function runClarify(ctx: CommandContext): Promise<number> {
  const { args, paths, sink, config } = ctx;
  if (!existsSync(paths.deckFile)) {
    throw new StructuralError(`No pitch deck at ${paths.deckFile}`, paths.deckFile, "Run 'deckspec decompose' first");
  }
  const deck = parsePitchDeck(paths.deckFile);

  if (args.section && !getSection(deck, args.section)) {
    const known = deck.sections.map((s) => s.id).join(", ");
    sink.error(`Section '${args.section}' not found. Available: ${known}`);
    return EXIT_FAILURE;
  }

  const vague = detectVagueSections(deck, args.section);
  if (vague.length === 0) {
    sink.success("No ambiguous sections found");
    return EXIT_OK;
  }
  const questions = prioritizeQuestions(generateQuestions(vague), config.maxQuestions);
  sink.info(`${vague.length} ambiguous section(s), asking ${questions.length} question(s)`);

  if (args.dryRun) {
    questions.forEach((q, i) => {
      for (const line of renderQuestion(q, i + 1, questions.length)) sink.write(line);
    });
    return EXIT_OK;
  }

  const prompter = ctx.openPrompter();
  try {
    const session = await runClarificationSession(deck, questions, prompter, sink);
    if (session.entries.length === 0) {
      sink.info("No answers given, pitch deck unchanged");
      return EXIT_OK;
    }

    const today = dateStamp(ctx.now);
    savePitchDeck(deck, { updated: today });
    const logPath = clarifyLogPath(paths.changelogDir, today);
    const previous = existsSync(logPath) ? readFileSync(logPath, "utf-8").trimEnd() + "\n\n" : "";
    writeFileSafe(logPath, previous + renderClarificationLog(session, today));

    sink.success(`Pitch deck updated to version ${session.toVersion} (${session.entries.length} answer(s))`);
    sink.info("Re-run 'deckspec decompose --force' to propagate the changes, then 'deckspec analyze'");
    return EXIT_OK;
  } finally {
    prompter.close();
  }
}
