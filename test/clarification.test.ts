import { describe, it, expect } from "vitest";
import {
  CUSTOM_ANSWER,
  detectVagueSections,
  generateQuestion,
  generateQuestions,
  isVague,
  prioritizeQuestions,
} from "../src/ambiguity-detector.js";
import {
  renderClarificationLog,
  renderQuestion,
  resolveChoice,
  runClarificationSession,
} from "../src/clarification.js";
import { parsePitchDeckContent, sectionText } from "../src/pitch-deck.js";
import { createScriptedPrompter } from "../src/prompter.js";
import { createBufferedSink } from "../src/output.js";
import { UserCancelledError, type ClarificationQuestion, type QuestionPriority } from "../src/types.js";
import { section } from "./helpers.js";

const DETAILED =
  "Hosts list spare rooms in minutes and guests book them instantly with verified reviews, clear total prices, and payouts that arrive within two days of checkout.";

const DECK = `---
version: 1.0.0
---

## Team

[TBD]

## Problem

Too short here.

## Solution

${DETAILED}

## Traction

Some.
`;

function loadDeck() {
  return parsePitchDeckContent(DECK, "/w/.specify/deck/pitch-deck.md");
}

function question(id: string, priority: QuestionPriority): ClarificationQuestion {
  return { id, text: id, sectionId: "problem", priority, suggestedAnswers: [CUSTOM_ANSWER] };
}

describe("isVague", () => {
  it("flags placeholders, vague phrases and short sections", () => {
    expect(isVague(section("team", "[TBD]"))).toBe(true);
    expect(isVague(section("product", `${DETAILED} Payments, messaging, etc.`))).toBe(true);
    expect(isVague(section("problem", "Too short here."))).toBe(true);
  });

  it("accepts detailed sections", () => {
    expect(isVague(section("solution", DETAILED))).toBe(false);
  });
});

describe("detectVagueSections", () => {
  it("orders vague sections by priority, ties in deck order", () => {
    expect(detectVagueSections(loadDeck()).map((s) => s.id)).toEqual(["problem", "traction", "team"]);
  });

  it("restricts to a target section", () => {
    expect(detectVagueSections(loadDeck(), "team").map((s) => s.id)).toEqual(["team"]);
    expect(detectVagueSections(loadDeck(), "solution")).toEqual([]);
    expect(detectVagueSections(loadDeck(), "exit")).toEqual([]);
  });
});

describe("question generation", () => {
  it("uses the section template and appends the custom option", () => {
    const q = generateQuestion(section("problem", ""), "CLQ001");
    expect(q).toEqual({
      id: "CLQ001",
      text: "What specific problem are you solving, and who feels it most?",
      sectionId: "problem",
      priority: "HIGH",
      suggestedAnswers: [
        "Hosts lose 15-20% of each booking to intermediary fees",
        "Buyers cannot verify sellers on peer-to-peer marketplaces",
        "Custom answer",
      ],
    });
  });

  it("falls back to a generic question for unknown sections", () => {
    const q = generateQuestion(section("traction", "", "Traction"), "CLQ009");
    expect(q.text).toBe("Please provide details for the 'Traction' section.");
    expect(q.priority).toBe("MEDIUM");
    expect(q.suggestedAnswers).toEqual(["Custom answer"]);
  });

  it("numbers questions from CLQ001", () => {
    const ids = generateQuestions(detectVagueSections(loadDeck())).map((q) => [q.id, q.sectionId]);
    expect(ids).toEqual([
      ["CLQ001", "problem"],
      ["CLQ002", "traction"],
      ["CLQ003", "team"],
    ]);
  });

  it("sorts by priority and caps the list", () => {
    const picked = prioritizeQuestions(
      [question("q1", "LOW"), question("q2", "HIGH"), question("q3", "MEDIUM"), question("q4", "HIGH")],
      3,
    );
    expect(picked.map((q) => q.id)).toEqual(["q2", "q4", "q3"]);
    expect(prioritizeQuestions([question("q1", "LOW")], 0)).toEqual([]);
  });
});

describe("resolveChoice", () => {
  const q = generateQuestion(section("problem", ""), "CLQ001");

  it("skips on an empty reply", () => {
    expect(resolveChoice(q, "   ")).toEqual({ kind: "skip" });
  });

  it("maps letters to suggestions", () => {
    expect(resolveChoice(q, "B")).toEqual({ kind: "answer", text: "Buyers cannot verify sellers on peer-to-peer marketplaces" });
    expect(resolveChoice(q, "c")).toEqual({ kind: "custom" });
  });

  it("takes other replies as the answer", () => {
    expect(resolveChoice(q, "z")).toEqual({ kind: "answer", text: "z" });
    expect(resolveChoice(q, " Guests pay hidden fees ")).toEqual({ kind: "answer", text: "Guests pay hidden fees" });
  });

  it("renders options with letters", () => {
    expect(renderQuestion(q, 1, 2)).toEqual([
      "[1/2] CLQ001 (HIGH) What specific problem are you solving, and who feels it most?",
      "  a) Hosts lose 15-20% of each booking to intermediary fees",
      "  b) Buyers cannot verify sellers on peer-to-peer marketplaces",
      "  c) Custom answer",
    ]);
  });
});

describe("runClarificationSession", () => {
  it("applies answers with a PATCH bump each and records skips", async () => {
    const deck = loadDeck();
    const questions = generateQuestions(detectVagueSections(deck));
    const prompter = createScriptedPrompter(["a", "", "c", "Two founders, both ex-hosts"]);
    const sink = createBufferedSink();

    const session = await runClarificationSession(deck, questions, prompter, sink);

    expect(session.fromVersion).toBe("1.0.0");
    expect(session.toVersion).toBe("1.0.2");
    expect(session.skipped).toEqual(["CLQ002"]);
    expect(session.entries.map((e) => [e.question.id, e.answer.answer, e.version])).toEqual([
      ["CLQ001", "Hosts lose 15-20% of each booking to intermediary fees", "1.0.1"],
      ["CLQ003", "Two founders, both ex-hosts", "1.0.2"],
    ]);
    expect(sectionText(deck, "problem")).toBe("Too short here.\n\nHosts lose 15-20% of each booking to intermediary fees");
    expect(sink.lines).toContain("[ok] Updated 'team' (version 1.0.2)");
    expect(prompter.asked.at(-1)).toBe("Your answer");
  });

  it("stops when input runs out", async () => {
    const deck = loadDeck();
    const questions = generateQuestions(detectVagueSections(deck));
    await expect(runClarificationSession(deck, questions, createScriptedPrompter([]), createBufferedSink())).rejects.toBeInstanceOf(
      UserCancelledError,
    );
  });

  it("renders the changelog entry", async () => {
    const deck = loadDeck();
    const [first] = generateQuestions(detectVagueSections(deck));
    const session = await runClarificationSession(deck, first ? [first] : [], createScriptedPrompter(["Fees"]), createBufferedSink());
    expect(renderClarificationLog(session, "2024-03-01")).toBe(
      [
        "## Clarification Session 2024-03-01",
        "",
        "**Deck version**: 1.0.0 → 1.0.1",
        "**Answered**: 1",
        "**Skipped**: 0",
        "",
        "### CLQ001: What specific problem are you solving, and who feels it most?",
        "",
        "- **Section**: problem",
        "- **Answer**: Fees",
        "- **Version**: 1.0.1",
        "",
      ].join("\n"),
    );
  });
});
