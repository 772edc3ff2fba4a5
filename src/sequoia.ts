// src/sequoia.ts — Canonical pitch-deck sections
// The ten Sequoia sections, their prompts, and which strategic constitution each feeds.

import type { QuestionPriority, SectionId, StrategicName } from "./types.js";

export interface SectionDefinition {
  id: SectionId;
  title: string;
  prompt: string;
  hint: string;
}

export const SEQUOIA_SECTIONS: readonly SectionDefinition[] = [
  {
    id: "company-purpose",
    title: "Company Purpose",
    prompt: "What is your company's mission, in one declarative sentence?",
    hint: "Define the company in a single sentence.",
  },
  {
    id: "problem",
    title: "Problem",
    prompt: "What pain does your customer have, and how is it handled today?",
    hint: "Describe the pain of the customer and shortcomings of current solutions.",
  },
  {
    id: "solution",
    title: "Solution",
    prompt: "What is your value proposition and why is it better than alternatives?",
    hint: "Explain why your value proposition makes the customer's life better.",
  },
  {
    id: "why-now",
    title: "Why Now",
    prompt: "Why is now the right time? What recent trends make this possible?",
    hint: "Set up the historical evolution of your category.",
  },
  {
    id: "market-potential",
    title: "Market Potential",
    prompt: "Who is your customer and how large is the market (TAM, SAM, SOM)?",
    hint: "Identify the customer and calculate the market size.",
  },
  {
    id: "competition",
    title: "Competition",
    prompt: "Who are your direct and indirect competitors, and how will you win?",
    hint: "List competitors and your plan to win.",
  },
  {
    id: "product",
    title: "Product",
    prompt: "What does the product do? List its core features as bullet points.",
    hint: "Product line-up: form factor, functionality, features.",
  },
  {
    id: "business-model",
    title: "Business Model",
    prompt: "How do you make money? Describe revenue model, pricing and unit economics.",
    hint: "Revenue model, pricing, average account size, sales and distribution.",
  },
  {
    id: "team",
    title: "Team",
    prompt: "Who are the founders and key team members, and why are they the right team?",
    hint: "Founders, management, board of directors and advisors.",
  },
  {
    id: "financials",
    title: "Financials",
    prompt: "What are your key financial projections and how much are you raising?",
    hint: "P&L, balance sheet, cash flow, cap table and the deal.",
  },
];

export const SECTION_IDS: readonly SectionId[] = SEQUOIA_SECTIONS.map((s) => s.id);

export function isSectionId(id: string): id is SectionId {
  return SECTION_IDS.some((s) => s === id);
}

export function getSectionDefinition(id: string): SectionDefinition | undefined {
  return SEQUOIA_SECTIONS.find((s) => s.id === id);
}

// ─── Strategic mapping ───────────────────────────────────────────────────────

/** Strategic constitutions in generation order, with the deck sections each draws from. */
export const STRATEGIC_SOURCES: Readonly<Record<StrategicName, readonly SectionId[]>> = {
  company: ["company-purpose", "problem", "why-now"],
  product: ["solution", "product"],
  market: ["market-potential", "competition"],
  business: ["business-model", "financials", "team"],
};

export const STRATEGIC_NAMES: readonly StrategicName[] = ["company", "product", "market", "business"];

export const STRATEGIC_TITLES: Readonly<Record<StrategicName, string>> = {
  company: "Company",
  product: "Product",
  market: "Market",
  business: "Business",
};

export function strategicFileName(name: StrategicName): string {
  return `${name}-constitution.md`;
}

// ─── Per-section lookups ─────────────────────────────────────────────────────

export const SECTION_RATIONALE: Readonly<Record<SectionId, string>> = {
  "company-purpose": "Defines core mission and organizational identity",
  problem: "Addresses fundamental customer pain point",
  solution: "Core value proposition differentiator",
  "why-now": "Market timing and strategic opportunity",
  "market-potential": "Market opportunity validation",
  competition: "Competitive positioning requirement",
  product: "Product feature requirement",
  "business-model": "Business model constraint",
  team: "Team capability requirement",
  financials: "Financial target or constraint",
};

export const DEFAULT_RATIONALE = "Strategic business requirement";

export const SECTION_PRIORITY: Readonly<Record<SectionId, QuestionPriority>> = {
  "business-model": "HIGH",
  "market-potential": "HIGH",
  problem: "HIGH",
  solution: "HIGH",
  financials: "HIGH",
  competition: "MEDIUM",
  "why-now": "MEDIUM",
  "company-purpose": "MEDIUM",
  product: "MEDIUM",
  team: "LOW",
};

export function sectionRationale(sectionId: string): string {
  return isSectionId(sectionId) ? SECTION_RATIONALE[sectionId] : DEFAULT_RATIONALE;
}

export function sectionPriority(sectionId: string): QuestionPriority {
  return isSectionId(sectionId) ? SECTION_PRIORITY[sectionId] : "MEDIUM";
}
