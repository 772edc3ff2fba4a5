// src/extractors/success-criteria.ts — Success-Criteria Generator
// Concrete criteria where the deck states a measurable fact, plus one
// placeholder with suggested approaches for the team to pick from.

import type { SuccessCriterion } from "../types.js";

type DerivedCriterion = Extract<SuccessCriterion, { kind: "derived" }>;
type DerivedDraft = Omit<DerivedCriterion, "id" | "kind">;

export interface CriteriaInput {
  featureId: string;
  featureTitle: string;
  businessText: string;
  productText: string;
}

type CriterionRule = (input: CriteriaInput) => DerivedDraft | null;

const SCALE_THRESHOLD = 10_000;

const CRITICAL_KEYWORDS = ["payment", "transaction", "booking", "authentication", "authorization", "checkout"];

const commission: CriterionRule = ({ businessText }) => {
  const match = /(\d+(?:\.\d+)?)\s*%\s*(?:commission|fee)/i.exec(businessText);
  if (!match?.[1]) return null;
  const pct = match[1];
  return {
    text: `Commission calculation accurate to 0.01% (verified against manual calculation for ${pct}% rate)`,
    rationale: `Business model depends on ${pct}% commission - calculation errors directly impact revenue`,
    test: `Unit tests verify commission = booking_amount * ${(Number(pct) / 100).toFixed(2)} for all transaction types`,
    confidence: 0.95,
  };
};

const pricing: CriterionRule = ({ businessText }) => {
  const match = /\$(\d+(?:,\d+)?(?:\.\d+)?)/.exec(businessText);
  if (!match?.[1]) return null;
  return {
    text: "Pricing display accurate to 2 decimal places",
    rationale: `Business model involves $${match[1]} transactions - pricing must be precise`,
    test: "Pricing calculations never lose precision beyond 2 decimals",
    confidence: 0.95,
  };
};

const scale: CriterionRule = ({ businessText, productText }) => {
  const match = /([\d,]+)\s*(?:users|customers|transactions|bookings)/i.exec(`${businessText} ${productText}`);
  if (!match?.[1]) return null;
  const digits = match[1].replace(/,/g, "");
  const count = Number.parseInt(digits, 10);
  if (Number.isNaN(count) || count < SCALE_THRESHOLD) return null;
  return {
    text: `System handles ${digits}+ concurrent users with <2s response time`,
    rationale: `Target market size of ${digits} users requires scalable performance`,
    test: "Load testing with simulated user traffic validates response times",
    confidence: 0.9,
  };
};

const criticality: CriterionRule = ({ featureTitle }) => {
  const lower = featureTitle.toLowerCase();
  if (!CRITICAL_KEYWORDS.some((k) => lower.includes(k))) return null;
  return {
    text: "Feature availability >99.5% (measured monthly)",
    rationale: `${featureTitle} is business-critical - downtime directly impacts revenue`,
    test: "Uptime monitoring and incident tracking validate availability target",
    confidence: 0.9,
  };
};

const DERIVATION_RULES: readonly CriterionRule[] = [commission, pricing, scale, criticality];

// ─── Placeholders ────────────────────────────────────────────────────────────

const BUSINESS_GOALS: ReadonlyArray<[keyword: string, goal: string]> = [
  ["booking", "Achieve sustainable booking volume"],
  ["payment", "Maximize payment success rate"],
  ["search", "Improve search conversion rate"],
  ["user", "Drive user registration and activation"],
  ["listing", "Increase listing creation rate"],
  ["review", "Encourage user engagement and trust"],
  ["notification", "Maintain user engagement"],
];

const SUGGESTIONS: ReadonlyArray<[keywords: string[], approaches: string[]]> = [
  [["booking"], ["Booking completion time <5 minutes", "Booking abandonment rate <20%", "Payment success rate >95%"]],
  [["search"], ["Search results returned in <1 second", "Search-to-click rate >40%", "Zero-result searches <10%"]],
  [["payment"], ["Payment processing time <30 seconds", "Payment failure rate <5%", "Refund processing time <24 hours"]],
  [
    ["user", "registration"],
    ["Registration completion rate >80%", "Email verification rate >70%", "Time to first action <5 minutes after registration"],
  ],
];

const GENERIC_SUGGESTIONS = [
  "User satisfaction score >80% (post-feature survey)",
  "Feature adoption rate >60% within 30 days",
  "Task completion rate >90%",
];

export function inferBusinessGoal(featureTitle: string): string {
  const lower = featureTitle.toLowerCase();
  return BUSINESS_GOALS.find(([keyword]) => lower.includes(keyword))?.[1] ?? "Support business objectives";
}

export function suggestApproaches(featureTitle: string): string[] {
  const lower = featureTitle.toLowerCase();
  const match = SUGGESTIONS.find(([keywords]) => keywords.some((k) => lower.includes(k)));
  return [...(match?.[1] ?? GENERIC_SUGGESTIONS)];
}

function criterionId(featureId: string, n: number): string {
  return `SC-${featureId}-${String(n).padStart(3, "0")}`;
}

/**
 * Derived criteria in rule order, then exactly one placeholder.
 */
export function generateSuccessCriteria(input: CriteriaInput): SuccessCriterion[] {
  const criteria: SuccessCriterion[] = [];
  for (const rule of DERIVATION_RULES) {
    const draft = rule(input);
    if (draft) criteria.push({ kind: "derived", id: criterionId(input.featureId, criteria.length + 1), ...draft });
  }

  const businessGoal = inferBusinessGoal(input.featureTitle);
  criteria.push({
    kind: "placeholder",
    id: criterionId(input.featureId, criteria.length + 1),
    text: `[Success criterion supporting ${businessGoal.toLowerCase()}] PLACEHOLDER`,
    businessGoal,
    suggestedApproaches: suggestApproaches(input.featureTitle),
  });
  return criteria;
}
