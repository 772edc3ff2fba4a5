import { describe, it, expect } from "vitest";
import { generateSuccessCriteria, inferBusinessGoal, suggestApproaches } from "../src/extractors/success-criteria.js";

describe("generateSuccessCriteria", () => {
  const criteria = generateSuccessCriteria({
    featureId: "001",
    featureTitle: "Payment Processing",
    businessText: "We charge a 10% commission on bookings over $150 each.",
    productText: "Serving 25,000 users.",
  });

  it("derives criteria in rule order, then one placeholder", () => {
    expect(criteria.map((c) => [c.id, c.kind])).toEqual([
      ["SC-001-001", "derived"],
      ["SC-001-002", "derived"],
      ["SC-001-003", "derived"],
      ["SC-001-004", "derived"],
      ["SC-001-005", "placeholder"],
    ]);
  });

  it("states the commission rate and its test", () => {
    const first = criteria[0];
    expect(first?.kind === "derived" && first.text).toBe(
      "Commission calculation accurate to 0.01% (verified against manual calculation for 10% rate)",
    );
    expect(first?.kind === "derived" && first.test).toBe(
      "Unit tests verify commission = booking_amount * 0.10 for all transaction types",
    );
  });

  it("derives the scale target from the user count", () => {
    const scale = criteria[2];
    expect(scale?.kind === "derived" && scale.text).toBe("System handles 25000+ concurrent users with <2s response time");
    expect(scale?.kind === "derived" && scale.confidence).toBe(0.9);
  });

  it("marks payment features as availability-critical", () => {
    const critical = criteria[3];
    expect(critical?.kind === "derived" && critical.text).toBe("Feature availability >99.5% (measured monthly)");
  });

  it("adds a placeholder with the business goal and approaches", () => {
    const last = criteria[4];
    expect(last).toEqual({
      kind: "placeholder",
      id: "SC-001-005",
      text: "[Success criterion supporting maximize payment success rate] PLACEHOLDER",
      businessGoal: "Maximize payment success rate",
      suggestedApproaches: [
        "Payment processing time <30 seconds",
        "Payment failure rate <5%",
        "Refund processing time <24 hours",
      ],
    });
  });

  it("ignores user counts below the scale threshold", () => {
    const small = generateSuccessCriteria({ featureId: "002", featureTitle: "Dashboard", businessText: "", productText: "500 users" });
    expect(small.map((c) => c.kind)).toEqual(["placeholder"]);
  });
});

describe("placeholder helpers", () => {
  it("maps feature titles to business goals", () => {
    expect(inferBusinessGoal("Booking system")).toBe("Achieve sustainable booking volume");
    expect(inferBusinessGoal("Dashboard")).toBe("Support business objectives");
  });

  it("falls back to generic approaches", () => {
    expect(suggestApproaches("User registration")[0]).toBe("Registration completion rate >80%");
    expect(suggestApproaches("Dashboard")).toEqual([
      "User satisfaction score >80% (post-feature survey)",
      "Feature adoption rate >60% within 30 days",
      "Task completion rate >90%",
    ]);
  });
});
