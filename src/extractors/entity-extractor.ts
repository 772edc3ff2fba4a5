// src/extractors/entity-extractor.ts — Entity Extractor
// Presence of domain nouns and role words marks an entity; two lexical
// templates suggest relationships between detected entities.

import type { DetectedFeature, EntityRelationship, ExtractedEntity } from "../types.js";
import { loadVocabulary } from "../vocabulary.js";
import { capitalize } from "./feature-detector.js";

const ENTITY_CONFIDENCE = 0.8;
const COMMON_ATTRIBUTES = "id, created_at, updated_at";

interface EntityProfile {
  rationale?: string;
  attributes?: string;
  constraints?: string;
  states?: string;
}

const ENTITY_PROFILES: Record<string, EntityProfile> = {
  User: {
    rationale: "Core user role for platform",
    attributes: `${COMMON_ATTRIBUTES}, email, name, role`,
    constraints: "email format validation, unique email",
    states: "registered, verified, active, suspended",
  },
  Listing: {
    rationale: "Central entity representing items/properties",
    attributes: `${COMMON_ATTRIBUTES}, title, description, price`,
    constraints: "price > 0, title max length 200",
    states: "draft, published, booked, archived",
  },
  Booking: {
    rationale: "Represents transactions/reservations",
    attributes: `${COMMON_ATTRIBUTES}, check_in_date, check_out_date, status, total_price`,
    constraints: "check_in < check_out, total_price > 0",
    states: "PENDING, CONFIRMED, ACTIVE, COMPLETED, CANCELLED",
  },
  Payment: {
    rationale: "Handles financial transactions",
    attributes: `${COMMON_ATTRIBUTES}, amount, currency, status, transaction_id`,
    constraints: "amount > 0, valid currency code",
    states: "pending, processing, completed, failed, refunded",
  },
  Review: {
    rationale: "User-generated feedback",
    attributes: `${COMMON_ATTRIBUTES}, rating, comment, verified`,
    constraints: "rating 1-5, comment max length 1000",
    states: "pending, published, flagged, removed",
  },
  Message: { rationale: "Communication between users" },
  Notification: { rationale: "System-generated alerts" },
};

const FALLBACK_ENTITIES = ["User", "Profile", "Account"];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function mentions(text: string, term: string): boolean {
  return new RegExp(`\\b${escapeRegExp(term)}(?:s)?\\b`, "i").test(text);
}

/** Entity names in vocabulary order, then roles, without duplicates. */
export function detectEntityNames(text: string): string[] {
  const vocabulary = loadVocabulary();
  const names: string[] = [];
  for (const term of [...vocabulary.entityTerms, ...vocabulary.roleTerms]) {
    const name = capitalize(term);
    if (!names.includes(name) && mentions(text, term)) names.push(name);
  }
  return names;
}

/** "Listings" resolves to "Listing" when only the singular is an entity. */
function resolveTarget(word: string, detected: Set<string>): string | undefined {
  const name = capitalize(word);
  if (detected.has(name)) return name;
  if (name.endsWith("s") && detected.has(name.slice(0, -1))) return name.slice(0, -1);
  return undefined;
}

export function inferRelationships(name: string, text: string, detected: Set<string>): EntityRelationship[] {
  const relationships: EntityRelationship[] = [];
  const subject = escapeRegExp(name.toLowerCase());
  const templates = [
    {
      type: "has_many" as const,
      regex: new RegExp(`\\b${subject}(?:s)?\\s+(?:have|has|own|create|manage)\\s+(\\w+)`, "gi"),
      description: "inferred from 'have/own' pattern",
    },
    {
      type: "belongs_to" as const,
      regex: new RegExp(`\\b${subject}(?:s)?\\s+(?:belong to|is owned by|created by)\\s+(\\w+)`, "gi"),
      description: "inferred from 'belong to' pattern",
    },
  ];

  for (const template of templates) {
    for (const match of text.matchAll(template.regex)) {
      const target = resolveTarget(match[1] ?? "", detected);
      if (target) relationships.push({ type: template.type, target, description: template.description });
    }
  }

  if (relationships.length === 0 && detected.has("User") && name !== "User") {
    relationships.push({ type: "belongs_to", target: "User", description: "generic user association" });
  }
  return relationships;
}

export function buildEntity(name: string, text: string, detected: Set<string>): ExtractedEntity {
  const profile = ENTITY_PROFILES[name] ?? {};
  return {
    name,
    sourceLink: "pitch-deck.md#product",
    rationale: profile.rationale ?? `Domain entity for ${name.toLowerCase()} management`,
    relationships: inferRelationships(name, text, detected),
    attributes: profile.attributes ?? COMMON_ATTRIBUTES,
    constraints: profile.constraints ?? "Define validation rules",
    states: profile.states ?? "Define entity states",
    confidence: ENTITY_CONFIDENCE,
  };
}

/**
 * Extract entities from the Product, Solution and Business Model sections.
 */
export function extractEntities(productText: string, solutionText: string, businessText: string): ExtractedEntity[] {
  const combined = `${productText}\n${solutionText}\n${businessText}`;
  const names = detectEntityNames(combined);
  const detected = new Set(names);
  return names.map((name) => buildEntity(name, combined, detected));
}

/**
 * Entities relevant to a feature: those named in its keywords or name.
 * Falls back to the first two of User/Profile/Account.
 */
export function entitiesForFeature(feature: DetectedFeature, entities: ExtractedEntity[]): ExtractedEntity[] {
  const haystack = [...feature.keywords, feature.name].join(" ").toLowerCase();
  const relevant = entities.filter((e) => haystack.includes(e.name.toLowerCase()));
  if (relevant.length > 0) return relevant;
  return entities.filter((e) => FALLBACK_ENTITIES.includes(e.name)).slice(0, 2);
}
