// src/vocabulary.ts — Word lists for the extractors
// Loaded once from data/vocabulary.json at the package root.

import { readFileSync } from "node:fs";
import { z } from "zod";

const VocabularySchema = z.object({
  entityTerms: z.array(z.string().min(1)),
  roleTerms: z.array(z.string().min(1)),
  actionVerbs: z.array(z.string().min(1)),
  featureKeywords: z.array(z.string().min(1)),
});

export type Vocabulary = z.infer<typeof VocabularySchema>;

const VOCABULARY_FILE = new URL("../data/vocabulary.json", import.meta.url);

let cached: Vocabulary | undefined;

export function loadVocabulary(): Vocabulary {
  if (!cached) {
    cached = VocabularySchema.parse(JSON.parse(readFileSync(VOCABULARY_FILE, "utf-8")));
  }
  return cached;
}
