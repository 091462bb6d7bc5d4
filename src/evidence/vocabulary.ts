import { readFileSync } from "node:fs";
import { z } from "zod";
import { resolveResource } from "../paths.js";

const vocabularySchema = z.object({
  synonyms: z.record(z.array(z.string())),
  domainKeywords: z.record(z.array(z.string())),
  acronyms: z.record(z.string()),
});

export type MedicalVocabulary = z.infer<typeof vocabularySchema>;

let cached: MedicalVocabulary | undefined;

export function loadVocabulary(): MedicalVocabulary {
  if (!cached) {
    const raw = readFileSync(resolveResource("medical-vocabulary.json"), "utf8");
    cached = vocabularySchema.parse(JSON.parse(raw));
  }
  return cached;
}
