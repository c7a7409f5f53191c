import type { KnowledgeRecord, ResearchFinding } from "../core/types";
import { isUsableFinding } from "../core/types";

/** A required field of a workflow kind and the words that evidence it. */
export interface FieldSpec {
  name: string;
  keywords: readonly string[];
}

const MAX_FACT_LENGTH = 300;

export const splitSentences = (text: string): string[] =>
  text
    .split(/(?<=[.!?])\s+|\n+/)
    .map((sentence) => sentence.replace(/\s+/g, " ").trim())
    .filter((sentence) => sentence.length > 0);

/**
 * For every field, the first sentence mentioning one of its keywords
 * (case-insensitive) becomes the fact for that field.
 */
export const extractFacts = (
  text: string,
  fields: readonly FieldSpec[],
): Record<string, string> => {
  const sentences = splitSentences(text);
  const lowered = sentences.map((sentence) => sentence.toLowerCase());
  const facts: Record<string, string> = {};

  for (const field of fields) {
    const index = lowered.findIndex((sentence) =>
      field.keywords.some((keyword) => sentence.includes(keyword.toLowerCase())),
    );
    const sentence = index >= 0 ? sentences[index] : undefined;
    if (sentence !== undefined) {
      facts[field.name] = sentence.slice(0, MAX_FACT_LENGTH);
    }
  }

  return facts;
};

export const coveredFields = (
  record: KnowledgeRecord | null,
  findings: Iterable<ResearchFinding>,
): Set<string> => {
  const covered = new Set<string>(record ? Object.keys(record.entities) : []);
  for (const finding of findings) {
    if (!isUsableFinding(finding)) {
      continue;
    }
    for (const key of Object.keys(finding.facts)) {
      covered.add(key);
    }
  }
  return covered;
};

/** Fraction of required fields covered by the record and usable findings. */
export const computeCoverage = (
  record: KnowledgeRecord | null,
  findings: Iterable<ResearchFinding>,
  fields: readonly FieldSpec[],
): number => {
  if (fields.length === 0) {
    return 1;
  }
  const covered = coveredFields(record, findings);
  const hits = fields.filter((field) => covered.has(field.name)).length;
  return hits / fields.length;
};

export const missingFields = (
  record: KnowledgeRecord | null,
  findings: Iterable<ResearchFinding>,
  fields: readonly FieldSpec[],
): FieldSpec[] => {
  const covered = coveredFields(record, findings);
  return fields.filter((field) => !covered.has(field.name));
};
