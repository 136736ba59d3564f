// ─────────────────────────────────────────────────────────────
// Dictionaries — Keyword, name and exclusion lists
// ─────────────────────────────────────────────────────────────

import { z } from "zod";
import { deepFreeze, formatIssues } from "./engineConfig";
import defaultDictionaries from "./dictionaries.json";

const keywordList = z.array(z.string().trim().min(1)).min(1);

const categoryKeywordsSchema = z.object({
  education: keywordList,
  transport: keywordList,
  welfare: keywordList,
  development: keywordList,
  culture: keywordList,
  safety: keywordList,
  economy: keywordList,
  family: keywordList,
});

const dictionariesSchema = z.object({
  knownNames: keywordList,
  nameExclusions: keywordList,
  nameInitials: z.array(z.string().length(1)).min(1),
  partyNames: keywordList,
  categoryKeywords: categoryKeywordsSchema,
  pledgeExclusionKeywords: keywordList,
  highlightKeywords: keywordList,
  pageTypeKeywords: z.object({
    profile: keywordList,
    pledge: keywordList,
    achievement: keywordList,
    contact: keywordList,
  }),
  contactKeywords: keywordList,
  /** Administrative neighbourhoods recognized as district headings */
  districts: keywordList.refine((names) => names.every((name) => name.endsWith("동")), {
    message: "every district must end in 동",
  }),
});

export type Dictionaries = z.infer<typeof dictionariesSchema>;

export type DictionaryOverrides = Partial<Dictionaries>;

/**
 * Load the bundled dictionaries, apply overrides, validate and freeze.
 * Overrides replace whole lists; they are not merged entry by entry.
 */
export function loadDictionaries(overrides: DictionaryOverrides = {}): Readonly<Dictionaries> {
  const parsed = dictionariesSchema.safeParse({ ...defaultDictionaries, ...overrides });
  if (!parsed.success) {
    throw new Error(`Invalid dictionaries: ${formatIssues(parsed.error)}`);
  }

  return deepFreeze(parsed.data);
}

/** Regex alternation over a district list, longest names first */
export function districtAlternation(districts: readonly string[]): string {
  const escaped = [...districts]
    .sort((a, b) => b.length - a.length)
    .map((name) => name.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"));
  return "(?:" + escaped.join("|") + ")";
}
