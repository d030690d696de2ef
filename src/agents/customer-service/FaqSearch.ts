import { readFileSync } from "node:fs";
import { z } from "zod";

const faqEntrySchema = z.object({
  question: z.string().min(1),
  answer: z.string().min(1),
  tags: z.array(z.string()).default([]),
});

const faqDatabaseSchema = z.record(z.array(faqEntrySchema));

export interface FaqEntry {
  question: string;
  answer: string;
  category: string;
  tags: string[];
}

export interface FaqMatch extends FaqEntry {
  relevanceScore: number;
}

/** Bundled FAQ data, resolved from both src/ and dist/. */
export const DEFAULT_FAQ_PATH = new URL("../../../data/faq.json", import.meta.url);

/**
 * Load an FAQ file: `{ <category>: [{ question, answer, tags }] }`.
 */
export function loadFaqEntries(source: string | URL = DEFAULT_FAQ_PATH): FaqEntry[] {
  const raw: unknown = JSON.parse(readFileSync(source, "utf-8"));
  const database = faqDatabaseSchema.parse(raw);
  return Object.entries(database).flatMap(([category, entries]) =>
    entries.map((entry) => ({ ...entry, category })),
  );
}

/**
 * Keyword search over question, answer and tags.
 */
export class FaqIndex {
  constructor(private readonly entries: FaqEntry[]) {}

  get categories(): string[] {
    return [...new Set(this.entries.map((e) => e.category))];
  }

  get size(): number {
    return this.entries.length;
  }

  search(query: string, options: { category?: string; limit?: number } = {}): FaqMatch[] {
    const normalized = query.trim().toLowerCase();
    if (!normalized) return [];
    const category = options.category ?? "all";
    const limit = options.limit ?? 3;

    return this.entries
      .filter((entry) => category === "all" || entry.category === category)
      .map((entry) => ({ ...entry, relevanceScore: scoreEntry(normalized, entry) }))
      .filter((match) => match.relevanceScore > 0)
      .sort((a, b) => b.relevanceScore - a.relevanceScore)
      .slice(0, Math.max(0, limit));
  }
}

/**
 * Whole-query hits weigh most (question 10, answer 5); each query word found
 * among the question's words adds 2, among the tags 1.
 */
export function scoreEntry(query: string, entry: FaqEntry): number {
  const question = entry.question.toLowerCase();
  const questionWords = new Set(words(question));
  const tags = new Set(entry.tags.map((t) => t.toLowerCase()));
  let score = 0;

  if (question.includes(query)) score += 10;
  if (entry.answer.toLowerCase().includes(query)) score += 5;
  for (const word of new Set(words(query))) {
    if (questionWords.has(word)) score += 2;
    if (tags.has(word)) score += 1;
  }
  return score;
}

function words(text: string): string[] {
  return text.match(/[a-z0-9]+/g) ?? [];
}
