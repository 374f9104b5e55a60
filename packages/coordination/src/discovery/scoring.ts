/**
 * Ranking helpers shared by the discovery queries.
 */

/**
 * Relevance of a phrase to a topic, case-insensitive: 2 when either
 * contains the other, 1 when some word of the phrase occurs anywhere in
 * the topic (so "kinase" matches "kinases"), 0 otherwise.
 */
export function phraseScore(phrase: string, topic: string): number {
  const p = phrase.trim().toLowerCase();
  const t = topic.trim().toLowerCase();
  if (!p || !t) return 0;
  if (t.includes(p) || p.includes(t)) return 2;
  return p.split(/\s+/).some((word) => t.includes(word)) ? 1 : 0;
}

/** Sum of `phraseScore` over every interest. */
export function interestScore(interests: readonly string[], topic: string): number {
  return interests.reduce((score, interest) => score + phraseScore(interest, topic), 0);
}

/** Number of elements of `a` that are also in `b`. */
export function overlap(a: readonly string[], b: ReadonlySet<string>): number {
  return a.reduce((n, item) => (b.has(item) ? n + 1 : n), 0);
}

/**
 * Keep items with a positive score, highest first. Equal scores keep their
 * input order.
 */
export function rankByScore<T>(items: readonly T[], score: (item: T) => number, limit?: number): T[] {
  const ranked = items
    .map((item) => ({ item, score: score(item) }))
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score)
    .map((entry) => entry.item);
  return limit === undefined ? ranked : ranked.slice(0, limit);
}
