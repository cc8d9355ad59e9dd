/** Shorter words only match whole words. */
const MIN_PREFIX_LENGTH = 3;

interface TitleCandidate {
  title: string;
  tier: number;
  score: number;
}

export function normalizeTitle(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

/**
 * Picks the stored title that best matches a partial or approximate name:
 * exact (normalised) match, then word containment either way (each word a
 * whole word or a prefix of one on the other side), then word-overlap
 * Dice coefficient at or above `threshold`. Ties go to the higher score,
 * then the shorter title, then alphabetical order.
 */
export function resolveTitle(partialName: string, titles: string[], threshold: number): string | null {
  const query = normalizeTitle(partialName);
  if (query.length === 0) {
    return null;
  }

  const queryWords = new Set(query.split(" "));
  let best: TitleCandidate | null = null;

  for (const title of titles) {
    const candidate = scoreTitle(query, queryWords, title, threshold);
    if (candidate && (!best || compareCandidates(candidate, best) < 0)) {
      best = candidate;
    }
  }

  return best?.title ?? null;
}

function scoreTitle(
  query: string,
  queryWords: Set<string>,
  title: string,
  threshold: number
): TitleCandidate | null {
  const normalized = normalizeTitle(title);
  if (normalized.length === 0) {
    return null;
  }
  if (normalized === query) {
    return { title, tier: 3, score: 1 };
  }
  const titleWords = new Set(normalized.split(" "));
  if (wordsCovered(queryWords, titleWords) || wordsCovered(titleWords, queryWords)) {
    const shorter = Math.min(normalized.length, query.length);
    const longer = Math.max(normalized.length, query.length);
    return { title, tier: 2, score: shorter / longer };
  }

  let shared = 0;
  for (const word of queryWords) {
    if (titleWords.has(word)) {
      shared += 1;
    }
  }
  const dice = (2 * shared) / (queryWords.size + titleWords.size);
  return dice >= threshold ? { title, tier: 1, score: dice } : null;
}

function wordsCovered(words: Set<string>, by: Set<string>): boolean {
  for (const word of words) {
    if (by.has(word)) {
      continue;
    }
    if (word.length < MIN_PREFIX_LENGTH || ![...by].some((other) => other.startsWith(word))) {
      return false;
    }
  }
  return true;
}

function compareCandidates(a: TitleCandidate, b: TitleCandidate): number {
  return (
    b.tier - a.tier ||
    b.score - a.score ||
    a.title.length - b.title.length ||
    a.title.localeCompare(b.title)
  );
}
