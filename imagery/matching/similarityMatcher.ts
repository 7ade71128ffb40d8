import type { ImageRecord } from "../store/imageRecord.schema.js";

/**
 * Two weight sets live side by side: `resolution` picks an image for an
 * event and gates on the thresholds below; `browsing` orders the "similar
 * images" list. They are not interchangeable.
 */
export type SimilarityProfile = "resolution" | "browsing";

export const AUTO_ACCEPT_THRESHOLD = 1.5;
export const GOOD_ENOUGH_THRESHOLD = 0.5;

export const DEFAULT_SIMILAR_LIMIT = 10;

const PROFILE_WEIGHTS = {
  resolution: { titleExact: 3.0, titlePartial: 2.0, titleWord: 0.5, tag: 0.3, location: 1.0 },
  browsing: { titleExact: 0, titlePartial: 0, titleWord: 1.0, tag: 0.5, location: 2.0 },
} as const satisfies Record<SimilarityProfile, Record<string, number>>;

export function titleWords(title: string): string[] {
  return title
    .toLowerCase()
    .split(/\s+/)
    .filter((w) => w.length > 0);
}

export function locationsOverlap(a: string | null | undefined, b: string | null | undefined): boolean {
  const left = a?.trim().toLowerCase() ?? "";
  const right = b?.trim().toLowerCase() ?? "";
  if (!left || !right) return false;
  return left.includes(right) || right.includes(left);
}

function titleScore(titleQuery: string, words: string[], profile: SimilarityProfile): number {
  const weights = PROFILE_WEIGHTS[profile];
  const query = titleQuery.toLowerCase();
  if (words.length === 0 || query.length === 0) return 0;

  if (profile === "browsing") {
    return words.filter((w) => query.includes(w)).length * weights.titleWord;
  }

  const title = words.join(" ");
  if (query === title) return weights.titleExact;
  if (query.includes(title) || title.includes(query)) return weights.titlePartial;

  const queryWords = titleWords(query);
  return words.filter((w) => queryWords.includes(w)).length * weights.titleWord;
}

/**
 * Sum of independent title, tag and location contributions. Always >= 0.
 */
export function score(
  record: ImageRecord,
  words: string[],
  locationQuery: string | null | undefined,
  profile: SimilarityProfile = "resolution"
): number {
  const weights = PROFILE_WEIGHTS[profile];
  let total = 0;

  if (record.titleQuery !== undefined) {
    total += titleScore(record.titleQuery, words, profile);
  }

  for (const tag of record.tags) {
    const tagLower = tag.toLowerCase();
    if (!tagLower) continue;
    for (const word of words) {
      if (tagLower.includes(word) || word.includes(tagLower)) {
        total += weights.tag;
      }
    }
  }

  if (locationsOverlap(locationQuery, record.locationQuery)) {
    total += weights.location;
  }

  return total;
}

export type RankedRecord = { record: ImageRecord; score: number };

/**
 * Highest score first; equal scores keep input order.
 */
export function rankBySimilarity(
  records: ImageRecord[],
  title: string,
  location: string | null | undefined,
  profile: SimilarityProfile,
  limit = DEFAULT_SIMILAR_LIMIT
): RankedRecord[] {
  const words = titleWords(title);
  return records
    .map((record) => ({ record, score: score(record, words, location, profile) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, limit);
}
