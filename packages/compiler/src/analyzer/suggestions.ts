/**
 * Levenshtein edit distance using two rolling rows.
 *
 * @example
 * editDistance('fields', 'feilds') // 2
 */
export function editDistance(left: string, right: string): number {
  const [shorter, longer] = left.length <= right.length ? [left, right] : [right, left];
  if (shorter.length === 0) {
    return longer.length;
  }

  let previous = Array.from({ length: shorter.length + 1 }, (_, index) => index);
  let current = new Array<number>(shorter.length + 1).fill(0);

  for (let row = 1; row <= longer.length; row++) {
    current[0] = row;
    for (let column = 1; column <= shorter.length; column++) {
      const cost = shorter[column - 1] === longer[row - 1] ? 0 : 1;
      current[column] = Math.min(
        previous[column] + 1,
        current[column - 1] + 1,
        previous[column - 1] + cost,
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[shorter.length];
}

export interface SuggestionOptions {
  readonly maxDistance?: number;
}

/**
 * Returns the closest candidate within `maxDistance` (default 2), compared case-insensitively.
 * Ties go to the candidate listed first.
 *
 * @param needle - Misspelled text.
 * @param candidates - Accepted spellings.
 * @param options - Distance threshold.
 * @returns The suggestion, or `undefined` when nothing is close enough.
 */
export function findClosestMatch(
  needle: string,
  candidates: readonly string[],
  options: SuggestionOptions = {},
): string | undefined {
  const maxDistance = options.maxDistance ?? 2;
  const normalizedNeedle = needle.toLowerCase();
  let best: { readonly candidate: string; readonly distance: number } | undefined;

  for (const candidate of candidates) {
    const distance = editDistance(normalizedNeedle, candidate.toLowerCase());
    if (distance > maxDistance) {
      continue;
    }
    if (!best || distance < best.distance) {
      best = { candidate, distance };
    }
  }

  return best?.candidate;
}
