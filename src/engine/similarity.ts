/**
 * Longest common block of a[aLo:aHi] and b[bLo:bHi]. Ties go to the block
 * starting earliest in `a`, then earliest in `b`.
 */
function longestMatch(
  a: string,
  b: string,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number,
): { i: number; j: number; size: number } {
  let best = { i: aLo, j: bLo, size: 0 };
  // lengths[j + 1] = length of the common suffix ending at a[i], b[j]
  let prev = new Array<number>(bHi - bLo + 1).fill(0);

  for (let i = aLo; i < aHi; i++) {
    const next = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const k = (prev[j - bLo] ?? 0) + 1;
      next[j - bLo + 1] = k;
      if (k > best.size) {
        best = { i: i - k + 1, j: j - k + 1, size: k };
      }
    }
    prev = next;
  }

  return best;
}

function matchingCharacters(a: string, b: string, aLo: number, aHi: number, bLo: number, bHi: number): number {
  if (aLo >= aHi || bLo >= bHi) return 0;
  const { i, j, size } = longestMatch(a, b, aLo, aHi, bLo, bHi);
  if (size === 0) return 0;
  return (
    size +
    matchingCharacters(a, b, aLo, i, bLo, j) +
    matchingCharacters(a, b, i + size, aHi, j + size, bHi)
  );
}

/**
 * Ratcliff/Obershelp similarity: 2·M / (|a| + |b|), where M counts the
 * characters in recursively found longest common blocks. 1.0 means identical;
 * two empty strings are identical.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchingCharacters(a, b, 0, a.length, 0, b.length)) / total;
}

/**
 * Best case-insensitive match for `name` among `candidates`. An exact
 * case-insensitive match wins immediately with score 1.0; otherwise the first
 * candidate with the highest positive score is returned.
 */
export function bestMatch(name: string, candidates: Iterable<string>): { match: string | null; score: number } {
  const lowered = name.toLowerCase();
  let match: string | null = null;
  let score = 0;

  for (const candidate of candidates) {
    const other = candidate.toLowerCase();
    if (other === lowered) return { match: candidate, score: 1 };

    const ratio = similarityRatio(lowered, other);
    if (ratio > score) {
      score = ratio;
      match = candidate;
    }
  }

  return { match, score };
}
