export const DEFAULT_FUZZY_THRESHOLD = 0.4;

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      row[j] = Math.min(prev[j] + 1, row[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = row;
  }
  return prev[b.length];
}

export function isSubsequence(query: string, target: string): boolean {
  let i = 0;
  for (let j = 0; j < target.length && i < query.length; j++) {
    if (query[i] === target[j]) i++;
  }
  return i === query.length;
}

/**
 * Similarity in [0, 1] between a query and one candidate name, compared
 * case-insensitively. A subsequence match scores at least 0.5.
 */
export function fuzzyScore(query: string, candidate: string): number {
  const q = query.toLowerCase();
  const c = candidate.toLowerCase();
  if (q.length === 0 && c.length === 0) return 1;
  const maxLen = Math.max(q.length, c.length);
  const edit = 1 - levenshtein(q, c) / maxLen;
  const subsequence = c.length > 0 && isSubsequence(q, c) ? 0.5 + (0.5 * q.length) / c.length : 0;
  return Math.max(edit, subsequence);
}
