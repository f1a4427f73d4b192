const commonCharacterCount = (x: string, y: string): number => {
  if (x.length === 0 || y.length === 0) return 0;
  const [outer, inner] = x.length >= y.length ? [x, y] : [y, x];
  let previous = new Int32Array(inner.length + 1);
  let current = new Int32Array(inner.length + 1);
  for (let i = 1; i <= outer.length; i++) {
    const ch = outer.charCodeAt(i - 1);
    for (let j = 1; j <= inner.length; j++) {
      current[j] = ch === inner.charCodeAt(j - 1)
        ? previous[j - 1] + 1
        : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }
  return previous[inner.length];
};

/** Upper bound on {@link lineSimilarity} from the lengths alone. */
export const lengthSimilarityBound = (x: string, y: string): number => {
  const total = x.length + y.length;
  if (total === 0) return 1;
  return (2 * Math.min(x.length, y.length)) / total;
};

/** Upper bound on {@link lineSimilarity} from the shared character multiset. */
export const multisetSimilarityBound = (x: string, y: string): number => {
  const total = x.length + y.length;
  if (total === 0) return 1;
  const available = new Map<number, number>();
  for (let i = 0; i < y.length; i++) {
    const code = y.charCodeAt(i);
    available.set(code, (available.get(code) ?? 0) + 1);
  }
  let shared = 0;
  for (let i = 0; i < x.length; i++) {
    const code = x.charCodeAt(i);
    const left = available.get(code) ?? 0;
    if (left > 0) {
      available.set(code, left - 1);
      shared += 1;
    }
  }
  return (2 * shared) / total;
};

/**
 * Character overlap ratio `2 * M / (|x| + |y|)`, where M is the length of the
 * longest common character subsequence. Two empty lines score 1.
 */
export const lineSimilarity = (x: string, y: string): number => {
  const total = x.length + y.length;
  if (total === 0) return 1;
  return (2 * commonCharacterCount(x, y)) / total;
};

/** Pair comparisons one replace block may spend beyond its position-paired lines. */
export const MAX_BLOCK_PAIR_CHECKS = 10_000;

const pairExceeds = (left: string, right: string, threshold: number): boolean =>
  lengthSimilarityBound(left, right) > threshold &&
  multisetSimilarityBound(left, right) > threshold &&
  lineSimilarity(left, right) > threshold;

/**
 * True when some deleted/inserted line pair scores strictly above `threshold`.
 * Position-paired lines (the ones a row shows side by side) are always compared;
 * the remaining pairs share a budget of `maxPairChecks`, and a block that runs
 * out of budget counts as unrelated.
 */
export const isNearMatchBlock = (
  deleted: readonly string[],
  inserted: readonly string[],
  threshold: number,
  maxPairChecks: number = MAX_BLOCK_PAIR_CHECKS,
): boolean => {
  const paired = Math.min(deleted.length, inserted.length);
  for (let i = 0; i < paired; i++) {
    if (pairExceeds(deleted[i], inserted[i], threshold)) return true;
  }
  let budget = maxPairChecks;
  for (let i = 0; i < deleted.length; i++) {
    for (let j = 0; j < inserted.length; j++) {
      if (i === j) continue;
      if (budget <= 0) return false;
      budget -= 1;
      if (pairExceeds(deleted[i], inserted[j], threshold)) return true;
    }
  }
  return false;
};
