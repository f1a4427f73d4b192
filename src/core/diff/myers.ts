import type { DiffToken, LineSequence } from "./schema.js";

export type AlignedToken = Extract<DiffToken, { tag: "equal" | "delete" | "insert" }>;

interface SplitPoint {
  x: number;
  y: number;
}

const internLines = (a: LineSequence, b: LineSequence): { aIds: Int32Array; bIds: Int32Array } => {
  const ids = new Map<string, number>();
  const toIds = (lines: LineSequence): Int32Array =>
    Int32Array.from(lines, (line) => {
      const existing = ids.get(line);
      if (existing !== undefined) return existing;
      const id = ids.size;
      ids.set(line, id);
      return id;
    });
  return { aIds: toIds(a), bIds: toIds(b) };
};

/**
 * Within every run of consecutive non-equal tokens, moves deletions ahead of insertions.
 * The edit cost and the relative order of each side's lines are unchanged.
 */
export const groupChangeRuns = (tokens: AlignedToken[]): AlignedToken[] => {
  const result: AlignedToken[] = [];
  let deletes: AlignedToken[] = [];
  let inserts: AlignedToken[] = [];
  const flush = (): void => {
    result.push(...deletes, ...inserts);
    deletes = [];
    inserts = [];
  };
  for (const token of tokens) {
    if (token.tag === "delete") {
      deletes.push(token);
    } else if (token.tag === "insert") {
      inserts.push(token);
    } else {
      flush();
      result.push(token);
    }
  }
  flush();
  return result;
};

/**
 * Minimal line alignment of `a` against `b` using Myers' O(ND) algorithm in its
 * linear-space form: trim the common prefix and suffix, find the middle snake,
 * recurse on both halves.
 */
export const alignLines = (a: LineSequence, b: LineSequence): AlignedToken[] => {
  const { aIds, bIds } = internLines(a, b);
  const out: AlignedToken[] = [];

  const pushDeletes = (from: number, to: number): void => {
    for (let i = from; i < to; i++) out.push({ tag: "delete", text: a[i] });
  };
  const pushInserts = (from: number, to: number): void => {
    for (let j = from; j < to; j++) out.push({ tag: "insert", text: b[j] });
  };

  const middleSnake = (aStart: number, aEnd: number, bStart: number, bEnd: number): SplitPoint | null => {
    const aLen = aEnd - aStart;
    const bLen = bEnd - bStart;
    const maxD = Math.ceil((aLen + bLen) / 2);
    const offset = maxD;
    const size = 2 * maxD + 2;
    const forward = new Int32Array(size).fill(-1);
    const backward = new Int32Array(size).fill(-1);
    forward[offset + 1] = 0;
    backward[offset + 1] = 0;
    const delta = aLen - bLen;
    const checkOnForward = delta % 2 !== 0;
    let fStartTrim = 0;
    let fEndTrim = 0;
    let bStartTrim = 0;
    let bEndTrim = 0;

    for (let d = 0; d < maxD; d++) {
      for (let k = -d + fStartTrim; k <= d - fEndTrim; k += 2) {
        const kOffset = offset + k;
        let x =
          k === -d || (k !== d && forward[kOffset - 1] < forward[kOffset + 1])
            ? forward[kOffset + 1]
            : forward[kOffset - 1] + 1;
        let y = x - k;
        while (x < aLen && y < bLen && aIds[aStart + x] === bIds[bStart + y]) {
          x += 1;
          y += 1;
        }
        forward[kOffset] = x;
        if (x > aLen) {
          fEndTrim += 2;
        } else if (y > bLen) {
          fStartTrim += 2;
        } else if (checkOnForward) {
          const mirrorOffset = offset + delta - k;
          if (mirrorOffset >= 0 && mirrorOffset < size && backward[mirrorOffset] !== -1) {
            if (x >= aLen - backward[mirrorOffset]) {
              return { x, y };
            }
          }
        }
      }

      for (let k = -d + bStartTrim; k <= d - bEndTrim; k += 2) {
        const kOffset = offset + k;
        let x =
          k === -d || (k !== d && backward[kOffset - 1] < backward[kOffset + 1])
            ? backward[kOffset + 1]
            : backward[kOffset - 1] + 1;
        let y = x - k;
        while (x < aLen && y < bLen && aIds[aEnd - x - 1] === bIds[bEnd - y - 1]) {
          x += 1;
          y += 1;
        }
        backward[kOffset] = x;
        if (x > aLen) {
          bEndTrim += 2;
        } else if (y > bLen) {
          bStartTrim += 2;
        } else if (!checkOnForward) {
          const mirrorOffset = offset + delta - k;
          if (mirrorOffset >= 0 && mirrorOffset < size && forward[mirrorOffset] !== -1) {
            const forwardX = forward[mirrorOffset];
            const forwardY = offset + forwardX - mirrorOffset;
            if (forwardX >= aLen - x) {
              return { x: forwardX, y: forwardY };
            }
          }
        }
      }
    }
    return null;
  };

  const diffRange = (aStart: number, aEnd: number, bStart: number, bEnd: number): void => {
    let lo = aStart;
    let hi = aEnd;
    let bLo = bStart;
    let bHi = bEnd;
    while (lo < hi && bLo < bHi && aIds[lo] === bIds[bLo]) {
      out.push({ tag: "equal", text: a[lo] });
      lo += 1;
      bLo += 1;
    }
    let suffix = 0;
    while (hi - suffix > lo && bHi - suffix > bLo && aIds[hi - suffix - 1] === bIds[bHi - suffix - 1]) {
      suffix += 1;
    }
    hi -= suffix;
    bHi -= suffix;

    if (lo === hi) {
      pushInserts(bLo, bHi);
    } else if (bLo === bHi) {
      pushDeletes(lo, hi);
    } else {
      const split = middleSnake(lo, hi, bLo, bHi);
      if (
        split === null ||
        (split.x === 0 && split.y === 0) ||
        (split.x === hi - lo && split.y === bHi - bLo)
      ) {
        pushDeletes(lo, hi);
        pushInserts(bLo, bHi);
      } else {
        diffRange(lo, lo + split.x, bLo, bLo + split.y);
        diffRange(lo + split.x, hi, bLo + split.y, bHi);
      }
    }

    for (let i = 0; i < suffix; i++) {
      out.push({ tag: "equal", text: a[hi + i] });
    }
  };

  diffRange(0, a.length, 0, b.length);
  return groupChangeRuns(out);
};
