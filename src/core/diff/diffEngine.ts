import { byteLengthOf, toLineSequence, type NamedSource } from "../input/sourceLoader.js";
import { stableHash } from "../utils/hash.js";
import { alignLines, type AlignedToken } from "./myers.js";
import type {
  CompareOptions,
  ComparisonResult,
  DiffStats,
  DiffToken,
  LineSequence,
  RenderRow,
} from "./schema.js";
import { isNearMatchBlock } from "./similarity.js";

export const DEFAULT_SIMILARITY_THRESHOLD = 0.6;

/**
 * Inserts a `modifiedHint` between the delete run and the insert run of every
 * replace block whose lines are close enough to count as edits.
 */
export const annotateReplaceBlocks = (aligned: AlignedToken[], threshold: number): DiffToken[] => {
  const tokens: DiffToken[] = [];
  let index = 0;
  while (index < aligned.length) {
    if (aligned[index].tag !== "delete") {
      tokens.push(aligned[index]);
      index += 1;
      continue;
    }
    const deleted: string[] = [];
    while (index < aligned.length && aligned[index].tag === "delete") {
      deleted.push(aligned[index].text);
      index += 1;
    }
    const inserted: string[] = [];
    while (index < aligned.length && aligned[index].tag === "insert") {
      inserted.push(aligned[index].text);
      index += 1;
    }
    for (const text of deleted) tokens.push({ tag: "delete", text });
    if (inserted.length > 0 && isNearMatchBlock(deleted, inserted, threshold)) {
      tokens.push({ tag: "modifiedHint", text: "" });
    }
    for (const text of inserted) tokens.push({ tag: "insert", text });
  }
  return tokens;
};

export const compare = (a: LineSequence, b: LineSequence, options: CompareOptions = {}): DiffToken[] =>
  annotateReplaceBlocks(alignLines(a, b), options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD);

export const toRenderRows = (tokens: readonly DiffToken[]): RenderRow[] => {
  const rows: RenderRow[] = [];
  let leftLine = 1;
  let rightLine = 1;
  let index = 0;

  while (index < tokens.length) {
    const token = tokens[index];
    if (token.tag === "equal") {
      rows.push({
        leftText: token.text,
        rightText: token.text,
        leftClass: "none",
        rightClass: "none",
        leftLineNumber: leftLine++,
        rightLineNumber: rightLine++,
      });
      index += 1;
      continue;
    }
    if (token.tag === "insert") {
      rows.push({
        leftText: null,
        rightText: token.text,
        leftClass: "none",
        rightClass: "added",
        leftLineNumber: null,
        rightLineNumber: rightLine++,
      });
      index += 1;
      continue;
    }
    if (token.tag === "modifiedHint") {
      // only reachable for a hint that does not follow a delete run; it has nothing to show
      index += 1;
      continue;
    }

    const deleted: string[] = [];
    while (index < tokens.length && tokens[index].tag === "delete") {
      deleted.push(tokens[index].text);
      index += 1;
    }
    if (index >= tokens.length || tokens[index].tag !== "modifiedHint") {
      for (const text of deleted) {
        rows.push({
          leftText: text,
          rightText: null,
          leftClass: "removed",
          rightClass: "none",
          leftLineNumber: leftLine++,
          rightLineNumber: null,
        });
      }
      continue;
    }

    index += 1;
    const inserted: string[] = [];
    while (index < tokens.length && tokens[index].tag === "insert") {
      inserted.push(tokens[index].text);
      index += 1;
    }
    const height = Math.max(deleted.length, inserted.length);
    for (let offset = 0; offset < height; offset++) {
      const hasLeft = offset < deleted.length;
      const hasRight = offset < inserted.length;
      rows.push({
        leftText: hasLeft ? deleted[offset] : null,
        rightText: hasRight ? inserted[offset] : null,
        leftClass: "modified",
        rightClass: "modified",
        leftLineNumber: hasLeft ? leftLine++ : null,
        rightLineNumber: hasRight ? rightLine++ : null,
      });
    }
  }
  return rows;
};

export const summarize = (tokens: readonly DiffToken[]): DiffStats => {
  const stats: DiffStats = {
    unchanged: 0,
    added: 0,
    removed: 0,
    modifiedLeft: 0,
    modifiedRight: 0,
    modifiedBlocks: 0,
  };
  let pendingDeletes = 0;
  let inModifiedBlock = false;
  for (const token of tokens) {
    switch (token.tag) {
      case "equal":
        stats.removed += pendingDeletes;
        pendingDeletes = 0;
        inModifiedBlock = false;
        stats.unchanged += 1;
        break;
      case "delete":
        pendingDeletes += 1;
        break;
      case "modifiedHint":
        stats.modifiedBlocks += 1;
        stats.modifiedLeft += pendingDeletes;
        pendingDeletes = 0;
        inModifiedBlock = true;
        break;
      case "insert":
        stats.removed += pendingDeletes;
        pendingDeletes = 0;
        if (inModifiedBlock) stats.modifiedRight += 1;
        else stats.added += 1;
        break;
    }
  }
  stats.removed += pendingDeletes;
  return stats;
};

export class DiffEngine {
  public constructor(private readonly defaults: CompareOptions = {}) {}

  public run(left: NamedSource, right: NamedSource, options: CompareOptions = {}): ComparisonResult {
    const similarityThreshold =
      options.similarityThreshold ?? this.defaults.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
    const leftLines = toLineSequence(left, left.name);
    const rightLines = toLineSequence(right, right.name);
    const tokens = compare(leftLines, rightLines, { similarityThreshold });
    const createdAt = new Date();

    return {
      comparisonId: stableHash(`${left.name}:${right.name}:${createdAt.getTime()}:${Math.random()}`),
      createdAt: createdAt.toISOString(),
      left: { name: left.name, byteLength: byteLengthOf(left), lineCount: leftLines.length },
      right: { name: right.name, byteLength: byteLengthOf(right), lineCount: rightLines.length },
      similarityThreshold,
      tokens,
      rows: toRenderRows(tokens),
      stats: summarize(tokens),
    };
  }
}
