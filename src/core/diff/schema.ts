export type LineSequence = readonly string[];

export type EditTag = "equal" | "delete" | "insert" | "modifiedHint";

export type DiffToken =
  | { tag: "equal"; text: string }
  | { tag: "delete"; text: string }
  | { tag: "insert"; text: string }
  | { tag: "modifiedHint"; text: "" };

export type LeftRowClass = "none" | "removed" | "modified";

export type RightRowClass = "none" | "added" | "modified";

export interface RenderRow {
  leftText: string | null;
  rightText: string | null;
  leftClass: LeftRowClass;
  rightClass: RightRowClass;
  leftLineNumber: number | null;
  rightLineNumber: number | null;
}

export interface DiffStats {
  unchanged: number;
  added: number;
  removed: number;
  modifiedLeft: number;
  modifiedRight: number;
  modifiedBlocks: number;
}

export interface CompareOptions {
  /** Replace blocks whose best line pair scores strictly above this ratio are marked modified. */
  similarityThreshold?: number;
}

export interface SourceSummary {
  name: string;
  byteLength: number;
  lineCount: number;
}

export interface ComparisonResult {
  comparisonId: string;
  createdAt: string;
  left: SourceSummary;
  right: SourceSummary;
  similarityThreshold: number;
  tokens: DiffToken[];
  rows: RenderRow[];
  stats: DiffStats;
}
