import type { ComparisonResult, DiffStats, RenderRow, SourceSummary } from "../diff/schema.js";

export interface ColumnNames {
  left: string;
  right: string;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  "\"": "&quot;",
  "'": "&#39;",
};

export const escapeHtml = (value: string): string => value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);

export const DIFF_STYLES = `
.diff-container { font-family: 'Monaco', 'Consolas', monospace; }
.diff-table { width: 100%; border-collapse: collapse; border: 1px solid #ddd; }
.diff-table td { padding: 5px 10px; vertical-align: top; border: 1px solid #ddd; white-space: pre-wrap; }
.line-num { width: 50px; background-color: #f8f9fa; color: #6c757d; text-align: right; user-select: none; border-right: 1px solid #ddd; }
.added { background-color: #e6ffe6; }
.removed { background-color: #ffe6e6; }
.modified { background-color: #fff5b1; }
.diff-header { background-color: #f8f9fa; font-weight: bold; text-align: center; padding: 10px; border-bottom: 2px solid #ddd; }
.diff-summary { font-family: sans-serif; color: #444; margin: 0 0 12px; }
`.trim();

const lineNumberCell = (lineNumber: number | null): string =>
  `<td class="line-num">${lineNumber === null ? "" : lineNumber}</td>`;

const textCell = (text: string | null, className: string): string => {
  const classAttr = className === "none" ? "" : ` class="${className}"`;
  return `<td${classAttr}>${text === null ? "" : escapeHtml(text)}</td>`;
};

export const renderRow = (row: RenderRow): string =>
  [
    "<tr>",
    lineNumberCell(row.leftLineNumber),
    textCell(row.leftText, row.leftClass),
    lineNumberCell(row.rightLineNumber),
    textCell(row.rightText, row.rightClass),
    "</tr>",
  ].join("");

export const renderDiffTable = (rows: readonly RenderRow[], names: ColumnNames): string =>
  [
    "<div class=\"diff-container\">",
    "<table class=\"diff-table\">",
    `<tr><th colspan="2" class="diff-header">${escapeHtml(names.left)}</th><th colspan="2" class="diff-header">${escapeHtml(names.right)}</th></tr>`,
    ...rows.map(renderRow),
    "</table>",
    "</div>",
  ].join("\n");

export const describeStats = (stats: DiffStats): string =>
  `${stats.unchanged} unchanged, ${stats.added} added, ${stats.removed} removed, ` +
  `${stats.modifiedBlocks} modified block${stats.modifiedBlocks === 1 ? "" : "s"}`;

const describeSource = (source: SourceSummary): string =>
  `${source.name} (${(source.byteLength / 1024).toFixed(1)} KB, ${source.lineCount} line${source.lineCount === 1 ? "" : "s"})`;

export const describeSources = (result: Pick<ComparisonResult, "left" | "right">): string =>
  `${describeSource(result.left)} vs ${describeSource(result.right)}`;

export const renderDiffPage = (result: ComparisonResult): string => {
  const title = `${result.left.name} vs ${result.right.name}`;
  return [
    "<!doctype html>",
    "<html lang=\"en\">",
    "<head>",
    "<meta charset=\"utf-8\">",
    `<title>${escapeHtml(title)}</title>`,
    `<style>\n${DIFF_STYLES}\n</style>`,
    "</head>",
    "<body>",
    `<p class="diff-summary">${escapeHtml(describeSources(result))}: ${escapeHtml(describeStats(result.stats))}</p>`,
    renderDiffTable(result.rows, { left: result.left.name, right: result.right.name }),
    "</body>",
    "</html>",
  ].join("\n");
};
