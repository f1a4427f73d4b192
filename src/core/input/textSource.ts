import type { LineSequence } from "../diff/schema.js";

export const HEX_BYTES_PER_LINE = 16;

const LINE_BREAK = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;

/**
 * Splits text on every line boundary (`\r\n`, `\n`, `\r` and the Unicode separators).
 * A trailing break ends the last line rather than starting an empty one.
 */
export const splitLines = (text: string): LineSequence => {
  if (text.length === 0) return [];
  const lines = text.split(LINE_BREAK);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return Object.freeze(lines);
};

export const formatHexDump = (bytes: Uint8Array): string => {
  const lines: string[] = [];
  for (let offset = 0; offset < bytes.length; offset += HEX_BYTES_PER_LINE) {
    const block = Buffer.from(bytes.subarray(offset, offset + HEX_BYTES_PER_LINE));
    lines.push(`${offset.toString(16).padStart(8, "0")}: ${block.toString("hex")}`);
  }
  return lines.join("\n");
};
