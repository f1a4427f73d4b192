import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import type { LineSequence } from "../diff/schema.js";
import { formatHexDump, splitLines } from "./textSource.js";

export const TEXT_EXTENSIONS = new Set([
  ".c", ".h", ".cpp", ".txt", ".py", ".json", ".yaml", ".yml", ".md", ".css", ".html", ".js",
]);
export const BINARY_EXTENSIONS = new Set([".bin", ".hex"]);
export const MAX_SOURCE_BYTES = 10 * 1024 * 1024;

export type SourceContent =
  | { kind: "text"; text: string }
  | { kind: "bytes"; bytes: Uint8Array };

export type NamedSource = SourceContent & { name: string };

/** Problem with a caller-supplied source, worded for the person who supplied it. */
export class InputError extends Error {
  public override readonly name = "InputError";
}

export const isBinarySourceName = (sourceName: string): boolean =>
  BINARY_EXTENSIONS.has(extname(sourceName).toLowerCase());

export const byteLengthOf = (source: SourceContent): number =>
  source.kind === "bytes" ? source.bytes.byteLength : Buffer.byteLength(source.text, "utf8");

const decodeUtf8 = (bytes: Uint8Array): string => {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    throw new InputError("File appears to be binary or contains invalid characters");
  }
};

export const toText = (source: SourceContent, sourceName: string): string => {
  if (source.kind === "text") {
    return source.text;
  }
  if (source.bytes.byteLength > MAX_SOURCE_BYTES) {
    throw new InputError(`File size exceeds ${MAX_SOURCE_BYTES / (1024 * 1024)}MB limit`);
  }
  if (isBinarySourceName(sourceName)) {
    return formatHexDump(source.bytes);
  }
  return decodeUtf8(source.bytes);
};

export const toLineSequence = (source: SourceContent, sourceName: string): LineSequence =>
  splitLines(toText(source, sourceName));

export const assertPastedText = (text: string): void => {
  if (text.length === 0) {
    throw new InputError("Please enter text in both fields to compare.");
  }
};

export const loadSource = async (filePath: string, name = basename(filePath)): Promise<NamedSource> => {
  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputError(`Error loading file: ${reason}`);
  }
  return { kind: "bytes", name, bytes };
};

export const describeSupportedTypes = (): string =>
  [
    `Text files: ${[...TEXT_EXTENSIONS].join(", ")}`,
    `Binary files: ${[...BINARY_EXTENSIONS].join(", ")}`,
    `Maximum file size: ${MAX_SOURCE_BYTES / (1024 * 1024)}MB`,
  ].join("\n");
