import { createInterface } from "node:readline/promises";
import {
  assertPastedText,
  describeSupportedTypes,
  InputError,
  loadSource,
  type NamedSource,
} from "../core/input/sourceLoader.js";
import { runCompare } from "./commands/compare.js";

const ESC_KEY = "\u001b";
const END_OF_TEXT = ".";

export interface PromptSession {
  ask: (question: string) => Promise<string>;
  close: () => void;
}

export interface InteractiveOptions {
  port: number;
  similarityThreshold: number;
}

const isExitToken = (value: string): boolean => {
  const trimmed = value.trim();
  return trimmed.toLowerCase() === "q" || trimmed === ESC_KEY;
};

const parseMenuNumber = (value: string, min: number, max: number): number | null => {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < min || parsed > max) return null;
  return parsed;
};

export const createPromptSession = (): PromptSession => {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return {
    ask: async (question: string): Promise<string> => rl.question(question),
    close: () => rl.close(),
  };
};

/** Reads lines until one holding only `.`; the terminator is not part of the text. */
export const readPastedText = async (
  ask: PromptSession["ask"],
  heading: string,
): Promise<string> => {
  console.log(`${heading} (finish with a line containing only "${END_OF_TEXT}")`);
  const lines: string[] = [];
  while (true) {
    const line = await ask("");
    if (line === END_OF_TEXT) break;
    lines.push(line);
  }
  return lines.join("\n");
};

const askLabel = async (ask: PromptSession["ask"], question: string, fallback: string): Promise<string> => {
  const value = (await ask(`${question} [${fallback}]: `)).trim();
  return value.length > 0 ? value : fallback;
};

export const collectPastedSources = async (
  ask: PromptSession["ask"],
): Promise<{ left: NamedSource; right: NamedSource }> => {
  const leftText = await readPastedText(ask, "Paste the original text");
  const leftName = await askLabel(ask, "Label for original text", "Original");
  const rightText = await readPastedText(ask, "Paste the modified text");
  const rightName = await askLabel(ask, "Label for modified text", "Modified");
  assertPastedText(leftText);
  assertPastedText(rightText);
  return {
    left: { kind: "text", name: leftName, text: leftText },
    right: { kind: "text", name: rightName, text: rightText },
  };
};

const collectFileSources = async (
  ask: PromptSession["ask"],
): Promise<{ left: NamedSource; right: NamedSource }> => {
  console.log(`\nSupported file types:\n${describeSupportedTypes()}`);
  const oldPath = (await ask("Path to original file: ")).trim();
  const newPath = (await ask("Path to modified file: ")).trim();
  const [left, right] = await Promise.all([loadSource(oldPath), loadSource(newPath)]);
  return { left, right };
};

export const runInteractiveMenu = async (
  options: InteractiveOptions,
  session: PromptSession = createPromptSession(),
): Promise<void> => {
  const { ask } = session;
  try {
    while (true) {
      console.log("\nsidediff menu (q or esc to exit)");
      console.log("1) File to file");
      console.log("2) Paste text");

      const selected = await ask("Select an option [1-2]: ");
      if (isExitToken(selected)) return;
      const option = parseMenuNumber(selected, 1, 2);
      if (option === null) {
        console.log("Invalid option. Use numbers 1-2, or q/esc to exit.");
        continue;
      }

      try {
        const sources = option === 1 ? await collectFileSources(ask) : await collectPastedSources(ask);
        const result = await runCompare({
          ...sources,
          openBrowser: true,
          port: options.port,
          similarityThreshold: options.similarityThreshold,
        });
        console.log(`Comparison ready at ${result.url}`);
        return;
      } catch (error: unknown) {
        if (!(error instanceof InputError)) throw error;
        console.log(`Warning: ${error.message}`);
      }
    }
  } finally {
    session.close();
  }
};
