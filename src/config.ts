import { DEFAULT_SIMILARITY_THRESHOLD } from "./core/diff/diffEngine.js";
import { InputError } from "./core/input/sourceLoader.js";

export const DEFAULT_PORT = 4177;

export interface RuntimeDefaults {
  port: number;
  similarityThreshold: number;
}

export const parseThreshold = (value: string): number => {
  const parsed = Number(value.trim());
  if (value.trim().length === 0 || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InputError(`Invalid similarity threshold '${value}'. Expected a number between 0 and 1.`);
  }
  return parsed;
};

export const parsePort = (value: string): number => {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InputError(`Invalid port '${value}'. Expected a whole number.`);
  }
  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < 1 || parsed > 65535) {
    throw new InputError(`Invalid port '${value}'. Expected a value between 1 and 65535.`);
  }
  return parsed;
};

/** Defaults for CLI options, taken from SIDEDIFF_PORT and SIDEDIFF_THRESHOLD when set. */
export const resolveDefaults = (env: NodeJS.ProcessEnv = process.env): RuntimeDefaults => ({
  port: env.SIDEDIFF_PORT ? parsePort(env.SIDEDIFF_PORT) : DEFAULT_PORT,
  similarityThreshold: env.SIDEDIFF_THRESHOLD
    ? parseThreshold(env.SIDEDIFF_THRESHOLD)
    : DEFAULT_SIMILARITY_THRESHOLD,
});
