#!/usr/bin/env node
import { existsSync, readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { Command, InvalidArgumentError } from "commander";
import updateNotifier from "update-notifier";
import { loadSource } from "../core/input/sourceLoader.js";
import { parsePort, parseThreshold, resolveDefaults, type RuntimeDefaults } from "../config.js";
import { buildComparison, runCompare, runServe, writeComparisonPage } from "./commands/compare.js";
import { createPromptSession, collectPastedSources, runInteractiveMenu } from "./interactive.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkgPath = [join(__dirname, "../../../package.json"), join(__dirname, "../../package.json")].find(
  (p) => existsSync(p),
);

const readPackage = (): { name: string; version: string } => {
  if (!pkgPath) return { name: "sidediff", version: "0.0.0" };
  return JSON.parse(readFileSync(pkgPath, "utf-8")) as { name: string; version: string };
};

const asArgument = <T>(parse: (value: string) => T) => (value: string): T => {
  try {
    return parse(value);
  } catch (error: unknown) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
};

interface ServeFlags {
  port: number;
  open: boolean;
  threshold: number;
}

interface CompareFlags extends ServeFlags {
  out?: string;
  json?: boolean;
  oldLabel?: string;
  newLabel?: string;
}

const buildProgram = (version: string, defaults: RuntimeDefaults): Command => {
  const program = new Command();
  program.name("sidediff").description("Side-by-side line diff viewer").version(version);

  const withServeOptions = (command: Command): Command =>
    command
      .option("--port <port>", "Server port", asArgument(parsePort), defaults.port)
      .option("--no-open", "Do not open browser")
      .option(
        "--threshold <ratio>",
        "Similarity above which a replaced line is shown as modified (0-1)",
        asArgument(parseThreshold),
        defaults.similarityThreshold,
      );

  withServeOptions(
    program
      .command("compare")
      .description("Compare two files side by side")
      .argument("<oldFile>", "Original file")
      .argument("<newFile>", "Modified file")
      .option("--old-label <label>", "Column title for the original file")
      .option("--new-label <label>", "Column title for the modified file")
      .option("--out <file>", "Write the comparison as an HTML page and exit")
      .option("--json", "Print the comparison as JSON and exit"),
  ).action(async (oldFile: string, newFile: string, options: CompareFlags) => {
    const [left, right] = await Promise.all([
      loadSource(oldFile, options.oldLabel),
      loadSource(newFile, options.newLabel),
    ]);

    if (options.json || options.out) {
      const result = buildComparison(left, right, {
        similarityThreshold: options.threshold,
        quiet: Boolean(options.json),
      });
      if (options.out) {
        const target = await writeComparisonPage(result, options.out);
        if (!options.json) console.log(`Comparison written to ${target}`);
      }
      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      }
      return;
    }

    const result = await runCompare({
      left,
      right,
      openBrowser: options.open,
      port: options.port,
      similarityThreshold: options.threshold,
    });
    console.log(`Comparison ready at ${result.url}`);
  });

  withServeOptions(
    program.command("paste").description("Paste two texts in the terminal and compare them"),
  ).action(async (options: ServeFlags) => {
    const session = createPromptSession();
    try {
      const sources = await collectPastedSources(session.ask);
      const result = await runCompare({
        ...sources,
        openBrowser: options.open,
        port: options.port,
        similarityThreshold: options.threshold,
      });
      console.log(`Comparison ready at ${result.url}`);
    } finally {
      session.close();
    }
  });

  withServeOptions(
    program.command("serve").description("Start the comparison service without a preloaded comparison"),
  ).action(async (options: ServeFlags) => {
    const service = await runServe({
      openBrowser: options.open,
      port: options.port,
      similarityThreshold: options.threshold,
    });
    console.log(`Service listening at ${service.url}`);
  });

  return program;
};

const runCli = async (): Promise<void> => {
  const pkg = readPackage();
  updateNotifier({ pkg }).notify();
  const defaults = resolveDefaults();
  if (process.argv.length <= 2) {
    await runInteractiveMenu(defaults);
    return;
  }
  await buildProgram(pkg.version, defaults).parseAsync(process.argv);
};

runCli().catch((error: unknown) => {
  if (error instanceof Error) {
    console.error(error.message);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
