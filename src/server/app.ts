import express from "express";
import type { ErrorRequestHandler } from "express";
import type { DiffEngine } from "../core/diff/diffEngine.js";
import type { ComparisonResult } from "../core/diff/schema.js";
import { assertPastedText, InputError, type NamedSource } from "../core/input/sourceLoader.js";
import { describeStats, escapeHtml, renderDiffPage } from "../core/render/htmlRenderer.js";
import { parseThreshold } from "../config.js";

export interface AppContext {
  engine: DiffEngine;
  results: Map<string, ComparisonResult>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readSide = (body: Record<string, unknown>, side: "left" | "right", fallbackName: string): NamedSource => {
  const raw = body[side];
  if (!isRecord(raw)) {
    throw new InputError(`Missing '${side}' source.`);
  }
  const name = typeof raw.name === "string" && raw.name.trim().length > 0 ? raw.name.trim() : fallbackName;
  if (typeof raw.base64 === "string") {
    return { kind: "bytes", name, bytes: Buffer.from(raw.base64, "base64") };
  }
  if (typeof raw.text === "string") {
    assertPastedText(raw.text);
    return { kind: "text", name, text: raw.text };
  }
  throw new InputError(`The '${side}' source needs either 'text' or 'base64'.`);
};

const readThreshold = (body: Record<string, unknown>): number | undefined => {
  const raw = body.threshold;
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw !== "number" && typeof raw !== "string") {
    throw new InputError("'threshold' must be a number between 0 and 1.");
  }
  return parseThreshold(String(raw));
};

const renderLandingPage = (results: Map<string, ComparisonResult>): string => {
  const items = [...results.values()]
    .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
    .map(
      (result) =>
        `<li><a href="/view/${encodeURIComponent(result.comparisonId)}">${escapeHtml(`${result.left.name} vs ${result.right.name}`)}</a> ` +
        `<small>${escapeHtml(describeStats(result.stats))}</small></li>`,
    );
  const body = items.length > 0 ? `<ul>\n${items.join("\n")}\n</ul>` : "<p>No comparisons yet. POST two sources to /api/compare.</p>";
  return `<!doctype html>\n<html lang="en">\n<head><meta charset="utf-8"><title>sidediff</title></head>\n<body>\n<h1>Comparisons</h1>\n${body}\n</body>\n</html>`;
};

export const createApp = (context: AppContext): express.Express => {
  const app = express();
  app.use(express.json({ limit: "30mb" }));

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.post("/api/compare", (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      res.status(400).json({ error: "Expected a JSON object with 'left' and 'right' sources." });
      return;
    }
    const left = readSide(body, "left", "Original");
    const right = readSide(body, "right", "Modified");
    const threshold = readThreshold(body);
    const result = context.engine.run(left, right, { similarityThreshold: threshold });
    context.results.set(result.comparisonId, result);
    res.status(201).json(result);
  });

  app.get("/api/comparisons/:comparisonId", (req, res) => {
    const result = context.results.get(req.params.comparisonId);
    if (!result) {
      res.status(404).json({ error: "comparison not found" });
      return;
    }
    res.json(result);
  });

  app.get("/view/:comparisonId", (req, res) => {
    const result = context.results.get(req.params.comparisonId);
    if (!result) {
      res.status(404).type("text/html").send("<h1>Comparison not found</h1>");
      return;
    }
    res.type("text/html").send(renderDiffPage(result));
  });

  app.get("/", (_req, res) => {
    res.type("text/html").send(renderLandingPage(context.results));
  });

  const handleError: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
    if (error instanceof InputError) {
      res.status(400).json({ error: error.message });
      return;
    }
    // body-parser marks malformed payloads with a client status
    const status = isRecord(error) ? error.status : undefined;
    if (typeof status === "number" && status >= 400 && status < 500) {
      res.status(status).json({ error: error instanceof Error ? error.message : "bad request" });
      return;
    }
    console.error(error instanceof Error ? error.stack ?? error.message : error);
    res.status(500).json({ error: "An unexpected error occurred." });
  };
  app.use(handleError);

  return app;
};
