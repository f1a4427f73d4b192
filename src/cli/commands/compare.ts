import { createServer } from "node:http";
import { createServer as createNetServer } from "node:net";
import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import open from "open";
import { DiffEngine } from "../../core/diff/diffEngine.js";
import type { ComparisonResult } from "../../core/diff/schema.js";
import type { NamedSource } from "../../core/input/sourceLoader.js";
import { describeSources, describeStats, renderDiffPage } from "../../core/render/htmlRenderer.js";
import { DEFAULT_PORT } from "../../config.js";
import { createApp, type AppContext } from "../../server/app.js";

const isPortFree = (port: number): Promise<boolean> =>
  new Promise((res) => {
    const tester = createNetServer();
    tester.once("error", () => res(false));
    tester.listen(port, () => {
      tester.close(() => res(true));
    });
  });

const findFreePort = async (startPort: number, maxAttempts = 20): Promise<number> => {
  for (let offset = 0; offset < maxAttempts; offset++) {
    const candidate = startPort + offset;
    if (await isPortFree(candidate)) {
      return candidate;
    }
  }
  throw new Error(`No free port found in range ${startPort}-${startPort + maxAttempts - 1}`);
};

export interface RunningService {
  url: string;
  close: () => Promise<void>;
}

export interface ServeOptions {
  openBrowser: boolean;
  port?: number;
  similarityThreshold?: number;
}

export interface RunCompareOptions extends ServeOptions {
  left: NamedSource;
  right: NamedSource;
}

const startService = async (context: AppContext, preferredPort: number): Promise<RunningService> => {
  const app = createApp(context);
  const port = await findFreePort(preferredPort);
  if (port !== preferredPort) {
    console.log(`Port ${preferredPort} busy, using ${port}`);
  }
  const server = createServer(app);
  await new Promise<void>((resolveServer) => {
    server.listen(port, resolveServer);
  });

  const close = async (): Promise<void> => {
    await new Promise<void>((resolveServer, rejectServer) => {
      server.close((error) => {
        if (error) {
          rejectServer(error);
          return;
        }
        resolveServer();
      });
    });
  };

  return { url: `http://localhost:${port}`, close };
};

export const runServe = async (options: ServeOptions): Promise<RunningService> => {
  const engine = new DiffEngine({ similarityThreshold: options.similarityThreshold });
  const service = await startService({ engine, results: new Map() }, options.port ?? DEFAULT_PORT);
  if (options.openBrowser) {
    await open(service.url);
  }
  return service;
};

export const buildComparison = (
  left: NamedSource,
  right: NamedSource,
  options: { similarityThreshold?: number; quiet?: boolean } = {},
): ComparisonResult => {
  const engine = new DiffEngine({ similarityThreshold: options.similarityThreshold });
  if (!options.quiet) {
    console.log(`Comparing ${left.name} with ${right.name}...`);
  }
  const result = engine.run(left, right);
  if (!options.quiet) {
    console.log(`Compared ${describeSources(result)}: ${describeStats(result.stats)}`);
  }
  return result;
};

export const runCompare = async (
  options: RunCompareOptions,
): Promise<{ comparisonId: string; url: string; close: () => Promise<void> }> => {
  const engine = new DiffEngine({ similarityThreshold: options.similarityThreshold });
  const result = buildComparison(options.left, options.right, options);
  const context: AppContext = { engine, results: new Map([[result.comparisonId, result]]) };
  const service = await startService(context, options.port ?? DEFAULT_PORT);
  const url = `${service.url}/view/${result.comparisonId}`;

  if (options.openBrowser) {
    await open(url);
  }

  return { comparisonId: result.comparisonId, url, close: service.close };
};

export const writeComparisonPage = async (result: ComparisonResult, outPath: string): Promise<string> => {
  const target = resolve(outPath);
  await writeFile(target, renderDiffPage(result), "utf8");
  return target;
};
