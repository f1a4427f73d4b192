import { describe, expect, it } from "vitest";
import {
  annotateReplaceBlocks,
  compare,
  DEFAULT_SIMILARITY_THRESHOLD,
  DiffEngine,
  summarize,
  toRenderRows,
} from "../src/core/diff/diffEngine.js";
import type { DiffToken } from "../src/core/diff/schema.js";

const randomLines = (seed: number, count: number, width: number): string[] => {
  let state = seed >>> 0;
  const next = (): number => {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    return state >>> 16;
  };
  return Array.from({ length: count }, () =>
    Array.from({ length: width }, () => String.fromCharCode(97 + (next() % 26))).join(""),
  );
};

const textsOf = (tokens: DiffToken[], tags: DiffToken["tag"][]): string[] =>
  tokens.filter((token) => tags.includes(token.tag)).map((token) => token.text);

describe("compare", () => {
  it("returns only equal tokens for identical input", () => {
    const lines = ["first", "", "third", "first"];
    const tokens = compare(lines, lines);
    expect(tokens.every((token) => token.tag === "equal")).toBe(true);
    expect(tokens.map((token) => token.text)).toEqual(lines);
  });

  it("covers both inputs in order", () => {
    const a = ["one", "two", "three", "four", "five"];
    const b = ["zero", "one", "three", "four!", "five", "six"];
    const tokens = compare(a, b);
    expect(textsOf(tokens, ["equal", "delete"])).toEqual(a);
    expect(textsOf(tokens, ["equal", "insert"])).toEqual(b);
  });

  it("handles empty inputs", () => {
    expect(compare([], [])).toEqual([]);
    expect(compare(["x"], [])).toEqual([{ tag: "delete", text: "x" }]);
    expect(compare([], ["y"])).toEqual([{ tag: "insert", text: "y" }]);
  });

  it("reports a pure append", () => {
    expect(compare(["a", "b"], ["a", "b", "c"])).toEqual([
      { tag: "equal", text: "a" },
      { tag: "equal", text: "b" },
      { tag: "insert", text: "c" },
    ]);
  });

  it("reports a pure removal", () => {
    expect(compare(["a", "b", "c"], ["a", "c"])).toEqual([
      { tag: "equal", text: "a" },
      { tag: "delete", text: "b" },
      { tag: "equal", text: "c" },
    ]);
  });

  it("marks a close replacement as modified", () => {
    expect(compare(["int x = 1;"], ["int x = 2;"])).toEqual([
      { tag: "delete", text: "int x = 1;" },
      { tag: "modifiedHint", text: "" },
      { tag: "insert", text: "int x = 2;" },
    ]);
  });

  it("leaves an unrelated replacement unannotated", () => {
    expect(compare(["foo"], ["completely different content"])).toEqual([
      { tag: "delete", text: "foo" },
      { tag: "insert", text: "completely different content" },
    ]);
  });

  it("keeps a large unrelated replace block fast", () => {
    const a = randomLines(7, 1500, 40);
    const b = randomLines(1234567, 1500, 40);
    const started = performance.now();
    const tokens = compare(a, b);
    const elapsed = performance.now() - started;
    expect(tokens.some((token) => token.tag === "modifiedHint")).toBe(false);
    expect(textsOf(tokens, ["delete"])).toEqual(a);
    expect(textsOf(tokens, ["insert"])).toEqual(b);
    expect(elapsed).toBeLessThan(2000);
  });

  it("returns a fresh hint token per comparison", () => {
    const first = compare(["int x = 1;"], ["int x = 2;"]);
    Object.assign(first[1], { text: "changed" });
    expect(compare(["int x = 1;"], ["int x = 2;"])[1]).toEqual({ tag: "modifiedHint", text: "" });
  });

  it("honours a custom threshold", () => {
    expect(compare(["int x = 1;"], ["int x = 2;"], { similarityThreshold: 0.95 })).toEqual([
      { tag: "delete", text: "int x = 1;" },
      { tag: "insert", text: "int x = 2;" },
    ]);
  });
});

describe("annotateReplaceBlocks", () => {
  it("does not annotate a delete run without a following insert run", () => {
    expect(
      annotateReplaceBlocks(
        [
          { tag: "delete", text: "same" },
          { tag: "equal", text: "x" },
          { tag: "insert", text: "same" },
        ],
        DEFAULT_SIMILARITY_THRESHOLD,
      ),
    ).toEqual([
      { tag: "delete", text: "same" },
      { tag: "equal", text: "x" },
      { tag: "insert", text: "same" },
    ]);
  });
});

describe("toRenderRows", () => {
  it("pairs an uneven modified block by position", () => {
    const tokens = compare(["keep", "value = 1", "value = 2", "end"], ["keep", "value = 10", "end"]);
    expect(tokens).toEqual([
      { tag: "equal", text: "keep" },
      { tag: "delete", text: "value = 1" },
      { tag: "delete", text: "value = 2" },
      { tag: "modifiedHint", text: "" },
      { tag: "insert", text: "value = 10" },
      { tag: "equal", text: "end" },
    ]);
    expect(toRenderRows(tokens)).toEqual([
      { leftText: "keep", rightText: "keep", leftClass: "none", rightClass: "none", leftLineNumber: 1, rightLineNumber: 1 },
      {
        leftText: "value = 1",
        rightText: "value = 10",
        leftClass: "modified",
        rightClass: "modified",
        leftLineNumber: 2,
        rightLineNumber: 2,
      },
      {
        leftText: "value = 2",
        rightText: null,
        leftClass: "modified",
        rightClass: "modified",
        leftLineNumber: 3,
        rightLineNumber: null,
      },
      { leftText: "end", rightText: "end", leftClass: "none", rightClass: "none", leftLineNumber: 4, rightLineNumber: 3 },
    ]);
  });

  it("renders unrelated replacements as separate removed and added rows", () => {
    expect(toRenderRows(compare(["foo"], ["completely different content"]))).toEqual([
      { leftText: "foo", rightText: null, leftClass: "removed", rightClass: "none", leftLineNumber: 1, rightLineNumber: null },
      {
        leftText: null,
        rightText: "completely different content",
        leftClass: "none",
        rightClass: "added",
        leftLineNumber: null,
        rightLineNumber: 1,
      },
    ]);
  });

  it("gives a longer insert side blank left cells", () => {
    const rows = toRenderRows([
      { tag: "delete", text: "a = 1" },
      { tag: "modifiedHint", text: "" },
      { tag: "insert", text: "a = 2" },
      { tag: "insert", text: "b = 2" },
    ]);
    expect(rows[1]).toEqual({
      leftText: null,
      rightText: "b = 2",
      leftClass: "modified",
      rightClass: "modified",
      leftLineNumber: null,
      rightLineNumber: 2,
    });
  });
});

describe("summarize", () => {
  it("counts modified blocks and their lines", () => {
    const tokens = compare(["keep", "value = 1", "value = 2", "end"], ["keep", "value = 10", "end"]);
    expect(summarize(tokens)).toEqual({
      unchanged: 2,
      added: 0,
      removed: 0,
      modifiedLeft: 2,
      modifiedRight: 1,
      modifiedBlocks: 1,
    });
  });

  it("counts plain additions and removals", () => {
    expect(summarize(compare(["a", "foo"], ["a", "completely different content", "tail"]))).toEqual({
      unchanged: 1,
      added: 2,
      removed: 1,
      modifiedLeft: 0,
      modifiedRight: 0,
      modifiedBlocks: 0,
    });
  });
});

describe("DiffEngine", () => {
  it("builds a comparison from text sources", () => {
    const engine = new DiffEngine();
    const result = engine.run(
      { kind: "text", name: "old.c", text: "int x = 1;\nreturn x;\n" },
      { kind: "text", name: "new.c", text: "int x = 2;\nreturn x;\n" },
    );
    expect(result.comparisonId).toMatch(/^[0-9a-f]{16}$/);
    expect(result.left).toEqual({ name: "old.c", byteLength: 21, lineCount: 2 });
    expect(result.right).toEqual({ name: "new.c", byteLength: 21, lineCount: 2 });
    expect(result.similarityThreshold).toBe(DEFAULT_SIMILARITY_THRESHOLD);
    expect(result.stats.modifiedBlocks).toBe(1);
    expect(result.rows).toHaveLength(2);
  });

  it("prefers per-call options over constructor defaults", () => {
    const engine = new DiffEngine({ similarityThreshold: 0.95 });
    const left = { kind: "text" as const, name: "a", text: "int x = 1;" };
    const right = { kind: "text" as const, name: "b", text: "int x = 2;" };
    expect(engine.run(left, right).stats.modifiedBlocks).toBe(0);
    expect(engine.run(left, right, { similarityThreshold: 0.5 }).stats.modifiedBlocks).toBe(1);
  });

  it("hex-dumps binary sources before comparing", () => {
    const engine = new DiffEngine();
    const bytes = Uint8Array.from({ length: 17 }, (_, i) => i);
    const changed = Uint8Array.from(bytes);
    changed[16] = 0xff;
    const result = engine.run({ kind: "bytes", name: "a.bin", bytes }, { kind: "bytes", name: "b.bin", bytes: changed });
    expect(result.tokens).toEqual([
      { tag: "equal", text: "00000000: 000102030405060708090a0b0c0d0e0f" },
      { tag: "delete", text: "00000010: 10" },
      { tag: "modifiedHint", text: "" },
      { tag: "insert", text: "00000010: ff" },
    ]);
  });
});
