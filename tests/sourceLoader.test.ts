import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import {
  assertPastedText,
  byteLengthOf,
  InputError,
  isBinarySourceName,
  loadSource,
  MAX_SOURCE_BYTES,
  toLineSequence,
} from "../src/core/input/sourceLoader.js";
import { formatHexDump, splitLines } from "../src/core/input/textSource.js";

const utf8 = (text: string): Uint8Array => new TextEncoder().encode(text);

describe("splitLines", () => {
  it("does not add a line for a trailing break", () => {
    expect(splitLines("a\nb\n")).toEqual(["a", "b"]);
    expect(splitLines("a\n\n")).toEqual(["a", ""]);
    expect(splitLines("\n")).toEqual([""]);
  });

  it("returns no lines for empty text", () => {
    expect(splitLines("")).toEqual([]);
  });

  it("accepts mixed line endings", () => {
    expect(splitLines("a\r\nb\rc\nd")).toEqual(["a", "b", "c", "d"]);
    expect(splitLines("x\u2028y\fz")).toEqual(["x", "y", "z"]);
  });
});

describe("formatHexDump", () => {
  it("emits one line per 16-byte block", () => {
    const bytes = Uint8Array.from({ length: 17 }, (_, i) => i);
    expect(formatHexDump(bytes).split("\n")).toEqual([
      "00000000: 000102030405060708090a0b0c0d0e0f",
      "00000010: 10",
    ]);
  });

  it("is empty for no bytes", () => {
    expect(formatHexDump(new Uint8Array())).toBe("");
  });
});

describe("toLineSequence", () => {
  it("hex-dumps sources with a binary extension", () => {
    const bytes = Uint8Array.from({ length: 17 }, (_, i) => 0xf0 - i);
    expect(toLineSequence({ kind: "bytes", bytes }, "firmware.BIN")).toEqual([
      "00000000: f0efeeedecebeae9e8e7e6e5e4e3e2e1",
      "00000010: e0",
    ]);
  });

  it("decodes other bytes as UTF-8", () => {
    expect(toLineSequence({ kind: "bytes", bytes: utf8("héllo\nworld\n") }, "notes.txt")).toEqual(["héllo", "world"]);
  });

  it("passes pasted text straight to the splitter", () => {
    expect(toLineSequence({ kind: "text", text: "one\ntwo" }, "Original")).toEqual(["one", "two"]);
  });

  it("rejects bytes that are not valid UTF-8", () => {
    const bytes = Uint8Array.from([0x66, 0xff, 0xfe]);
    expect(() => toLineSequence({ kind: "bytes", bytes }, "data.txt")).toThrow(InputError);
    expect(() => toLineSequence({ kind: "bytes", bytes }, "data.txt")).toThrow(
      "File appears to be binary or contains invalid characters",
    );
  });

  it("rejects files over the size limit", () => {
    const bytes = new Uint8Array(MAX_SOURCE_BYTES + 1);
    expect(() => toLineSequence({ kind: "bytes", bytes }, "big.txt")).toThrow("File size exceeds 10MB limit");
  });
});

describe("source helpers", () => {
  it("recognises binary names case-insensitively", () => {
    expect(isBinarySourceName("dump.hex")).toBe(true);
    expect(isBinarySourceName("FIRMWARE.BIN")).toBe(true);
    expect(isBinarySourceName("main.c")).toBe(false);
  });

  it("measures text sources in UTF-8 bytes", () => {
    expect(byteLengthOf({ kind: "text", text: "é" })).toBe(2);
    expect(byteLengthOf({ kind: "bytes", bytes: new Uint8Array(5) })).toBe(5);
  });

  it("refuses empty pasted text", () => {
    expect(() => assertPastedText("")).toThrow("Please enter text in both fields to compare.");
    expect(() => assertPastedText("x")).not.toThrow();
  });
});

describe("loadSource", () => {
  it("reads a file as bytes named after its basename", async () => {
    const tempDir = await mkdtemp(join(tmpdir(), "sidediff-"));
    const filePath = join(tempDir, "old.py");
    await writeFile(filePath, "print('hi')\n", "utf8");

    const source = await loadSource(filePath);
    expect(source.name).toBe("old.py");
    expect(source.kind).toBe("bytes");
    expect(toLineSequence(source, source.name)).toEqual(["print('hi')"]);
  });

  it("uses an explicit label when given", async () => {
    const tempDir = await mkdtemp(join(tmpdir(), "sidediff-"));
    const filePath = join(tempDir, "a.txt");
    await writeFile(filePath, "x", "utf8");
    expect((await loadSource(filePath, "Before")).name).toBe("Before");
  });

  it("wraps read failures in an InputError", async () => {
    const tempDir = await mkdtemp(join(tmpdir(), "sidediff-"));
    await expect(loadSource(join(tempDir, "missing.txt"))).rejects.toThrow(/^Error loading file: /);
  });
});
