import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { BatchCompressor } from "../compressor.js";
import { loadLanguagePack } from "../i18n.js";
import type { LanguagePack } from "../i18n.js";
import { FileProcessor } from "../processor.js";
import { FILE_STATUSES } from "../types.js";
import type { CodecResult, ImageCodec, ProcessorOptions } from "../types.js";

function tmpDir(): string {
  return path.join(os.tmpdir(), `squeezepix-batch-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

/**
 * Halves every file it is given. Files named `bad*` fail to decode, and
 * `delays` holds per-file latency so later files can finish first.
 */
class ScriptedCodec implements ImageCodec {
  active = 0;
  maxActive = 0;
  started: string[] = [];

  constructor(private readonly delays: Record<string, number> = {}) {}

  async compress(filePath: string): Promise<CodecResult> {
    const name = path.basename(filePath);
    this.started.push(name);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await new Promise((resolve) => setTimeout(resolve, this.delays[name] ?? 1));
      if (name.startsWith("bad")) {
        return { ok: false, kind: "decode", message: "not an image" };
      }
      const { size } = await fs.stat(filePath);
      await fs.writeFile(filePath, Buffer.alloc(Math.floor(size / 2)));
      return { ok: true };
    } finally {
      this.active--;
    }
  }
}

const options: ProcessorOptions = {
  quality: 80,
  backup: false,
  backupFolder: "original image",
  originalSuffix: "_original",
  skipSuffix: "_skip",
  skipOriginal: true,
  skipSkip: true,
  compress: true,
  ignoreSuffixCase: false,
};

describe("BatchCompressor", () => {
  let workDir: string;
  let en: LanguagePack;

  beforeAll(async () => {
    en = await loadLanguagePack("en");
  });

  beforeEach(async () => {
    workDir = tmpDir();
    await fs.mkdir(workDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  async function makeFiles(names: string[], size = 2048): Promise<string[]> {
    const files = names.map((name) => path.join(workDir, name));
    for (const file of files) {
      await fs.writeFile(file, Buffer.alloc(size));
    }
    return files;
  }

  it("keeps going after a file fails and counts every outcome", async () => {
    const files = await makeFiles(["a.jpg", "bad.png", "photo_skip.jpg", "c.png"]);
    const lines: string[] = [];
    const compressor = new BatchCompressor(new FileProcessor(options, new ScriptedCodec()), {
      language: en,
      concurrency: 1,
      write: (line) => lines.push(line),
    });

    const snapshot = await compressor.run(files);

    expect(snapshot.records.map((r) => r.status)).toEqual([
      "compressed",
      "unreadable",
      "skipped-by-name",
      "compressed",
    ]);
    expect(snapshot.total).toBe(4);
    expect(FILE_STATUSES.reduce((acc, status) => acc + snapshot.counts[status], 0)).toBe(4);
    expect(snapshot.records[1]?.sizeAfter).toBeUndefined();
    expect(snapshot.records[1]?.error).toEqual({ kind: "decode", message: "not an image" });
    expect(lines).toEqual([
      `${files[0]}: 2.00 KB → 1.00 KB (saved 50.0%)`,
      `${files[1]}: Unreadable / Unsupported - Open error: not an image`,
      `${files[2]}: Skipped by name`,
      `${files[3]}: 2.00 KB → 1.00 KB (saved 50.0%)`,
    ]);
  });

  it("commits records in enumeration order even when later files finish first", async () => {
    const files = await makeFiles(["slow.jpg", "fast1.jpg", "fast2.png", "fast3.jpg"]);
    const codec = new ScriptedCodec({ "slow.jpg": 60 });
    const lines: string[] = [];
    const compressor = new BatchCompressor(new FileProcessor(options, codec), {
      language: en,
      concurrency: 4,
      write: (line) => lines.push(line),
    });

    const snapshot = await compressor.run(files);

    expect(snapshot.records.map((r) => r.path)).toEqual(files);
    expect(lines).toEqual(files.map((file) => `${file}: 2.00 KB → 1.00 KB (saved 50.0%)`));
    expect([...snapshot.extensions.keys()]).toEqual([".jpg", ".png"]);
  });

  it("never runs more files at once than the concurrency limit", async () => {
    const files = await makeFiles(["1.jpg", "2.jpg", "3.jpg", "4.jpg", "5.jpg", "6.jpg"]);
    const codec = new ScriptedCodec(Object.fromEntries(files.map((f) => [path.basename(f), 10])));

    await new BatchCompressor(new FileProcessor(options, codec), {
      language: en,
      concurrency: 2,
      printImageReduced: false,
    }).run(files);

    expect(codec.maxActive).toBeLessThanOrEqual(2);
    expect(codec.started).toHaveLength(6);
  });

  it("stays quiet when per-file lines are off", async () => {
    const files = await makeFiles(["a.jpg"]);
    const lines: string[] = [];

    await new BatchCompressor(new FileProcessor(options, new ScriptedCodec()), {
      language: en,
      printImageReduced: false,
      write: (line) => lines.push(line),
    }).run(files);

    expect(lines).toEqual([]);
  });

  it("records start and end times around the run", async () => {
    const files = await makeFiles(["a.jpg"]);
    const before = Date.now();

    const snapshot = await new BatchCompressor(new FileProcessor(options, new ScriptedCodec()), {
      language: en,
      printImageReduced: false,
    }).run(files);

    expect(snapshot.startTime?.getTime()).toBeGreaterThanOrEqual(before);
    expect(snapshot.endTime?.getTime()).toBeGreaterThanOrEqual(snapshot.startTime?.getTime() ?? Infinity);
  });

  it("finishes in-flight files and reports them after an interrupt", async () => {
    const files = await makeFiles(["a.jpg", "b.jpg", "c.jpg", "d.jpg"]);
    const controller = new AbortController();
    const codec = new ScriptedCodec({ "a.jpg": 20, "b.jpg": 20 });
    const compressor = new BatchCompressor(new FileProcessor(options, codec), {
      language: en,
      concurrency: 2,
      printImageReduced: false,
      signal: controller.signal,
    });

    const running = compressor.run(files);
    controller.abort();
    const snapshot = await running;

    expect([...codec.started].sort()).toEqual(["a.jpg", "b.jpg"]);
    expect(snapshot.records.map((r) => path.basename(r.path))).toEqual(["a.jpg", "b.jpg"]);
    expect(snapshot.counts.compressed).toBe(2);
    expect(snapshot.endTime).not.toBeNull();
  });

  it("returns an empty snapshot for an empty list", async () => {
    const snapshot = await new BatchCompressor(new FileProcessor(options, new ScriptedCodec()), {
      language: en,
    }).run([]);

    expect(snapshot.total).toBe(0);
    expect(snapshot.startTime).not.toBeNull();
  });
});
