import path from "node:path";
import fs from "node:fs/promises";
import fsSync from "node:fs";
import { SharpCodec } from "./codec.js";
import { backupPathFor, classify } from "./naming.js";
import { errorMessage } from "./utils.js";
import type { FileFailure, FileRecord, FileStatus, ImageCodec, ProcessorOptions } from "./types.js";

type BackupOutcome = { state: "copied" } | { state: "exists" } | { state: "failed"; failure: FileFailure };

interface Outcome {
  status: FileStatus;
  sizeBefore: number;
  sizeAfter?: number;
  error?: FileFailure;
  backupError?: FileFailure;
}

async function statSize(filePath: string): Promise<number | undefined> {
  try {
    return (await fs.stat(filePath)).size;
  } catch {
    return undefined;
  }
}

/**
 * Runs the skip / backup / compress sequence for one file and reports what
 * happened. `process` always resolves; every failure ends up on the record.
 */
export class FileProcessor {
  readonly options: ProcessorOptions;
  private readonly codec: ImageCodec;

  constructor(options: ProcessorOptions, codec: ImageCodec = new SharpCodec()) {
    this.options = options;
    this.codec = codec;
  }

  async process(filePath: string): Promise<FileRecord> {
    const started = Date.now();
    let outcome: Outcome;

    try {
      outcome = await this.decide(filePath);
    } catch (err) {
      outcome = {
        status: "compression-error",
        sizeBefore: (await statSize(filePath)) ?? 0,
        error: { kind: "encode", message: errorMessage(err) },
      };
    }

    return {
      path: filePath,
      extension: path.extname(filePath).toLowerCase(),
      sizeBefore: outcome.sizeBefore,
      sizeAfter: outcome.sizeAfter,
      status: outcome.status,
      elapsedSeconds: (Date.now() - started) / 1000,
      finishedAt: new Date(),
      error: outcome.error,
      backupError: outcome.backupError,
    };
  }

  private async decide(filePath: string): Promise<Outcome> {
    const verdict = classify(path.basename(filePath), this.options);

    if (verdict === "skip") {
      return { status: "skipped-by-name", sizeBefore: (await statSize(filePath)) ?? 0 };
    }

    let sizeBefore: number;
    try {
      sizeBefore = (await fs.stat(filePath)).size;
    } catch (err) {
      return { status: "unreadable", sizeBefore: 0, error: { kind: "decode", message: errorMessage(err) } };
    }

    let backupError: FileFailure | undefined;
    if (this.options.backup) {
      const backup = await this.backup(filePath);
      if (backup.state === "exists") {
        // Backed up on an earlier run, so the file has already been compressed once.
        return { status: "skipped-backed-up", sizeBefore, sizeAfter: sizeBefore };
      }
      if (backup.state === "failed") {
        backupError = backup.failure;
      }
    }

    if (verdict === "backup-only") {
      if (backupError) {
        return { status: "compression-error", sizeBefore, error: backupError };
      }
      return { status: "skipped-backed-up", sizeBefore, sizeAfter: sizeBefore };
    }

    const result = await this.codec.compress(filePath, this.options.quality);
    if (!result.ok) {
      return {
        status: result.kind === "decode" ? "unreadable" : "compression-error",
        sizeBefore,
        error: { kind: result.kind, message: result.message },
        backupError,
      };
    }

    const sizeAfter = await statSize(filePath);
    if (sizeAfter === undefined) {
      return {
        status: "compression-error",
        sizeBefore,
        error: { kind: "encode", message: "compressed file is missing" },
        backupError,
      };
    }

    return { status: "compressed", sizeBefore, sizeAfter, error: backupError };
  }

  private async backup(filePath: string): Promise<BackupOutcome> {
    const target = backupPathFor(
      filePath,
      this.options.backupFolder,
      this.options.originalSuffix,
      this.options.scanRoot
    );

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
    } catch (err) {
      return { state: "failed", failure: { kind: "backup", message: errorMessage(err) } };
    }

    try {
      await fs.copyFile(filePath, target, fsSync.constants.COPYFILE_EXCL);
      const { atime, mtime } = await fs.stat(filePath);
      await fs.utimes(target, atime, mtime);
      return { state: "copied" };
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "EEXIST") {
        return { state: "exists" };
      }
      return { state: "failed", failure: { kind: "backup", message: errorMessage(err) } };
    }
  }
}
