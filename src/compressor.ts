import os from "node:os";
import { Aggregator } from "./aggregator.js";
import type { LanguagePack } from "./i18n.js";
import type { FileProcessor } from "./processor.js";
import { renderRecordLine } from "./report.js";
import type { AggregateSnapshot, FileRecord } from "./types.js";

export interface BatchOptions {
  language: LanguagePack;
  concurrency?: number;
  printImageReduced?: boolean;
  /** Stops new files from starting; files already in flight still finish and are reported. */
  signal?: AbortSignal;
  write?: (line: string) => void;
}

export function defaultConcurrency(): number {
  return Math.max(1, Math.min(os.cpus().length - 1, 4));
}

/**
 * Feeds a list of files through a {@link FileProcessor} with a bounded number
 * in flight. Records reach the aggregator in the order the files were listed,
 * whatever order they finish in.
 */
export class BatchCompressor {
  private readonly processor: FileProcessor;
  private readonly options: BatchOptions;

  constructor(processor: FileProcessor, options: BatchOptions) {
    this.processor = processor;
    this.options = options;
  }

  async run(files: readonly string[]): Promise<AggregateSnapshot> {
    const { language, signal, printImageReduced = true, write = console.log } = this.options;
    const limit = Math.max(1, this.options.concurrency ?? defaultConcurrency());
    const aggregator = new Aggregator();
    const finished = new Map<number, FileRecord>();
    let nextIndex = 0;
    let nextCommit = 0;

    const commit = (): void => {
      let record = finished.get(nextCommit);
      while (record) {
        finished.delete(nextCommit);
        if (printImageReduced) {
          write(renderRecordLine(record, language));
        }
        aggregator.update(record);
        nextCommit++;
        record = finished.get(nextCommit);
      }
    };

    const worker = async (): Promise<void> => {
      while (nextIndex < files.length && !signal?.aborted) {
        const index = nextIndex++;
        const file = files[index];
        if (file === undefined) continue;

        finished.set(index, await this.processor.process(file));
        commit();
      }
    };

    aggregator.start();
    await Promise.all(Array.from({ length: Math.min(limit, files.length) }, worker));
    aggregator.finish();

    return aggregator.snapshot();
  }
}
