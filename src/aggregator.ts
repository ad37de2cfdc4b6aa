import type { AggregateSnapshot, ExtensionStats, FileRecord, FileStatus } from "./types.js";

function emptyCounts(): Record<FileStatus, number> {
  return {
    compressed: 0,
    "skipped-backed-up": 0,
    "skipped-by-name": 0,
    unreadable: 0,
    "compression-error": 0,
  };
}

/**
 * Running totals for a batch. Only records that reached byte-level work
 * (compressed or already backed up) count towards sizes and extension stats.
 */
export class Aggregator {
  private total = 0;
  private readonly counts = emptyCounts();
  private bytesBefore = 0;
  private bytesAfter = 0;
  private readonly extensions = new Map<string, ExtensionStats>();
  private readonly records: FileRecord[] = [];
  private startTime: Date | null = null;
  private endTime: Date | null = null;

  start(at: Date = new Date()): void {
    this.startTime = at;
  }

  finish(at: Date = new Date()): void {
    this.endTime = at;
  }

  update(record: FileRecord): void {
    this.total++;
    this.counts[record.status]++;

    if (record.status === "compressed" || record.status === "skipped-backed-up") {
      const after = record.sizeAfter ?? record.sizeBefore;
      this.bytesBefore += record.sizeBefore;
      this.bytesAfter += after;

      let stats = this.extensions.get(record.extension);
      if (!stats) {
        stats = { extension: record.extension, count: 0, bytesBefore: 0, bytesAfter: 0 };
        this.extensions.set(record.extension, stats);
      }
      stats.count++;
      stats.bytesBefore += record.sizeBefore;
      stats.bytesAfter += after;
    }

    this.records.push(record);
  }

  snapshot(): AggregateSnapshot {
    const extensions = new Map<string, ExtensionStats>();
    for (const [key, stats] of this.extensions) {
      extensions.set(key, { ...stats });
    }

    return {
      total: this.total,
      counts: { ...this.counts },
      bytesBefore: this.bytesBefore,
      bytesAfter: this.bytesAfter,
      extensions,
      records: [...this.records],
      startTime: this.startTime,
      endTime: this.endTime,
    };
  }
}
