export interface CompressionConfig {
  quality: number;
  backup: boolean;
  backupFolder: string;
  originalSuffix: string;
  skipSuffix: string;
  skipOriginal: boolean;
  skipSkip: boolean;
  compress: boolean;
  ignoreSuffixCase: boolean;
  printImageReduced: boolean;
  printSummary: boolean;
  saveSummaryToCsv: boolean;
  summaryFolder: string;
  summaryFilename: string;
  langCode: string;
  concurrency: number;
  recursive: boolean;
}

export type NamingPolicy = Pick<
  CompressionConfig,
  "originalSuffix" | "skipSuffix" | "skipOriginal" | "skipSkip" | "compress" | "ignoreSuffixCase"
>;

export type ProcessorOptions = NamingPolicy &
  Pick<CompressionConfig, "quality" | "backup" | "backupFolder"> & {
    /** Folder the files were collected from; keeps subfolders apart under an absolute backup folder. */
    scanRoot?: string;
  };

/** What the naming policy wants done with a file before any I/O happens. */
export type Classification = "skip" | "backup-only" | "full";

export type FileStatus =
  | "compressed"
  | "skipped-backed-up"
  | "skipped-by-name"
  | "unreadable"
  | "compression-error";

export const FILE_STATUSES: readonly FileStatus[] = [
  "compressed",
  "skipped-backed-up",
  "skipped-by-name",
  "unreadable",
  "compression-error",
];

export type FailureKind = "backup" | "decode" | "encode";

export interface FileFailure {
  kind: FailureKind;
  message: string;
}

export interface FileRecord {
  readonly path: string;
  /** Lower-cased, with the leading dot. */
  readonly extension: string;
  readonly sizeBefore: number;
  readonly sizeAfter?: number;
  readonly status: FileStatus;
  readonly elapsedSeconds: number;
  readonly finishedAt: Date;
  readonly error?: FileFailure;
  /** Set only when the backup failed and `error` already holds a worse failure. */
  readonly backupError?: FileFailure;
}

export interface ExtensionStats {
  extension: string;
  count: number;
  bytesBefore: number;
  bytesAfter: number;
}

export interface AggregateSnapshot {
  total: number;
  counts: Readonly<Record<FileStatus, number>>;
  bytesBefore: number;
  bytesAfter: number;
  /** Iterates in the order extensions were first seen. */
  extensions: ReadonlyMap<string, Readonly<ExtensionStats>>;
  records: readonly FileRecord[];
  startTime: Date | null;
  endTime: Date | null;
}

export type CodecResult =
  | { ok: true }
  | { ok: false; kind: "decode" | "encode"; message: string };

export interface ImageCodec {
  compress(filePath: string, quality: number): Promise<CodecResult>;
}

export interface ParsedArgs {
  inputs: string[];
  configPath: string;
  overrides: Partial<CompressionConfig>;
  help: boolean;
  version: boolean;
  about: boolean;
}
