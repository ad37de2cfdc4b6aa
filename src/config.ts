import path from "node:path";
import fs from "node:fs/promises";
import YAML from "yaml";
import { defaultConcurrency } from "./compressor.js";
import { ConfigurationError } from "./errors.js";
import { errorMessage, parseBoolean } from "./utils.js";
import type { CompressionConfig } from "./types.js";

/** Raw settings from a config file, keyed the way the file spells them. */
export type ConfigFile = Record<string, unknown>;

export const DEFAULT_CONFIG_PATH = "config.yaml";

export const DEFAULT_CONFIG: Readonly<CompressionConfig> = {
  quality: 85,
  backup: true,
  backupFolder: "original image",
  originalSuffix: "_original",
  skipSuffix: "_skip",
  skipOriginal: true,
  skipSkip: true,
  compress: true,
  ignoreSuffixCase: false,
  printImageReduced: true,
  printSummary: true,
  saveSummaryToCsv: true,
  summaryFolder: "summary",
  summaryFilename: "report",
  langCode: "en",
  concurrency: defaultConcurrency(),
  recursive: true,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** A missing file is an empty config; a file that exists but cannot be read or parsed is not. */
export async function loadConfigFile(configPath: string): Promise<ConfigFile> {
  let text: string;
  try {
    text = await fs.readFile(configPath, "utf8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return {};
    throw new ConfigurationError(`Cannot read config file ${configPath}: ${errorMessage(err)}`);
  }

  let data: unknown;
  try {
    data = YAML.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Config file ${configPath} is not valid YAML: ${errorMessage(err)}`);
  }

  if (data === null || data === undefined) return {};
  if (!isRecord(data)) {
    throw new ConfigurationError(`Config file ${configPath} must contain a mapping of settings`);
  }
  return data;
}

function readNumber(file: ConfigFile, key: string): number | undefined {
  const value = file[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "" && !isNaN(Number(value))) return Number(value);
  throw new ConfigurationError(`Config value "${key}" must be a number, got: ${String(value)}`);
}

function readBoolean(file: ConfigFile, key: string): boolean | undefined {
  const value = file[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "boolean") return value;
  const parsed = typeof value === "string" ? parseBoolean(value) : undefined;
  if (parsed === undefined) {
    throw new ConfigurationError(`Config value "${key}" must be true or false, got: ${String(value)}`);
  }
  return parsed;
}

function readString(file: ConfigFile, key: string): string | undefined {
  const value = file[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string" || typeof value === "number") return String(value);
  throw new ConfigurationError(`Config value "${key}" must be a string, got: ${String(value)}`);
}

export function readPath(file: ConfigFile): string | undefined {
  return readString(file, "path");
}

/**
 * Merges command-line overrides over config file values over defaults, then
 * validates the result. The rest of the program trusts what comes out.
 */
export function resolveConfig(overrides: Partial<CompressionConfig>, file: ConfigFile = {}): CompressionConfig {
  const config: CompressionConfig = {
    quality: overrides.quality ?? readNumber(file, "compress_quality") ?? DEFAULT_CONFIG.quality,
    backup: overrides.backup ?? readBoolean(file, "backup") ?? DEFAULT_CONFIG.backup,
    backupFolder: overrides.backupFolder ?? readString(file, "backup_folder") ?? DEFAULT_CONFIG.backupFolder,
    originalSuffix: overrides.originalSuffix ?? readString(file, "original_suffix") ?? DEFAULT_CONFIG.originalSuffix,
    skipSuffix: overrides.skipSuffix ?? readString(file, "skip_suffix") ?? DEFAULT_CONFIG.skipSuffix,
    skipOriginal: overrides.skipOriginal ?? readBoolean(file, "skip_original") ?? DEFAULT_CONFIG.skipOriginal,
    skipSkip: overrides.skipSkip ?? readBoolean(file, "skip_skip") ?? DEFAULT_CONFIG.skipSkip,
    compress: overrides.compress ?? readBoolean(file, "compress") ?? DEFAULT_CONFIG.compress,
    ignoreSuffixCase:
      overrides.ignoreSuffixCase ?? readBoolean(file, "ignore_suffix_case") ?? DEFAULT_CONFIG.ignoreSuffixCase,
    printImageReduced:
      overrides.printImageReduced ?? readBoolean(file, "print_image_reduced") ?? DEFAULT_CONFIG.printImageReduced,
    printSummary: overrides.printSummary ?? readBoolean(file, "print_summary") ?? DEFAULT_CONFIG.printSummary,
    saveSummaryToCsv:
      overrides.saveSummaryToCsv ?? readBoolean(file, "save_summary_to_csv") ?? DEFAULT_CONFIG.saveSummaryToCsv,
    summaryFolder: overrides.summaryFolder ?? readString(file, "summary_folder") ?? DEFAULT_CONFIG.summaryFolder,
    summaryFilename:
      overrides.summaryFilename ?? readString(file, "summary_filename") ?? DEFAULT_CONFIG.summaryFilename,
    langCode: overrides.langCode ?? readString(file, "lang_code") ?? DEFAULT_CONFIG.langCode,
    concurrency: overrides.concurrency ?? readNumber(file, "concurrency") ?? DEFAULT_CONFIG.concurrency,
    recursive: overrides.recursive ?? readBoolean(file, "recursive") ?? DEFAULT_CONFIG.recursive,
  };

  validateConfig(config);
  return config;
}

export function validateConfig(config: CompressionConfig): void {
  if (!Number.isInteger(config.quality) || config.quality < 1 || config.quality > 100) {
    throw new ConfigurationError(`Compression quality must be an integer from 1 to 100, got: ${config.quality}`);
  }

  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    throw new ConfigurationError(`Concurrency must be a positive integer, got: ${config.concurrency}`);
  }

  if (!config.compress && !config.backup) {
    throw new ConfigurationError("Nothing to do: both backup and compress are disabled");
  }

  if (config.backupFolder.trim() === "") {
    throw new ConfigurationError("Backup folder name must not be empty");
  }

  if (config.summaryFilename.trim() === "" || /[\\/]/.test(config.summaryFilename)) {
    throw new ConfigurationError(`Invalid summary file name: "${config.summaryFilename}"`);
  }
}

/** Relative summary folders live inside the folder being processed. */
export function summaryDirFor(root: string, config: CompressionConfig): string {
  return path.isAbsolute(config.summaryFolder) ? config.summaryFolder : path.join(root, config.summaryFolder);
}

/**
 * Creates the folders the run will write to, so a folder that cannot be
 * created stops the run before any image is touched. Relative backup folders
 * are per image directory and are created as files are backed up.
 */
export async function prepareFolders(root: string, config: CompressionConfig): Promise<void> {
  const folders: string[] = [];
  if (config.saveSummaryToCsv) folders.push(summaryDirFor(root, config));
  if (config.backup && path.isAbsolute(config.backupFolder)) folders.push(config.backupFolder);

  for (const folder of folders) {
    try {
      await fs.mkdir(folder, { recursive: true });
    } catch (err) {
      throw new ConfigurationError(`Cannot create folder ${folder}: ${errorMessage(err)}`);
    }
  }
}
