#!/usr/bin/env node

import fs from "node:fs/promises";
import { createRequire } from "node:module";
import { BatchCompressor } from "./compressor.js";
import {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATH,
  loadConfigFile,
  prepareFolders,
  readPath,
  resolveConfig,
  summaryDirFor,
} from "./config.js";
import { loadLanguagePack } from "./i18n.js";
import { FileProcessor } from "./processor.js";
import { REPORT_MESSAGE_KEYS, renderConsole, writeCsvReport } from "./report.js";
import { collectImages } from "./scanner.js";
import { errorMessage, parseBoolean } from "./utils.js";
import type { CompressionConfig, ParsedArgs } from "./types.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as {
  name: string;
  version: string;
  description: string;
  license: string;
};
const VERSION = pkg.version;

const CLI_MESSAGE_KEYS = [
  "general.start_processing",
  "general.finished_processing",
  "general.saved_report",
  "general.folder_not_found",
  "general.interrupted",
];

type KeysOfType<T> = { [K in keyof CompressionConfig]: CompressionConfig[K] extends T ? K : never }[keyof CompressionConfig];

const NUMBER_OPTIONS = new Map<string, KeysOfType<number>>([
  ["q", "quality"],
  ["quality", "quality"],
  ["compress-quality", "quality"],
  ["j", "concurrency"],
  ["concurrency", "concurrency"],
]);

const BOOLEAN_OPTIONS = new Map<string, KeysOfType<boolean>>([
  ["backup", "backup"],
  ["skip-original", "skipOriginal"],
  ["skip-skip", "skipSkip"],
  ["compress", "compress"],
  ["ignore-suffix-case", "ignoreSuffixCase"],
  ["print-image-reduced", "printImageReduced"],
  ["print-summary", "printSummary"],
  ["save-summary-to-csv", "saveSummaryToCsv"],
  ["r", "recursive"],
  ["recursive", "recursive"],
]);

const STRING_OPTIONS = new Map<string, KeysOfType<string>>([
  ["backup-folder", "backupFolder"],
  ["original-suffix", "originalSuffix"],
  ["skip-suffix", "skipSuffix"],
  ["summary-folder", "summaryFolder"],
  ["summary-filename", "summaryFilename"],
  ["l", "langCode"],
  ["lang", "langCode"],
  ["lang-code", "langCode"],
]);

const HELP = `
squeezepix v${VERSION}: recompress every image in a folder, in place

Usage:
  squeezepix <folder>                 Compress all images under folder (recursively)
  squeezepix -q 70 <folder>           Custom quality (default: ${DEFAULT_CONFIG.quality})
  squeezepix -l zh-tw <folder>        Report in Traditional Chinese
  squeezepix -c my.yaml               Read settings (including "path") from a YAML file

Options:
  -q, --quality <n>              Compression quality 1-100
  -l, --lang <code>              Report language: en, zh-tw (default: ${DEFAULT_CONFIG.langCode})
  -c, --config <file>            YAML config file (default: ${DEFAULT_CONFIG_PATH})
  -j, --concurrency <n>          Images processed at once (default: ${DEFAULT_CONFIG.concurrency})
  -r, --recursive <bool>         Descend into subfolders (default: true)
      --path <folder>            Folder to process
      --backup <bool>            Copy originals before compressing (default: true)
      --backup-folder <name>     Backup folder name (default: "${DEFAULT_CONFIG.backupFolder}")
      --original-suffix <s>      Suffix for backup copies (default: ${DEFAULT_CONFIG.originalSuffix})
      --skip-suffix <s>          Images whose name ends with this are skipped (default: ${DEFAULT_CONFIG.skipSuffix})
      --skip-original <bool>     Skip images ending with the original suffix (default: true)
      --skip-skip <bool>         Skip images ending with the skip suffix (default: true)
      --compress <bool>          Compress after backing up (default: true)
      --ignore-suffix-case <bool>  Match suffixes case-insensitively (default: false)
      --print-image-reduced <bool> Print one line per image (default: true)
      --print-summary <bool>     Print the summary report (default: true)
      --save-summary-to-csv <bool> Write the CSV report (default: true)
      --summary-folder <name>    Folder for CSV reports (default: ${DEFAULT_CONFIG.summaryFolder})
      --summary-filename <name>  CSV report base name (default: ${DEFAULT_CONFIG.summaryFilename})
      --about                    Show package information
  -h, --help                     Show this help message
  -v, --version                  Show version number

Options also accept snake_case spellings, e.g. --compress_quality 80.
Supported formats: jpg, jpeg, png, webp, tiff, gif, avif (bmp and heic are reported as unreadable or failed)
`.trim();

function fail(message: string): never {
  console.error(`Error: ${message}`);
  console.error("Run squeezepix --help for usage");
  process.exit(1);
}

function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    inputs: [],
    configPath: DEFAULT_CONFIG_PATH,
    overrides: {},
    help: false,
    version: false,
    about: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (!arg.startsWith("-") || arg === "-") {
      result.inputs.push(arg);
      continue;
    }

    const [flag = "", inline] = arg.split(/=(.*)/s, 2);
    const name = flag.replace(/^--?/, "").replace(/_/g, "-");
    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const next = args[++i];
      if (next === undefined) fail(`${flag} requires a value`);
      return next;
    };

    if (name === "h" || name === "help") {
      result.help = true;
      return result;
    }

    if (name === "v" || name === "version") {
      result.version = true;
      return result;
    }

    if (name === "about") {
      result.about = true;
      return result;
    }

    if (name === "c" || name === "config") {
      result.configPath = takeValue();
      continue;
    }

    if (name === "p" || name === "path") {
      result.inputs.push(takeValue());
      continue;
    }

    const numberKey = NUMBER_OPTIONS.get(name);
    if (numberKey) {
      const raw = takeValue();
      const val = Number(raw);
      if (raw.trim() === "" || isNaN(val)) fail(`invalid ${flag} value: ${raw}`);
      result.overrides[numberKey] = val;
      continue;
    }

    const booleanKey = BOOLEAN_OPTIONS.get(name);
    if (booleanKey) {
      // A bare boolean flag means true; a following true/false/yes/no is its value.
      const next = inline ?? args[i + 1];
      const val = next === undefined ? undefined : parseBoolean(next);
      if (val === undefined) {
        if (inline !== undefined) fail(`invalid ${flag} value: ${inline}`);
        result.overrides[booleanKey] = true;
      } else {
        if (inline === undefined) i++;
        result.overrides[booleanKey] = val;
      }
      continue;
    }

    const stringKey = STRING_OPTIONS.get(name);
    if (stringKey) {
      result.overrides[stringKey] = takeValue();
      continue;
    }

    fail(`unknown option: ${flag}`);
  }

  return result;
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv);

  if (parsed.help) {
    console.log(HELP);
    return;
  }

  if (parsed.version) {
    console.log(VERSION);
    return;
  }

  if (parsed.about) {
    console.log(`Name: ${pkg.name}`);
    console.log(`Version: ${pkg.version}`);
    console.log(`Description: ${pkg.description}`);
    console.log(`License: ${pkg.license}`);
    return;
  }

  const configFile = await loadConfigFile(parsed.configPath);
  const config = resolveConfig(parsed.overrides, configFile);

  if (parsed.inputs.length > 1) {
    fail("only one folder can be processed at a time");
  }
  const target = parsed.inputs[0] ?? readPath(configFile);
  if (!target) {
    fail("no input folder specified");
  }

  const language = await loadLanguagePack(config.langCode);
  language.assertKeys([...REPORT_MESSAGE_KEYS, ...CLI_MESSAGE_KEYS]);

  const stat = await fs.stat(target).catch(() => null);
  if (!stat?.isDirectory()) {
    console.error(language.t("general.folder_not_found", { folder: target }));
    process.exit(1);
  }

  await prepareFolders(target, config);

  const files = await collectImages(target, {
    backupFolder: config.backupFolder,
    summaryFolder: config.summaryFolder,
    recursive: config.recursive,
  });
  console.log(language.t("general.start_processing", { count: files.length }));

  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.warn(language.t("general.interrupted"));
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  const compressor = new BatchCompressor(new FileProcessor({ ...config, scanRoot: target }), {
    language,
    concurrency: config.concurrency,
    printImageReduced: config.printImageReduced,
    signal: controller.signal,
  });

  const snapshot = await compressor.run(files).finally(() => process.off("SIGINT", onInterrupt));

  if (config.printSummary) {
    console.log(`\n${renderConsole(snapshot, language)}`);
  }

  if (config.saveSummaryToCsv) {
    const csvPath = await writeCsvReport(snapshot, language, summaryDirFor(target, config), config.summaryFilename);
    console.log(language.t("general.saved_report", { path: csvPath }));
  }

  console.log(language.t("general.finished_processing", { folder: target }));

  if (snapshot.counts.unreadable + snapshot.counts["compression-error"] > 0) {
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error("Error:", errorMessage(err));
  process.exit(1);
});
