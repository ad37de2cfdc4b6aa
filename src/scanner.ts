import path from "node:path";
import fs from "node:fs/promises";
import { isImageFile } from "./utils.js";

export interface ScanOptions {
  backupFolder: string;
  summaryFolder: string;
  recursive: boolean;
}

/**
 * Lists image files under `root`, sorted so a fixed directory always yields
 * the same order. Backup and summary folders are left out at any depth.
 * Name-marked files are kept; the processor reports them as skipped.
 */
export async function collectImages(root: string, options: ScanOptions): Promise<string[]> {
  const excluded = new Set(
    [options.backupFolder, options.summaryFolder]
      .filter((folder) => folder !== "" && !path.isAbsolute(folder))
      .map((folder) => folder.toLowerCase())
  );
  const absoluteExcluded = [options.backupFolder, options.summaryFolder]
    .filter((folder) => path.isAbsolute(folder))
    .map((folder) => path.resolve(folder));

  const entries = options.recursive
    ? await fs.readdir(root, { recursive: true })
    : await fs.readdir(root);

  const files: string[] = [];
  for (const entry of entries) {
    if (!isImageFile(entry)) continue;

    const dirs = path.dirname(entry).split(path.sep);
    if (dirs.some((dir) => excluded.has(dir.toLowerCase()))) continue;

    const filePath = path.join(root, entry);
    const resolved = path.resolve(filePath);
    if (absoluteExcluded.some((folder) => resolved.startsWith(folder + path.sep))) continue;

    // Dangling links and entries removed mid-scan are left out.
    const stat = await fs.stat(filePath).catch(() => null);
    if (stat?.isFile()) files.push(filePath);
  }

  return files.sort();
}
