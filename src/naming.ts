import path from "node:path";
import type { Classification, NamingPolicy } from "./types.js";

function stemEndsWith(stem: string, suffix: string, ignoreCase: boolean): boolean {
  if (suffix === "") return false;
  return ignoreCase ? stem.toLowerCase().endsWith(suffix.toLowerCase()) : stem.endsWith(suffix);
}

/**
 * Decides from the file name alone what should happen to a file.
 * Skip markers are checked first, then whether compression is enabled at all.
 */
export function classify(filename: string, policy: NamingPolicy): Classification {
  const stem = path.parse(filename).name;

  if (policy.skipSkip && stemEndsWith(stem, policy.skipSuffix, policy.ignoreSuffixCase)) {
    return "skip";
  }

  if (policy.skipOriginal && stemEndsWith(stem, policy.originalSuffix, policy.ignoreSuffixCase)) {
    return "skip";
  }

  return policy.compress ? "full" : "backup-only";
}

function absoluteBackupDir(backupFolder: string, dir: string, scanRoot: string | undefined): string {
  if (scanRoot === undefined) return backupFolder;
  const relative = path.relative(scanRoot, dir);
  if (relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) return backupFolder;
  return path.join(backupFolder, relative);
}

/**
 * `<backupFolder>/<stem><originalSuffix><ext>`. A relative backup folder lives
 * beside the file it backs up. An absolute one mirrors the file's folder
 * below `scanRoot`, so equal names in different subfolders do not collide.
 */
export function backupPathFor(
  filePath: string,
  backupFolder: string,
  originalSuffix: string,
  scanRoot?: string
): string {
  const { dir, name, ext } = path.parse(filePath);
  const folder = path.isAbsolute(backupFolder)
    ? absoluteBackupDir(backupFolder, dir, scanRoot)
    : path.join(dir, backupFolder);
  return path.join(folder, `${name}${originalSuffix}${ext}`);
}
