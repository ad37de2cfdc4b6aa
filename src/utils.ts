import path from "node:path";

const INPUT_FORMATS = ["jpg", "jpeg", "png", "webp", "bmp", "tif", "tiff", "gif", "avif", "heic"];

export type ByteUnit = "KB" | "MB" | "GB";

export function isImageFile(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase().slice(1);
  return INPUT_FORMATS.includes(ext);
}

/**
 * Picks the largest of KB/MB/GB that keeps the magnitude at or above 1.
 * Anything under a kilobyte stays in KB.
 */
export function scaleBytes(bytes: number): { size: number; unit: ByteUnit } {
  const units: ByteUnit[] = ["KB", "MB", "GB"];
  let size = bytes / 1024;
  let unit = 0;

  while (Math.abs(size) >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }

  return { size, unit: units[unit] ?? "GB" };
}

export function percentSaved(before: number, after: number): number {
  return before > 0 ? ((before - after) / before) * 100 : 0;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  if (hours > 0) return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  return minutes > 0 ? `${minutes}m ${seconds % 60}s` : `${(ms / 1000).toFixed(2)}s`;
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  return `${day} ${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

/** Local time as `YYYY-MM-DD-HH-mm-ss`, safe for file names. */
export function fileTimestamp(date: Date): string {
  return formatTimestamp(date).replace(/[ :]/g, "-");
}

export function parseBoolean(value: string): boolean | undefined {
  switch (value.trim().toLowerCase()) {
    case "true":
    case "t":
    case "yes":
    case "y":
    case "1":
      return true;
    case "false":
    case "f":
    case "no":
    case "n":
    case "0":
      return false;
    default:
      return undefined;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
