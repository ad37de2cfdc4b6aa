import path from "node:path";
import fs from "node:fs/promises";
import type { LanguagePack, TemplateValue } from "./i18n.js";
import { fileTimestamp, formatDuration, formatTimestamp, percentSaved, scaleBytes } from "./utils.js";
import type { AggregateSnapshot, FileFailure, FileRecord, FileStatus } from "./types.js";

const MB = 1024 * 1024;

const STATUS_KEYS: Record<FileStatus, string> = {
  compressed: "status.compressed",
  "skipped-backed-up": "status.skipped_backed_up",
  "skipped-by-name": "status.skipped_by_name",
  unreadable: "status.unreadable",
  "compression-error": "status.compression_error",
};

const CSV_FIELDS = [
  "key", "value",
  "start_time", "end_time", "elapsed", "avg_time", "avg_time_unavailable", "avg_time_cannot_calculate",
  "total_images", "compressed", "skipped_backup", "skipped_named", "unreadable", "errors",
  "size_before", "size_after", "size_saved", "size_percent",
  "ext", "ext_count", "ext_before", "ext_after", "ext_saved", "ext_percent",
  "detail_path", "detail_ext", "detail_before", "detail_after", "detail_percent",
  "detail_status", "detail_error", "detail_elapsed", "detail_time",
];

/** Every message the renderer can ask for; checked up front so a bad pack fails before any work. */
export const REPORT_MESSAGE_KEYS: readonly string[] = [
  ...Object.values(STATUS_KEYS),
  "failure.backup", "failure.decode", "failure.encode",
  "progress.compressed", "progress.compressed_warning", "progress.skipped", "progress.failed",
  "report.header_summary", "report.header_ext_summary",
  "report.start_time", "report.end_time", "report.elapsed", "report.avg_time", "report.no_avg_time",
  "report.time_unavailable",
  "report.total_images", "report.compressed_success", "report.skipped_backup", "report.skipped_named",
  "report.error_unreadable", "report.error_failed",
  "report.size_before", "report.size_after", "report.size_saved", "report.ext_format", "report.no_extensions",
  "report.units.KB", "report.units.MB", "report.units.GB",
  "csv.section_general", "csv.section_ext", "csv.section_detail",
  ...CSV_FIELDS.map((field) => `csv.fields.${field}`),
];

function sized(lang: LanguagePack, bytes: number): { size: number; unit: string } {
  const { size, unit } = scaleBytes(bytes);
  return { size, unit: lang.t(`report.units.${unit}`) };
}

function timeText(lang: LanguagePack, date: Date | null): string {
  return date ? formatTimestamp(date) : lang.t("report.time_unavailable");
}

function elapsedText(lang: LanguagePack, snapshot: AggregateSnapshot): string {
  if (!snapshot.startTime || !snapshot.endTime) return lang.t("report.time_unavailable");
  return formatDuration(snapshot.endTime.getTime() - snapshot.startTime.getTime());
}

/** Mean time spent on successfully compressed files, or null when there are none. */
export function averageCompressSeconds(snapshot: AggregateSnapshot): number | null {
  const count = snapshot.counts.compressed;
  if (count === 0) return null;

  const seconds = snapshot.records
    .filter((record) => record.status === "compressed")
    .reduce((acc, record) => acc + record.elapsedSeconds, 0);
  return seconds / count;
}

export function describeFailure(failure: FileFailure, lang: LanguagePack): string {
  return lang.t(`failure.${failure.kind}`, { error: failure.message });
}

/** The record's failure, followed by a backup failure that happened alongside it. */
export function describeFailures(record: FileRecord, lang: LanguagePack): string {
  return [record.error, record.backupError]
    .filter((failure): failure is FileFailure => failure !== undefined)
    .map((failure) => describeFailure(failure, lang))
    .join("; ");
}

export function describeStatus(status: FileStatus, lang: LanguagePack): string {
  return lang.t(STATUS_KEYS[status]);
}

/** The one-line progress message shown as each file is committed. */
export function renderRecordLine(record: FileRecord, lang: LanguagePack): string {
  const status = describeStatus(record.status, lang);

  if (record.status === "compressed" && record.sizeAfter !== undefined) {
    const before = sized(lang, record.sizeBefore);
    const after = sized(lang, record.sizeAfter);
    const params: Record<string, TemplateValue> = {
      path: record.path,
      before: before.size,
      before_unit: before.unit,
      after: after.size,
      after_unit: after.unit,
      percent: percentSaved(record.sizeBefore, record.sizeAfter),
    };
    return record.error
      ? lang.t("progress.compressed_warning", { ...params, error: describeFailures(record, lang) })
      : lang.t("progress.compressed", params);
  }

  if (record.error) {
    return lang.t("progress.failed", { path: record.path, status, error: describeFailures(record, lang) });
  }
  return lang.t("progress.skipped", { path: record.path, status });
}

export function renderConsole(snapshot: AggregateSnapshot, lang: LanguagePack): string {
  const { counts, bytesBefore, bytesAfter } = snapshot;
  const lines: string[] = [];

  lines.push(lang.t("report.header_summary"));
  lines.push(lang.t("report.start_time", { time: timeText(lang, snapshot.startTime) }));
  lines.push(lang.t("report.end_time", { time: timeText(lang, snapshot.endTime) }));
  lines.push(lang.t("report.elapsed", { elapsed: elapsedText(lang, snapshot) }));
  lines.push(lang.t("report.total_images", { count: snapshot.total }));

  const average = averageCompressSeconds(snapshot);
  lines.push(average === null ? lang.t("report.no_avg_time") : lang.t("report.avg_time", { seconds: average }));

  lines.push(lang.t("report.compressed_success", { count: counts.compressed }));
  lines.push(lang.t("report.skipped_backup", { count: counts["skipped-backed-up"] }));
  lines.push(lang.t("report.skipped_named", { count: counts["skipped-by-name"] }));
  lines.push(lang.t("report.error_unreadable", { count: counts.unreadable }));
  lines.push(lang.t("report.error_failed", { count: counts["compression-error"] }));
  lines.push(lang.t("report.size_before", sized(lang, bytesBefore)));
  lines.push(lang.t("report.size_after", sized(lang, bytesAfter)));
  lines.push(
    lang.t("report.size_saved", {
      ...sized(lang, bytesBefore - bytesAfter),
      percent: percentSaved(bytesBefore, bytesAfter),
    })
  );

  lines.push("");
  lines.push(lang.t("report.header_ext_summary"));

  if (snapshot.extensions.size === 0) {
    lines.push(lang.t("report.no_extensions"));
  }
  for (const stats of snapshot.extensions.values()) {
    lines.push(
      lang.t("report.ext_format", {
        ext: stats.extension.toUpperCase(),
        count: stats.count,
        ...sized(lang, stats.bytesBefore - stats.bytesAfter),
        percent: percentSaved(stats.bytesBefore, stats.bytesAfter),
      })
    );
  }

  return lines.join("\n");
}

function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Three sections: summary key/value pairs, per-extension totals in first-seen
 * order, and one row per file in the order the files were given.
 */
export function renderCsv(snapshot: AggregateSnapshot, lang: LanguagePack): string {
  const field = (key: string): string => lang.t(`csv.fields.${key}`);
  const { counts, bytesBefore, bytesAfter } = snapshot;
  const rows: Array<Array<string | number>> = [];

  rows.push([lang.t("csv.section_general")]);
  rows.push([field("key"), field("value")]);
  rows.push([field("start_time"), timeText(lang, snapshot.startTime)]);
  rows.push([field("end_time"), timeText(lang, snapshot.endTime)]);
  rows.push([field("elapsed"), elapsedText(lang, snapshot)]);

  const average = averageCompressSeconds(snapshot);
  rows.push(
    average === null
      ? [field("avg_time_unavailable"), field("avg_time_cannot_calculate")]
      : [field("avg_time"), average.toFixed(2)]
  );

  rows.push([field("total_images"), snapshot.total]);
  rows.push([field("compressed"), counts.compressed]);
  rows.push([field("skipped_backup"), counts["skipped-backed-up"]]);
  rows.push([field("skipped_named"), counts["skipped-by-name"]]);
  rows.push([field("unreadable"), counts.unreadable]);
  rows.push([field("errors"), counts["compression-error"]]);
  rows.push([field("size_before"), (bytesBefore / MB).toFixed(2)]);
  rows.push([field("size_after"), (bytesAfter / MB).toFixed(2)]);
  rows.push([field("size_saved"), ((bytesBefore - bytesAfter) / MB).toFixed(2)]);
  rows.push([field("size_percent"), percentSaved(bytesBefore, bytesAfter).toFixed(1)]);
  rows.push([]);

  rows.push([lang.t("csv.section_ext")]);
  rows.push(["ext", "ext_count", "ext_before", "ext_after", "ext_saved", "ext_percent"].map(field));
  for (const stats of snapshot.extensions.values()) {
    rows.push([
      stats.extension,
      stats.count,
      stats.bytesBefore,
      stats.bytesAfter,
      ((stats.bytesBefore - stats.bytesAfter) / MB).toFixed(2),
      percentSaved(stats.bytesBefore, stats.bytesAfter).toFixed(1),
    ]);
  }
  rows.push([]);

  rows.push([lang.t("csv.section_detail")]);
  rows.push(
    [
      "detail_path", "detail_ext", "detail_before", "detail_after", "detail_percent",
      "detail_status", "detail_error", "detail_elapsed", "detail_time",
    ].map(field)
  );
  for (const record of snapshot.records) {
    const after = record.sizeAfter;
    rows.push([
      record.path,
      record.extension,
      (record.sizeBefore / 1024).toFixed(1),
      after === undefined ? "" : (after / 1024).toFixed(1),
      after === undefined ? "" : percentSaved(record.sizeBefore, after).toFixed(1),
      describeStatus(record.status, lang),
      describeFailures(record, lang),
      record.elapsedSeconds.toFixed(3),
      formatTimestamp(record.finishedAt),
    ]);
  }

  return rows.map((row) => row.map(csvField).join(",")).join("\r\n") + "\r\n";
}

/**
 * Writes `<folder>/<baseName>_<timestamp>.csv`, stamped with the run's end
 * time. The BOM lets spreadsheet tools pick up UTF-8.
 */
export async function writeCsvReport(
  snapshot: AggregateSnapshot,
  lang: LanguagePack,
  folder: string,
  baseName: string
): Promise<string> {
  const document = renderCsv(snapshot, lang);
  await fs.mkdir(folder, { recursive: true });

  const csvPath = path.join(folder, `${baseName}_${fileTimestamp(snapshot.endTime ?? new Date())}.csv`);
  await fs.writeFile(csvPath, `\ufeff${document}`, "utf8");
  return csvPath;
}
