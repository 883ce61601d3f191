import { promises as fs } from "fs";
import path from "path";
import { logger } from "../core/logger";
import { ExportTargetMissingError } from "../core/errors";
import { formatTimestamp, slugify } from "../core/normalize";
import { ENTRY_SCHEMAS, type Collection, type CollectionKind } from "../domain/models";

export type ExportFormat = "csv" | "json";

export interface ExportOptions {
  outputDir: string;
  filenameHint?: string | null;
  now?: Date;
}

export interface ExportResult {
  format: ExportFormat;
  kind: CollectionKind;
  path: string;
  metadataPath: string;
  entryCount: number;
  filenameHint: string;
}

const MAX_COLLISION_SUFFIX = 1000;

export function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (match) => `_${match.toLowerCase()}`);
}

/** Field order of the entry schema for a collection kind. */
export function columnsFor(kind: CollectionKind): string[] {
  return Object.keys(ENTRY_SCHEMAS[kind].shape);
}

export function csvCell(value: unknown): string {
  let text: string;
  if (value === null || value === undefined) text = "";
  else if (Array.isArray(value)) text = value.map((item) => String(item)).join("|");
  else if (typeof value === "object") text = JSON.stringify(value);
  else text = String(value);

  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function renderCsv(collection: Collection): string {
  const columns = columnsFor(collection.kind);
  const lines = [columns.map((column) => csvCell(toSnakeCase(column))).join(",")];
  for (const entry of collection.entries) {
    const record: Record<string, unknown> = { ...entry };
    lines.push(columns.map((column) => csvCell(record[column])).join(","));
  }
  return lines.join("\r\n") + "\r\n";
}

export function renderJson(collection: Collection): string {
  return JSON.stringify(collection.entries, null, 2) + "\n";
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Picks the first free `<base>[-N]` whose data file and sidecar both do not
 * exist yet, then writes the data file exclusively. Returns the chosen stem.
 */
async function writeExclusive(outputDir: string, base: string, ext: string, data: string): Promise<string> {
  for (let attempt = 1; attempt <= MAX_COLLISION_SUFFIX; attempt++) {
    const stem = attempt === 1 ? base : `${base}-${attempt}`;
    if (await exists(path.join(outputDir, `${stem}.meta.json`))) continue;
    try {
      await fs.writeFile(path.join(outputDir, `${stem}.${ext}`), data, { encoding: "utf8", flag: "wx" });
      return stem;
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "EEXIST") continue;
      throw error;
    }
  }
  throw new Error(`Could not find a free file name for ${base}.${ext} in ${outputDir}`);
}

/**
 * Writes the collection as `<slug>_<YYYYMMDD_HHMMSS>.<ext>` plus a
 * `<same base>.meta.json` sidecar. Existing files are never overwritten.
 */
export async function exportCollection(
  collection: Collection | null,
  format: ExportFormat,
  options: ExportOptions
): Promise<ExportResult> {
  if (!collection) throw new ExportTargetMissingError();

  const now = options.now ?? new Date();
  const filenameHint = options.filenameHint?.trim() || collection.filenameHint;
  const base = `${slugify(filenameHint)}_${formatTimestamp(now)}`;
  const body = format === "csv" ? renderCsv(collection) : renderJson(collection);

  await fs.mkdir(options.outputDir, { recursive: true });
  const stem = await writeExclusive(options.outputDir, base, format, body);
  const dataPath = path.join(options.outputDir, `${stem}.${format}`);
  const metadataPath = path.join(options.outputDir, `${stem}.meta.json`);

  const sidecar = {
    kind: collection.kind,
    entryCount: collection.entries.length,
    generatedAt: now.toISOString(),
    fetchedAt: collection.fetchedAt,
    filenameHint,
    format,
    dataFile: path.basename(dataPath),
    metadata: collection.metadata,
  };
  await fs.writeFile(metadataPath, JSON.stringify(sidecar, null, 2) + "\n", { encoding: "utf8", flag: "wx" });

  logger.info({ path: dataPath, kind: collection.kind, entries: collection.entries.length }, "Collection exported");

  return {
    format,
    kind: collection.kind,
    path: dataPath,
    metadataPath,
    entryCount: collection.entries.length,
    filenameHint,
  };
}
