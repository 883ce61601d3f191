import { promises as fs } from "fs";
import path from "path";
import { logger } from "../core/logger";
import { formatTimestamp, slugify } from "../core/normalize";
import type { DownloadPlan, DownloadResult, DownloadedFile } from "../domain/models";
import type { StatsClient } from "../platforms/adapter";

export interface DownloadOptions {
  outputDir: string;
  now?: Date;
  signal?: AbortSignal;
}

export function assetFileName(index: number, code: string | null, fallback: string, extension: string): string {
  // Shortcodes are case-sensitive, so they are kept as-is apart from unsafe characters.
  const stem = (code ?? "").replace(/[^A-Za-z0-9_-]+/g, "-").replace(/^-+|-+$/g, "") || fallback;
  return `${String(index).padStart(2, "0")}_${stem}${extension}`;
}

/**
 * Fetches every asset of the plan, one at a time, into
 * `<outputDir>/downloads/<label>_<timestamp>/` and writes metadata.json beside them.
 */
export async function downloadPlan(
  plan: DownloadPlan,
  client: Pick<StatsClient, "fetchBinary">,
  options: DownloadOptions
): Promise<DownloadResult> {
  const now = options.now ?? new Date();
  const outputDir = path.join(
    options.outputDir,
    "downloads",
    `${slugify(plan.targetLabel, plan.downloadKind)}_${formatTimestamp(now)}`
  );
  await fs.mkdir(outputDir, { recursive: true });

  const files: DownloadedFile[] = [];
  for (const asset of plan.assets) {
    const dir = asset.group ? path.join(outputDir, asset.group) : outputDir;
    await fs.mkdir(dir, { recursive: true });
    const target = path.join(dir, assetFileName(asset.index, asset.code, asset.kind, asset.extension));

    const bytes = await client.fetchBinary(asset.url, options.signal);
    await fs.writeFile(target, bytes);
    logger.debug({ target, bytes: bytes.byteLength }, "Asset downloaded");

    files.push({ path: target, kind: asset.kind, url: asset.url, code: asset.code, group: asset.group });
  }

  const metadataPath = path.join(outputDir, "metadata.json");
  const createdAt = now.toISOString();
  const metadata = {
    downloadKind: plan.downloadKind,
    targetLabel: plan.targetLabel,
    createdAt,
    details: plan.details,
    files: files.map((file) => ({ ...file, path: path.relative(outputDir, file.path) })),
  };
  await fs.writeFile(metadataPath, JSON.stringify(metadata, null, 2) + "\n", "utf8");

  logger.info({ outputDir, files: files.length, kind: plan.downloadKind }, "Download finished");

  return {
    downloadKind: plan.downloadKind,
    targetLabel: plan.targetLabel,
    outputDir,
    files,
    metadataPath,
    createdAt,
  };
}
