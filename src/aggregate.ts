// ── Route aggregation ────────────────────────────────────────────────────────
//
// Reads every archive of the input directory in name order. A file that cannot
// be opened or parsed is reported and skipped; the remaining files are still
// processed.

import * as fs from "node:fs";
import * as path from "node:path";
import { readArchive } from "./archive.js";
import { ArchiveError, InputError, ParseError, describeError, isErrnoException } from "./errors.js";
import { extractRoutes } from "./kml.js";
import type { Logger } from "./logger.js";
import { assignRouteIds, fileStem } from "./route.js";
import type { Route } from "./route.js";

export const ARCHIVE_EXTENSION = ".kmz";

export interface AggregateResult {
  routes: Route[];
  /** Archives skipped because they could not be read or parsed. */
  failedFiles: string[];
}

/**
 * List the archives directly inside `dir`, sorted by name. Subdirectories are not searched.
 *
 * @throws {InputError} when `dir` is missing, not a directory, or holds no archives
 */
export function listArchives(dir: string): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    const reason = isErrnoException(err) && err.code === "ENOTDIR" ? "is not a directory" : describeError(err);
    throw new InputError(`Input directory ${dir} ${reason}`, dir, { cause: err });
  }

  const archives = entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(ARCHIVE_EXTENSION))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(dir, name));

  if (archives.length === 0) {
    throw new InputError(`No ${ARCHIVE_EXTENSION} archives found in ${dir}`, dir);
  }
  return archives;
}

/** Extract the routes of one archive, with ids unique within it and not in `taken`. */
export function readArchiveRoutes(archivePath: string, logger: Logger, taken?: Set<string>): Route[] {
  const source = path.basename(archivePath);
  const { routes, skipped } = extractRoutes(readArchive(archivePath), source);
  for (const s of skipped) {
    const label = s.name ? `"${s.name}"` : `#${s.placemark}`;
    logger.warn(`${source}: skipped placemark ${label}: ${s.reason}`);
  }
  return assignRouteIds(source, routes, taken);
}

/** Read all archives, isolating per-file failures. */
export function aggregateRoutes(archivePaths: readonly string[], logger: Logger): AggregateResult {
  const routes: Route[] = [];
  const failedFiles: string[] = [];
  const taken = new Set<string>();
  const stems = new Set<string>();

  for (const archivePath of archivePaths) {
    try {
      const found = readArchiveRoutes(archivePath, logger, taken);
      const stem = fileStem(archivePath);
      if (stems.has(stem)) {
        logger.warn(`${path.basename(archivePath)}: another archive is also named "${stem}"; repeated route ids get a #N suffix`);
      }
      stems.add(stem);
      if (found.length === 0) {
        logger.warn(`${path.basename(archivePath)}: no routes found`);
      }
      routes.push(...found);
    } catch (err) {
      if (!(err instanceof ArchiveError || err instanceof ParseError)) throw err;
      logger.warn(`skipping ${archivePath}: ${err.message}`);
      failedFiles.push(archivePath);
    }
  }

  return { routes, failedFiles };
}
