// ── Run pipeline ─────────────────────────────────────────────────────────────
//
// One invocation: load the merge store, read every archive, merge, write the
// overlay, save the store, then upload when asked. Returns the exit code.

import * as path from "node:path";
import { aggregateRoutes, listArchives } from "./aggregate.js";
import type { RunOptions } from "./config.js";
import { InputError, RouteHighlighterError } from "./errors.js";
import { buildKmlDocument, writeKmlDocument } from "./kml-writer.js";
import { consoleLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { loadRouteStore, mergeRoutes, saveRouteStore } from "./merge-store.js";
import type { RouteCollection } from "./route.js";
import { DEFAULT_ROUTE_STYLE } from "./style.js";
import type { RouteStyle } from "./style.js";
import { DriveUploader } from "./upload.js";
import type { Uploader } from "./upload.js";

export interface RunDependencies {
  logger?: Logger;
  style?: RouteStyle;
  /** Defaults to a DriveUploader using `options.credentials`. */
  uploader?: Uploader;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

async function execute(options: RunOptions, deps: RunDependencies, logger: Logger): Promise<void> {
  const stored: RouteCollection = options.mergeStore ? loadRouteStore(options.mergeStore) : new Map();
  if (options.mergeStore) {
    logger.info(`Loaded ${stored.size} stored route(s) from ${options.mergeStore}`);
  }

  const archives = listArchives(options.inputDir);
  const { routes, failedFiles } = aggregateRoutes(archives, logger);
  logger.info(
    `Extracted ${routes.length} route(s) from ${archives.length - failedFiles.length} of ${archives.length} archive(s)`,
  );
  if (routes.length === 0) {
    throw new InputError(`No valid routes extracted from ${options.inputDir}`, options.inputDir);
  }

  const collection = mergeRoutes(stored, routes);
  const kml = buildKmlDocument(collection, deps.style ?? DEFAULT_ROUTE_STYLE, {
    documentName: options.documentName,
  });
  writeKmlDocument(options.output, kml);
  logger.info(`Combined KML with ${collection.size} route(s) saved to ${options.output}`);

  if (options.mergeStore) {
    saveRouteStore(collection, options.mergeStore);
    logger.info(`Merge store updated: ${options.mergeStore}`);
  }

  if (options.upload) {
    const uploader = deps.uploader ?? new DriveUploader({ credentialsPath: options.credentials });
    const remoteId = await uploader.upload(options.output, path.basename(options.output));
    logger.info(`Uploaded ${path.basename(options.output)} to Google Drive with ID: ${remoteId}`);
  }
}

/**
 * Run the tool once. Known failures are logged and turned into a non-zero
 * exit code; anything else propagates.
 */
export async function run(options: RunOptions, deps: RunDependencies = {}): Promise<number> {
  const logger = deps.logger ?? consoleLogger;
  try {
    await execute(options, deps, logger);
    return EXIT_OK;
  } catch (err) {
    if (!(err instanceof RouteHighlighterError)) throw err;
    logger.error(err.message);
    return EXIT_FAILURE;
  }
}
