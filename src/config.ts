// ── Run configuration ────────────────────────────────────────────────────────
//
// Validates the options handed over by the command line and resolves them into
// absolute paths and defaults. The upload credential lives at a fixed
// well-known location unless --credentials points elsewhere.

import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { DEFAULT_DOCUMENT_NAME } from "./kml-writer.js";

export const APP_NAME = "route-highlighter";

/** ~/.config/route-highlighter/credentials.json */
export function defaultCredentialsPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, ".config", APP_NAME, "credentials.json");
}

const nonEmpty = z.string().trim().min(1);

export const runOptionsSchema = z.object({
  inputDir: nonEmpty.describe("Directory scanned for *.kmz archives"),
  output: nonEmpty.describe("Path of the combined KML"),
  upload: z.boolean().default(false).describe("Upload the KML after writing it"),
  mergeStore: nonEmpty.optional().describe("JSON Lines file holding routes from earlier runs"),
  credentials: nonEmpty.optional().describe("authorized_user credential for the upload"),
  documentName: nonEmpty.default(DEFAULT_DOCUMENT_NAME).describe("<Document> name of the output"),
});

export type RawRunOptions = z.input<typeof runOptionsSchema>;

export interface RunOptions {
  inputDir: string;
  output: string;
  upload: boolean;
  mergeStore?: string;
  credentials: string;
  documentName: string;
}

/**
 * Validate raw options and resolve every path against `cwd`.
 *
 * @throws {z.ZodError} when a required option is missing or blank
 */
export function resolveRunOptions(raw: RawRunOptions, cwd: string = process.cwd()): RunOptions {
  const opts = runOptionsSchema.parse(raw);
  return {
    inputDir: path.resolve(cwd, opts.inputDir),
    output: path.resolve(cwd, opts.output),
    upload: opts.upload,
    mergeStore: opts.mergeStore === undefined ? undefined : path.resolve(cwd, opts.mergeStore),
    credentials: path.resolve(cwd, opts.credentials ?? defaultCredentialsPath()),
    documentName: opts.documentName,
  };
}
