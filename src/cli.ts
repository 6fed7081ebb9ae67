// ── Command line ─────────────────────────────────────────────────────────────

import { Command } from "commander";
import { APP_NAME, defaultCredentialsPath, resolveRunOptions } from "./config.js";
import type { RunOptions } from "./config.js";
import { DEFAULT_DOCUMENT_NAME } from "./kml-writer.js";

export const VERSION = "0.1.0";

interface CliFlags {
  output: string;
  upload?: boolean;
  mergeStore?: string;
  credentials?: string;
  name?: string;
}

/**
 * Build the command. `onRun` receives the resolved options; its exit code
 * becomes `process.exitCode`.
 */
export function createProgram(onRun: (options: RunOptions) => Promise<number>): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description(
      "Combine the routes of GPS exports (KMZ files) into one KML overlay with a hot pink highlight, " +
        "optionally uploading it to Google Drive for Google My Maps.",
    )
    .version(VERSION)
    .argument("<input_directory>", "directory containing your KMZ files (not searched recursively)")
    .requiredOption("-o, --output <path>", "output KML file")
    .option("--upload", "upload the resulting KML to Google Drive")
    .option("--merge-store <path>", "keep routes from earlier runs in this file and merge new ones into it")
    .option("--credentials <path>", `Google authorized_user credential (default: ${defaultCredentialsPath()})`)
    .option("--name <title>", `document name shown in map viewers (default: "${DEFAULT_DOCUMENT_NAME}")`)
    .action(async (inputDir: string, flags: CliFlags) => {
      const options = resolveRunOptions({
        inputDir,
        output: flags.output,
        upload: flags.upload ?? false,
        mergeStore: flags.mergeStore,
        credentials: flags.credentials,
        documentName: flags.name,
      });
      process.exitCode = await onRun(options);
    });

  return program;
}
