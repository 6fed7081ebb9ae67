// ── KMZ archive reading ──────────────────────────────────────────────────────
//
// A KMZ is a zip container holding one KML document, conventionally named
// doc.kml at the archive root. Some exporters use a different name or put it
// in a folder, so any *.kml entry is accepted when doc.kml is absent.

import * as fs from "node:fs";
import AdmZip from "adm-zip";
import { ArchiveError, describeError } from "./errors.js";

const DEFAULT_DOCUMENT = "doc.kml";

/** Pick the KML entry of a KMZ: root doc.kml first, else the first *.kml in archive order. */
export function findKmlEntry(entryNames: readonly string[]): string | undefined {
  const kml = entryNames.filter((name) => name.toLowerCase().endsWith(".kml"));
  return kml.find((name) => name.toLowerCase() === DEFAULT_DOCUMENT) ?? kml[0];
}

/**
 * Read the KML document embedded in a KMZ file.
 *
 * @throws {ArchiveError} when the file cannot be read, is not a zip, is empty,
 *   or holds no KML document
 */
export function readArchive(archivePath: string): string {
  let buffer: Buffer;
  try {
    buffer = fs.readFileSync(archivePath);
  } catch (err) {
    throw new ArchiveError(`Cannot read ${archivePath}: ${describeError(err)}`, archivePath, { cause: err });
  }
  if (buffer.length === 0) {
    throw new ArchiveError(`${archivePath} is empty`, archivePath);
  }

  let zip: AdmZip;
  try {
    zip = new AdmZip(buffer);
  } catch (err) {
    throw new ArchiveError(`${archivePath} is not a valid KMZ archive: ${describeError(err)}`, archivePath, {
      cause: err,
    });
  }

  const entries = zip.getEntries().filter((entry) => !entry.isDirectory);
  if (entries.length === 0) {
    throw new ArchiveError(`${archivePath} contains no files`, archivePath);
  }

  const kmlName = findKmlEntry(entries.map((entry) => entry.entryName));
  const entry = entries.find((e) => e.entryName === kmlName);
  if (!entry) {
    throw new ArchiveError(`No KML document found in ${archivePath}`, archivePath);
  }

  let data: Buffer;
  try {
    data = entry.getData();
  } catch (err) {
    throw new ArchiveError(`Cannot extract ${entry.entryName} from ${archivePath}: ${describeError(err)}`, archivePath, {
      cause: err,
    });
  }
  // Strip a UTF-8 byte order mark; the XML validator rejects it before the declaration.
  return data.toString("utf8").replace(/^\uFEFF/, "");
}
