// ── KML output ───────────────────────────────────────────────────────────────

import { XMLBuilder } from "fast-xml-parser";
import { WriteError, describeError } from "./errors.js";
import { writeFileAtomic } from "./fs-utils.js";
import type { RouteCollection } from "./route.js";
import { buildStyledPlacemark } from "./style.js";
import type { RouteStyle } from "./style.js";

export const KML_NAMESPACE = "http://www.opengis.net/kml/2.2";
export const KML_MIME_TYPE = "application/vnd.google-earth.kml+xml";
export const DEFAULT_DOCUMENT_NAME = "Combined routes";

export interface KmlDocumentOptions {
  /** <Document> name shown by map viewers. */
  documentName?: string;
}

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  format: true,
  indentBy: "  ",
  suppressEmptyNode: true,
});

/** Render the collection as one KML document, one styled placemark per route in collection order. */
export function buildKmlDocument(
  collection: RouteCollection,
  style: RouteStyle,
  options: KmlDocumentOptions = {},
): string {
  const placemarks = [...collection.values()].map((route) => buildStyledPlacemark(route, style));
  const xml: unknown = builder.build({
    "?xml": { "@_version": "1.0", "@_encoding": "UTF-8" },
    kml: {
      "@_xmlns": KML_NAMESPACE,
      Document: {
        name: options.documentName ?? DEFAULT_DOCUMENT_NAME,
        Placemark: placemarks,
      },
    },
  });
  if (typeof xml !== "string") throw new TypeError("XML builder returned a non-string document");
  return xml;
}

/**
 * Write a KML document to disk. The file appears complete or not at all.
 *
 * @throws {WriteError} on any I/O failure
 */
export function writeKmlDocument(outputPath: string, kml: string): void {
  try {
    writeFileAtomic(outputPath, kml);
  } catch (err) {
    throw new WriteError(`Cannot write ${outputPath}: ${describeError(err)}`, outputPath, { cause: err });
  }
}
