// ── KML route extraction ─────────────────────────────────────────────────────
//
// Turns a KML document into route drafts, one per line geometry.
//
// Placemarks are collected from <Document>/<Folder> containers at any depth.
// Each placemark is read into a PlacemarkRecord first, then validated:
//
//   <LineString><coordinates>  "lng,lat[,ele]" tuples separated by whitespace
//   <gx:Track><gx:coord>       one "lng lat [ele]" per element
//
// LineStrings inside <MultiGeometry> and Tracks inside <gx:MultiTrack> count.
// Placemarks without line geometry (waypoints) are not routes and are ignored.
// A geometry with fewer than two usable points is skipped and reported; it
// never fails the document.

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { ParseError, describeError } from "./errors.js";
import type { RoutePoint } from "./route.js";

// ── Types ────────────────────────────────────────────────────────────────────

export interface RouteDraft {
  name: string;
  points: RoutePoint[];
}

export interface SkippedPlacemark {
  /** 1-based position of the placemark in the document. */
  placemark: number;
  name?: string;
  reason: string;
}

export interface ExtractResult {
  routes: RouteDraft[];
  skipped: SkippedPlacemark[];
}

type GeometryRecord =
  | { kind: "LineString"; coordinates: string }
  | { kind: "Track"; coords: string[] };

/** A placemark as found in the document, before validation. */
export interface PlacemarkRecord {
  name?: string;
  geometries: GeometryRecord[];
}

interface KmlNode {
  [key: string]: unknown;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

/** Wrap a value in an array if it isn't one already (handles single-element XML). */
function asArray<T>(value: T | T[] | undefined | null): T[] {
  if (value == null) return [];
  return Array.isArray(value) ? value : [value];
}

function isNode(value: unknown): value is KmlNode {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

/** Text content of an element, whether parsed as a plain string or as a node with attributes. */
function textOf(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (isNode(value) && typeof value["#text"] === "string") return value["#text"];
  return undefined;
}

function childNodes(node: KmlNode, key: string): KmlNode[] {
  return asArray(node[key]).filter(isNode);
}

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Plain decimal number; hex, binary and other forms Number() accepts are rejected. */
function parseDecimal(text: string | undefined): number | undefined {
  const trimmed = text?.trim();
  if (!trimmed || !DECIMAL.test(trimmed)) return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

function toPoint(lngText: string | undefined, latText: string | undefined, eleText: string | undefined): RoutePoint | undefined {
  const lng = parseDecimal(lngText);
  const lat = parseDecimal(latText);
  if (lng === undefined || lat === undefined) return undefined;
  if (Math.abs(lng) > 180 || Math.abs(lat) > 90) return undefined;

  const elevation = parseDecimal(eleText);
  return elevation === undefined ? { lng, lat } : { lng, lat, elevation };
}

/** Parse KML coordinate string: "lng,lat,ele lng,lat,ele ..." */
export function parseKmlCoordinates(coordStr: string): RoutePoint[] {
  const points: RoutePoint[] = [];
  for (const tuple of coordStr.trim().split(/\s+/)) {
    const [lng, lat, ele] = tuple.split(",");
    const point = toPoint(lng, lat, ele);
    if (point) points.push(point);
  }
  return points;
}

/** Parse gx:coord values: "lng lat ele", one point per element. */
export function parseTrackCoords(coords: readonly string[]): RoutePoint[] {
  const points: RoutePoint[] = [];
  for (const coord of coords) {
    const [lng, lat, ele] = coord.trim().split(/\s+/);
    const point = toPoint(lng, lat, ele);
    if (point) points.push(point);
  }
  return points;
}

// ── Document walk ────────────────────────────────────────────────────────────

function collectGeometries(node: KmlNode, out: GeometryRecord[]): void {
  for (const ls of asArray(node["LineString"])) {
    const coordinates = isNode(ls) ? textOf(ls["coordinates"]) : undefined;
    out.push({ kind: "LineString", coordinates: coordinates ?? "" });
  }
  for (const track of childNodes(node, "Track")) {
    const coords = asArray(track["coord"])
      .map(textOf)
      .filter((c): c is string => c !== undefined);
    out.push({ kind: "Track", coords });
  }
  for (const key of ["MultiGeometry", "MultiTrack"]) {
    for (const child of childNodes(node, key)) collectGeometries(child, out);
  }
}

/** Read one <Placemark> into its intermediate record. */
function readPlacemark(node: KmlNode): PlacemarkRecord {
  const name = textOf(node["name"])?.trim();
  const geometries: GeometryRecord[] = [];
  collectGeometries(node, geometries);
  return { name: name ? name : undefined, geometries };
}

/** Recursively find all <Placemark> nodes below a container, in document order per container. */
function findPlacemarks(node: KmlNode): KmlNode[] {
  const results = childNodes(node, "Placemark");
  for (const key of ["Document", "Folder"]) {
    for (const child of childNodes(node, key)) {
      results.push(...findPlacemarks(child));
    }
  }
  return results;
}

function geometryPoints(geometry: GeometryRecord): RoutePoint[] {
  return geometry.kind === "LineString"
    ? parseKmlCoordinates(geometry.coordinates)
    : parseTrackCoords(geometry.coords);
}

// ── Public API ───────────────────────────────────────────────────────────────

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  trimValues: true,
  // Keep coordinate strings and names as text
  parseTagValue: false,
  // kml:Placemark and gx:Track are addressed without their prefixes
  removeNSPrefix: true,
});

/**
 * Extract route drafts from KML text.
 *
 * @throws {ParseError} on empty content, XML that is not well-formed, or a
 *   document without a <kml> root
 */
export function extractRoutes(content: string, source = "document"): ExtractResult {
  if (!content || content.trim() === "") {
    throw new ParseError(`${source}: empty KML document`, source);
  }

  const validation = XMLValidator.validate(content);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new ParseError(`${source}: invalid XML at line ${line}: ${msg}`, source);
  }

  let xml: unknown;
  try {
    xml = parser.parse(content);
  } catch (err) {
    throw new ParseError(`${source}: invalid XML: ${describeError(err)}`, source, {
      cause: err,
    });
  }

  const kml = isNode(xml) ? xml["kml"] : undefined;
  if (!isNode(kml)) {
    // An empty <kml/> root parses to "", which is still a KML document.
    if (isNode(xml) && kml === "") return { routes: [], skipped: [] };
    throw new ParseError(`${source}: not a KML document (missing <kml> root element)`, source);
  }

  const routes: RouteDraft[] = [];
  const skipped: SkippedPlacemark[] = [];

  findPlacemarks(kml).forEach((node, index) => {
    const record = readPlacemark(node);
    let emitted = 0;
    for (const geometry of record.geometries) {
      const points = geometryPoints(geometry);
      if (points.length < 2) {
        skipped.push({
          placemark: index + 1,
          name: record.name,
          reason: `${geometry.kind} has ${points.length} valid point${points.length === 1 ? "" : "s"}, need at least 2`,
        });
        continue;
      }
      emitted++;
      const name = record.name
        ? emitted === 1
          ? record.name
          : `${record.name} (${emitted})`
        : `Route ${routes.length + 1}`;
      routes.push({ name, points });
    }
  });

  return { routes, skipped };
}
