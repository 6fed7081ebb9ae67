// ── Merge store ──────────────────────────────────────────────────────────────
//
// Persists the route collection between runs so each run adds to the overlay
// instead of replacing it. The file is JSON Lines, one route per line:
//
//   {"id":"ride/Morning","name":"Morning","source":"ride.kmz","points":[[lng,lat],[lng,lat,ele],...]}
//
// Merging is last-write-wins by id: an incoming route replaces the stored
// route with the same id as a whole. Content and timestamps are not compared.
//
// JSON has no negative zero, so -0 is stored as the string "-0".

import * as fs from "node:fs";
import { z } from "zod";
import { StoreCorruptError, WriteError, describeError } from "./errors.js";
import { writeFileAtomic } from "./fs-utils.js";
import type { Route, RouteCollection, RoutePoint } from "./route.js";

const coordinateSchema = z.preprocess((value) => (value === "-0" ? -0 : value), z.number());

const pointSchema = z
  .tuple([coordinateSchema, coordinateSchema])
  .rest(coordinateSchema)
  .refine((point) => point.length <= 3, "expected [lng, lat] or [lng, lat, elevation]");

const routeRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  source: z.string(),
  points: z.array(pointSchema).min(2),
});

type RouteRecord = z.infer<typeof routeRecordSchema>;

function toRecord(route: Route): RouteRecord {
  return {
    id: route.id,
    name: route.name,
    source: route.source,
    points: route.points.map((p): RouteRecord["points"][number] =>
      p.elevation === undefined ? [p.lng, p.lat] : [p.lng, p.lat, p.elevation],
    ),
  };
}

function encodeNegativeZero(_key: string, value: unknown): unknown {
  return Object.is(value, -0) ? "-0" : value;
}

function fromRecord(record: RouteRecord): Route {
  return {
    id: record.id,
    name: record.name,
    source: record.source,
    points: record.points.map(([lng, lat, elevation]): RoutePoint =>
      elevation === undefined ? { lng, lat } : { lng, lat, elevation },
    ),
  };
}

/**
 * Load the stored collection. A missing file is an empty collection.
 *
 * @throws {StoreCorruptError} when the file exists but cannot be read or parsed
 */
export function loadRouteStore(storePath: string): RouteCollection {
  const collection: RouteCollection = new Map();
  if (!fs.existsSync(storePath)) return collection;

  let content: string;
  try {
    content = fs.readFileSync(storePath, "utf8");
  } catch (err) {
    throw new StoreCorruptError(`Cannot read merge store ${storePath}: ${describeError(err)}`, storePath, {
      cause: err,
    });
  }

  const lines = content.split(/\r?\n/);
  lines.forEach((line, index) => {
    if (line.trim() === "") return;
    const where = `${storePath}:${index + 1}`;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (err) {
      throw new StoreCorruptError(`Merge store ${where} is not valid JSON: ${describeError(err)}`, storePath, {
        cause: err,
      });
    }

    const parsed = routeRecordSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join(".") || "record"}: ${issue.message}` : parsed.error.message;
      throw new StoreCorruptError(`Merge store ${where} is not a route record (${detail})`, storePath, {
        cause: parsed.error,
      });
    }
    if (collection.has(parsed.data.id)) {
      throw new StoreCorruptError(`Merge store ${where} repeats route id "${parsed.data.id}"`, storePath);
    }
    collection.set(parsed.data.id, fromRecord(parsed.data));
  });

  return collection;
}

/** Union of both collections; an incoming route replaces a stored route with the same id. */
export function mergeRoutes(existing: RouteCollection, incoming: Iterable<Route>): RouteCollection {
  const merged: RouteCollection = new Map(existing);
  for (const route of incoming) {
    merged.set(route.id, route);
  }
  return merged;
}

/**
 * Replace the store file with the collection.
 *
 * @throws {WriteError} on any I/O failure; the previous file is left untouched
 */
export function saveRouteStore(collection: RouteCollection, storePath: string): void {
  const body = [...collection.values()]
    .map((route) => JSON.stringify(toRecord(route), encodeNegativeZero) + "\n")
    .join("");
  try {
    writeFileAtomic(storePath, body);
  } catch (err) {
    throw new WriteError(`Cannot write merge store ${storePath}: ${describeError(err)}`, storePath, { cause: err });
  }
}
