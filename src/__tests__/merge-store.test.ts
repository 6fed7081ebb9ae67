import * as fs from "node:fs";
import * as path from "node:path";
import { afterEach, describe, test, expect } from "vitest";
import { StoreCorruptError, WriteError } from "../errors.js";
import { loadRouteStore, mergeRoutes, saveRouteStore } from "../merge-store.js";
import type { Route, RouteCollection } from "../route.js";
import { makeTempDir, removeTempDirs } from "./test-utils.js";

afterEach(removeTempDirs);

function route(id: string, name = id, lng = 1): Route {
  return {
    id,
    name,
    source: `${id.split("/")[0]}.kmz`,
    points: [
      { lng, lat: 2 },
      { lng: lng + 1, lat: 3, elevation: 120.5 },
    ],
  };
}

function collectionOf(...routes: Route[]): RouteCollection {
  return new Map(routes.map((r) => [r.id, r]));
}

function storePath(): string {
  return path.join(makeTempDir(), "routes.jsonl");
}

// ── mergeRoutes ──────────────────────────────────────────────────────────────

describe("mergeRoutes", () => {
  test("incoming route replaces the stored one with the same id", () => {
    const stored = collectionOf(route("a/One", "One", 1), route("a/Two", "Two", 1));
    const replacement = route("a/Two", "Two (re-recorded)", 50);

    const merged = mergeRoutes(stored, [replacement, route("b/Three")]);

    expect([...merged.keys()]).toEqual(["a/One", "a/Two", "b/Three"]);
    expect(merged.get("a/Two")).toBe(replacement);
    expect(merged.get("a/One")).toBe(stored.get("a/One"));
  });

  test("does not mutate the stored collection", () => {
    const stored = collectionOf(route("a/One", "One", 1));
    mergeRoutes(stored, [route("a/One", "Changed", 9), route("b/New")]);
    expect(stored.size).toBe(1);
    expect(stored.get("a/One")?.name).toBe("One");
  });

  test("replaces even when the content is identical", () => {
    const incoming = route("a/One");
    const merged = mergeRoutes(collectionOf(route("a/One")), [incoming]);
    expect(merged.get("a/One")).toBe(incoming);
  });

  test("merging into an empty collection keeps every incoming route", () => {
    const merged = mergeRoutes(new Map(), [route("a/One"), route("a/Two")]);
    expect([...merged.keys()]).toEqual(["a/One", "a/Two"]);
  });
});

// ── loadRouteStore / saveRouteStore ──────────────────────────────────────────

describe("loadRouteStore", () => {
  test("missing file is an empty collection", () => {
    expect(loadRouteStore(storePath()).size).toBe(0);
  });

  test("rejects a line that is not JSON, naming the line", () => {
    const file = storePath();
    fs.writeFileSync(file, `${JSON.stringify({ id: "a/x", name: "x", source: "a.kmz", points: [[1, 2], [3, 4]] })}\n{oops\n`);
    expect(() => loadRouteStore(file)).toThrow(StoreCorruptError);
    expect(() => loadRouteStore(file)).toThrow(`${file}:2 is not valid JSON`);
  });

  test("rejects a record with too few points", () => {
    const file = storePath();
    fs.writeFileSync(file, `${JSON.stringify({ id: "a/x", name: "x", source: "a.kmz", points: [[1, 2]] })}\n`);
    expect(() => loadRouteStore(file)).toThrow(`${file}:1 is not a route record (points:`);
  });

  test("rejects a point with more than three values", () => {
    const file = storePath();
    fs.writeFileSync(file, `${JSON.stringify({ id: "a/x", name: "x", source: "a.kmz", points: [[1, 2], [3, 4, 5, 6]] })}\n`);
    expect(() => loadRouteStore(file)).toThrow(StoreCorruptError);
  });

  test("rejects repeated ids", () => {
    const file = storePath();
    const line = JSON.stringify({ id: "a/x", name: "x", source: "a.kmz", points: [[1, 2], [3, 4]] });
    fs.writeFileSync(file, `${line}\n${line}\n`);
    expect(() => loadRouteStore(file)).toThrow(`${file}:2 repeats route id "a/x"`);
  });

  test("rejects a directory in place of the file", () => {
    const dir = makeTempDir();
    expect(() => loadRouteStore(dir)).toThrow(StoreCorruptError);
  });

  test("skips blank lines", () => {
    const file = storePath();
    const line = JSON.stringify({ id: "a/x", name: "x", source: "a.kmz", points: [[1, 2], [3, 4]] });
    fs.writeFileSync(file, `\n${line}\r\n\n`);
    expect([...loadRouteStore(file).keys()]).toEqual(["a/x"]);
  });
});

describe("saveRouteStore", () => {
  test("round-trips an empty collection", () => {
    const file = storePath();
    saveRouteStore(new Map(), file);
    expect(fs.readFileSync(file, "utf8")).toBe("");
    expect(loadRouteStore(file)).toEqual(new Map());
  });

  test("round-trips a single route", () => {
    const file = storePath();
    const routes = collectionOf(route("a/One"));
    saveRouteStore(routes, file);
    expect(loadRouteStore(file)).toEqual(routes);
  });

  test("round-trips many routes with unicode names and full-precision coordinates", () => {
    const file = storePath();
    const precise: Route = {
      id: "tour/Zürich → 東京",
      name: "Zürich → 東京 🚴",
      source: "tour.kmz",
      points: [
        { lng: 0.1 + 0.2, lat: 47.37688999999999 },
        { lng: 179.99999999999997, lat: -89.99999999999999, elevation: 1e-7 },
        { lng: -122.4194155, lat: 5e-324, elevation: 8848.86 },
      ],
    };
    const routes = collectionOf(route("a/One"), precise, route("b/Two", "Двa"));

    saveRouteStore(routes, file);
    const loaded = loadRouteStore(file);

    expect(loaded).toEqual(routes);
    expect([...loaded.keys()]).toEqual(["a/One", "tour/Zürich → 東京", "b/Two"]);
    expect(loaded.get("tour/Zürich → 東京")?.points[0]?.lng).toBe(0.1 + 0.2);
  });

  test("keeps negative zero", () => {
    const file = storePath();
    const meridian: Route = {
      id: "coast/Meridian",
      name: "Meridian",
      source: "coast.kmz",
      points: [
        { lng: -0, lat: 51.4778, elevation: -0 },
        { lng: 0, lat: -0 },
      ],
    };

    saveRouteStore(collectionOf(meridian), file);
    const [first, second] = loadRouteStore(file).get("coast/Meridian")?.points ?? [];

    expect(Object.is(first?.lng, -0)).toBe(true);
    expect(Object.is(first?.elevation, -0)).toBe(true);
    expect(Object.is(second?.lng, 0)).toBe(true);
    expect(Object.is(second?.lat, -0)).toBe(true);
    expect(fs.readFileSync(file, "utf8")).toBe(
      '{"id":"coast/Meridian","name":"Meridian","source":"coast.kmz","points":[["-0",51.4778,"-0"],[0,"-0"]]}\n',
    );
  });

  test("writes one JSON record per line", () => {
    const file = storePath();
    saveRouteStore(collectionOf(route("a/One", "One", 1)), file);
    expect(fs.readFileSync(file, "utf8")).toBe(
      '{"id":"a/One","name":"One","source":"a.kmz","points":[[1,2],[2,3,120.5]]}\n',
    );
  });

  test("overwrites the previous store", () => {
    const file = storePath();
    saveRouteStore(collectionOf(route("a/One"), route("a/Two")), file);
    saveRouteStore(collectionOf(route("b/Three")), file);
    expect([...loadRouteStore(file).keys()]).toEqual(["b/Three"]);
  });

  test("throws WriteError when the directory is missing", () => {
    const file = path.join(makeTempDir(), "nope", "routes.jsonl");
    expect(() => saveRouteStore(new Map(), file)).toThrow(WriteError);
  });
});
