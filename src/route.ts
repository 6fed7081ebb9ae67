// ── Route model ──────────────────────────────────────────────────────────────

import * as path from "node:path";

export interface RoutePoint {
  lng: number;
  lat: number;
  elevation?: number;
}

export interface Route {
  /** Stable identifier: `<archive stem>/<name>`, unique within a collection. */
  readonly id: string;
  readonly name: string;
  /** Ordered points, at least two. */
  readonly points: readonly RoutePoint[];
  /** Archive file name the route was extracted from. */
  readonly source: string;
}

/** Routes keyed by id. Iteration order is the drawing order of the overlay. */
export type RouteCollection = Map<string, Route>;

/** Archive file name without its extension. */
export function fileStem(fileName: string): string {
  const base = path.basename(fileName);
  const ext = path.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

export function routeId(source: string, name: string): string {
  return `${fileStem(source)}/${name}`;
}

/**
 * Assign ids to the routes drafted from one archive. Repeated names get
 * `#2`, `#3`, … so every id is unique within the archive, and within the run
 * when the ids already handed out are passed as `taken`.
 */
export function assignRouteIds(
  source: string,
  drafts: ReadonlyArray<{ name: string; points: RoutePoint[] }>,
  taken: Set<string> = new Set(),
): Route[] {
  const nextSuffix = new Map<string, number>();
  return drafts.map((draft) => {
    const base = routeId(source, draft.name);
    let n = nextSuffix.get(base) ?? 1;
    let id = n === 1 ? base : `${base}#${n}`;
    while (taken.has(id)) {
      n++;
      id = `${base}#${n}`;
    }
    nextSuffix.set(base, n + 1);
    taken.add(id);
    return {
      id,
      name: draft.name,
      points: draft.points,
      source,
    };
  });
}
