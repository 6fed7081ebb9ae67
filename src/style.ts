// ── Route styling ────────────────────────────────────────────────────────────
//
// Every route is drawn the same way: a closed polygon with a highlighter-style
// translucent fill and a solid outline. The style is a value handed to the
// builder, so callers (and tests) can substitute their own.

import type { Route, RoutePoint } from "./route.js";

export interface RouteStyle {
  /** RGB hex color, "#RRGGBB" or "RRGGBB". */
  color: string;
  /** Outline opacity, 0–1. */
  lineOpacity: number;
  /** Fill opacity, 0–1. */
  fillOpacity: number;
  /** Outline width in pixels. */
  lineWidth: number;
  fill: boolean;
}

/** Hot pink (#FF69B4) outline with a translucent fill. */
export const DEFAULT_ROUTE_STYLE: Readonly<RouteStyle> = {
  color: "#FF69B4",
  lineOpacity: 1,
  fillOpacity: 100 / 255,
  lineWidth: 2,
  fill: true,
};

/** Node shape consumed by fast-xml-parser's XMLBuilder. */
export interface KmlElement {
  [tag: string]: string | KmlElement | KmlElement[];
}

/** Distance in degrees under which two points count as the same vertex. */
const RING_TOLERANCE = 1e-6;

/**
 * Convert an RGB hex color and an opacity to KML's aabbggrr notation.
 *
 * kmlColor("#FF69B4", 1) === "ffb469ff"
 */
export function kmlColor(rgb: string, opacity: number): string {
  const match = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(rgb);
  if (!match) throw new RangeError(`Invalid RGB color: ${rgb}`);
  const [, rr, gg, bb] = match;
  const alpha = Math.round(Math.min(1, Math.max(0, opacity)) * 255)
    .toString(16)
    .padStart(2, "0");
  return `${alpha}${bb}${gg}${rr}`.toLowerCase();
}

/** Return the points with the first one repeated at the end, unless the ring is already closed. */
export function closeRing(points: readonly RoutePoint[]): RoutePoint[] {
  const ring = [...points];
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (first === undefined || last === undefined) return ring;
  if (Math.abs(first.lng - last.lng) > RING_TOLERANCE || Math.abs(first.lat - last.lat) > RING_TOLERANCE) {
    ring.push(first);
  }
  return ring;
}

/**
 * Shortest round-trip decimal for a number, never in exponent notation.
 *
 * formatDecimal(1e-7) === "0.0000001"
 */
export function formatDecimal(value: number): string {
  const text = String(value);
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;
  const [, sign = "", lead = "", fraction = "", exponentText = "0"] = match;
  const digits = lead + fraction;
  const exponent = Number(exponentText);
  if (exponent < 0) return `${sign}0.${"0".repeat(-exponent - 1)}${digits}`;
  return sign + digits.padEnd(exponent + 1, "0");
}

export function formatCoordinates(points: readonly RoutePoint[]): string {
  return points
    .map((p) => {
      const lngLat = `${formatDecimal(p.lng)},${formatDecimal(p.lat)}`;
      return p.elevation === undefined ? lngLat : `${lngLat},${formatDecimal(p.elevation)}`;
    })
    .join(" ");
}

/** Build the styled <Placemark> for a route. */
export function buildStyledPlacemark(route: Route, style: RouteStyle): KmlElement {
  return {
    name: route.name,
    description: `Source: ${route.source}`,
    Style: {
      LineStyle: {
        color: kmlColor(style.color, style.lineOpacity),
        width: String(style.lineWidth),
      },
      PolyStyle: {
        color: kmlColor(style.color, style.fillOpacity),
        fill: style.fill ? "1" : "0",
        outline: "1",
      },
    },
    Polygon: {
      tessellate: "1",
      outerBoundaryIs: {
        LinearRing: {
          coordinates: formatCoordinates(closeRing(route.points)),
        },
      },
    },
  };
}
