// FILE: src/utils/kml.ts
import { XMLParser } from "fast-xml-parser";
import type { BoundingBox, LngLat } from "@/domain/types";
import { InputFormatError } from "@/domain/errors";
import { createBoundingBox } from "@/domain/inputs";

export type ParsedKmlPolygon = {
  name?: string;
  ring: LngLat[]; // [lng, lat]
};

export type KmlBounds = {
  minLng: number;
  minLat: number;
  maxLng: number;
  maxLat: number;
};

type XmlNode = Record<string, unknown>;

const isNode = (v: unknown): v is XmlNode => typeof v === "object" && v !== null && !Array.isArray(v);
const asList = (v: unknown): unknown[] => (v === undefined ? [] : Array.isArray(v) ? v : [v]);

/** Calculate bounding box for a set of KML polygons */
export function calculateKmlBounds(polygons: ParsedKmlPolygon[]): KmlBounds | null {
  if (polygons.length === 0) return null;

  let minLng = Infinity;
  let minLat = Infinity;
  let maxLng = -Infinity;
  let maxLat = -Infinity;

  for (const poly of polygons) {
    for (const [lng, lat] of poly.ring) {
      if (lng < minLng) minLng = lng;
      if (lng > maxLng) maxLng = lng;
      if (lat < minLat) minLat = lat;
      if (lat > maxLat) maxLat = lat;
    }
  }

  return { minLng, minLat, maxLng, maxLat };
}

// KML coordinates are whitespace separated lon,lat[,alt] tuples
function parseCoords(coordText: string): LngLat[] {
  const coords: LngLat[] = [];
  for (const token of coordText.trim().split(/\s+/)) {
    const parts = token.split(",");
    if (parts.length < 2) continue;
    const lng = parseFloat(parts[0]);
    const lat = parseFloat(parts[1]);
    if (Number.isFinite(lng) && Number.isFinite(lat)) coords.push([lng, lat]);
  }
  if (coords.length < 3) return [];

  const first = coords[0];
  const last = coords[coords.length - 1];
  if (first[0] !== last[0] || first[1] !== last[1]) coords.push([first[0], first[1]]);
  return coords;
}

function outerRingText(polygon: unknown): string | undefined {
  if (!isNode(polygon)) return undefined;
  const outer = polygon.outerBoundaryIs ?? polygon.outerboundaryis;
  if (!isNode(outer) || !isNode(outer.LinearRing)) return undefined;
  const text = outer.LinearRing.coordinates;
  return typeof text === "string" ? text : undefined;
}

// Depth-first walk collecting every Polygon, with the nearest enclosing Placemark name
function collectPolygons(node: unknown, name: string | undefined, out: ParsedKmlPolygon[]): void {
  if (Array.isArray(node)) {
    for (const child of node) collectPolygons(child, name, out);
    return;
  }
  if (!isNode(node)) return;

  const ownName = typeof node.name === "string" ? node.name.trim() || undefined : undefined;
  const scopeName = ownName ?? name;

  for (const [key, value] of Object.entries(node)) {
    if (key === "Polygon") {
      for (const poly of asList(value)) {
        const text = outerRingText(poly);
        const ring = text ? parseCoords(text) : [];
        if (ring.length >= 4) out.push({ name: scopeName, ring });
      }
    } else if (typeof value === "object" && value !== null) {
      collectPolygons(value, scopeName, out);
    }
  }
}

/** Parse the first outer LinearRing of every Polygon in a KML string. */
export function parseKmlPolygons(kmlText: string): ParsedKmlPolygon[] {
  const parser = new XMLParser({ ignoreAttributes: true, parseTagValue: false, trimValues: true });
  let doc: unknown;
  try {
    doc = parser.parse(kmlText, true);
  } catch (err) {
    throw new InputFormatError(`Invalid KML: ${err instanceof Error ? err.message : String(err)}`);
  }
  const out: ParsedKmlPolygon[] = [];
  collectPolygons(doc, undefined, out);
  return out;
}

/** Survey box enclosing every polygon of a KML document. */
export function kmlToBoundingBox(kmlText: string): BoundingBox {
  const bounds = calculateKmlBounds(parseKmlPolygons(kmlText));
  if (!bounds) throw new InputFormatError("KML contains no polygons");
  return createBoundingBox(
    { lat: bounds.maxLat, lon: bounds.minLng },
    { lat: bounds.minLat, lon: bounds.maxLng }
  );
}
