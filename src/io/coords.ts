/**
 * Parsers for the coordinate inputs.
 *
 * Inline strings separate values with underscores:
 *   "35.22_-90.07_35.06_-89.73_400"   raster box: TL lat, TL lon, BR lat, BR lon, altitude
 *   "35.16_-89.90_120"                single point: lat, lon, altitude
 *
 * Files hold one whitespace-separated `lat lon altitude` record per line.
 *
 * Altitudes are feet unless told otherwise, and come back as meters.
 */

import type { AltitudeUnit, BoundingBox, LatLon } from "@/domain/types";
import { InputFormatError } from "@/domain/errors";
import { createBoundingBox } from "@/domain/inputs";

export const FEET_TO_METERS = 0.3048;

export function toMeters(altitude: number, unit: AltitudeUnit): number {
  return unit === "ft" ? altitude * FEET_TO_METERS : altitude;
}

export interface PointRecord {
  center: LatLon;
  altitudeAGL: number; // meters
}

export interface RasterRecord {
  boundingBox: BoundingBox;
  altitudeAGL: number; // meters
}

export type CoordinateInput =
  | ({ kind: "raster" } & RasterRecord)
  | ({ kind: "point" } & PointRecord);

function parseNumbers(tokens: string[], source: string): number[] {
  return tokens.map((token) => {
    const value = Number(token);
    if (token.trim() === "" || !Number.isFinite(value)) {
      throw new InputFormatError(`"${token}" in "${source}" is not a number`);
    }
    return value;
  });
}

/** Parse an underscore-separated inline coordinate string. */
export function parseInlineCoordinates(text: string, unit: AltitudeUnit = "ft"): CoordinateInput {
  const source = text.trim();
  const values = parseNumbers(source.split("_"), source);

  if (values.length === 5) {
    const [tlLat, tlLon, brLat, brLon, altitude] = values;
    return {
      kind: "raster",
      boundingBox: createBoundingBox({ lat: tlLat, lon: tlLon }, { lat: brLat, lon: brLon }),
      altitudeAGL: toMeters(altitude, unit),
    };
  }
  if (values.length === 3) {
    const [lat, lon, altitude] = values;
    return { kind: "point", center: { lat, lon }, altitudeAGL: toMeters(altitude, unit) };
  }
  throw new InputFormatError(
    `expected "lat_lon_alt" or "tlLat_tlLon_brLat_brLon_alt", got ${values.length} values in "${source}"`
  );
}

/** Parse a whitespace-separated point list. Blank lines and `#` comments are ignored. */
export function parsePointList(text: string, unit: AltitudeUnit = "ft"): PointRecord[] {
  const records: PointRecord[] = [];
  text.split(/\r?\n/).forEach((raw, i) => {
    const line = raw.replace(/#.*$/, "").trim();
    if (!line) return;
    const tokens = line.split(/\s+/);
    if (tokens.length !== 3) {
      throw new InputFormatError(`line ${i + 1}: expected "lat lon altitude", got "${line}"`);
    }
    const [lat, lon, altitude] = parseNumbers(tokens, `line ${i + 1}`);
    records.push({ center: { lat, lon }, altitudeAGL: toMeters(altitude, unit) });
  });
  if (records.length === 0) {
    throw new InputFormatError("coordinate file contains no records");
  }
  return records;
}
