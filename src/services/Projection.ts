/**
 * Conversions between geographic coordinates and local planar offsets.
 *
 * This is a local equirectangular approximation: one degree of latitude is a
 * constant number of meters and one degree of longitude shrinks with the cosine
 * of latitude. It holds for city-scale missions; it is not geodesically exact
 * over boxes hundreds of kilometers across or near the poles.
 *
 * Inputs and outputs are degrees (coordinates) and meters (offsets).
 */

import { distance, point } from "@turf/turf";
import type { LatLon } from "@/domain/types";

const METERS_PER_DEGREE = 111_320;

export interface PlanarOffset {
  north: number; // meters, positive towards the north
  east: number;  // meters, positive towards the east
}

export function metersPerDegreeLatitude(): number {
  return METERS_PER_DEGREE;
}

export function metersPerDegreeLongitude(latitudeDegrees: number): number {
  return metersPerDegreeLatitude() * Math.cos((latitudeDegrees * Math.PI) / 180);
}

/**
 * Move `origin` by the given planar offset.
 * The longitude scale is evaluated at `referenceLatitude`, which defaults to the
 * origin's own latitude; the raster planner passes the mission's mean latitude
 * so every row uses the same scale.
 */
export function offsetToLatLon(
  origin: LatLon,
  dNorthMeters: number,
  dEastMeters: number,
  referenceLatitude: number = origin.lat
): LatLon {
  return {
    lat: origin.lat + dNorthMeters / metersPerDegreeLatitude(),
    lon: origin.lon + dEastMeters / metersPerDegreeLongitude(referenceLatitude),
  };
}

/** Inverse of {@link offsetToLatLon}. */
export function latLonToOffset(
  origin: LatLon,
  target: LatLon,
  referenceLatitude: number = origin.lat
): PlanarOffset {
  return {
    north: (target.lat - origin.lat) * metersPerDegreeLatitude(),
    east: (target.lon - origin.lon) * metersPerDegreeLongitude(referenceLatitude),
  };
}

/**
 * Great-circle distance in meters, used as the reference the planar
 * approximation is checked against.
 */
export function haversineMeters(a: LatLon, b: LatLon): number {
  return distance(point([a.lon, a.lat]), point([b.lon, b.lat]), { units: "meters" });
}
