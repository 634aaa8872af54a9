/**
 * Validated constructors for the immutable mission inputs.
 */

import type { BoundingBox, CameraSpec, FlightParams, LatLon } from "./types";
import { InvalidGeometryError, InvalidOverlapError } from "./errors";

const isFiniteNumber = (v: number) => typeof v === "number" && Number.isFinite(v);

function assertLatLon(p: LatLon, label: string): void {
  if (!isFiniteNumber(p.lat) || !isFiniteNumber(p.lon)) {
    throw new InvalidGeometryError(`${label} must have finite coordinates, got (${p.lat}, ${p.lon})`);
  }
  if (p.lat < -90 || p.lat > 90) {
    throw new InvalidGeometryError(`${label} latitude ${p.lat} is outside [-90, 90]`);
  }
  if (p.lon < -180 || p.lon > 180) {
    throw new InvalidGeometryError(`${label} longitude ${p.lon} is outside [-180, 180]`);
  }
}

export function assertBoundingBox(box: BoundingBox): void {
  assertLatLon(box.topLeft, "top-left");
  assertLatLon(box.bottomRight, "bottom-right");
  if (!(box.topLeft.lat > box.bottomRight.lat)) {
    throw new InvalidGeometryError(
      `top-left latitude ${box.topLeft.lat} must be north of bottom-right latitude ${box.bottomRight.lat}`
    );
  }
  if (!(box.topLeft.lon < box.bottomRight.lon)) {
    throw new InvalidGeometryError(
      `top-left longitude ${box.topLeft.lon} must be west of bottom-right longitude ${box.bottomRight.lon}`
    );
  }
}

export function assertCameraSpec(camera: CameraSpec): void {
  const fov = camera.diagonalFovDegrees;
  if (!isFiniteNumber(fov) || fov <= 0 || fov >= 180) {
    throw new InvalidGeometryError(`diagonal FOV must be in (0, 180) degrees, got ${fov}`);
  }
  const [w, h] = camera.aspectRatio;
  if (!isFiniteNumber(w) || !isFiniteNumber(h) || w <= 0 || h <= 0) {
    throw new InvalidGeometryError(`aspect ratio components must be positive, got ${w}:${h}`);
  }
}

export function assertAltitude(altitudeAGL: number): void {
  if (!isFiniteNumber(altitudeAGL) || altitudeAGL <= 0) {
    throw new InvalidGeometryError(`altitude AGL must be positive, got ${altitudeAGL}`);
  }
}

export function assertOverlap(overlapFraction: number): void {
  if (!isFiniteNumber(overlapFraction) || overlapFraction < 0 || overlapFraction >= 1) {
    throw new InvalidOverlapError(`overlap fraction must be in [0, 1), got ${overlapFraction}`);
  }
}

export function assertFlightParams(flight: FlightParams): void {
  assertAltitude(flight.altitudeAGL);
  assertOverlap(flight.overlapFraction);
}

export function createBoundingBox(topLeft: LatLon, bottomRight: LatLon): BoundingBox {
  const box: BoundingBox = {
    topLeft: Object.freeze({ lat: topLeft.lat, lon: topLeft.lon }),
    bottomRight: Object.freeze({ lat: bottomRight.lat, lon: bottomRight.lon }),
  };
  assertBoundingBox(box);
  return Object.freeze(box);
}

export function createCameraSpec(diagonalFovDegrees: number, aspectRatio: readonly [number, number]): CameraSpec {
  const camera: CameraSpec = {
    diagonalFovDegrees,
    aspectRatio: Object.freeze([aspectRatio[0], aspectRatio[1]] as const),
  };
  assertCameraSpec(camera);
  return Object.freeze(camera);
}

export function createFlightParams(altitudeAGL: number, overlapFraction = 0): FlightParams {
  const flight: FlightParams = { altitudeAGL, overlapFraction };
  assertFlightParams(flight);
  return Object.freeze(flight);
}
