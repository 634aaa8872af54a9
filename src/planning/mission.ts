// src/planning/mission.ts
//
// Mission planning entry points: validate inputs, derive footprint and steps,
// lay out the raster, and package everything as an immutable Mission.
//

import type {
  BoundingBox,
  CameraSpec,
  CapturePoint,
  FlightParams,
  Footprint,
  LatLon,
  Mission,
  PrecisionReport,
  RasterGrid,
} from "@/domain/types";
import { assertBoundingBox, assertCameraSpec, assertFlightParams, createBoundingBox } from "@/domain/inputs";
import { computeFootprint } from "@/domain/camera";
import { haversineMeters, offsetToLatLon } from "@/services/Projection";
import { planStepSizes } from "./steps";
import { generateRasterPath, planRasterGrid } from "./raster";

// Planar vs great-circle diagonal disagreement above which spacing is considered distorted
export const PRECISION_TOLERANCE = 0.005;

export function assessPrecision(box: BoundingBox, grid: RasterGrid): PrecisionReport {
  const planarDiagonalMeters = Math.hypot(grid.northSouthExtentMeters, grid.eastWestExtentMeters);
  const geodesicDiagonalMeters = haversineMeters(box.topLeft, box.bottomRight);
  const relativeError = geodesicDiagonalMeters > 0
    ? Math.abs(planarDiagonalMeters - geodesicDiagonalMeters) / geodesicDiagonalMeters
    : 0;
  return Object.freeze({
    planarDiagonalMeters,
    geodesicDiagonalMeters,
    relativeError,
    withinTolerance: relativeError <= PRECISION_TOLERANCE,
  });
}

/**
 * Plan a raster survey of `boundingBox`.
 * All inputs are validated before any traversal; invalid geometry or overlap
 * throws and nothing is planned.
 */
export function planMission(boundingBox: BoundingBox, camera: CameraSpec, flight: FlightParams): Mission {
  assertBoundingBox(boundingBox);
  assertCameraSpec(camera);
  assertFlightParams(flight);

  const footprint = computeFootprint(camera, flight.altitudeAGL);
  const steps = planStepSizes(footprint, flight.overlapFraction);
  const grid = planRasterGrid(boundingBox, footprint, steps);
  const points = generateRasterPath(boundingBox, grid, steps, flight.altitudeAGL);

  return Object.freeze({
    boundingBox,
    camera,
    flight,
    footprint,
    steps,
    grid,
    points: Object.freeze(points),
    precision: assessPrecision(boundingBox, grid),
  });
}

/** Box one footprint in size centred on `center`. */
export function boundingBoxAroundCenter(center: LatLon, footprint: Footprint): BoundingBox {
  const halfH = footprint.groundHeight / 2;
  const halfW = footprint.groundWidth / 2;
  return createBoundingBox(
    offsetToLatLon(center, halfH, -halfW),
    offsetToLatLon(center, -halfH, halfW)
  );
}

/**
 * A single image at `center`. The recorded bounding box is the area that image covers.
 */
export function planSinglePointMission(center: LatLon, camera: CameraSpec, altitudeAGL: number): Mission {
  assertCameraSpec(camera);
  const flight: FlightParams = Object.freeze({ altitudeAGL, overlapFraction: 0 });
  assertFlightParams(flight);

  const footprint = computeFootprint(camera, altitudeAGL);
  const boundingBox = boundingBoxAroundCenter(center, footprint);
  const steps = planStepSizes(footprint, 0);
  const grid: RasterGrid = Object.freeze({
    rows: 1,
    columns: 1,
    northSouthExtentMeters: footprint.groundHeight,
    eastWestExtentMeters: footprint.groundWidth,
    referenceLatitude: center.lat,
  });
  const point: CapturePoint = {
    latitude: center.lat,
    longitude: center.lon,
    altitudeAGL,
    yaw: 0,
    sequenceIndex: 0,
    row: 0,
    column: 0,
  };

  return Object.freeze({
    boundingBox,
    camera,
    flight,
    footprint,
    steps,
    grid,
    points: Object.freeze([Object.freeze(point)]),
    precision: assessPrecision(boundingBox, grid),
  });
}

const round = (v: number, digits: number) => String(Number(v.toFixed(digits)));

/**
 * Stable label for output naming: overlap, box centre, altitude and camera.
 */
export function missionLabel(mission: Mission): string {
  const { topLeft, bottomRight } = mission.boundingBox;
  return [
    round(mission.flight.overlapFraction, 3),
    round((topLeft.lat + bottomRight.lat) / 2, 7),
    round((topLeft.lon + bottomRight.lon) / 2, 7),
    round(mission.flight.altitudeAGL, 2),
    round(mission.camera.diagonalFovDegrees, 2),
    round(mission.camera.aspectRatio[0], 3),
    round(mission.camera.aspectRatio[1], 3),
  ].join("_");
}
