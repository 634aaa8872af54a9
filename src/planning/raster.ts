// src/planning/raster.ts
//
// Pure utilities to lay a boustrophedon grid of capture points over a bounding box.
// No I/O, no clock, no randomness: identical inputs give an identical sequence.
//

import type { BoundingBox, CapturePoint, Footprint, RasterGrid, StepSizes } from "@/domain/types";
import { latLonToOffset, offsetToLatLon } from "@/services/Projection";

/** Latitude the longitude scale is evaluated at for the whole mission. */
export function referenceLatitude(box: BoundingBox): number {
  return (box.topLeft.lat + box.bottomRight.lat) / 2;
}

// Offsets this close to the far edge are on it. Degree round trips leave
// sub-millimetre noise on extents that are whole multiples of a step.
const EDGE_TOLERANCE_M = 1e-3;

// Number of samples along one axis. An extent smaller than one footprint is
// covered by a single image; otherwise the "+1" puts the last sample on the far edge.
function samplesAlongAxis(extentM: number, footprintM: number, stepM: number): number {
  if (extentM < footprintM) return 1;
  return Math.max(1, Math.ceil((extentM - EDGE_TOLERANCE_M) / stepM) + 1);
}

/**
 * Row/column counts and metric extents, computable before any point is generated.
 */
export function planRasterGrid(box: BoundingBox, footprint: Footprint, steps: StepSizes): RasterGrid {
  const refLat = referenceLatitude(box);
  const corner = latLonToOffset(box.topLeft, box.bottomRight, refLat);
  const northSouthExtentMeters = -corner.north;
  const eastWestExtentMeters = corner.east;

  return Object.freeze({
    rows: samplesAlongAxis(northSouthExtentMeters, footprint.groundHeight, steps.stepNorth),
    columns: samplesAlongAxis(eastWestExtentMeters, footprint.groundWidth, steps.stepEast),
    northSouthExtentMeters,
    eastWestExtentMeters,
    referenceLatitude: refLat,
  });
}

/** Column indices of a row in flight order: even rows west→east, odd rows east→west. */
export function columnOrder(row: number, columns: number): number[] {
  const order = Array.from({ length: columns }, (_, c) => c);
  return row % 2 === 0 ? order : order.reverse();
}

/**
 * Generate the ordered capture points.
 * Offsets are clamped to the box extent, and an offset at (or within a
 * millimetre of) the extent lands exactly on the southern/eastern edge rather
 * than a floating-point neighbour of it.
 */
export function generateRasterPath(
  box: BoundingBox,
  grid: RasterGrid,
  steps: StepSizes,
  altitudeAGL: number
): CapturePoint[] {
  const { topLeft, bottomRight } = box;
  const latitudes: number[] = [];
  for (let r = 0; r < grid.rows; r++) {
    const south = r * steps.stepNorth;
    latitudes.push(
      south >= grid.northSouthExtentMeters - EDGE_TOLERANCE_M && r > 0
        ? bottomRight.lat
        : offsetToLatLon(topLeft, -south, 0, grid.referenceLatitude).lat
    );
  }
  const longitudes: number[] = [];
  for (let c = 0; c < grid.columns; c++) {
    const east = c * steps.stepEast;
    longitudes.push(
      east >= grid.eastWestExtentMeters - EDGE_TOLERANCE_M && c > 0
        ? bottomRight.lon
        : offsetToLatLon(topLeft, 0, east, grid.referenceLatitude).lon
    );
  }

  const points: CapturePoint[] = [];
  for (let row = 0; row < grid.rows; row++) {
    for (const column of columnOrder(row, grid.columns)) {
      const point: CapturePoint = {
        latitude: latitudes[row],
        longitude: longitudes[column],
        altitudeAGL,
        yaw: 0,
        sequenceIndex: points.length,
        row,
        column,
      };
      points.push(Object.freeze(point));
    }
  }
  return points;
}
