import { describe, expect, it } from "vitest";
import { computeFootprint, DEFAULT_CAMERA } from "@/domain/camera";
import { createBoundingBox } from "@/domain/inputs";
import type { BoundingBox, CapturePoint } from "@/domain/types";
import { columnOrder, generateRasterPath, planRasterGrid, referenceLatitude } from "@/planning/raster";
import { planStepSizes } from "@/planning/steps";
import { offsetToLatLon } from "@/services/Projection";
import { captureBounds, overlapPercent, sharedFraction } from "@/overlap/footprints";
import { SMALL_BOX, SQUARE_CAMERA } from "./helpers";

function plan(box: BoundingBox, altitude: number, overlap: number) {
  const footprint = computeFootprint(SQUARE_CAMERA, altitude);
  const steps = planStepSizes(footprint, overlap);
  const grid = planRasterGrid(box, footprint, steps);
  return { footprint, steps, grid, points: generateRasterPath(box, grid, steps, altitude) };
}

function expectBoustrophedon(points: CapturePoint[], columns: number) {
  points.forEach((p, i) => {
    expect(p.sequenceIndex).toBe(i);
    expect(p.yaw).toBe(0);
    if (i === 0) return;
    const prev = points[i - 1];
    if (prev.row === p.row) {
      expect(p.column - prev.column).toBe(p.row % 2 === 0 ? 1 : -1);
      expect(p.latitude).toBe(prev.latitude);
    } else {
      expect(p.row).toBe(prev.row + 1);
      expect(p.column).toBe(prev.column);
      expect(p.column).toBe(p.row % 2 === 0 ? 0 : columns - 1);
    }
  });
}

describe("columnOrder", () => {
  it("alternates direction row by row", () => {
    expect(columnOrder(0, 4)).toEqual([0, 1, 2, 3]);
    expect(columnOrder(1, 4)).toEqual([3, 2, 1, 0]);
    expect(columnOrder(2, 1)).toEqual([0]);
  });
});

describe("planRasterGrid", () => {
  it("measures a 0.001° square at the equator", () => {
    const { grid } = plan(SMALL_BOX, 50, 0.5);
    expect(referenceLatitude(SMALL_BOX)).toBe(0);
    expect(grid.northSouthExtentMeters).toBeCloseTo(111.32, 9);
    expect(grid.eastWestExtentMeters).toBeCloseTo(111.32, 9);
    // 111.32 / 30 → 4 steps south, 111.32 / 40 → 3 steps east, plus the starting row/column
    expect(grid.rows).toBe(5);
    expect(grid.columns).toBe(4);
  });

  it("does not add a row or column for an extent that is a whole number of steps", () => {
    const steps = planStepSizes(computeFootprint(SQUARE_CAMERA, 50), 0.5);
    const topLeft = { lat: 16.0143, lon: 10 };
    // 3 steps each way; converting through degrees leaves the extents a hair over 90 m and 120 m
    const box = createBoundingBox(topLeft, offsetToLatLon(topLeft, -3 * steps.stepNorth, 3 * steps.stepEast));
    const { grid, points } = plan(box, 50, 0.5);

    expect(grid.northSouthExtentMeters).toBeGreaterThan(3 * steps.stepNorth);
    expect(grid.eastWestExtentMeters).toBeGreaterThan(3 * steps.stepEast);
    expect(grid.rows).toBe(4);
    expect(grid.columns).toBe(4);
    expect(points).toHaveLength(16);

    const latitudes = points.filter((p) => p.column === 0).map((p) => p.latitude);
    for (let r = 1; r < latitudes.length; r++) {
      expect(latitudes[r - 1] - latitudes[r]).toBeCloseTo(30 / 111_320, 12);
    }
    expect(points[points.length - 1]).toMatchObject({
      latitude: box.bottomRight.lat,
      longitude: box.bottomRight.lon,
      row: 3,
      column: 3,
    });
  });

  it("collapses an axis shorter than the footprint to a single sample", () => {
    const box = createBoundingBox({ lat: 0.0002, lon: 0 }, { lat: 0, lon: 0.001 });
    const { grid } = plan(box, 50, 0.5);
    expect(grid.rows).toBe(1);
    expect(grid.columns).toBe(4);
  });
});

describe("generateRasterPath", () => {
  const { grid, points } = plan(SMALL_BOX, 50, 0.5);

  it("emits rows × columns points in serpentine order", () => {
    expect(points).toHaveLength(20);
    expectBoustrophedon(points, grid.columns);
    expect(points.slice(0, 8).map((p) => [p.row, p.column])).toEqual([
      [0, 0], [0, 1], [0, 2], [0, 3],
      [1, 3], [1, 2], [1, 1], [1, 0],
    ]);
  });

  it("starts at the top-left corner and finishes on the bottom-right corner", () => {
    expect(points[0]).toMatchObject({ latitude: 0.0005, longitude: 0, row: 0, column: 0 });
    const last = points[points.length - 1];
    expect(last).toMatchObject({ latitude: -0.0005, longitude: 0.001, row: 4, column: 3 });
  });

  it("spaces unclamped samples by exactly one step", () => {
    const lat = (row: number) => points.find((p) => p.row === row && p.column === 0)?.latitude;
    const lon = (column: number) => points.find((p) => p.row === 0 && p.column === column)?.longitude;
    expect(lat(1)).toBeCloseTo(0.0005 - 30 / 111_320, 12);
    expect(lat(3)).toBeCloseTo(0.0005 - 90 / 111_320, 12);
    expect(lon(2)).toBeCloseTo(80 / 111_320, 12);
  });

  it("keeps every point inside the box", () => {
    for (const p of points) {
      expect(p.latitude).toBeLessThanOrEqual(SMALL_BOX.topLeft.lat);
      expect(p.latitude).toBeGreaterThanOrEqual(SMALL_BOX.bottomRight.lat);
      expect(p.longitude).toBeGreaterThanOrEqual(SMALL_BOX.topLeft.lon);
      expect(p.longitude).toBeLessThanOrEqual(SMALL_BOX.bottomRight.lon);
      expect(p.altitudeAGL).toBe(50);
    }
  });

  it("gives neighbouring captures the requested overlap", () => {
    const [a, b] = points;
    const below = points[7]; // row 1, column 0
    const fp = { groundWidth: 80, groundHeight: 60 };
    const boundsA = captureBounds(a, fp, 0);
    expect(sharedFraction(boundsA, captureBounds(b, fp, 0))).toBeCloseTo(0.5, 9);
    expect(sharedFraction(boundsA, captureBounds(below, fp, 0))).toBeCloseTo(0.5, 9);
    // half of each image shared → IoU 1/3
    expect(overlapPercent(boundsA, captureBounds(b, fp, 0))).toBe(33);
  });

  it("is deterministic", () => {
    expect(plan(SMALL_BOX, 50, 0.5).points).toEqual(points);
  });

  it("plans a single capture at the corner of a box smaller than one image", () => {
    const tiny = createBoundingBox({ lat: 0.0002, lon: 0 }, { lat: 0, lon: 0.0003 });
    const result = plan(tiny, 50, 0.5);
    expect(result.grid.rows).toBe(1);
    expect(result.grid.columns).toBe(1);
    expect(result.points).toEqual([
      { latitude: 0.0002, longitude: 0, altitudeAGL: 50, yaw: 0, sequenceIndex: 0, row: 0, column: 0 },
    ]);
  });

  it("tiles edge to edge at zero overlap", () => {
    const result = plan(SMALL_BOX, 50, 0);
    // steps 80 × 60: ceil(111.32 / 60) + 1 rows, ceil(111.32 / 80) + 1 columns
    expect(result.grid.rows).toBe(3);
    expect(result.grid.columns).toBe(3);
    expectBoustrophedon(result.points, 3);
    expect(result.points[result.points.length - 1]).toMatchObject({ latitude: -0.0005, longitude: 0.001 });
  });
});

describe("city-scale survey", () => {
  const box = createBoundingBox({ lat: 35.22, lon: -90.07 }, { lat: 35.06, lon: -89.73 });
  const altitude = 400 * 0.3048;
  const footprint = computeFootprint(DEFAULT_CAMERA, altitude);
  const steps = planStepSizes(footprint, 0.3);
  const grid = planRasterGrid(box, footprint, steps);
  const points = generateRasterPath(box, grid, steps, altitude);

  it("sizes the grid from the metric extents", () => {
    expect(steps.stepEast).toBeCloseTo(112.1638, 3);
    expect(steps.stepNorth).toBeCloseTo(84.1228, 3);
    expect(grid.northSouthExtentMeters).toBeCloseTo(17_811.2, 6);
    expect(grid.eastWestExtentMeters).toBeCloseTo(30_950.7839, 3);
    expect(grid.rows).toBe(213);
    expect(grid.columns).toBe(277);
    expect(points).toHaveLength(59_001);
  });

  it("covers the box corner to corner", () => {
    expect(points[0]).toMatchObject({ latitude: 35.22, longitude: -90.07 });
    expect(points[points.length - 1]).toMatchObject({ latitude: 35.06, longitude: -89.73, row: 212, column: 276 });
    expectBoustrophedon(points, grid.columns);
  });
});

// 1 km x 1 km of flat ground at the equator, 100 m AGL, 70 % overlap both ways
describe("square kilometre survey", () => {
  const side = 1000 / 111_320;
  const box = createBoundingBox({ lat: side / 2, lon: 0 }, { lat: -side / 2, lon: side });
  const footprint = computeFootprint(DEFAULT_CAMERA, 100);
  const steps = planStepSizes(footprint, 0.7);
  const grid = planRasterGrid(box, footprint, steps);
  const points = generateRasterPath(box, grid, steps, 100);

  it("spaces lines and shots from the footprint", () => {
    expect(footprint.groundWidth).toBeCloseTo(131.4255, 3);
    expect(footprint.groundHeight).toBeCloseTo(98.5691, 3);
    expect(steps.stepEast).toBeCloseTo(39.4276, 3);
    expect(steps.stepNorth).toBeCloseTo(29.5707, 3);
  });

  it("needs 35 rows of 27 captures", () => {
    expect(grid.rows).toBe(35);
    expect(grid.columns).toBe(27);
    expect(points).toHaveLength(945);
    expect(points[points.length - 1]).toMatchObject({ latitude: -side / 2, longitude: side, row: 34, column: 26 });
  });
});
