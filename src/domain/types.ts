/**
 * Shared domain types for the raster mission planner.
 * These types flow from input parsing through planning to the imagery executor.
 */

export type LngLat = [number, number];

export interface LatLon {
  readonly lat: number; // degrees, positive north
  readonly lon: number; // degrees, positive east
}

export interface BoundingBox {
  readonly topLeft: LatLon;     // north-west corner
  readonly bottomRight: LatLon; // south-east corner
}

export interface CameraSpec {
  readonly diagonalFovDegrees: number;             // (0, 180)
  readonly aspectRatio: readonly [number, number]; // width : height
}

export interface FlightParams {
  readonly altitudeAGL: number;     // meters above ground level
  readonly overlapFraction: number; // [0, 1)
}

export interface Footprint {
  readonly groundWidth: number;  // same linear units as altitude
  readonly groundHeight: number;
}

export interface StepSizes {
  readonly stepEast: number;  // meters between columns
  readonly stepNorth: number; // meters between rows
}

export interface RasterGrid {
  readonly rows: number;
  readonly columns: number;
  readonly northSouthExtentMeters: number;
  readonly eastWestExtentMeters: number;
  readonly referenceLatitude: number; // latitude the longitude scale is evaluated at
}

export interface CapturePoint {
  readonly latitude: number;
  readonly longitude: number;
  readonly altitudeAGL: number;
  readonly yaw: 0;
  readonly sequenceIndex: number; // 0-based traversal order
  readonly row: number;           // counted from the north edge
  readonly column: number;        // counted from the west edge, whatever the row direction
}

export interface PrecisionReport {
  readonly planarDiagonalMeters: number;
  readonly geodesicDiagonalMeters: number;
  readonly relativeError: number;
  readonly withinTolerance: boolean;
}

export interface Mission {
  readonly boundingBox: BoundingBox;
  readonly camera: CameraSpec;
  readonly flight: FlightParams;
  readonly footprint: Footprint;
  readonly steps: StepSizes;
  readonly grid: RasterGrid;
  readonly points: readonly CapturePoint[];
  readonly precision: PrecisionReport;
}

export type MapType = "satellite" | "roadmap" | "terrain";

export type AltitudeUnit = "ft" | "m";
