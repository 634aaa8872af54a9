/**
 * Virtual camera presets and ground-footprint calculations.
 *
 * Angles are degrees at the API boundary and radians only inside these
 * functions. Footprint dimensions come back in whatever linear unit the
 * altitude was given in; the planner always passes meters.
 */

import type { CameraSpec, Footprint } from './types';
import { assertAltitude, assertCameraSpec } from './inputs';

// Consumer quadcopter sensor: 4:3 still images, 78.8° diagonal FOV (datasheet value)
export const MAVIC_4_3: CameraSpec = Object.freeze({
  diagonalFovDegrees: 78.8,
  aspectRatio: Object.freeze([4, 3] as const),
});

export const DEFAULT_CAMERA = MAVIC_4_3;

const toRad = (d: number) => (d * Math.PI) / 180;
const toDeg = (r: number) => (r * 180) / Math.PI;

/**
 * Half-angle tangents along the image width and height.
 * The diagonal is the hypotenuse of a right triangle whose legs scale as w:h,
 * so the tangent of each half angle is the diagonal tangent times that leg's share.
 */
function halfAngleTangents(camera: CameraSpec): { tanH: number; tanV: number } {
  const [w, h] = camera.aspectRatio;
  const diagonal = Math.hypot(w, h);
  const tanDiag = Math.tan(toRad(camera.diagonalFovDegrees) / 2);
  return { tanH: (tanDiag * w) / diagonal, tanV: (tanDiag * h) / diagonal };
}

/**
 * Full horizontal and vertical field-of-view angles in degrees.
 */
export function fieldOfView(camera: CameraSpec): { horizontalDegrees: number; verticalDegrees: number } {
  assertCameraSpec(camera);
  const { tanH, tanV } = halfAngleTangents(camera);
  return {
    horizontalDegrees: 2 * toDeg(Math.atan(tanH)),
    verticalDegrees: 2 * toDeg(Math.atan(tanV)),
  };
}

/**
 * Ground footprint of a nadir image taken at `altitudeAGL`.
 * Each axis is 2 · altitude · tan(halfAngle).
 */
export function computeFootprint(camera: CameraSpec, altitudeAGL: number): Footprint {
  assertCameraSpec(camera);
  assertAltitude(altitudeAGL);
  const { tanH, tanV } = halfAngleTangents(camera);
  return Object.freeze({
    groundWidth: 2 * altitudeAGL * tanH,
    groundHeight: 2 * altitudeAGL * tanV,
  });
}

/** Length of the footprint diagonal. */
export function footprintDiagonal(footprint: Footprint): number {
  return Math.hypot(footprint.groundWidth, footprint.groundHeight);
}
