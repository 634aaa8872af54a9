/**
 * Ground area covered by individual captures, and how much two captures share.
 */

import type { BoundingBox, CapturePoint, Footprint } from "@/domain/types";
import { offsetToLatLon } from "@/services/Projection";

/** Box covered by a nadir image centred on `point`. */
export function captureBounds(
  point: CapturePoint,
  footprint: Footprint,
  referenceLatitude: number = point.latitude
): BoundingBox {
  const center = { lat: point.latitude, lon: point.longitude };
  const halfH = footprint.groundHeight / 2;
  const halfW = footprint.groundWidth / 2;
  return {
    topLeft: offsetToLatLon(center, halfH, -halfW, referenceLatitude),
    bottomRight: offsetToLatLon(center, -halfH, halfW, referenceLatitude),
  };
}

function areaDeg2(box: BoundingBox): number {
  return Math.abs(box.topLeft.lat - box.bottomRight.lat) * Math.abs(box.bottomRight.lon - box.topLeft.lon);
}

function intersectionDeg2(a: BoundingBox, b: BoundingBox): number {
  const dy = Math.max(0, Math.min(a.topLeft.lat, b.topLeft.lat) - Math.max(a.bottomRight.lat, b.bottomRight.lat));
  const dx = Math.max(0, Math.min(a.bottomRight.lon, b.bottomRight.lon) - Math.max(a.topLeft.lon, b.topLeft.lon));
  return dx * dy;
}

/** Intersection over union of two boxes, as an integer percentage (0–100). */
export function overlapPercent(a: BoundingBox, b: BoundingBox): number {
  const inter = intersectionDeg2(a, b);
  const union = areaDeg2(a) + areaDeg2(b) - inter;
  if (union <= 0) return 0;
  return Math.floor((inter / union) * 100);
}

/** Fraction of `a` that `b` also covers. */
export function sharedFraction(a: BoundingBox, b: BoundingBox): number {
  const area = areaDeg2(a);
  return area > 0 ? intersectionDeg2(a, b) / area : 0;
}
