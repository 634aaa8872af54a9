import type { BoundingBox, LatLon } from "@/domain/types";

// Web-Mercator "world" at zoom 0 is one 256 px tile
const TILE = 256;
const ORIGIN = TILE / 2;
const PX_PER_DEG = TILE / 360;
const PX_PER_RAD = TILE / (2 * Math.PI);
const SIN_LIMIT = 1 - 1e-15;

export function latLonToWorldPixel(p: LatLon): { x: number; y: number } {
  const s = Math.max(-SIN_LIMIT, Math.min(SIN_LIMIT, Math.sin((p.lat * Math.PI) / 180)));
  return {
    x: ORIGIN + p.lon * PX_PER_DEG,
    y: ORIGIN + 0.5 * Math.log((1 + s) / (1 - s)) * -PX_PER_RAD,
  };
}

export function worldPixelToLatLon(x: number, y: number): LatLon {
  return {
    lat: (Math.atan(Math.sinh((y - ORIGIN) / -PX_PER_RAD)) * 180) / Math.PI,
    lon: (x - ORIGIN) / PX_PER_DEG,
  };
}

export interface ZoomFit {
  zoom: number;
  width: number;  // pixels at `zoom`
  height: number;
}

/**
 * Largest integer zoom at which the box fits inside `maxPixels` on its longer
 * side, and the box's pixel size at that zoom. Zoom is clamped to [0, maxZoom].
 */
export function zoomForBounds(box: BoundingBox, maxZoom = 22, maxPixels = 640): ZoomFit {
  const tl = latLonToWorldPixel(box.topLeft);
  const br = latLonToWorldPixel(box.bottomRight);
  const w0 = Math.abs(br.x - tl.x);
  const h0 = Math.abs(br.y - tl.y);
  const fit = Math.floor(Math.log2(maxPixels / Math.max(w0, h0)));
  const zoom = Math.max(0, Math.min(maxZoom, fit));
  const scale = 2 ** zoom;
  return {
    zoom,
    width: Math.max(1, Math.min(maxPixels, Math.ceil(w0 * scale))),
    height: Math.max(1, Math.min(maxPixels, Math.ceil(h0 * scale))),
  };
}

/**
 * Area covered by a static map image of `size` pixels centred on `center` at `zoom`.
 */
export function boundsForStaticMap(center: LatLon, zoom: number, size: [number, number]): BoundingBox {
  const c = latLonToWorldPixel(center);
  const pixel = 2 ** -zoom;
  const halfX = (size[0] * pixel) / 2;
  const halfY = (size[1] * pixel) / 2;
  return {
    topLeft: worldPixelToLatLon(c.x - halfX, c.y - halfY),
    bottomRight: worldPixelToLatLon(c.x + halfX, c.y + halfY),
  };
}
