/**
 * Narrow interface to the external map-imagery service, plus the static-map
 * HTTP client used in production. Planning never touches this module.
 */

import type { BoundingBox, CapturePoint, Footprint, LatLon, MapType } from "@/domain/types";
import { ConfigError } from "@/domain/errors";
import { captureBounds } from "@/overlap/footprints";
import { latLonToWorldPixel, worldPixelToLatLon, zoomForBounds } from "@/overlap/mercator";

export interface ImageRequest {
  sequenceIndex: number; // AREA_MAP_INDEX for the whole-area map
  center: LatLon;
  zoom: number;
  width: number;  // pixels
  height: number; // pixels
  mapType: MapType;
  bounds: BoundingBox; // ground footprint the request was sized for
}

export interface ImageryImage {
  data: Uint8Array;
  contentType: string;
}

export interface ImageryProvider {
  readonly name: string;
  fetchImage(request: ImageRequest, signal: AbortSignal): Promise<ImageryImage>;
}

// 408 and 429 are worth retrying, as is anything the server blames on itself
const TRANSIENT_STATUS = new Set([408, 425, 429]);

export class ImageryHttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string, detail?: string) {
    super(`imagery request failed with HTTP ${status}${detail ? `: ${detail}` : ""}`);
    this.name = "ImageryHttpError";
    this.status = status;
    this.url = url;
  }

  get transient(): boolean {
    return this.status >= 500 || TRANSIENT_STATUS.has(this.status);
  }
}

/** Raised when a single fetch exceeds its time budget. */
export class FetchTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`imagery request timed out after ${timeoutMs} ms`);
    this.name = "FetchTimeoutError";
  }
}

/**
 * Whether retrying could help. Network failures surface from fetch as TypeError.
 */
export function isTransientError(err: unknown): boolean {
  if (err instanceof ImageryHttpError) return err.transient;
  if (err instanceof FetchTimeoutError) return true;
  return err instanceof TypeError;
}

/**
 * Size a provider request so the returned image covers the capture's footprint.
 */
export function buildImageRequest(
  point: CapturePoint,
  footprint: Footprint,
  mapType: MapType,
  referenceLatitude: number = point.latitude,
  maxZoom = 22
): ImageRequest {
  const bounds = captureBounds(point, footprint, referenceLatitude);
  const { zoom, width, height } = zoomForBounds(bounds, maxZoom);
  return {
    sequenceIndex: point.sequenceIndex,
    center: { lat: point.latitude, lon: point.longitude },
    zoom,
    width,
    height,
    mapType,
    bounds,
  };
}

/** Sequence index carried by the request for the map of the whole survey area. */
export const AREA_MAP_INDEX = -1;

/**
 * One image of the whole bounding box, centred on the box's Mercator midpoint
 * so the pixel size from `zoomForBounds` covers it edge to edge.
 */
export function buildAreaMapRequest(box: BoundingBox, mapType: MapType, maxZoom = 22): ImageRequest {
  const tl = latLonToWorldPixel(box.topLeft);
  const br = latLonToWorldPixel(box.bottomRight);
  const { zoom, width, height } = zoomForBounds(box, maxZoom);
  return {
    sequenceIndex: AREA_MAP_INDEX,
    center: worldPixelToLatLon((tl.x + br.x) / 2, (tl.y + br.y) / 2),
    zoom,
    width,
    height,
    mapType,
    bounds: box,
  };
}

export interface StaticMapProviderOptions {
  apiKey: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

export const STATIC_MAP_URL = "https://maps.googleapis.com/maps/api/staticmap";

/**
 * Static map HTTP client. One request per capture, labels hidden.
 */
export class StaticMapProvider implements ImageryProvider {
  readonly name = "static-map";
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: StaticMapProviderOptions) {
    if (!options.apiKey) {
      throw new ConfigError("static map provider needs an API key (set STATIC_MAPS_API_KEY)");
    }
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? STATIC_MAP_URL;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  buildUrl(request: ImageRequest): string {
    const url = new URL(this.baseUrl);
    url.searchParams.set("center", `${request.center.lat},${request.center.lon}`);
    url.searchParams.set("zoom", String(request.zoom));
    url.searchParams.set("size", `${request.width}x${request.height}`);
    url.searchParams.set("maptype", request.mapType);
    url.searchParams.set("style", "feature:all|element:labels|visibility:off");
    url.searchParams.set("key", this.apiKey);
    return url.toString();
  }

  async fetchImage(request: ImageRequest, signal: AbortSignal): Promise<ImageryImage> {
    const url = this.buildUrl(request);
    const response = await this.fetchImpl(url, { signal });

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      throw new ImageryHttpError(response.status, url, detail.slice(0, 200));
    }

    const contentType = response.headers.get("content-type") ?? "image/png";
    if (contentType.includes("application/json") || contentType.startsWith("text/")) {
      // The service reports some errors with a 200 and a text body
      throw new ImageryHttpError(502, url, (await response.text()).slice(0, 200));
    }

    return { data: new Uint8Array(await response.arrayBuffer()), contentType };
  }
}
