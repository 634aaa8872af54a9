/**
 * Drives an imagery provider over a planned mission.
 *
 * Points are independent, so they are fetched by a bounded pool of workers in
 * no particular order; `sequenceIndex` only names the output. A failing point
 * is retried (transient errors only), then recorded and skipped. Aborting the
 * mission signal stops dispatch and aborts in-flight fetches; whatever was
 * persisted before that stays on disk.
 *
 * `captureAreaMap` fetches one overview image of the whole box with the same
 * retry and timeout rules.
 */

import type { CapturePoint, MapType, Mission } from "@/domain/types";
import type { Logger } from "@/utils/log";
import { createLogger } from "@/utils/log";
import type { AreaMapStore, CaptureStore } from "./storage";
import type { ImageRequest, ImageryImage, ImageryProvider } from "./provider";
import { FetchTimeoutError, buildAreaMapRequest, buildImageRequest, isTransientError } from "./provider";
import { boundsForStaticMap } from "@/overlap/mercator";

export interface ExecuteOptions {
  provider: ImageryProvider;
  store: CaptureStore;
  mapType?: MapType;
  concurrency?: number;
  maxAttempts?: number;
  backoffMs?: number;
  timeoutMs?: number;
  maxZoom?: number;
  signal?: AbortSignal;
  logger?: Logger;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  onProgress?: (done: number, total: number) => void;
}

export interface FailedCapture {
  sequenceIndex: number;
  attempts: number;
  reason: string;
}

export interface MissionSummary {
  total: number;
  succeeded: number;
  skipped: number; // already persisted by an earlier run
  failed: FailedCapture[];
  aborted: number;       // in flight when the mission was cancelled
  notDispatched: number; // never started
  cancelled: boolean;
}

export type AreaMapOptions = Omit<ExecuteOptions, "store" | "concurrency" | "onProgress"> & {
  store: AreaMapStore;
};

export type AreaMapOutcome =
  | { kind: "present" }
  | { kind: "saved"; imageFile: string }
  | { kind: "failed"; attempts: number; reason: string }
  | { kind: "cancelled" };

type Outcome =
  | { kind: "saved" }
  | { kind: "skipped" }
  | { kind: "failed"; attempts: number; reason: string }
  | { kind: "cancelled" };

type FetchResult =
  | { kind: "fetched"; image: ImageryImage; attempts: number }
  | { kind: "failed"; attempts: number; reason: string }
  | { kind: "cancelled" };

interface RetryPolicy {
  provider: ImageryProvider;
  maxAttempts: number;
  backoffMs: number;
  timeoutMs: number;
  signal: AbortSignal;
  sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  logger: Logger;
}

const errorText = (err: unknown) => (err instanceof Error ? `${err.name}: ${err.message}` : String(err));

/** Resolves after `ms`, or rejects as soon as `signal` aborts. */
export function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) return reject(signal.reason);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal.reason);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

// One fetch, aborted by either the mission signal or its own timer.
async function fetchWithTimeout(
  provider: ImageryProvider,
  request: ImageRequest,
  timeoutMs: number,
  missionSignal: AbortSignal
) {
  const controller = new AbortController();
  const onAbort = () => controller.abort(missionSignal.reason);
  missionSignal.addEventListener("abort", onAbort, { once: true });
  const timer = setTimeout(() => controller.abort(new FetchTimeoutError(timeoutMs)), timeoutMs);
  try {
    return await provider.fetchImage(request, controller.signal);
  } catch (err) {
    // Providers may reject with a generic AbortError; report the reason we aborted for
    if (controller.signal.aborted) throw controller.signal.reason;
    throw err;
  } finally {
    clearTimeout(timer);
    missionSignal.removeEventListener("abort", onAbort);
  }
}

function retryPolicy(options: Omit<ExecuteOptions, "store">): RetryPolicy {
  const {
    provider,
    maxAttempts = 5,
    backoffMs = 500,
    timeoutMs = 30_000,
    logger = createLogger("executor"),
    sleep = abortableSleep,
  } = options;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }
  const signal = options.signal ?? new AbortController().signal;
  return { provider, maxAttempts, backoffMs, timeoutMs, signal, sleep, logger };
}

// Fetch with retries on transient errors; `what` names the image in log lines.
async function fetchWithRetries(request: ImageRequest, what: string, policy: RetryPolicy): Promise<FetchResult> {
  const { provider, maxAttempts, backoffMs, timeoutMs, signal, sleep, logger } = policy;
  for (let attempt = 1; ; attempt++) {
    try {
      const image = await fetchWithTimeout(provider, request, timeoutMs, signal);
      return { kind: "fetched", image, attempts: attempt };
    } catch (err) {
      if (signal.aborted) return { kind: "cancelled" };
      if (!isTransientError(err) || attempt >= maxAttempts) {
        return { kind: "failed", attempts: attempt, reason: errorText(err) };
      }
      const delay = backoffMs * 2 ** (attempt - 1);
      logger.debug(`${what}: attempt ${attempt} failed (${errorText(err)}), retrying in ${delay} ms`);
      try {
        await sleep(delay, signal);
      } catch (sleepErr) {
        if (signal.aborted) return { kind: "cancelled" };
        throw sleepErr;
      }
    }
  }
}

export async function executeMission(mission: Mission, options: ExecuteOptions): Promise<MissionSummary> {
  const { store, mapType = "satellite", concurrency = 4, maxZoom = 22, onProgress } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }
  const policy = retryPolicy(options);
  const { signal, logger } = policy;

  const points = mission.points;
  const outcomes = new Map<number, Outcome>();
  let next = 0;
  let done = 0;

  const capture = async (point: CapturePoint): Promise<Outcome> => {
    if (await store.has(point)) return { kind: "skipped" };

    const request = buildImageRequest(point, mission.footprint, mapType, mission.grid.referenceLatitude, maxZoom);
    const fetched = await fetchWithRetries(request, `point ${point.sequenceIndex}`, policy);
    if (fetched.kind !== "fetched") return fetched;
    try {
      await store.save(point, fetched.image, {
        sequenceIndex: point.sequenceIndex,
        latitude: point.latitude,
        longitude: point.longitude,
        altitudeAGL: point.altitudeAGL,
        yaw: point.yaw,
        row: point.row,
        column: point.column,
        zoom: request.zoom,
        imageBounds: boundsForStaticMap(request.center, request.zoom, [request.width, request.height]),
      });
      return { kind: "saved" };
    } catch (err) {
      if (signal.aborted) return { kind: "cancelled" };
      return { kind: "failed", attempts: fetched.attempts, reason: errorText(err) };
    }
  };

  const worker = async () => {
    while (!signal.aborted && next < points.length) {
      const point = points[next++];
      let outcome: Outcome;
      try {
        outcome = await capture(point);
      } catch (err) {
        outcome = signal.aborted ? { kind: "cancelled" } : { kind: "failed", attempts: 0, reason: errorText(err) };
      }
      outcomes.set(point.sequenceIndex, outcome);
      if (outcome.kind === "failed") {
        logger.warn(`point ${point.sequenceIndex} failed after ${outcome.attempts} attempt(s): ${outcome.reason}`);
      }
      onProgress?.(++done, points.length);
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, Math.max(1, points.length)) }, () => worker());
  await Promise.all(workers);

  const summary: MissionSummary = {
    total: points.length,
    succeeded: 0,
    skipped: 0,
    failed: [],
    aborted: 0,
    notDispatched: 0,
    cancelled: signal.aborted,
  };
  for (const point of points) {
    const outcome = outcomes.get(point.sequenceIndex);
    if (!outcome) summary.notDispatched++;
    else if (outcome.kind === "cancelled") summary.aborted++;
    else if (outcome.kind === "saved") summary.succeeded++;
    else if (outcome.kind === "skipped") summary.skipped++;
    else summary.failed.push({ sequenceIndex: point.sequenceIndex, attempts: outcome.attempts, reason: outcome.reason });
  }

  logger.info(
    `mission finished: ${summary.succeeded} saved, ${summary.skipped} already present, ` +
    `${summary.failed.length} failed, ${summary.aborted + summary.notDispatched} not captured` +
    (summary.cancelled ? " (cancelled)" : "")
  );
  return summary;
}

/**
 * Fetch one image covering the whole bounding box, unless the store already
 * holds it. Failure here does not stop the per-point captures.
 */
export async function captureAreaMap(mission: Mission, options: AreaMapOptions): Promise<AreaMapOutcome> {
  const { store, mapType = "satellite", maxZoom = 22 } = options;
  const policy = retryPolicy(options);
  const { signal, logger } = policy;

  if (signal.aborted) return { kind: "cancelled" };
  if (await store.hasAreaMap()) {
    logger.info("area map already present");
    return { kind: "present" };
  }

  const request = buildAreaMapRequest(mission.boundingBox, mapType, maxZoom);
  const fetched = await fetchWithRetries(request, "area map", policy);
  if (fetched.kind === "failed") {
    logger.warn(`area map failed after ${fetched.attempts} attempt(s): ${fetched.reason}`);
  }
  if (fetched.kind !== "fetched") return fetched;

  try {
    const imageFile = await store.saveAreaMap(fetched.image, {
      center: request.center,
      zoom: request.zoom,
      width: request.width,
      height: request.height,
      mapType,
      imageBounds: boundsForStaticMap(request.center, request.zoom, [request.width, request.height]),
    });
    logger.info(`area map saved as ${imageFile} (zoom ${request.zoom}, ${request.width}x${request.height})`);
    return { kind: "saved", imageFile };
  } catch (err) {
    if (signal.aborted) return { kind: "cancelled" };
    logger.warn(`area map could not be saved: ${errorText(err)}`);
    return { kind: "failed", attempts: fetched.attempts, reason: errorText(err) };
  }
}
