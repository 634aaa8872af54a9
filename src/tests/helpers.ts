/**
 * In-process stand-ins for the imagery service and the dataset store.
 */

import type { CapturePoint } from "@/domain/types";
import type { AreaMapMetadata, AreaMapStore, CaptureMetadata, CaptureStore } from "@/imagery/storage";
import type { Logger } from "@/utils/log";
import type { ImageRequest, ImageryImage, ImageryProvider } from "@/imagery/provider";
import { createBoundingBox, createCameraSpec } from "@/domain/inputs";

// fov 90° → tan(45°) = 1, so at 50 m AGL a 4:3 frame covers exactly 80 m x 60 m
export const SQUARE_CAMERA = createCameraSpec(90, [4, 3]);

// 111.32 m on each side at the equator
export const SMALL_BOX = createBoundingBox({ lat: 0.0005, lon: 0 }, { lat: -0.0005, lon: 0.001 });

export const PNG: ImageryImage = { data: new Uint8Array([0x89, 0x50, 0x4e, 0x47]), contentType: "image/png" };

type Behaviour = (request: ImageRequest, attempt: number, signal: AbortSignal) => Promise<ImageryImage>;

/** Records every request and answers according to `behaviour` (default: a tiny PNG). */
export class RecordingProvider implements ImageryProvider {
  readonly name = "recording";
  readonly requests: ImageRequest[] = [];
  private readonly attempts = new Map<number, number>();

  constructor(private readonly behaviour: Behaviour = async () => PNG) {}

  attemptsFor(sequenceIndex: number): number {
    return this.attempts.get(sequenceIndex) ?? 0;
  }

  fetchImage(request: ImageRequest, signal: AbortSignal): Promise<ImageryImage> {
    const attempt = this.attemptsFor(request.sequenceIndex) + 1;
    this.attempts.set(request.sequenceIndex, attempt);
    this.requests.push(request);
    return this.behaviour(request, attempt, signal);
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export class MemoryCaptureStore implements CaptureStore, AreaMapStore {
  readonly saved = new Map<number, Omit<CaptureMetadata, "imageFile">>();
  areaMap: Omit<AreaMapMetadata, "imageFile"> | undefined;

  constructor(preloaded: number[] = []) {
    for (const seq of preloaded) {
      this.saved.set(seq, {
        sequenceIndex: seq,
        latitude: 0,
        longitude: 0,
        altitudeAGL: 0,
        yaw: 0,
        row: 0,
        column: 0,
        zoom: 0,
        imageBounds: { topLeft: { lat: 0, lon: 0 }, bottomRight: { lat: 0, lon: 0 } },
      });
    }
  }

  async has(point: CapturePoint): Promise<boolean> {
    return this.saved.has(point.sequenceIndex);
  }

  async save(point: CapturePoint, _image: ImageryImage, metadata: Omit<CaptureMetadata, "imageFile">): Promise<string> {
    this.saved.set(point.sequenceIndex, metadata);
    return `${point.sequenceIndex}.png`;
  }

  async hasAreaMap(): Promise<boolean> {
    return this.areaMap !== undefined;
  }

  async saveAreaMap(_image: ImageryImage, metadata: Omit<AreaMapMetadata, "imageFile">): Promise<string> {
    this.areaMap = metadata;
    return "area_map.png";
  }
}

/** Stays pending until `signal` aborts, then rejects with its reason, like a real fetch. */
export function hangUntilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) return reject(signal.reason);
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}
