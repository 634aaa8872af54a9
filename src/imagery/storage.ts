/**
 * On-disk dataset layout.
 *
 *   <dataDirectory>/<mapType>/raster_<missionLabel>/
 *     mission.json                               planning parameters and counts
 *     summary.json                               written after execution
 *     area_map.<ext>, area_map.json              one image of the whole box
 *     <seq>_<col>_<row>_<lat>_<lon>.<ext>        image
 *     <seq>_<col>_<row>_<lat>_<lon>.json         sidecar metadata
 *
 * A capture counts as persisted once its sidecar exists; the image is written first.
 */

import { access, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { BoundingBox, CapturePoint, LatLon, MapType, Mission } from "@/domain/types";
import { missionLabel } from "@/planning/mission";
import type { ImageryImage } from "./provider";
import type { MissionSummary } from "./executor";

export interface CaptureMetadata {
  sequenceIndex: number;
  latitude: number;
  longitude: number;
  altitudeAGL: number;
  yaw: 0;
  row: number;
  column: number;
  zoom: number;
  imageBounds: BoundingBox;
  imageFile: string;
}

export interface CaptureStore {
  has(point: CapturePoint): Promise<boolean>;
  save(point: CapturePoint, image: ImageryImage, metadata: Omit<CaptureMetadata, "imageFile">): Promise<string>;
}

export interface AreaMapMetadata {
  center: LatLon;
  zoom: number;
  width: number;
  height: number;
  mapType: MapType;
  imageBounds: BoundingBox;
  imageFile: string;
}

/** Holds the single overview image of a mission; kept once written. */
export interface AreaMapStore {
  hasAreaMap(): Promise<boolean>;
  saveAreaMap(image: ImageryImage, metadata: Omit<AreaMapMetadata, "imageFile">): Promise<string>;
}

const AREA_MAP_STEM = "area_map";

export function captureStem(point: CapturePoint): string {
  return [
    point.sequenceIndex,
    point.column,
    point.row,
    point.latitude.toFixed(7),
    point.longitude.toFixed(7),
  ].join("_");
}

export function extensionFor(contentType: string): string {
  const type = contentType.split(";")[0].trim().toLowerCase();
  switch (type) {
    case "image/jpeg":
    case "image/jpg":
      return "jpg";
    case "image/png":
      return "png";
    case "image/gif":
      return "gif";
    case "image/webp":
      return "webp";
    default:
      return "bin";
  }
}

export function missionDirectory(dataDirectory: string, mapType: MapType, mission: Mission): string {
  return path.join(dataDirectory, mapType, `raster_${missionLabel(mission)}`);
}

async function exists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}

export class FileSystemCaptureStore implements CaptureStore, AreaMapStore {
  constructor(readonly directory: string) {}

  /** Create the directory and record the mission parameters. */
  async init(mission: Mission, mapType: MapType): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const record = {
      label: missionLabel(mission),
      mapType,
      boundingBox: mission.boundingBox,
      camera: mission.camera,
      flight: mission.flight,
      footprint: mission.footprint,
      steps: mission.steps,
      grid: mission.grid,
      precision: mission.precision,
      pointCount: mission.points.length,
    };
    await writeFile(path.join(this.directory, "mission.json"), JSON.stringify(record, null, 2));
  }

  has(point: CapturePoint): Promise<boolean> {
    return exists(path.join(this.directory, `${captureStem(point)}.json`));
  }

  async save(
    point: CapturePoint,
    image: ImageryImage,
    metadata: Omit<CaptureMetadata, "imageFile">
  ): Promise<string> {
    const stem = captureStem(point);
    const imageFile = `${stem}.${extensionFor(image.contentType)}`;
    await writeFile(path.join(this.directory, imageFile), image.data);
    const sidecar: CaptureMetadata = { ...metadata, imageFile };
    await writeFile(path.join(this.directory, `${stem}.json`), JSON.stringify(sidecar, null, 2));
    return imageFile;
  }

  hasAreaMap(): Promise<boolean> {
    return exists(path.join(this.directory, `${AREA_MAP_STEM}.json`));
  }

  async saveAreaMap(image: ImageryImage, metadata: Omit<AreaMapMetadata, "imageFile">): Promise<string> {
    const imageFile = `${AREA_MAP_STEM}.${extensionFor(image.contentType)}`;
    await writeFile(path.join(this.directory, imageFile), image.data);
    const sidecar: AreaMapMetadata = { ...metadata, imageFile };
    await writeFile(path.join(this.directory, `${AREA_MAP_STEM}.json`), JSON.stringify(sidecar, null, 2));
    return imageFile;
  }

  async writeSummary(summary: MissionSummary): Promise<void> {
    await writeFile(path.join(this.directory, "summary.json"), JSON.stringify(summary, null, 2));
  }
}
