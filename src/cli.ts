/**
 * Command-line entry point.
 *
 *   plan    --coords TLlat_TLlon_BRlat_BRlon_alt | --kml area.kml --altitude 400
 *   raster  same inputs as plan, then fetch every capture
 *   single  --coords lat_lon_alt | --coords points.txt (first record)
 *   list    --coords points.txt (one single-image mission per record)
 *
 * Run with `npm run mission -- <command> [flags]`.
 */

import type { EventEmitter } from "node:events";
import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";

import type { BoundingBox, CameraSpec, Mission } from "@/domain/types";
import { createCameraSpec, createFlightParams } from "@/domain/inputs";
import { ConfigError, InputFormatError, MissionPlanningError } from "@/domain/errors";
import { fieldOfView, footprintDiagonal } from "@/domain/camera";
import type { MissionConfig } from "@/config";
import { loadConfig, validateConfig } from "@/config";
import { missionLabel, planMission, planSinglePointMission } from "@/planning/mission";
import { captureBounds, overlapPercent, sharedFraction } from "@/overlap/footprints";
import { parseInlineCoordinates, parsePointList, toMeters } from "@/io/coords";
import { kmlToBoundingBox } from "@/utils/kml";
import { captureAreaMap, executeMission } from "@/imagery/executor";
import { StaticMapProvider } from "@/imagery/provider";
import { FileSystemCaptureStore, missionDirectory } from "@/imagery/storage";
import { createLogger } from "@/utils/log";

const log = createLogger("mission");

const COMMANDS = ["plan", "raster", "single", "list"] as const;
type Command = (typeof COMMANDS)[number];
const isCommand = (v: string | undefined): v is Command => COMMANDS.some((c) => c === v);

const USAGE = `usage: mission <${COMMANDS.join("|")}> [options]

  --coords <value|file>     inline "TLlat_TLlon_BRlat_BRlon_alt" / "lat_lon_alt", or a point file
  --kml <file>              survey area from KML polygons (needs --altitude)
  --altitude <n>            altitude AGL for --kml input
  --altitude-unit <ft|m>    unit of input altitudes (default ft)
  --fov <deg>               diagonal field of view
  --aspect-ratio <w,h>      image aspect ratio, e.g. 4,3
  --overlap <0..1)          overlap fraction between neighbouring captures
  --map-type <type>         satellite | roadmap | terrain
  --data-dir <dir>          dataset root directory
  --concurrency <n>         parallel image requests
  --config <file>           JSON config file (default ./mission.config.json if present)
  --yes                     do not ask before downloading
`;

const toNumber = (v: string | undefined) => (v === undefined ? undefined : Number(v));

function parseAspectRatio(v: string | undefined): [number, number] | undefined {
  if (v === undefined) return undefined;
  const parts = v.split(/[,:x]/).map(Number);
  if (parts.length !== 2) throw new ConfigError(`--aspect-ratio expects "w,h", got "${v}"`);
  return [parts[0], parts[1]];
}

function looksInline(coords: string): boolean {
  return /^\s*-?[\d.]+(_-?[\d.]+)+\s*$/.test(coords);
}

export function formatMissionSummary(mission: Mission): string[] {
  const { footprint, steps, grid, points, precision } = mission;
  const fov = fieldOfView(mission.camera);
  const lines = [
    `label:        ${missionLabel(mission)}`,
    `altitude:     ${mission.flight.altitudeAGL.toFixed(2)} m AGL, overlap ${mission.flight.overlapFraction}`,
    `fov:          ${fov.horizontalDegrees.toFixed(2)}° x ${fov.verticalDegrees.toFixed(2)}°`,
    `footprint:    ${footprint.groundWidth.toFixed(2)} m x ${footprint.groundHeight.toFixed(2)} m` +
      ` (diagonal ${footprintDiagonal(footprint).toFixed(2)} m)`,
    `steps:        ${steps.stepEast.toFixed(2)} m east, ${steps.stepNorth.toFixed(2)} m north`,
    `extent:       ${grid.eastWestExtentMeters.toFixed(1)} m x ${grid.northSouthExtentMeters.toFixed(1)} m`,
    `grid:         ${grid.rows} rows x ${grid.columns} columns = ${points.length} captures`,
  ];
  // Neighbours of the first capture: the next one in its row, and the one below it
  const first = captureBounds(points[0], footprint, grid.referenceLatitude);
  const overlaps: string[] = [];
  if (grid.columns > 1) {
    const east = captureBounds(points[1], footprint, grid.referenceLatitude);
    const shared = (sharedFraction(first, east) * 100).toFixed(1);
    overlaps.push(`${shared}% along rows (IoU ${overlapPercent(first, east)}%)`);
  }
  if (grid.rows > 1) {
    const south = captureBounds(points[2 * grid.columns - 1], footprint, grid.referenceLatitude);
    overlaps.push(`${(sharedFraction(first, south) * 100).toFixed(1)}% between rows`);
  }
  if (overlaps.length > 0) lines.push(`overlap:      ${overlaps.join(", ")}`);
  lines.push(
    `precision:    planar diagonal ${precision.planarDiagonalMeters.toFixed(1)} m, ` +
    `great-circle ${precision.geodesicDiagonalMeters.toFixed(1)} m (${(precision.relativeError * 100).toFixed(3)}%)`
  );
  return lines;
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = (await rl.question(`${question} (y/yes): `)).trim().toLowerCase();
    return answer === "y" || answer === "yes";
  } finally {
    rl.close();
  }
}

async function runMission(
  mission: Mission,
  config: MissionConfig,
  signal: AbortSignal,
  assumeYes: boolean,
  withAreaMap = false
): Promise<boolean> {
  for (const line of formatMissionSummary(mission)) log.info(line);
  if (!mission.precision.withinTolerance) {
    log.warn("box is large enough that the planar approximation distorts spacing; consider splitting it");
  }

  const directory = missionDirectory(config.dataDirectory, config.mapType, mission);
  const question =
    `Download ${mission.points.length} image(s)${withAreaMap ? " and an area map" : ""} into ${directory}?`;
  if (!assumeYes && !(await confirm(question))) {
    log.info("not downloading");
    return true;
  }

  const provider = new StaticMapProvider({ apiKey: config.apiKey });
  const store = new FileSystemCaptureStore(directory);
  await store.init(mission, config.mapType);

  const fetchOptions = {
    provider,
    mapType: config.mapType,
    maxAttempts: config.maxAttempts,
    backoffMs: config.backoffMs,
    timeoutMs: config.timeoutMs,
    maxZoom: config.maxZoom,
    signal,
    logger: createLogger("executor"),
  };
  const areaMap = withAreaMap ? await captureAreaMap(mission, { ...fetchOptions, store }) : undefined;

  const total = mission.points.length;
  const every = Math.max(1, Math.floor(total / 20));
  const summary = await executeMission(mission, {
    ...fetchOptions,
    store,
    concurrency: config.concurrency,
    onProgress: (done) => {
      if (done % every === 0 || done === total) log.info(`${done}/${total}`);
    },
  });
  await store.writeSummary(summary);
  return summary.failed.length === 0 && areaMap?.kind !== "failed";
}

async function resolveBoundingBox(
  values: { coords?: string; kml?: string; altitude?: string },
  config: MissionConfig
): Promise<{ boundingBox: BoundingBox; altitudeAGL: number }> {
  if (values.kml) {
    const altitude = toNumber(values.altitude);
    if (altitude === undefined) throw new InputFormatError("--kml needs --altitude");
    return {
      boundingBox: kmlToBoundingBox(await readFile(values.kml, "utf8")),
      altitudeAGL: toMeters(altitude, config.altitudeUnit),
    };
  }
  if (!values.coords) throw new InputFormatError("--coords or --kml is required");
  const parsed = parseInlineCoordinates(values.coords, config.altitudeUnit);
  if (parsed.kind !== "raster") {
    throw new InputFormatError(`raster missions need "TLlat_TLlon_BRlat_BRlon_alt", got "${values.coords}"`);
  }
  return parsed;
}

export async function main(argv: string[], signal: AbortSignal): Promise<number> {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      coords: { type: "string" },
      kml: { type: "string" },
      altitude: { type: "string" },
      "altitude-unit": { type: "string" },
      fov: { type: "string" },
      "aspect-ratio": { type: "string" },
      overlap: { type: "string" },
      "map-type": { type: "string" },
      "data-dir": { type: "string" },
      concurrency: { type: "string" },
      config: { type: "string" },
      yes: { type: "boolean", short: "y" },
      help: { type: "boolean", short: "h" },
    },
  });

  const command = positionals[0];
  if (values.help || !isCommand(command)) {
    process.stdout.write(USAGE);
    return values.help ? 0 : 1;
  }

  const overrides = validateConfig({
    altitudeUnit: values["altitude-unit"],
    diagonalFovDegrees: toNumber(values.fov),
    aspectRatio: parseAspectRatio(values["aspect-ratio"]),
    overlapFraction: toNumber(values.overlap),
    mapType: values["map-type"],
    dataDirectory: values["data-dir"],
    concurrency: toNumber(values.concurrency),
  });
  const config = await loadConfig({ file: values.config, overrides });
  const camera: CameraSpec = createCameraSpec(config.diagonalFovDegrees, config.aspectRatio);
  const assumeYes = values.yes ?? false;

  switch (command) {
    case "plan": {
      const { boundingBox, altitudeAGL } = await resolveBoundingBox(values, config);
      const mission = planMission(boundingBox, camera, createFlightParams(altitudeAGL, config.overlapFraction));
      for (const line of formatMissionSummary(mission)) log.info(line);
      if (!mission.precision.withinTolerance) log.warn("planar approximation distorts spacing for a box this large");
      return 0;
    }
    case "raster": {
      const { boundingBox, altitudeAGL } = await resolveBoundingBox(values, config);
      const mission = planMission(boundingBox, camera, createFlightParams(altitudeAGL, config.overlapFraction));
      return (await runMission(mission, config, signal, assumeYes, true)) ? 0 : 1;
    }
    case "single": {
      if (!values.coords) throw new InputFormatError("--coords is required");
      const record = looksInline(values.coords)
        ? parseInlineCoordinates(values.coords, config.altitudeUnit)
        : { kind: "point" as const, ...parsePointList(await readFile(values.coords, "utf8"), config.altitudeUnit)[0] };
      // A raster string is accepted too: its top-left corner becomes the image centre
      const center = record.kind === "point" ? record.center : record.boundingBox.topLeft;
      const mission = planSinglePointMission(center, camera, record.altitudeAGL);
      return (await runMission(mission, config, signal, assumeYes)) ? 0 : 1;
    }
    case "list": {
      if (!values.coords) throw new InputFormatError("--coords <file> is required");
      const records = parsePointList(await readFile(values.coords, "utf8"), config.altitudeUnit);
      let ok = true;
      for (const [i, record] of records.entries()) {
        if (signal.aborted) break;
        log.info(`coordinate ${i + 1}/${records.length}: ${record.center.lat}, ${record.center.lon}`);
        const mission = planSinglePointMission(record.center, camera, record.altitudeAGL);
        ok = (await runMission(mission, config, signal, assumeYes)) && ok;
      }
      return ok ? 0 : 1;
    }
  }
}

/** First Ctrl-C cancels the mission: requests in flight are aborted and no new ones start. */
export function abortOnInterrupt(controller: AbortController, target: EventEmitter = process): void {
  target.once("SIGINT", () => {
    log.warn("cancelling: aborting in-flight requests, no new ones will start");
    controller.abort(new Error("cancelled by user"));
  });
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const controller = new AbortController();
  abortOnInterrupt(controller);
  main(process.argv.slice(2), controller.signal).then(
    (code) => { process.exitCode = code; },
    (err: unknown) => {
      if (err instanceof MissionPlanningError || err instanceof InputFormatError || err instanceof ConfigError) {
        log.error(err.message);
      } else {
        log.error(err);
      }
      process.exitCode = 1;
    }
  );
}
