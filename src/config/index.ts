/**
 * Runtime configuration.
 *
 * Precedence, lowest first: built-in defaults, JSON config file, environment,
 * then whatever the CLI passes as overrides.
 */

import { readFile } from "node:fs/promises";
import type { AltitudeUnit, MapType } from "@/domain/types";
import { ConfigError } from "@/domain/errors";
import { DEFAULT_CAMERA } from "@/domain/camera";

export interface MissionConfig {
  aspectRatio: [number, number];
  diagonalFovDegrees: number;
  overlapFraction: number;
  altitudeUnit: AltitudeUnit;
  mapType: MapType;
  dataDirectory: string;
  apiKey: string;
  concurrency: number;
  maxAttempts: number;
  backoffMs: number;
  timeoutMs: number;
  maxZoom: number;
}

export const DEFAULT_CONFIG_FILE = "mission.config.json";

const defaults: MissionConfig = {
  aspectRatio: [DEFAULT_CAMERA.aspectRatio[0], DEFAULT_CAMERA.aspectRatio[1]],
  diagonalFovDegrees: DEFAULT_CAMERA.diagonalFovDegrees,
  overlapFraction: 0,
  altitudeUnit: "ft",
  mapType: "satellite",
  dataDirectory: "dataset",
  apiKey: "",
  concurrency: 4,
  maxAttempts: 5,
  backoffMs: 500,
  timeoutMs: 30_000,
  maxZoom: 22,
};

export const DEFAULT_CONFIG: Readonly<MissionConfig> = Object.freeze(defaults);

const MAP_TYPES: readonly MapType[] = ["satellite", "roadmap", "terrain"];
const ALTITUDE_UNITS: readonly AltitudeUnit[] = ["ft", "m"];

const isMapType = (v: unknown): v is MapType => MAP_TYPES.some((t) => t === v);
const isAltitudeUnit = (v: unknown): v is AltitudeUnit => ALTITUDE_UNITS.some((u) => u === v);

function expectNumber(key: string, v: unknown): number {
  if (typeof v !== "number" || !Number.isFinite(v)) throw new ConfigError(`"${key}" must be a finite number`);
  return v;
}

function expectPositiveInteger(key: string, v: unknown): number {
  const n = expectNumber(key, v);
  if (!Number.isInteger(n) || n < 1) throw new ConfigError(`"${key}" must be a positive integer`);
  return n;
}

function expectString(key: string, v: unknown): string {
  if (typeof v !== "string") throw new ConfigError(`"${key}" must be a string`);
  return v;
}

/**
 * Validate a partial config object (parsed JSON or CLI overrides).
 * Unknown keys are rejected so typos do not silently fall back to defaults.
 */
export function validateConfig(raw: unknown): Partial<MissionConfig> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError("config must be a JSON object");
  }
  const out: Partial<MissionConfig> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    switch (key) {
      case "aspectRatio": {
        if (!Array.isArray(value) || value.length !== 2) {
          throw new ConfigError(`"aspectRatio" must be a [width, height] pair`);
        }
        out.aspectRatio = [expectNumber("aspectRatio[0]", value[0]), expectNumber("aspectRatio[1]", value[1])];
        break;
      }
      case "diagonalFovDegrees":
      case "overlapFraction":
        out[key] = expectNumber(key, value);
        break;
      case "concurrency":
      case "maxAttempts":
        out[key] = expectPositiveInteger(key, value);
        break;
      case "backoffMs":
      case "timeoutMs":
      case "maxZoom": {
        const n = expectNumber(key, value);
        if (n < 0) throw new ConfigError(`"${key}" must not be negative`);
        out[key] = n;
        break;
      }
      case "dataDirectory":
      case "apiKey":
        out[key] = expectString(key, value);
        break;
      case "mapType":
        if (!isMapType(value)) throw new ConfigError(`"mapType" must be one of ${MAP_TYPES.join(", ")}`);
        out.mapType = value;
        break;
      case "altitudeUnit":
        if (!isAltitudeUnit(value)) throw new ConfigError(`"altitudeUnit" must be one of ${ALTITUDE_UNITS.join(", ")}`);
        out.altitudeUnit = value;
        break;
      default:
        throw new ConfigError(`unknown config key "${key}"`);
    }
  }
  return out;
}

export function configFromEnv(env: NodeJS.ProcessEnv): Partial<MissionConfig> {
  const out: Partial<MissionConfig> = {};
  if (env.STATIC_MAPS_API_KEY) out.apiKey = env.STATIC_MAPS_API_KEY;
  if (env.MISSION_DATA_DIR) out.dataDirectory = env.MISSION_DATA_DIR;
  return out;
}

async function readConfigFile(file: string, required: boolean): Promise<Partial<MissionConfig>> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (err) {
    const missing = err instanceof Error && "code" in err && err.code === "ENOENT";
    if (missing && !required) return {};
    throw new ConfigError(`cannot read config file ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`config file ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return validateConfig(parsed);
}

export interface LoadConfigOptions {
  file?: string; // explicit file must exist; the default file is optional
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<MissionConfig>;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<MissionConfig> {
  const fromFile = await readConfigFile(options.file ?? DEFAULT_CONFIG_FILE, options.file !== undefined);
  return {
    ...DEFAULT_CONFIG,
    aspectRatio: [DEFAULT_CONFIG.aspectRatio[0], DEFAULT_CONFIG.aspectRatio[1]],
    ...fromFile,
    ...configFromEnv(options.env ?? process.env),
    ...(options.overrides ?? {}),
  };
}
