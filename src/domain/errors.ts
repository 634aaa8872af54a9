/**
 * Error types raised while planning a mission.
 * Planning errors are precondition violations: they are thrown synchronously
 * and retrying with the same input cannot succeed.
 */

export type PlanningErrorKind = "invalid-geometry" | "invalid-overlap";

export class MissionPlanningError extends Error {
  readonly kind: PlanningErrorKind;

  constructor(kind: PlanningErrorKind, message: string) {
    super(message);
    this.name = "MissionPlanningError";
    this.kind = kind;
  }
}

export class InvalidGeometryError extends MissionPlanningError {
  constructor(message: string) {
    super("invalid-geometry", message);
    this.name = "InvalidGeometryError";
  }
}

export class InvalidOverlapError extends MissionPlanningError {
  constructor(message: string) {
    super("invalid-overlap", message);
    this.name = "InvalidOverlapError";
  }
}

/** Malformed coordinate strings or files. */
export class InputFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputFormatError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
