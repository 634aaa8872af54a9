import { describe, expect, it } from "vitest";
import { DEFAULT_CAMERA, computeFootprint, fieldOfView, footprintDiagonal } from "@/domain/camera";
import { createCameraSpec } from "@/domain/inputs";
import { InvalidGeometryError } from "@/domain/errors";
import type { CameraSpec } from "@/domain/types";

describe("computeFootprint", () => {
  it("splits a 90° diagonal over a 4:3 frame", () => {
    const fp = computeFootprint(createCameraSpec(90, [4, 3]), 50);
    expect(fp.groundWidth).toBeCloseTo(80, 9);
    expect(fp.groundHeight).toBeCloseTo(60, 9);
  });

  it("matches the default sensor at 400 ft", () => {
    const fp = computeFootprint(DEFAULT_CAMERA, 400 * 0.3048);
    expect(fp.groundWidth).toBeCloseTo(160.2339, 3);
    expect(fp.groundHeight).toBeCloseTo(120.1755, 3);
  });

  it("keeps the aspect ratio and the diagonal angle", () => {
    const camera = createCameraSpec(78.8, [16, 9]);
    const fp = computeFootprint(camera, 120);
    expect(fp.groundWidth / fp.groundHeight).toBeCloseTo(16 / 9, 12);
    expect(footprintDiagonal(fp)).toBeCloseTo(2 * 120 * Math.tan((78.8 * Math.PI) / 360), 9);
  });

  it("scales linearly with altitude", () => {
    for (const camera of [DEFAULT_CAMERA, createCameraSpec(30, [1, 1]), createCameraSpec(150, [3, 2])]) {
      const a = computeFootprint(camera, 37.5);
      const b = computeFootprint(camera, 75);
      expect(b.groundWidth).toBeCloseTo(2 * a.groundWidth, 9);
      expect(b.groundHeight).toBeCloseTo(2 * a.groundHeight, 9);
      expect(Number.isFinite(a.groundWidth) && a.groundWidth > 0).toBe(true);
      expect(Number.isFinite(a.groundHeight) && a.groundHeight > 0).toBe(true);
    }
  });

  it.each([
    [{ diagonalFovDegrees: 0, aspectRatio: [4, 3] }, 100],
    [{ diagonalFovDegrees: 180, aspectRatio: [4, 3] }, 100],
    [{ diagonalFovDegrees: Number.NaN, aspectRatio: [4, 3] }, 100],
    [{ diagonalFovDegrees: 78.8, aspectRatio: [0, 3] }, 100],
    [{ diagonalFovDegrees: 78.8, aspectRatio: [4, -3] }, 100],
    [{ diagonalFovDegrees: 78.8, aspectRatio: [4, 3] }, 0],
    [{ diagonalFovDegrees: 78.8, aspectRatio: [4, 3] }, -10],
  ] satisfies Array<[CameraSpec, number]>)("rejects %o at %d m", (camera, altitude) => {
    expect(() => computeFootprint(camera, altitude)).toThrow(InvalidGeometryError);
  });
});

describe("fieldOfView", () => {
  it("derives horizontal and vertical angles from the diagonal", () => {
    const fov = fieldOfView(createCameraSpec(90, [4, 3]));
    expect(fov.horizontalDegrees).toBeCloseTo(77.3196, 3);
    expect(fov.verticalDegrees).toBeCloseTo(61.9275, 3);
  });

  it("gives equal angles for a square frame", () => {
    const fov = fieldOfView(createCameraSpec(60, [1, 1]));
    expect(fov.horizontalDegrees).toBeCloseTo(fov.verticalDegrees, 12);
    expect(fov.horizontalDegrees).toBeLessThan(60);
  });
});
