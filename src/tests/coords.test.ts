import { describe, expect, it } from "vitest";
import { parseInlineCoordinates, parsePointList, toMeters } from "@/io/coords";
import { InputFormatError, InvalidGeometryError } from "@/domain/errors";

describe("toMeters", () => {
  it("converts feet and passes meters through", () => {
    expect(toMeters(400, "ft")).toBeCloseTo(121.92, 10);
    expect(toMeters(120, "m")).toBe(120);
  });
});

describe("parseInlineCoordinates", () => {
  it("reads a raster box with a feet altitude", () => {
    const input = parseInlineCoordinates("35.22_-90.07_35.06_-89.73_400");
    expect(input.kind).toBe("raster");
    if (input.kind !== "raster") return;
    expect(input.boundingBox).toEqual({ topLeft: { lat: 35.22, lon: -90.07 }, bottomRight: { lat: 35.06, lon: -89.73 } });
    expect(input.altitudeAGL).toBeCloseTo(121.92, 10);
  });

  it("reads a single point in meters", () => {
    expect(parseInlineCoordinates(" 35.16_-89.9_120 ", "m")).toEqual({
      kind: "point",
      center: { lat: 35.16, lon: -89.9 },
      altitudeAGL: 120,
    });
  });

  it("rejects the wrong number of values", () => {
    expect(() => parseInlineCoordinates("35.16_-89.9")).toThrow(InputFormatError);
    expect(() => parseInlineCoordinates("1_2_3_4")).toThrow(/got 4 values/);
  });

  it("rejects non-numeric values", () => {
    expect(() => parseInlineCoordinates("35.16_west_120")).toThrow('"west" in "35.16_west_120" is not a number');
    expect(() => parseInlineCoordinates("35.16__120")).toThrow(InputFormatError);
  });

  it("rejects an inverted raster box", () => {
    expect(() => parseInlineCoordinates("35.06_-90.07_35.22_-89.73_400")).toThrow(InvalidGeometryError);
  });
});

describe("parsePointList", () => {
  it("skips comments and blank lines", () => {
    const text = ["# lat lon alt", "", "35.16 -89.90 100", "  35.17\t-89.91   200  # second", ""].join("\n");
    const records = parsePointList(text, "m");
    expect(records).toEqual([
      { center: { lat: 35.16, lon: -89.9 }, altitudeAGL: 100 },
      { center: { lat: 35.17, lon: -89.91 }, altitudeAGL: 200 },
    ]);
  });

  it("converts feet by default", () => {
    expect(parsePointList("1 2 10\r\n")[0].altitudeAGL).toBeCloseTo(3.048, 10);
  });

  it("names the offending line", () => {
    expect(() => parsePointList("1 2 3\n4 5\n")).toThrow('line 2: expected "lat lon altitude", got "4 5"');
  });

  it("rejects a file with no records", () => {
    expect(() => parsePointList("# nothing here\n\n")).toThrow("coordinate file contains no records");
  });
});
