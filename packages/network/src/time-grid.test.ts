import { describe, expect, it } from "vitest";
import { buildTimeGrid } from "./time-grid.js";

describe("buildTimeGrid", () => {
  it("samples the default rush windows every 30 minutes", () => {
    const grid = buildTimeGrid();

    expect(grid.arrivalPoints).toEqual([0, 450, 480, 510, 540, 570, 960, 990, 1020, 1050, 1080, 1110]);
    expect(grid.widthPoints).toEqual([0]);
  });

  it("is strictly increasing and starts at midnight", () => {
    const { arrivalPoints } = buildTimeGrid();

    expect(arrivalPoints[0]).toBe(0);
    for (let i = 1; i < arrivalPoints.length; i += 1) {
      expect(arrivalPoints[i]).toBeGreaterThan(arrivalPoints[i - 1]);
    }
  });

  it("stops at the last step that fits inside a window", () => {
    const { arrivalPoints } = buildTimeGrid([{ start: 100, end: 150 }]);
    expect(arrivalPoints).toEqual([0, 100, 130]);
  });

  it("does not repeat midnight for a window opening at 0", () => {
    const { arrivalPoints } = buildTimeGrid([{ start: 0, end: 60 }]);
    expect(arrivalPoints).toEqual([0, 30, 60]);
  });

  it("honours a custom step", () => {
    const { arrivalPoints } = buildTimeGrid([{ start: 60, end: 120 }], 20);
    expect(arrivalPoints).toEqual([0, 60, 80, 100, 120]);
  });

  it("rejects overlapping or unordered windows", () => {
    expect(() =>
      buildTimeGrid([
        { start: 400, end: 500 },
        { start: 480, end: 600 },
      ])
    ).toThrow("Rush windows must be ordered and disjoint");
    expect(() =>
      buildTimeGrid([
        { start: 900, end: 1000 },
        { start: 400, end: 500 },
      ])
    ).toThrow(RangeError);
  });

  it("rejects windows outside the day", () => {
    expect(() => buildTimeGrid([{ start: 1400, end: 1500 }])).toThrow(RangeError);
  });
});
