import { describe, it, expect } from "vitest";
import {
  cellName,
  chooseStableIdentities,
  detectionsWithinMargin,
  filledGridCells,
  firstEmptyGridCell,
  gridIndex3x3,
  hasBothSides,
  heightBin,
  lateralBin,
  meanCenter,
  normalize,
  polygonArea,
  spreadXNorm,
  withinEdgeMargin,
} from "./geometry.js";

describe("gridIndex3x3", () => {
  it("maps corners and center to their cells", () => {
    expect(gridIndex3x3(0, 0)).toBe(0);
    expect(gridIndex3x3(0.5, 0.5)).toBe(4);
    expect(gridIndex3x3(0.99, 0.99)).toBe(8);
    expect(gridIndex3x3(1, 1)).toBe(8);
    expect(gridIndex3x3(0.9, 0.1)).toBe(2);
    expect(gridIndex3x3(0.1, 0.9)).toBe(6);
  });

  it("puts boundary values in the upper cell", () => {
    expect(gridIndex3x3(0.333333, 0)).toBe(1);
    expect(gridIndex3x3(0.666666, 0)).toBe(2);
    expect(gridIndex3x3(0, 0.333333)).toBe(3);
    expect(gridIndex3x3(0, 0.666666)).toBe(6);
    expect(gridIndex3x3(0.3333, 0)).toBe(0);
  });
});

describe("lateralBin / heightBin", () => {
  it("splits x into thirds with strict edges", () => {
    expect(lateralBin(0.1)).toBe("LEFT");
    expect(lateralBin(0.33)).toBe("CENTER");
    expect(lateralBin(0.66)).toBe("CENTER");
    expect(lateralBin(0.67)).toBe("RIGHT");
  });

  it("treats the top of the frame as LOW and the bottom as HIGH", () => {
    expect(heightBin(0.1)).toBe("LOW");
    expect(heightBin(0.5)).toBe("MID");
    expect(heightBin(0.9)).toBe("HIGH");
  });
});

describe("normalize", () => {
  it("clamps to [0,1] and returns 0 for a non-positive extent", () => {
    expect(normalize(50, 100)).toBe(0.5);
    expect(normalize(150, 100)).toBe(1);
    expect(normalize(-5, 100)).toBe(0);
    expect(normalize(5, 0)).toBe(0);
  });
});

describe("grid helpers", () => {
  it("counts filled cells and finds the first empty one", () => {
    const counts = [1, 0, 3, 0, 0, 0, 0, 0, 2];
    expect(filledGridCells(counts)).toBe(3);
    expect(firstEmptyGridCell(counts)).toBe(1);
    expect(firstEmptyGridCell([1, 1, 1, 1, 1, 1, 1, 1, 1])).toBeNull();
  });

  it("names cells by row and column", () => {
    expect(cellName(0)).toBe("top-left");
    expect(cellName(4)).toBe("mid-center");
    expect(cellName(5)).toBe("mid-right");
    expect(cellName(8)).toBe("bottom-right");
  });
});

describe("centers and spread", () => {
  const centers = [
    { centerX: 100, centerY: 200 },
    { centerX: 900, centerY: 400 },
  ];

  it("averages centers", () => {
    expect(meanCenter(centers)).toEqual({ x: 500, y: 300 });
    expect(meanCenter([])).toBeNull();
  });

  it("measures horizontal spread as a fraction of width", () => {
    expect(spreadXNorm(centers, 1000)).toBeCloseTo(0.8, 10);
    expect(spreadXNorm([], 1000)).toBe(0);
  });

  it("requires one center in each outer third for both sides", () => {
    expect(hasBothSides(centers, 1000)).toBe(true);
    expect(hasBothSides([{ centerX: 100 }, { centerX: 500 }], 1000)).toBe(false);
  });
});

describe("chooseStableIdentities", () => {
  it("orders by descending count, then ascending identity", () => {
    const tally = new Map([
      [7, 3],
      [2, 5],
      [9, 3],
      [4, 1],
    ]);
    expect(chooseStableIdentities(tally, 3)).toEqual([2, 7, 9]);
    expect(chooseStableIdentities(tally, 10)).toEqual([2, 7, 9, 4]);
    expect(chooseStableIdentities(tally, 0)).toEqual([]);
  });
});

describe("polygonArea", () => {
  it("computes the absolute shoelace area", () => {
    const square = [
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 0, y: 10 },
    ];
    expect(polygonArea(square)).toBe(100);
    expect(polygonArea([...square].reverse())).toBe(100);
    expect(polygonArea(square.slice(0, 2))).toBe(0);
  });
});

describe("edge margin", () => {
  it("accepts points on the margin boundary", () => {
    expect(withinEdgeMargin([{ x: 10, y: 10 }], 100, 100, 0.1)).toBe(true);
    expect(withinEdgeMargin([{ x: 90, y: 90 }], 100, 100, 0.1)).toBe(true);
    expect(withinEdgeMargin([{ x: 9.9, y: 50 }], 100, 100, 0.1)).toBe(false);
  });

  it("checks corners when present and centers otherwise", () => {
    const inside = { centerX: 50, centerY: 50 };
    const cornerOut = {
      centerX: 50,
      centerY: 50,
      corners: [
        { x: 5, y: 40 },
        { x: 60, y: 40 },
        { x: 60, y: 60 },
        { x: 40, y: 60 },
      ],
    };
    expect(detectionsWithinMargin([inside], 100, 100, 0.1)).toBe(true);
    expect(detectionsWithinMargin([cornerOut], 100, 100, 0.1)).toBe(false);
    expect(detectionsWithinMargin([], 100, 100, 0.1)).toBe(true);
  });
});
