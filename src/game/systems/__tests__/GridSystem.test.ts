import { describe, expect, it } from "vitest";
import { PuzzleError } from "@/lib/errors";
import {
  GOAL_GRID,
  blankPosition,
  describeInvalidGrid,
  equals,
  goal,
  hash,
  isValidGrid,
  parseGrid,
  tilesToGrid,
} from "../GridSystem";

describe("GridSystem", () => {
  it("exposes the fixed goal", () => {
    expect(goal()).toBe(GOAL_GRID);
    expect(GOAL_GRID).toEqual([
      [1, 2, 3],
      [4, 5, 6],
      [7, 8, 0],
    ]);
    expect(Object.isFrozen(GOAL_GRID)).toBe(true);
    expect(Object.isFrozen(GOAL_GRID[0])).toBe(true);
  });

  it("compares grids cell by cell", () => {
    const copy = tilesToGrid([1, 2, 3, 4, 5, 6, 7, 8, 0]);
    const other = tilesToGrid([1, 2, 3, 4, 5, 6, 7, 0, 8]);
    expect(equals(copy, GOAL_GRID)).toBe(true);
    expect(equals(other, GOAL_GRID)).toBe(false);
  });

  it("hashes equal grids to the same key", () => {
    const copy = tilesToGrid([1, 2, 3, 4, 5, 6, 7, 8, 0]);
    expect(hash(GOAL_GRID)).toBe("123456780");
    expect(new Set([hash(copy), hash(GOAL_GRID)]).size).toBe(1);
  });

  it("locates the blank", () => {
    expect(blankPosition(GOAL_GRID)).toEqual({ row: 2, col: 2 });
    expect(blankPosition(tilesToGrid([1, 0, 2, 3, 4, 5, 6, 7, 8]))).toEqual({
      row: 0,
      col: 1,
    });
  });

  it("throws when a grid has no blank", () => {
    const noBlank = tilesToGrid([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(() => blankPosition(noBlank)).toThrow(PuzzleError);
  });

  it("validates the shape and values of a grid", () => {
    expect(isValidGrid(GOAL_GRID)).toBe(true);
    expect(describeInvalidGrid([[1, 2, 3]])).toBe("expected 3 rows");
    expect(
      describeInvalidGrid([
        [1, 2],
        [3, 4],
        [5, 6],
      ])
    ).toBe("expected 3 columns in every row");
    expect(
      describeInvalidGrid([
        [1, 1, 3],
        [4, 5, 6],
        [7, 8, 0],
      ])
    ).toBe("tile 1 appears more than once");
    expect(
      describeInvalidGrid([
        [1, 2, 3],
        [4, 5, 6],
        [7, 8, 9],
      ])
    ).toBe("tile 9 is outside 0-8");
    expect(describeInvalidGrid("123456780")).toBe("expected 3 rows");
  });

  it("parses the accepted text forms", () => {
    const expected = tilesToGrid([1, 2, 3, 4, 5, 6, 7, 0, 8]);
    expect(parseGrid("1,2,3,4,5,6,7,0,8")).toEqual(expected);
    expect(parseGrid("1 2 3 / 4 5 6 / 7 0 8")).toEqual(expected);
    expect(parseGrid(" 123456708 ")).toEqual(expected);
  });

  it("rejects malformed text", () => {
    expect(() => parseGrid("1,2,3")).toThrow('Expected 9 tile values, got "1,2,3"');
    expect(() => parseGrid("1,1,3,4,5,6,7,8,0")).toThrow(
      'Invalid grid "1,1,3,4,5,6,7,8,0": tile 1 appears more than once'
    );
    try {
      parseGrid("a,b,c,d,e,f,g,h,i");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PuzzleError);
      expect(error).toMatchObject({ code: "INVALID_GRID" });
    }
  });
});
