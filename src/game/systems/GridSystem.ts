import { PuzzleError } from "@/lib/errors";
import type { Grid, GridKey, Position } from "@/types/puzzle";

export const GRID_SIZE = 3;
export const BLANK = 0;

const TILE_COUNT = GRID_SIZE * GRID_SIZE;

const freezeGrid = (rows: number[][]): Grid =>
  Object.freeze(rows.map((row) => Object.freeze(row)));

export const GOAL_GRID: Grid = freezeGrid([
  [1, 2, 3],
  [4, 5, 6],
  [7, 8, 0],
]);

export const goal = () => GOAL_GRID;

export const cloneGrid = (grid: Grid) => grid.map((row) => [...row]);

export const tilesToGrid = (tiles: ReadonlyArray<number>): Grid => {
  const rows: number[][] = [];
  for (let row = 0; row < GRID_SIZE; row += 1) {
    const start = row * GRID_SIZE;
    rows.push(tiles.slice(start, start + GRID_SIZE));
  }
  return freezeGrid(rows);
};

export const gridToTiles = (grid: Grid) => grid.flat();

export const hash = (grid: Grid): GridKey => gridToTiles(grid).join("");

export const equals = (a: Grid, b: Grid) => {
  for (let row = 0; row < GRID_SIZE; row += 1) {
    for (let col = 0; col < GRID_SIZE; col += 1) {
      if (a[row][col] !== b[row][col]) return false;
    }
  }
  return true;
};

export const blankPosition = (grid: Grid): Position => {
  for (let row = 0; row < grid.length; row += 1) {
    for (let col = 0; col < grid[row].length; col += 1) {
      if (grid[row][col] === BLANK) {
        return { row, col };
      }
    }
  }
  throw new PuzzleError("INVALID_GRID", "Grid has no blank tile");
};

export const isInBounds = ({ row, col }: Position) =>
  row >= 0 && row < GRID_SIZE && col >= 0 && col < GRID_SIZE;

export const isAdjacent = (a: Position, b: Position) => {
  const dRow = Math.abs(a.row - b.row);
  const dCol = Math.abs(a.col - b.col);
  return (dRow === 1 && dCol === 0) || (dRow === 0 && dCol === 1);
};

export const describeInvalidGrid = (value: unknown): string | null => {
  if (!Array.isArray(value) || value.length !== GRID_SIZE) {
    return `expected ${GRID_SIZE} rows`;
  }
  const seen = new Set<number>();
  for (const row of value) {
    if (!Array.isArray(row) || row.length !== GRID_SIZE) {
      return `expected ${GRID_SIZE} columns in every row`;
    }
    for (const cell of row) {
      if (typeof cell !== "number" || !Number.isInteger(cell)) {
        return `tile ${String(cell)} is not an integer`;
      }
      if (cell < 0 || cell >= TILE_COUNT) {
        return `tile ${cell} is outside 0-${TILE_COUNT - 1}`;
      }
      if (seen.has(cell)) {
        return `tile ${cell} appears more than once`;
      }
      seen.add(cell);
    }
  }
  return null;
};

export const isValidGrid = (value: unknown): value is Grid =>
  describeInvalidGrid(value) === null;

/**
 * Reads "1,2,3,4,5,6,7,8,0", "1 2 3 / 4 5 6 / 7 8 0" or "123456780".
 */
export const parseGrid = (text: string): Grid => {
  const trimmed = text.trim();
  const parts = /^\d{9}$/.test(trimmed)
    ? trimmed.split("")
    : trimmed.split(/[\s,;/|]+/).filter((part) => part.length > 0);

  if (parts.length !== TILE_COUNT || parts.some((part) => !/^\d+$/.test(part))) {
    throw new PuzzleError(
      "INVALID_GRID",
      `Expected ${TILE_COUNT} tile values, got "${text}"`
    );
  }

  const grid = tilesToGrid(parts.map(Number));
  const problem = describeInvalidGrid(grid);
  if (problem) {
    throw new PuzzleError("INVALID_GRID", `Invalid grid "${text}": ${problem}`);
  }
  return grid;
};
