import type { Direction, Grid, Position } from "@/types/puzzle";
import {
  BLANK,
  blankPosition,
  cloneGrid,
  isAdjacent,
  isInBounds,
} from "./GridSystem";

// Emission order matters: depth-limited search walks neighbors in this order.
export const DIRECTIONS: ReadonlyArray<Direction> = ["up", "down", "left", "right"];

const OFFSETS: Record<Direction, { dRow: number; dCol: number }> = {
  up: { dRow: -1, dCol: 0 },
  down: { dRow: 1, dCol: 0 },
  left: { dRow: 0, dCol: -1 },
  right: { dRow: 0, dCol: 1 },
};

const swapWithBlank = (grid: Grid, blank: Position, row: number, col: number): Grid => {
  const next = cloneGrid(grid);
  next[blank.row][blank.col] = grid[row][col];
  next[row][col] = BLANK;
  return next;
};

/** Moves the blank one cell in `direction`; null when that leaves the board. */
export const slide = (
  grid: Grid,
  direction: Direction,
  blank: Position = blankPosition(grid)
): Grid | null => {
  const target = {
    row: blank.row + OFFSETS[direction].dRow,
    col: blank.col + OFFSETS[direction].dCol,
  };
  if (!isInBounds(target)) return null;
  return swapWithBlank(grid, blank, target.row, target.col);
};

export const neighbors = (grid: Grid): Grid[] => {
  const blank = blankPosition(grid);
  const result: Grid[] = [];
  for (const direction of DIRECTIONS) {
    const next = slide(grid, direction, blank);
    if (next) result.push(next);
  }
  return result;
};

export const tryMove = (grid: Grid, row: number, col: number) => {
  const empty = blankPosition(grid);
  if (!isInBounds({ row, col }) || !isAdjacent(empty, { row, col })) {
    return { moved: false, grid };
  }

  return { moved: true, grid: swapWithBlank(grid, empty, row, col) };
};
