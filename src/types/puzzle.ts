export type Row = ReadonlyArray<number>;

/** 3x3 arrangement of the values 0-8, 0 being the blank. */
export type Grid = ReadonlyArray<Row>;

/** Structural key of a grid: its nine values in row-major order. */
export type GridKey = string;

export type Position = {
  row: number;
  col: number;
};

export type Direction = "up" | "down" | "left" | "right";

/** Grids from start to goal, both inclusive. */
export type Path = Grid[];

export type PredecessorMap = Map<GridKey, Grid | null>;

export type Strategy = "BFS" | "DFS" | "UCS";

export type SearchResult =
  | { found: true; path: Path; explored: number }
  | { found: false; explored: number };

export type SolveOptions = {
  depthLimit?: number;
};

export type SolveOutcome =
  | {
      status: "solved";
      strategy: Strategy;
      path: Path;
      moves: number;
      explored: number;
    }
  | { status: "not-found"; strategy: Strategy; explored: number }
  | { status: "unsolvable" }
  | { status: "unknown-strategy"; strategy: string }
  | { status: "invalid-grid"; reason: string };

export type LevelData = {
  id: string;
  name: string;
  tiles: number[];
};

export type PuzzleConfig = {
  shuffleMoves: number;
  depthLimit: number;
  defaultStrategy: Strategy;
};
