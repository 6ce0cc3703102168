import type { Grid } from "@/types/puzzle";
import { GOAL_GRID, equals } from "./GridSystem";

export const isSolved = (grid: Grid, target: Grid = GOAL_GRID) =>
  equals(grid, target);
