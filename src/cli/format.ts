import type { Grid, Path } from "@/types/puzzle";

export const formatGrid = (grid: Grid) =>
  grid.map((row) => `[${row.join(", ")}]`).join("\n");

export const formatStep = (grid: Grid, index: number) =>
  `Step ${index + 1}:\n${formatGrid(grid)}\n`;

export const formatPath = (path: Path) =>
  path.map((grid, index) => formatStep(grid, index)).join("\n");
