import type { Grid } from "@/types/puzzle";
import { BLANK, gridToTiles } from "./GridSystem";

export const countInversions = (grid: Grid) => {
  const tiles = gridToTiles(grid).filter((tile) => tile !== BLANK);
  let inversions = 0;
  for (let i = 0; i < tiles.length; i += 1) {
    for (let j = i + 1; j < tiles.length; j += 1) {
      if (tiles[i] > tiles[j]) inversions += 1;
    }
  }
  return inversions;
};

export const isSolvable = (grid: Grid) => countInversions(grid) % 2 === 0;
