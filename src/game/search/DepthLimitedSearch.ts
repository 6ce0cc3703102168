import type { Grid, GridKey, Path, SearchResult } from "@/types/puzzle";
import { equals, hash } from "../systems/GridSystem";
import { neighbors } from "../systems/MoveSystem";

export const DEFAULT_DEPTH_LIMIT = 50;

// Path taken so far, newest grid first. Siblings share their prefix.
type Trail = {
  grid: Grid;
  previous: Trail | null;
};

type StackEntry = {
  grid: Grid;
  trail: Trail | null;
  depth: number;
};

const trailToPath = (trail: Trail | null, last: Grid): Path => {
  const path: Grid[] = [last];
  for (let node = trail; node; node = node.previous) {
    path.push(node.grid);
  }
  return path.reverse();
};

// Visited on pop, not on push: a grid may be stacked more than once.
export const depthLimitedSearch = (
  start: Grid,
  goal: Grid,
  depthLimit = DEFAULT_DEPTH_LIMIT
): SearchResult => {
  const stack: StackEntry[] = [{ grid: start, trail: null, depth: 0 }];
  const visited = new Set<GridKey>();
  let explored = 0;

  let entry = stack.pop();
  while (entry) {
    const { grid, trail, depth } = entry;
    const key = hash(grid);

    if (depth <= depthLimit && !visited.has(key)) {
      visited.add(key);
      explored += 1;

      if (equals(grid, goal)) {
        return { found: true, path: trailToPath(trail, grid), explored };
      }

      const nextTrail: Trail = { grid, previous: trail };
      const next = neighbors(grid);
      for (let index = next.length - 1; index >= 0; index -= 1) {
        const neighbor = next[index];
        if (visited.has(hash(neighbor))) continue;
        stack.push({ grid: neighbor, trail: nextTrail, depth: depth + 1 });
      }
    }

    entry = stack.pop();
  }

  return { found: false, explored };
};
