import type { Grid, GridKey, PredecessorMap, SearchResult } from "@/types/puzzle";
import { equals, hash } from "../systems/GridSystem";
import { neighbors } from "../systems/MoveSystem";
import { reconstructPath } from "./PathReconstructor";

export const breadthFirstSearch = (start: Grid, goal: Grid): SearchResult => {
  const frontier: Grid[] = [start];
  const visited = new Set<GridKey>([hash(start)]);
  const predecessors: PredecessorMap = new Map();
  predecessors.set(hash(start), null);
  let head = 0;

  while (head < frontier.length) {
    const current = frontier[head];
    head += 1;

    if (equals(current, goal)) {
      return {
        found: true,
        path: reconstructPath(predecessors, current),
        explored: head,
      };
    }

    for (const neighbor of neighbors(current)) {
      const key = hash(neighbor);
      if (visited.has(key)) continue;
      visited.add(key);
      predecessors.set(key, current);
      frontier.push(neighbor);
    }
  }

  return { found: false, explored: head };
};
