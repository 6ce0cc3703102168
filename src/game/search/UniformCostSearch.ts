import type { Grid, GridKey, PredecessorMap, SearchResult } from "@/types/puzzle";
import { equals, hash } from "../systems/GridSystem";
import { neighbors } from "../systems/MoveSystem";
import { reconstructPath } from "./PathReconstructor";
import { PriorityQueue } from "./PriorityQueue";

const SLIDE_COST = 1;

type QueueEntry = {
  cost: number;
  // insertion counter, breaks cost ties first-in first-out
  order: number;
  grid: Grid;
};

const byCostThenOrder = (a: QueueEntry, b: QueueEntry) =>
  a.cost - b.cost || a.order - b.order;

// Superseded entries stay queued and are skipped when popped.
export const uniformCostSearch = (start: Grid, goal: Grid): SearchResult => {
  const queue = new PriorityQueue<QueueEntry>(byCostThenOrder);
  const bestCost = new Map<GridKey, number>([[hash(start), 0]]);
  const visited = new Set<GridKey>();
  const predecessors: PredecessorMap = new Map();
  predecessors.set(hash(start), null);
  let order = 0;
  let explored = 0;

  queue.push({ cost: 0, order, grid: start });

  let entry = queue.pop();
  while (entry) {
    const { cost, grid } = entry;
    const key = hash(grid);

    if (!visited.has(key)) {
      explored += 1;
      if (equals(grid, goal)) {
        return {
          found: true,
          path: reconstructPath(predecessors, grid),
          explored,
        };
      }
      visited.add(key);

      for (const neighbor of neighbors(grid)) {
        const neighborKey = hash(neighbor);
        const newCost = cost + SLIDE_COST;
        const known = bestCost.get(neighborKey);
        if (known !== undefined && newCost >= known) continue;

        bestCost.set(neighborKey, newCost);
        order += 1;
        queue.push({ cost: newCost, order, grid: neighbor });
        predecessors.set(neighborKey, grid);
      }
    }

    entry = queue.pop();
  }

  return { found: false, explored };
};
