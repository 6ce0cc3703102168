import type {
  Grid,
  SearchResult,
  SolveOptions,
  SolveOutcome,
  Strategy,
} from "@/types/puzzle";
import { describeInvalidGrid, equals } from "../systems/GridSystem";
import { isSolvable } from "../systems/SolvabilitySystem";
import { breadthFirstSearch } from "./BreadthFirstSearch";
import { DEFAULT_DEPTH_LIMIT, depthLimitedSearch } from "./DepthLimitedSearch";
import { isStrategy } from "./strategies";
import { uniformCostSearch } from "./UniformCostSearch";

const runStrategy = (
  strategy: Strategy,
  start: Grid,
  goal: Grid,
  options: SolveOptions
): SearchResult => {
  switch (strategy) {
    case "BFS":
      return breadthFirstSearch(start, goal);
    case "DFS":
      return depthLimitedSearch(start, goal, options.depthLimit ?? DEFAULT_DEPTH_LIMIT);
    case "UCS":
      return uniformCostSearch(start, goal);
  }
};

export const solve = (
  start: Grid,
  goal: Grid,
  strategy: string,
  options: SolveOptions = {}
): SolveOutcome => {
  const startProblem = describeInvalidGrid(start);
  if (startProblem) {
    return { status: "invalid-grid", reason: `start: ${startProblem}` };
  }
  const goalProblem = describeInvalidGrid(goal);
  if (goalProblem) {
    return { status: "invalid-grid", reason: `goal: ${goalProblem}` };
  }

  if (!isStrategy(strategy)) {
    return { status: "unknown-strategy", strategy };
  }

  if (!equals(start, goal) && !isSolvable(start)) {
    return { status: "unsolvable" };
  }

  const result = runStrategy(strategy, start, goal, options);
  if (!result.found) {
    return { status: "not-found", strategy, explored: result.explored };
  }

  return {
    status: "solved",
    strategy,
    path: result.path,
    moves: result.path.length - 1,
    explored: result.explored,
  };
};
