import type { Strategy } from "@/types/puzzle";

export const STRATEGIES: ReadonlyArray<Strategy> = ["BFS", "DFS", "UCS"];

export const STRATEGY_LABELS: Record<Strategy, string> = {
  BFS: "breadth-first",
  DFS: "depth-limited depth-first",
  UCS: "uniform-cost",
};

export const isStrategy = (value: string): value is Strategy =>
  STRATEGIES.some((strategy) => strategy === value);
