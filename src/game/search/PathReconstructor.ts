import { PuzzleError } from "@/lib/errors";
import type { Grid, Path, PredecessorMap } from "@/types/puzzle";
import { hash } from "../systems/GridSystem";

export const reconstructPath = (
  predecessors: PredecessorMap,
  terminal: Grid
): Path => {
  const reversed: Grid[] = [];
  let current: Grid | null = terminal;

  while (current) {
    const key = hash(current);
    const previous = predecessors.get(key);
    if (previous === undefined) {
      throw new PuzzleError(
        "INTERNAL_INCONSISTENCY",
        `No predecessor entry for grid ${key}`
      );
    }
    reversed.push(current);
    if (reversed.length > predecessors.size) {
      throw new PuzzleError(
        "INTERNAL_INCONSISTENCY",
        `Predecessor chain from ${hash(terminal)} does not reach the start`
      );
    }
    current = previous;
  }

  return reversed.reverse();
};
