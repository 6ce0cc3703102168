import { expect } from "vitest";
import { equals } from "@/game/systems/GridSystem";
import { neighbors } from "@/game/systems/MoveSystem";
import type { Grid, Path } from "@/types/puzzle";

export const isOneSlideApart = (from: Grid, to: Grid) =>
  neighbors(from).some((next) => equals(next, to));

export const expectValidPath = (path: Path, start: Grid, goal: Grid) => {
  expect(path.length).toBeGreaterThan(0);
  expect(path[0]).toEqual(start);
  expect(path[path.length - 1]).toEqual(goal);
  for (let index = 1; index < path.length; index += 1) {
    expect(isOneSlideApart(path[index - 1], path[index])).toBe(true);
  }
};
