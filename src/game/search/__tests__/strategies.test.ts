import { describe, expect, it } from "vitest";
import { createRandom } from "@/lib/DeterministicRng";
import { expectValidPath } from "@/test/paths";
import { GOAL_GRID, tilesToGrid } from "../../systems/GridSystem";
import { shuffle } from "../../systems/ShuffleSystem";
import { breadthFirstSearch } from "../BreadthFirstSearch";
import { DEFAULT_DEPTH_LIMIT, depthLimitedSearch } from "../DepthLimitedSearch";
import { uniformCostSearch } from "../UniformCostSearch";

const oneSlide = tilesToGrid([1, 2, 3, 4, 5, 6, 7, 0, 8]);
const sixSlides = tilesToGrid([4, 1, 3, 7, 2, 6, 0, 5, 8]);

describe("breadthFirstSearch", () => {
  it("solves a grid one slide from the goal", () => {
    expect(breadthFirstSearch(oneSlide, GOAL_GRID)).toEqual({
      found: true,
      path: [oneSlide, GOAL_GRID],
      explored: 4,
    });
  });

  it("returns the start alone when it is already the goal", () => {
    expect(breadthFirstSearch(GOAL_GRID, GOAL_GRID)).toEqual({
      found: true,
      path: [GOAL_GRID],
      explored: 1,
    });
  });

  it("finds the fewest slides", () => {
    const result = breadthFirstSearch(sixSlides, GOAL_GRID);
    if (!result.found) throw new Error("expected a path");
    expect(result.path).toHaveLength(7);
    expectValidPath(result.path, sixSlides, GOAL_GRID);
  });

  it("reports not found when the goal is in the other parity class", () => {
    const start = tilesToGrid([1, 2, 3, 4, 5, 6, 8, 7, 0]);
    const result = breadthFirstSearch(start, GOAL_GRID);
    expect(result).toEqual({ found: false, explored: 181440 });
  });
});

describe("uniformCostSearch", () => {
  it("solves a grid one slide from the goal", () => {
    expect(uniformCostSearch(oneSlide, GOAL_GRID)).toEqual({
      found: true,
      path: [oneSlide, GOAL_GRID],
      explored: 4,
    });
  });

  it("matches breadth-first path lengths on shuffled grids", () => {
    for (let seed = 1; seed <= 5; seed += 1) {
      const start = shuffle(GOAL_GRID, 20, createRandom(seed));
      const bfs = breadthFirstSearch(start, GOAL_GRID);
      const ucs = uniformCostSearch(start, GOAL_GRID);
      if (!bfs.found || !ucs.found) throw new Error("expected both to find a path");

      expect(ucs.path.length).toBe(bfs.path.length);
      expect(ucs.path.length - 1).toBeLessThanOrEqual(20);
      expectValidPath(ucs.path, start, GOAL_GRID);
      expectValidPath(bfs.path, start, GOAL_GRID);
    }
  });

  it("returns the same path on every run", () => {
    const first = uniformCostSearch(sixSlides, GOAL_GRID);
    const second = uniformCostSearch(sixSlides, GOAL_GRID);
    expect(second).toEqual(first);
  });
});

describe("depthLimitedSearch", () => {
  it("returns the start alone when it is already the goal", () => {
    expect(depthLimitedSearch(GOAL_GRID, GOAL_GRID)).toEqual({
      found: true,
      path: [GOAL_GRID],
      explored: 1,
    });
  });

  it("gives up on a non-goal start with a zero depth limit", () => {
    expect(depthLimitedSearch(oneSlide, GOAL_GRID, 0)).toEqual({
      found: false,
      explored: 1,
    });
  });

  it("reaches a goal within a depth limit of one", () => {
    expect(depthLimitedSearch(oneSlide, GOAL_GRID, 1)).toEqual({
      found: true,
      path: [oneSlide, GOAL_GRID],
      explored: 4,
    });
  });

  it("returns a valid path within the default limit", () => {
    const result = depthLimitedSearch(oneSlide, GOAL_GRID);
    if (!result.found) throw new Error("expected a path");
    expectValidPath(result.path, oneSlide, GOAL_GRID);
    expect(result.path.length - 1).toBeLessThanOrEqual(DEFAULT_DEPTH_LIMIT);
  });
});
