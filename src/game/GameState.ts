import { PuzzleError } from "@/lib/errors";
import type { RandomSource } from "@/lib/DeterministicRng";
import { puzzleConfig } from "@/lib/puzzleConfig";
import type {
  Grid,
  LevelData,
  Path,
  PuzzleConfig,
  SolveOutcome,
  Strategy,
} from "@/types/puzzle";
import { solve as solvePuzzle } from "./search/solver";
import { STRATEGY_LABELS } from "./search/strategies";
import {
  GOAL_GRID,
  describeInvalidGrid,
  gridToTiles,
  tilesToGrid,
} from "./systems/GridSystem";
import { tryMove } from "./systems/MoveSystem";
import { shuffle } from "./systems/ShuffleSystem";
import { isSolved } from "./systems/WinCheckSystem";

export type GameStatus =
  | "idle"
  | "ready"
  | "won"
  | "solved"
  | "unsolvable"
  | "not-found"
  | "unknown-strategy";

export type GameStateData = {
  levelId: string | null;
  levelName: string | null;
  grid: Grid;
  moves: number;
  status: GameStatus;
  strategy: Strategy | null;
  path: Path;
  step: number;
  explored: number;
  message: string | null;
};

type Listener = (state: GameStateData) => void;

export const MESSAGES = {
  unsolvable: "Puzzle is not solvable!",
  notFound: "No solution found",
  unknownStrategy: "Unknown method",
  won: "Puzzle solved!",
} as const;

const initialState = (): GameStateData => ({
  levelId: null,
  levelName: null,
  grid: GOAL_GRID,
  moves: 0,
  status: "idle",
  strategy: null,
  path: [],
  step: 0,
  explored: 0,
  message: null,
});

/** Board session: one instance per presentation layer. */
export class GameState {
  private state: GameStateData = initialState();
  private listeners = new Set<Listener>();

  constructor(private readonly config: PuzzleConfig = puzzleConfig) {}

  subscribe(listener: Listener) {
    this.listeners.add(listener);
    listener(this.state);
    return () => this.listeners.delete(listener);
  }

  getState() {
    return this.state;
  }

  startLevel(level: LevelData) {
    this.loadGrid(tilesToGrid(level.tiles), {
      levelId: level.id,
      levelName: level.name,
    });
  }

  setGrid(grid: Grid) {
    this.loadGrid(grid, { levelId: null, levelName: null });
  }

  shuffle(moves = this.config.shuffleMoves, random: RandomSource = Math.random) {
    this.loadGrid(shuffle(GOAL_GRID, moves, random), {
      levelId: null,
      levelName: null,
    });
  }

  reset() {
    this.setState(initialState());
  }

  move(row: number, col: number) {
    const { moved, grid } = tryMove(this.state.grid, row, col);
    if (!moved) return false;

    const won = isSolved(grid);
    this.setState({
      ...clearedSolution(),
      grid,
      moves: this.state.moves + 1,
      status: won ? "won" : "ready",
      message: won ? MESSAGES.won : null,
    });
    return true;
  }

  solve(strategy: string = this.config.defaultStrategy): SolveOutcome {
    const outcome = solvePuzzle(this.state.grid, GOAL_GRID, strategy, {
      depthLimit: this.config.depthLimit,
    });

    switch (outcome.status) {
      case "solved":
        this.setState({
          status: "solved",
          strategy: outcome.strategy,
          path: outcome.path,
          step: 0,
          explored: outcome.explored,
          message: solvedMessage(outcome.strategy, outcome.moves),
        });
        break;
      case "not-found":
        this.setState({
          ...clearedSolution(),
          status: "not-found",
          strategy: outcome.strategy,
          explored: outcome.explored,
          message: MESSAGES.notFound,
        });
        break;
      case "unsolvable":
        this.setState({
          ...clearedSolution(),
          status: "unsolvable",
          message: MESSAGES.unsolvable,
        });
        break;
      case "unknown-strategy":
        this.setState({
          ...clearedSolution(),
          status: "unknown-strategy",
          message: MESSAGES.unknownStrategy,
        });
        break;
      case "invalid-grid":
        throw new PuzzleError(
          "INTERNAL_INCONSISTENCY",
          `Session holds an invalid grid: ${outcome.reason}`
        );
    }

    return outcome;
  }

  advance() {
    const { status, path, step } = this.state;
    if (status !== "solved" || step >= path.length - 1) return false;
    this.setState({ step: step + 1 });
    return true;
  }

  currentGrid(): Grid {
    const { status, path, step, grid } = this.state;
    return status === "solved" ? path[step] : grid;
  }

  isFinalStep() {
    const { status, path, step } = this.state;
    return status === "solved" && step === path.length - 1;
  }

  private loadGrid(
    grid: Grid,
    level: Pick<GameStateData, "levelId" | "levelName">
  ) {
    const problem = describeInvalidGrid(grid);
    if (problem) {
      throw new PuzzleError("INVALID_GRID", `Cannot load grid: ${problem}`);
    }
    this.setState({
      ...clearedSolution(),
      ...level,
      grid: tilesToGrid(gridToTiles(grid)),
      moves: 0,
      status: "ready",
      message: null,
    });
  }

  private setState(partial: Partial<GameStateData>) {
    this.state = { ...this.state, ...partial };
    this.listeners.forEach((listener) => listener(this.state));
  }
}

const solvedMessage = (strategy: Strategy, moves: number) =>
  `Solved with ${STRATEGY_LABELS[strategy]} search in ${moves} ${moves === 1 ? "move" : "moves"}`;

const clearedSolution = (): Pick<
  GameStateData,
  "strategy" | "path" | "step" | "explored"
> => ({
  strategy: null,
  path: [],
  step: 0,
  explored: 0,
});
