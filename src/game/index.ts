export { GameState, MESSAGES } from "./GameState";
export type { GameStateData, GameStatus } from "./GameState";
export { getLevelById, hasLevel, loadLevels } from "./levels/levelLoader";
export {
  BLANK,
  GOAL_GRID,
  GRID_SIZE,
  blankPosition,
  cloneGrid,
  describeInvalidGrid,
  equals,
  goal,
  gridToTiles,
  hash,
  isValidGrid,
  parseGrid,
  tilesToGrid,
} from "./systems/GridSystem";
export { DIRECTIONS, neighbors, slide, tryMove } from "./systems/MoveSystem";
export { countInversions, isSolvable } from "./systems/SolvabilitySystem";
export { DEFAULT_SHUFFLE_MOVES, shuffle } from "./systems/ShuffleSystem";
export { isSolved } from "./systems/WinCheckSystem";
export { breadthFirstSearch } from "./search/BreadthFirstSearch";
export { DEFAULT_DEPTH_LIMIT, depthLimitedSearch } from "./search/DepthLimitedSearch";
export { uniformCostSearch } from "./search/UniformCostSearch";
export { reconstructPath } from "./search/PathReconstructor";
export { PriorityQueue } from "./search/PriorityQueue";
export { STRATEGIES, STRATEGY_LABELS, isStrategy } from "./search/strategies";
export { solve } from "./search/solver";
