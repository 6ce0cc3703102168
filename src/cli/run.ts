import { parseArgs } from "node:util";
import { GameState, getLevelById, hasLevel, parseGrid } from "@/game";
import { createRandom } from "@/lib/DeterministicRng";
import { PuzzleError, isPuzzleError } from "@/lib/errors";
import { consoleLogger, type Logger } from "@/lib/logger";
import { puzzleConfig } from "@/lib/puzzleConfig";
import { formatGrid, formatStep } from "./format";

export type CliOptions = {
  strategy: string;
  moves: number;
  depthLimit: number;
  seed?: number;
  start?: string;
  level?: string;
  help: boolean;
};

export const USAGE = [
  "Usage: solve [options]",
  "  --strategy <BFS|DFS|UCS>  search strategy",
  "  --moves <n>               random slides applied to the goal",
  "  --seed <n>                seed for a reproducible shuffle",
  "  --start <tiles>           start grid, e.g. 1,2,3,4,5,6,7,0,8",
  "  --level <id>              start from a preset level",
  "  --depth-limit <n>         depth limit for DFS",
  "  --help                    show this message",
].join("\n");

export const MAX_COUNT = 1_000_000;

const readCount = (name: string, value: string | undefined, fallback: number) => {
  if (value === undefined) return fallback;
  if (!/^\d+$/.test(value)) {
    throw new PuzzleError(
      "INVALID_ARGUMENT",
      `--${name} must be a non-negative integer, got "${value}"`
    );
  }
  const count = Number(value);
  if (count > MAX_COUNT) {
    throw new PuzzleError(
      "INVALID_ARGUMENT",
      `--${name} must be at most ${MAX_COUNT}, got "${value}"`
    );
  }
  return count;
};

const isParseArgsError = (error: unknown): error is Error & { code: string } =>
  error instanceof Error &&
  "code" in error &&
  typeof error.code === "string" &&
  error.code.startsWith("ERR_PARSE_ARGS");

const readArgs = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv,
      options: {
        strategy: { type: "string", short: "s" },
        moves: { type: "string", short: "m" },
        seed: { type: "string" },
        start: { type: "string" },
        level: { type: "string" },
        "depth-limit": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (error) {
    if (isParseArgsError(error)) {
      throw new PuzzleError("INVALID_ARGUMENT", error.message);
    }
    throw error;
  }
};

export const parseCliArgs = (argv: string[]): CliOptions => {
  const values = readArgs(argv);
  return {
    strategy: (values.strategy ?? puzzleConfig.defaultStrategy).toUpperCase(),
    moves: readCount("moves", values.moves, puzzleConfig.shuffleMoves),
    depthLimit: readCount("depth-limit", values["depth-limit"], puzzleConfig.depthLimit),
    seed: values.seed === undefined ? undefined : readCount("seed", values.seed, 0),
    start: values.start,
    level: values.level,
    help: values.help ?? false,
  };
};

const loadStart = (session: GameState, options: CliOptions) => {
  if (options.start !== undefined) {
    session.setGrid(parseGrid(options.start));
    return;
  }
  if (options.level !== undefined) {
    if (!hasLevel(options.level)) {
      throw new PuzzleError("INVALID_ARGUMENT", `Unknown level: ${options.level}`);
    }
    session.startLevel(getLevelById(options.level));
    return;
  }
  session.shuffle(options.moves, createRandom(options.seed));
};

const solveAndPrint = (session: GameState, strategy: string, logger: Logger) => {
  logger.info(`Start:\n${formatGrid(session.getState().grid)}\n`);

  const outcome = session.solve(strategy);
  const message = session.getState().message ?? outcome.status;
  if (outcome.status !== "solved") {
    logger.error(message);
    return 1;
  }

  do {
    logger.info(formatStep(session.currentGrid(), session.getState().step));
  } while (session.advance());

  logger.info(`${message} (${outcome.explored} states explored)`);
  return 0;
};

export const run = (argv: string[], logger: Logger = consoleLogger): number => {
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      logger.info(USAGE);
      return 0;
    }
    const session = new GameState({ ...puzzleConfig, depthLimit: options.depthLimit });
    loadStart(session, options);
    return solveAndPrint(session, options.strategy, logger);
  } catch (error) {
    if (isPuzzleError(error) && error.code !== "INTERNAL_INCONSISTENCY") {
      logger.error(error.message);
      logger.error(USAGE);
      return 2;
    }
    throw error;
  }
};
