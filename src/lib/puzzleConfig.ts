import configJson from "@/data/puzzle-config.json";
import { isStrategy } from "@/game/search/strategies";
import { PuzzleError } from "@/lib/errors";
import type { PuzzleConfig } from "@/types/puzzle";

export type RawPuzzleConfig = {
  shuffleMoves: number;
  depthLimit: number;
  defaultStrategy: string;
};

const requireCount = (name: string, value: number) => {
  if (!Number.isInteger(value) || value < 0) {
    throw new PuzzleError(
      "INVALID_CONFIG",
      `${name} must be a non-negative integer, got ${value}`
    );
  }
  return value;
};

export const parsePuzzleConfig = (raw: RawPuzzleConfig): PuzzleConfig => {
  if (!isStrategy(raw.defaultStrategy)) {
    throw new PuzzleError(
      "INVALID_CONFIG",
      `Unknown default strategy: ${raw.defaultStrategy}`
    );
  }
  return {
    shuffleMoves: requireCount("shuffleMoves", raw.shuffleMoves),
    depthLimit: requireCount("depthLimit", raw.depthLimit),
    defaultStrategy: raw.defaultStrategy,
  };
};

export const puzzleConfig = parsePuzzleConfig(configJson);
