import type { RandomSource } from "@/lib/DeterministicRng";
import { PuzzleError } from "@/lib/errors";
import type { Grid } from "@/types/puzzle";
import { neighbors } from "./MoveSystem";

export const DEFAULT_SHUFFLE_MOVES = 30;

export const shuffle = (
  grid: Grid,
  moves = DEFAULT_SHUFFLE_MOVES,
  random: RandomSource = Math.random
): Grid => {
  if (!Number.isInteger(moves) || moves < 0) {
    throw new PuzzleError(
      "INVALID_ARGUMENT",
      `Shuffle moves must be a non-negative integer, got ${moves}`
    );
  }

  let state = grid;
  for (let move = 0; move < moves; move += 1) {
    const options = neighbors(state);
    const pick = Math.min(Math.floor(random() * options.length), options.length - 1);
    state = options[pick];
  }
  return state;
};
