export type PuzzleErrorCode =
  | "INVALID_GRID"
  | "INVALID_ARGUMENT"
  | "INVALID_CONFIG"
  | "INTERNAL_INCONSISTENCY";

export class PuzzleError extends Error {
  constructor(public readonly code: PuzzleErrorCode, message: string) {
    super(message);
    this.name = "PuzzleError";
  }
}

export const isPuzzleError = (error: unknown): error is PuzzleError =>
  error instanceof PuzzleError;
