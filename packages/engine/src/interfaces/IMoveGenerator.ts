import { Game, Move } from "@multiverse-chess/core";
import type { PartialGame } from "../PartialGame";

/** One-shot, lazy sequence of candidate moves */
export type MoveIterator = Iterator<Move, void>;

// ---------------------------------------------------------------------------
// Anything that can generate moves: a single piece or a whole board
// ---------------------------------------------------------------------------

/**
 * Both functions read the position through the partial game, never through
 * the raw game boards, and must be deterministic given the same inputs.
 */
export interface IMoveGenerator {
  /**
   * Start a new lazy sequence of candidate moves.
   * Returns null when the generator no longer matches the position
   * (e.g. the piece left its square).
   */
  generateMoves(game: Game, partial: PartialGame): MoveIterator | null;

  /** Check a single move without enumerating every candidate */
  validateMove(game: Game, partial: PartialGame, move: Move): boolean;
}
