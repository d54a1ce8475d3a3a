import { Result } from "@badrap/result";
import { Board, Game, Move, boardKey } from "@multiverse-chess/core";
import { BoardMoves } from "./gen/board";
import { CacheMoves } from "./gen/cache";
import log from "./logger";
import { Moveset, MovesetValidityError } from "./Moveset";
import { PartialGame } from "./PartialGame";

export type MovesetCandidate = Result<Moveset, MovesetValidityError>;

/**
 * Enumerates every combination of one move per board, lazily.
 *
 * Works like an odometer: each board is a digit whose base is its number of
 * moves, discovered while the board's cache is drained. The last board varies
 * fastest, the first board slowest. Candidates are only checked for shape;
 * call `Moveset.generatePartialGame` to keep the legal ones.
 */
export class GenMovesetIter implements IterableIterator<MovesetCandidate> {
  private readonly digits: CacheMoves<BoardMoves>[] = [];
  private readonly cursors: number[];
  private started = false;
  private done = false;
  private finished = false;
  private emitted = 0;

  constructor(ownBoards: ReadonlyArray<Board>, game: Game, partial: PartialGame) {
    for (const board of ownBoards) {
      const cache = CacheMoves.create(new BoardMoves(board), game, partial);
      if (!cache) {
        this.done = true;
        break;
      }
      this.digits.push(cache);
    }
    if (this.digits.length === 0) this.done = true;
    this.cursors = this.digits.map(() => 0);
    log.debug({ boards: ownBoards.length }, "Moveset enumeration started");
  }

  next(): IteratorResult<MovesetCandidate, undefined> {
    if (this.done || !this.advance()) {
      this.finish();
      return { done: true, value: undefined };
    }
    this.emitted++;
    return { done: false, value: Moveset.create(this.currentMoves()) };
  }

  [Symbol.iterator](): IterableIterator<MovesetCandidate> {
    return this;
  }

  /** Move the cursors to the next combination; false once every combination was visited */
  private advance(): boolean {
    if (!this.started) {
      this.started = true;
      return this.digits.every((digit) => digit.get(0) !== undefined);
    }

    for (let i = this.digits.length - 1; i >= 0; i--) {
      this.cursors[i]++;
      if (this.digits[i].get(this.cursors[i]) !== undefined) return true;
      // Digit exhausted: rewind it and carry into the previous one.
      // Its cache now holds the whole sequence, so nothing is regenerated.
      this.cursors[i] = 0;
    }
    return false;
  }

  private currentMoves(): Move[] {
    return this.cursors.map((cursor, i) => {
      const move = this.digits[i].getCached(cursor);
      if (!move) {
        throw new Error(`Cursor ${cursor} of board ${i} points past its cached moves`);
      }
      return move;
    });
  }

  private finish(): void {
    this.done = true;
    if (this.finished) return;
    this.finished = true;
    log.debug({ candidates: this.emitted }, "Moveset enumeration finished");
  }
}

export interface LegalTurn {
  moveset: Moveset;
  partial: PartialGame;
}

/** Keys of the boards some own move jumps onto */
function jumpDestinations(game: Game, partial: PartialGame, boards: ReadonlyArray<Board>): Set<string> {
  const keys = new Set<string>();
  for (const board of boards) {
    const moves = new BoardMoves(board).generateMoves(game, partial);
    if (!moves) continue;
    for (let next = moves.next(); !next.done; next = moves.next()) {
      const { kind, to } = next.value;
      if (kind === "jump") keys.add(boardKey(to.coords.timeline, to.coords.turn));
    }
  }
  return keys;
}

function landsOnPlayedBoard(moveset: Moveset): boolean {
  const sources = new Set(
    moveset.moves.map((m) => boardKey(m.from.coords.timeline, m.from.coords.turn))
  );
  return moveset.moves.some(
    (m) => m.kind === "jump" && sources.has(boardKey(m.to.coords.timeline, m.to.coords.turn))
  );
}

/**
 * Every legal turn the active player may submit from `partial`, paired with
 * the partial game it leads to.
 *
 * A board may be left out of a turn when it is optional (not at the present)
 * or when a jump from another own board can play it. Each selection of
 * boards, starting with all of them, is enumerated by `GenMovesetIter`.
 */
export function* legalMovesets(game: Game, partial: PartialGame): Generator<LegalTurn, void> {
  const own = partial.ownBoards(game);
  const required = new Set(partial.requiredBoards(game).map((b) => boardKey(b.timeline, b.turn)));
  const landings = jumpDestinations(game, partial, own);
  const skippable = own.filter((b) => {
    const key = boardKey(b.timeline, b.turn);
    return !required.has(key) || landings.has(key);
  });

  for (let mask = 0; mask < 2 ** skippable.length; mask++) {
    const skipped = new Set(skippable.filter((_, bit) => mask & (1 << bit)));
    const chosen = own.filter((b) => !skipped.has(b));
    if (chosen.length === 0) continue;

    for (const candidate of new GenMovesetIter(chosen, game, partial)) {
      if (candidate.isErr || landsOnPlayedBoard(candidate.value)) continue;
      const result = candidate.value.generatePartialGame(game, partial);
      if (result.isOk) {
        yield { moveset: candidate.value, partial: result.value };
      }
    }
  }
}
