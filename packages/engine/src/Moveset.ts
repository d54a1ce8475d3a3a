import { Result } from "@badrap/result";
import {
  Board,
  Game,
  GameInfo,
  Move,
  Piece,
  TimelineInfo,
  boardKey,
  deriveBoard,
  formatMove,
  nextTimelineIndex,
  opponentColor,
} from "@multiverse-chess/core";
import { isInCheck } from "./check";
import { BoardMoves } from "./gen/board";
import log from "./logger";
import { PartialGame } from "./PartialGame";

export enum MovesetValidity {
  NoMoves = "ERR_NO_MOVES",
  UnplayableBoard = "ERR_UNPLAYABLE_BOARD",
  DuplicateOrMissingBoard = "ERR_DUPLICATE_OR_MISSING_BOARD",
  IllegalMove = "ERR_ILLEGAL_MOVE",
  KingInCheck = "ERR_KING_IN_CHECK",
}

export class MovesetValidityError extends Error {
  constructor(readonly reason: MovesetValidity) {
    super(reason);
    this.name = "MovesetValidityError";
  }
}

function reject<T>(reason: MovesetValidity, moves: ReadonlyArray<Move>): Result<T, MovesetValidityError> {
  log.trace({ reason, moves: moves.map(formatMove) }, "Moveset rejected");
  return Result.err(new MovesetValidityError(reason));
}

/** Boards a move plays: its source, and its destination when it jumps onto another timeline's last board */
function playedBoardKeys(move: Move): string[] {
  const keys = [boardKey(move.from.coords.timeline, move.from.coords.turn)];
  if (move.kind === "jump") {
    keys.push(boardKey(move.to.coords.timeline, move.to.coords.turn));
  }
  return keys;
}

/**
 * A candidate turn: at most one move per playable board.
 * Only the shape is checked on creation; legality is checked by `generatePartialGame`.
 */
export class Moveset {
  private constructor(readonly moves: ReadonlyArray<Move>) {}

  static create(moves: ReadonlyArray<Move>): Result<Moveset, MovesetValidityError> {
    if (moves.length === 0) {
      return reject(MovesetValidity.NoMoves, moves);
    }
    const sources = new Set<string>();
    for (const move of moves) {
      const key = boardKey(move.from.coords.timeline, move.from.coords.turn);
      if (sources.has(key)) {
        return reject(MovesetValidity.DuplicateOrMissingBoard, moves);
      }
      sources.add(key);
    }
    return Result.ok(new Moveset([...moves]));
  }

  /**
   * Validate the moveset against `partial` and, if it holds, return the
   * partial game it leads to. `partial` is left untouched.
   */
  generatePartialGame(game: Game, partial: PartialGame): Result<PartialGame, MovesetValidityError> {
    const moves = this.moves;

    // 1. Every required board played exactly once, nothing but own boards played
    const own = new Set(partial.ownBoards(game).map((b) => boardKey(b.timeline, b.turn)));
    const played = new Set<string>();
    for (const move of moves) {
      for (const key of playedBoardKeys(move)) {
        if (!own.has(key)) return reject(MovesetValidity.UnplayableBoard, moves);
        if (played.has(key)) return reject(MovesetValidity.DuplicateOrMissingBoard, moves);
        played.add(key);
      }
    }
    for (const board of partial.requiredBoards(game)) {
      if (!played.has(boardKey(board.timeline, board.turn))) {
        return reject(MovesetValidity.DuplicateOrMissingBoard, moves);
      }
    }

    // 2. Every single move is legal on its own
    for (const move of moves) {
      const source = partial.getBoard(game, move.from.coords.timeline, move.from.coords.turn);
      if (!source || !new BoardMoves(source).validateMove(game, partial, move)) {
        return reject(MovesetValidity.IllegalMove, moves);
      }
    }

    // 3. Apply the moves
    const child = applyMoves(game, partial, moves);

    // 4. No royal piece of the mover may be left capturable on any timeline
    if (isInCheck(game, child, partial.info.activePlayer)) {
      return reject(MovesetValidity.KingInCheck, moves);
    }

    return Result.ok(child);
  }
}

function requireBoard(game: Game, partial: PartialGame, timeline: number, turn: number): Board {
  const board = partial.getBoard(game, timeline, turn);
  if (!board) {
    throw new Error(`Board ${boardKey(timeline, turn)} disappeared while applying a validated moveset`);
  }
  return board;
}

/** Produce the partial game resulting from already validated moves */
function applyMoves(game: Game, partial: PartialGame, moves: ReadonlyArray<Move>): PartialGame {
  const boards = new Map<string, Board>();
  const timelines: TimelineInfo[] = partial.info.timelines.map((tl) => ({ ...tl }));
  const mover = partial.info.activePlayer;

  const publish = (board: Board) => {
    const key = boardKey(board.timeline, board.turn);
    if (boards.has(key)) {
      throw new Error(`Board ${key} produced twice by one moveset`);
    }
    boards.set(key, board);
    const tl = timelines.find((t) => t.index === board.timeline);
    if (tl) tl.lastTurn = board.turn;
  };

  for (const move of moves) {
    const { coords: from } = move.from;
    const { coords: to } = move.to;
    const moved: Piece = {
      color: move.from.piece.color,
      kind: move.promotion ?? move.from.piece.kind,
      moved: true,
    };
    const source = requireBoard(game, partial, from.timeline, from.turn);

    if (move.kind === "board") {
      publish(
        deriveBoard(source, from.timeline, from.turn + 1, [
          { file: from.file, rank: from.rank, piece: null },
          { file: to.file, rank: to.rank, piece: moved },
        ])
      );
      continue;
    }

    publish(
      deriveBoard(source, from.timeline, from.turn + 1, [
        { file: from.file, rank: from.rank, piece: null },
      ])
    );
    const target = requireBoard(game, partial, to.timeline, to.turn);
    const arrival = [{ file: to.file, rank: to.rank, piece: moved }];

    if (move.kind === "jump") {
      publish(deriveBoard(target, to.timeline, to.turn + 1, arrival));
    } else {
      const index = nextTimelineIndex({ activePlayer: mover, timelines }, mover);
      timelines.push({
        index,
        startTurn: to.turn + 1,
        lastTurn: to.turn + 1,
        origin: { timeline: to.timeline, turn: to.turn },
      });
      publish(deriveBoard(target, index, to.turn + 1, arrival));
    }
  }

  const info: GameInfo = {
    activePlayer: opponentColor(mover),
    timelines: timelines.sort((a, b) => a.index - b.index),
  };
  return new PartialGame(info, boards, partial);
}
