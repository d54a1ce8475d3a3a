import { strict as assert } from "assert";
import { Board, Game, Move, formatMove, pieceAt } from "@multiverse-chess/core";
import {
  black,
  collect,
  jumpGame,
  makeBoard,
  makeGame,
  twoBoardGame,
  white,
} from "./__fixtures__/positions";
import { BoardMoves } from "./gen/board";
import { Moveset, MovesetValidity } from "./Moveset";
import { PartialGame, noPartialGame } from "./PartialGame";

function movesOf(game: Game, partial: PartialGame, timeline: number, turn: number): Move[] {
  const board = partial.getBoard(game, timeline, turn);
  assert.ok(board);
  return collect(new BoardMoves(board).generateMoves(game, partial));
}

function pick(moves: Move[], label: string): Move {
  const move = moves.find((m) => formatMove(m) === label);
  assert.ok(move, `no move ${label}`);
  return move;
}

function moveset(moves: Move[]): Moveset {
  const result = Moveset.create(moves);
  assert.ok(result.isOk);
  return result.value;
}

function errorOf(result: ReturnType<Moveset["generatePartialGame"]>): MovesetValidity {
  assert.ok(result.isErr);
  return result.error.reason;
}

function requireBoard(board: Board | undefined): Board {
  assert.ok(board);
  return board;
}

describe("Moveset", () => {
  describe("create", () => {
    it("should reject an empty moveset", () => {
      const result = Moveset.create([]);
      assert.ok(result.isErr);
      assert.equal(result.error.reason, MovesetValidity.NoMoves);
      assert.equal(result.error.message, "ERR_NO_MOVES");
    });

    it("should reject two moves from the same board", () => {
      const game = twoBoardGame();
      const moves = movesOf(game, noPartialGame(game), -1, 0);
      const result = Moveset.create([moves[0], moves[1]]);

      assert.ok(result.isErr);
      assert.equal(result.error.reason, MovesetValidity.DuplicateOrMissingBoard);
    });
  });

  describe("generatePartialGame", () => {
    const game = twoBoardGame();
    const partial = noPartialGame(game);
    const left = movesOf(game, partial, -1, 0);
    const right = movesOf(game, partial, 1, 0);

    it("should produce one new board per played board, one turn later", () => {
      const result = moveset([left[2], right[0]]).generatePartialGame(game, partial);
      assert.ok(result.isOk);
      const child = result.value;

      assert.equal(child.parent, partial);
      assert.equal(child.info.activePlayer, "black");
      assert.deepEqual(
        child
          .newBoards()
          .map((b) => [b.timeline, b.turn])
          .sort((a, b) => a[0] - b[0]),
        [
          [-1, 1],
          [1, 1],
        ]
      );
      assert.deepEqual(
        child.info.timelines.map((tl) => [tl.index, tl.lastTurn]),
        [
          [-1, 1],
          [0, 1],
          [1, 1],
        ]
      );

      const leftBoard = requireBoard(child.getBoard(game, -1, 1));
      assert.equal(pieceAt(leftBoard, 0, 3), null);
      assert.deepEqual(pieceAt(leftBoard, 0, 2), white("rook", true));
      assert.deepEqual(pieceAt(leftBoard, 0, 1), white("king"));

      const rightBoard = requireBoard(child.getBoard(game, 1, 1));
      assert.deepEqual(pieceAt(rightBoard, 0, 0), white("king", true));
    });

    it("should leave the parent partial game and the game untouched", () => {
      moveset([left[0], right[1]]).generatePartialGame(game, partial);

      assert.equal(partial.newBoards().length, 0);
      assert.equal(partial.getBoard(game, -1, 1), undefined);
      assert.equal(game.boards.size, 3);
      assert.deepEqual(partial.info.timelines.map((tl) => tl.lastTurn), [0, 1, 0]);
    });

    it("should be deterministic", () => {
      const ms = moveset([left[1], right[1]]);
      const a = ms.generatePartialGame(game, partial);
      const b = ms.generatePartialGame(game, partial);

      assert.ok(a.isOk && b.isOk);
      assert.deepEqual(a.value.newBoards(), b.value.newBoards());
      assert.deepEqual(a.value.info, b.value.info);
    });

    it("should require every board at the present", () => {
      const result = moveset([left[0]]).generatePartialGame(game, partial);

      assert.equal(errorOf(result), MovesetValidity.DuplicateOrMissingBoard);
    });

    it("should reject moves on boards the player cannot move on", () => {
      const child = moveset([left[0], right[0]]).generatePartialGame(game, partial);
      assert.ok(child.isOk);

      // White moves again on the boards it just left to black
      const result = moveset([left[1], right[1]]).generatePartialGame(game, child.value);

      assert.equal(errorOf(result), MovesetValidity.UnplayableBoard);
    });

    it("should reject a move with wrong capture metadata", () => {
      const forged: Move = { ...right[0], to: { ...right[0].to, piece: black("pawn") } };
      const result = moveset([left[0], forged]).generatePartialGame(game, partial);

      assert.equal(errorOf(result), MovesetValidity.IllegalMove);
    });

    it("should reject a move whose piece is gone", () => {
      const ghost: Move = {
        ...right[0],
        from: { ...right[0].from, piece: white("queen") },
      };
      const result = moveset([left[0], ghost]).generatePartialGame(game, partial);

      assert.equal(errorOf(result), MovesetValidity.IllegalMove);
    });
  });

  describe("king safety", () => {
    it("should reject moving the king next to a rook", () => {
      const game = makeGame(2, 3, [
        makeBoard(0, 0, 2, 3, { a1: white("king"), b3: black("rook") }),
      ]);
      const partial = noPartialGame(game);
      const moves = movesOf(game, partial, 0, 0);

      assert.deepEqual(moves.map(formatMove), [
        "(0T0)a1>(0T0)b1",
        "(0T0)a1>(0T0)a2",
        "(0T0)a1>(0T0)b2",
      ]);
      const outcomes = moves.map((m) => {
        const result = moveset([m]).generatePartialGame(game, partial);
        return result.isOk ? "ok" : result.error.reason;
      });
      assert.deepEqual(outcomes, [
        MovesetValidity.KingInCheck,
        "ok",
        MovesetValidity.KingInCheck,
      ]);
    });

    it("should see checks coming from another timeline", () => {
      const game = makeGame(2, 2, [
        makeBoard(0, 0, 2, 2, { a1: white("king"), b2: white("commonKing") }),
        makeBoard(1, 0, 2, 2, { a1: black("rook"), b2: white("commonKing") }),
      ]);
      const partial = noPartialGame(game);
      const first = pick(movesOf(game, partial, 0, 0), "(0T0)b2>(0T0)b1");
      const second = pick(movesOf(game, partial, 1, 0), "(1T0)b2>(1T0)b1");

      const result = moveset([first, second]).generatePartialGame(game, partial);

      assert.equal(errorOf(result), MovesetValidity.KingInCheck);
    });

    it("should accept the same turn once the king is covered", () => {
      const game = makeGame(2, 2, [
        makeBoard(0, 0, 2, 2, { a1: white("king"), b2: white("commonKing") }),
        makeBoard(1, 0, 2, 2, { a1: black("rook"), b2: white("commonKing") }),
      ]);
      const partial = noPartialGame(game);
      const first = pick(movesOf(game, partial, 0, 0), "(0T0)a1>(0T0)b1");
      const second = pick(movesOf(game, partial, 1, 0), "(1T0)b2>(1T0)a1");

      const result = moveset([first, second]).generatePartialGame(game, partial);

      assert.ok(result.isOk);
    });
  });

  describe("jumps", () => {
    const game = jumpGame();
    const partial = noPartialGame(game);
    const jump = pick(movesOf(game, partial, 0, 0), "(0T0)a2>(1T0)a2");

    it("should play both the source and the destination board", () => {
      assert.equal(jump.kind, "jump");

      const result = moveset([jump]).generatePartialGame(game, partial);
      assert.ok(result.isOk);
      const child = result.value;

      assert.deepEqual(
        child
          .newBoards()
          .map((b) => `${b.timeline}:${b.turn}`)
          .sort(),
        ["0:1", "1:1"]
      );
      const source = requireBoard(child.getBoard(game, 0, 1));
      assert.equal(pieceAt(source, 0, 1), null);
      assert.equal(pieceAt(source, 0, 0), null);

      const destination = requireBoard(child.getBoard(game, 1, 1));
      assert.deepEqual(pieceAt(destination, 0, 1), white("rook", true));
      assert.deepEqual(pieceAt(destination, 0, 0), white("rook"));

      assert.deepEqual(
        child.info.timelines.map((tl) => [tl.index, tl.lastTurn]),
        [
          [0, 1],
          [1, 1],
        ]
      );
      assert.equal(child.info.activePlayer, "black");
    });

    it("should reject a move from the board a jump lands on", () => {
      const local = pick(movesOf(game, partial, 1, 0), "(1T0)a1>(1T0)a2");
      const result = moveset([jump, local]).generatePartialGame(game, partial);

      assert.equal(errorOf(result), MovesetValidity.DuplicateOrMissingBoard);
    });
  });

  describe("time travel", () => {
    const game = makeGame(1, 2, [
      makeBoard(0, 0, 1, 2, { a1: white("king") }),
      makeBoard(0, 1, 1, 2, { a2: white("king", true) }),
      makeBoard(0, 2, 1, 2, { a2: white("king", true) }),
    ]);
    const partial = noPartialGame(game);

    it("should create a new timeline when branching into the past", () => {
      const branch = pick(movesOf(game, partial, 0, 2), "(0T2)a2>(0T0)a2");
      assert.equal(branch.kind, "branch");

      const result = moveset([branch]).generatePartialGame(game, partial);
      assert.ok(result.isOk);
      const child = result.value;

      assert.deepEqual(child.info.timelines, [
        { index: 0, startTurn: 0, lastTurn: 3, origin: null },
        { index: 1, startTurn: 1, lastTurn: 1, origin: { timeline: 0, turn: 0 } },
      ]);
      assert.equal(child.present(), 1);

      const branched = requireBoard(child.getBoard(game, 1, 1));
      assert.deepEqual(pieceAt(branched, 0, 0), white("king"));
      assert.deepEqual(pieceAt(branched, 0, 1), white("king", true));

      const source = requireBoard(child.getBoard(game, 0, 3));
      assert.equal(pieceAt(source, 0, 1), null);

      // Older boards are still read through to the game
      assert.equal(child.getBoard(game, 0, 2), game.boards.get("0:2"));
    });

    it("should let the new timeline's boards be played next", () => {
      const branch = pick(movesOf(game, partial, 0, 2), "(0T2)a2>(0T0)a2");
      const result = moveset([branch]).generatePartialGame(game, partial);
      assert.ok(result.isOk);

      const own = result.value.ownBoards(game).map((b) => [b.timeline, b.turn]);
      assert.deepEqual(own, [
        [0, 3],
        [1, 1],
      ]);
    });
  });
});
