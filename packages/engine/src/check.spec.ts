import { strict as assert } from "assert";
import { black, makeBoard, makeGame, white } from "./__fixtures__/positions";
import { isInCheck } from "./check";
import { noPartialGame } from "./PartialGame";

describe("isInCheck", () => {
  it("should see a royal piece the opponent can capture", () => {
    const game = makeGame(2, 2, [makeBoard(0, 1, 2, 2, { a1: white("king"), a2: black("rook") })]);

    assert.equal(isInCheck(game, noPartialGame(game), "white"), true);
  });

  it("should only look at boards the opponent moves on", () => {
    const game = makeGame(2, 2, [makeBoard(0, 1, 2, 2, { a1: black("king"), a2: white("rook") })]);

    assert.equal(isInCheck(game, noPartialGame(game), "black"), false);
  });

  it("should ignore pieces out of reach", () => {
    const game = makeGame(2, 2, [makeBoard(0, 1, 2, 2, { a1: white("king"), b2: black("rook") })]);

    assert.equal(isInCheck(game, noPartialGame(game), "white"), false);
  });

  it("should not count common kings as royal", () => {
    const game = makeGame(2, 2, [
      makeBoard(0, 1, 2, 2, { a1: white("commonKing"), a2: black("rook") }),
    ]);

    assert.equal(isInCheck(game, noPartialGame(game), "white"), false);
  });

  it("should count royal queens", () => {
    const game = makeGame(2, 2, [
      makeBoard(0, 1, 2, 2, { a1: white("royalQueen"), a2: black("rook") }),
    ]);

    assert.equal(isInCheck(game, noPartialGame(game), "white"), true);
  });
});
