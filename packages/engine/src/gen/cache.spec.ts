import { strict as assert } from "assert";
import { formatMove } from "@multiverse-chess/core";
import { collect, makeBoard, makeGame, white } from "../__fixtures__/positions";
import { noPartialGame } from "../PartialGame";
import { BoardMoves } from "./board";
import { CachedIterator, CacheMoves } from "./cache";
import { PieceMoves } from "./piece";

function counting(values: number[]): { iterator: Iterator<number>; pulls: () => number } {
  let pulls = 0;
  const inner = values[Symbol.iterator]();
  return {
    iterator: {
      next() {
        pulls++;
        return inner.next();
      },
    },
    pulls: () => pulls,
  };
}

const same = (a: number, b: number) => a === b;

describe("CachedIterator", () => {
  it("should cache values in the order they were yielded", () => {
    const cached = new CachedIterator([10, 20, 30][Symbol.iterator](), same);

    assert.deepEqual(cached.next(), { done: false, value: 10 });
    assert.deepEqual(cached.next(), { done: false, value: 20 });
    assert.deepEqual(cached.cache, [10, 20]);
    assert.equal(cached.getCached(0), 10);
    assert.equal(cached.getCached(1), 20);
    assert.equal(cached.getCached(2), undefined);
  });

  it("should only look at the cache in includesCached", () => {
    const { iterator, pulls } = counting([1, 2, 3]);
    const cached = new CachedIterator(iterator, same);
    cached.next();

    assert.equal(cached.includesCached(1), true);
    assert.equal(cached.includesCached(3), false);
    assert.equal(pulls(), 1);
  });

  it("should drain the iterator until the value is found in includes", () => {
    const { iterator, pulls } = counting([1, 2, 3, 4]);
    const cached = new CachedIterator(iterator, same);

    assert.equal(cached.includes(3), true);
    assert.deepEqual(cached.cache, [1, 2, 3]);
    assert.equal(pulls(), 3);

    assert.equal(cached.includes(7), false);
    assert.deepEqual(cached.cache, [1, 2, 3, 4]);
    assert.equal(cached.isExhausted, true);
  });

  it("should pull just enough values in get", () => {
    const { iterator, pulls } = counting([5, 6, 7]);
    const cached = new CachedIterator(iterator, same);

    assert.equal(cached.get(1), 6);
    assert.equal(pulls(), 2);
    assert.equal(cached.get(0), 5);
    assert.equal(pulls(), 2);
    assert.equal(cached.get(3), undefined);
    assert.equal(cached.get(-1), undefined);
    assert.deepEqual(cached.cache, [5, 6, 7]);
  });

  it("should not pull again once exhausted", () => {
    const { iterator, pulls } = counting([]);
    const cached = new CachedIterator(iterator, same);

    assert.equal(cached.next().done, true);
    assert.equal(cached.next().done, true);
    assert.equal(pulls(), 1);
  });

  it("should be iterable", () => {
    const cached = new CachedIterator([1, 2][Symbol.iterator](), same);

    assert.deepEqual([...cached], [1, 2]);
    assert.deepEqual(cached.cache, [1, 2]);
  });
});

describe("CacheMoves", () => {
  // One king with exactly two destinations: a1 and a3
  const board = makeBoard(0, 0, 1, 3, { a2: white("king") });
  const game = makeGame(1, 3, [board]);
  const partial = noPartialGame(game);

  it("should yield the board's two king moves", () => {
    assert.equal(collect(new BoardMoves(board).generateMoves(game, partial)).length, 2);
  });

  it("should return the second move without regenerating the first", () => {
    const cache = CacheMoves.create(new BoardMoves(board), game, partial);
    assert.ok(cache);

    const second = cache.get(1);
    assert.ok(second);
    assert.equal(formatMove(second), "(0T0)a2>(0T0)a3");
    assert.equal(cache.cache.length, 2);

    const first = cache.getCached(0);
    assert.ok(first);
    assert.equal(formatMove(first), "(0T0)a2>(0T0)a1");
    assert.equal(cache.get(2), undefined);
  });

  it("should report cached moves only in validateMoveCached", () => {
    const cache = CacheMoves.create(new BoardMoves(board), game, partial);
    assert.ok(cache);
    const [first, second] = collect(new BoardMoves(board).generateMoves(game, partial));

    const yielded = cache.next();
    assert.equal(yielded.done, false);
    assert.equal(cache.validateMoveCached(first), true);
    assert.equal(cache.validateMoveCached(second), false);

    assert.equal(cache.validateMove(second), true);
    assert.equal(cache.validateMoveCached(second), true);
  });

  it("should return null when the generator has no sequence", () => {
    const stale = new PieceMoves(white("king"), { timeline: 0, turn: 0, file: 0, rank: 0 });

    assert.equal(CacheMoves.create(stale, game, partial), null);
  });

  it("should keep the wrapped generator", () => {
    const gen = new BoardMoves(board);
    const cache = CacheMoves.create(gen, game, partial);

    assert.equal(cache?.generator, gen);
  });
});
