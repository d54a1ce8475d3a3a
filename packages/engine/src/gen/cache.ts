import { Game, Move, moveEquals } from "@multiverse-chess/core";
import { IMoveGenerator } from "../interfaces/IMoveGenerator";
import type { PartialGame } from "../PartialGame";

/**
 * Wraps a one-shot iterator and remembers every value it yielded, in order,
 * so that later lookups do not have to regenerate them.
 */
export class CachedIterator<T> implements IterableIterator<T> {
  private readonly items: T[] = [];
  private exhausted = false;

  constructor(
    private readonly iterator: Iterator<T, unknown>,
    private readonly equals: (a: T, b: T) => boolean
  ) {}

  /** Values yielded so far */
  get cache(): ReadonlyArray<T> {
    return this.items;
  }

  get isExhausted(): boolean {
    return this.exhausted;
  }

  /** Pull the next value from the wrapped iterator and cache it */
  next(): IteratorResult<T, undefined> {
    if (this.exhausted) return { done: true, value: undefined };
    const result = this.iterator.next();
    if (result.done) {
      this.exhausted = true;
      return { done: true, value: undefined };
    }
    this.items.push(result.value);
    return { done: false, value: result.value };
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this;
  }

  /**
   * Looks for `item` among the cached values only. False means
   * "not seen yet", not "absent from the sequence".
   */
  includesCached(item: T): boolean {
    return this.items.some((cached) => this.equals(cached, item));
  }

  /** Looks through the cache, then drains the iterator until `item` shows up */
  includes(item: T): boolean {
    if (this.includesCached(item)) return true;
    for (let next = this.next(); !next.done; next = this.next()) {
      if (this.equals(next.value, item)) return true;
    }
    return false;
  }

  /** The n-th yielded value if it is already cached */
  getCached(n: number): T | undefined {
    if (n < 0 || n >= this.items.length) return undefined;
    return this.items[n];
  }

  /** The n-th value, draining the iterator up to it if needed */
  get(n: number): T | undefined {
    if (n < 0) return undefined;
    while (n >= this.items.length) {
      if (this.next().done) return undefined;
    }
    return this.items[n];
  }
}

/**
 * Caches the moves of a move generator.
 * Use it when the same board or piece is queried several times within a search node.
 */
export class CacheMoves<G extends IMoveGenerator = IMoveGenerator> extends CachedIterator<Move> {
  private constructor(
    readonly generator: G,
    iterator: Iterator<Move, void>
  ) {
    super(iterator, moveEquals);
  }

  /** Returns null when the generator has no move sequence for this position */
  static create<G extends IMoveGenerator>(
    generator: G,
    game: Game,
    partial: PartialGame
  ): CacheMoves<G> | null {
    const iterator = generator.generateMoves(game, partial);
    if (!iterator) return null;
    return new CacheMoves(generator, iterator);
  }

  /** Cache-only membership check; may miss moves that were not generated yet */
  validateMoveCached(move: Move): boolean {
    return this.includesCached(move);
  }

  /**
   * Full membership check. Prefer `generator.validateMove` for a single
   * query; this pays off when many moves are checked against one cache.
   */
  validateMove(move: Move): boolean {
    return this.includes(move);
  }
}
