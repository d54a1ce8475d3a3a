export { PieceMoves } from "./gen/piece";
export { BoardMoves } from "./gen/board";
export { CachedIterator, CacheMoves } from "./gen/cache";
export { MOVEMENT_RULES, vectorEquals } from "./gen/vectors";
export type { MovementRule, Vector } from "./gen/vectors";
export { PartialGame, noPartialGame } from "./PartialGame";
export { Moveset, MovesetValidity, MovesetValidityError } from "./Moveset";
export { GenMovesetIter, legalMovesets } from "./GenMovesetIter";
export type { MovesetCandidate, LegalTurn } from "./GenMovesetIter";
export { isInCheck } from "./check";
export type { IMoveGenerator, MoveIterator } from "./interfaces/IMoveGenerator";
