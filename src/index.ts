export { Position } from './core/Position';
export { Game } from './core/Game';
export {
    applyMove,
    captures,
    countLeafPositions,
    isTerminal,
    legalMoves,
    mobility,
    placementMask,
    winner
} from './core/Rules';
export { Direction, DIRECTIONS } from './core/BitBoard';
export { cellToSquare, formatMove, parseMove, squareToCell } from './core/notation';
export {
    AgentContractError,
    GameError,
    GameErrorCode,
    IllegalMoveError,
    InvalidPositionError
} from './core/errors';
export type { InvalidPositionReason } from './core/errors';
export {
    BOARD_SIZE,
    CELL_COUNT,
    GameState,
    Outcome,
    PASS,
    Side,
    cellOf,
    movesEqual,
    opponent,
    place
} from './core/types';
export type { Move, MoveRecord, PassMove, PlaceMove } from './core/types';
export * from './ai';
export { playMatch } from './match';
export type { MatchOptions, MatchResult } from './match';
