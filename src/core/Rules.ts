import { DIRECTIONS, EMPTY, FULL, bit, cells, fillOccluded, popCount, shift } from './BitBoard';
import { GameError, GameErrorCode, IllegalMoveError } from './errors';
import { Position } from './Position';
import { Move, Outcome, PASS, Side, isValidCell, opponent, place } from './types';

/**
 * Othello rules over bitboard positions. Every function is pure: positions
 * are never modified, and each call allocates its own results.
 */

/**
 * Gets every cell where `side` could place a disc.
 * A cell qualifies when a ray from it crosses one or more opponent discs
 * and ends on one of the side's own discs.
 */
export function placementMask(position: Position, side: Side = position.sideToMove): bigint {
    const mine = position.occupied(side);
    const theirs = position.occupied(opponent(side));
    const empty = FULL & ~(mine | theirs);

    let moves = EMPTY;
    for (const direction of DIRECTIONS) {
        moves |= shift(fillOccluded(mine, theirs, direction), direction) & empty;
    }
    return moves;
}

/**
 * Number of placements available to a side
 */
export function mobility(position: Position, side: Side): number {
    return popCount(placementMask(position, side));
}

/**
 * Lists the legal moves of the side to move in ascending cell order,
 * or a single pass when no placement exists
 */
export function legalMoves(position: Position): Move[] {
    const mask = placementMask(position);
    if (mask === EMPTY) {
        return [PASS];
    }
    return cells(mask).map(place);
}

/**
 * Gets the discs that placing on `cell` would flip, or nothing if the cell is taken
 */
export function captures(position: Position, cell: number, side: Side = position.sideToMove): bigint {
    if (!isValidCell(cell) || !position.isEmpty(cell)) {
        return EMPTY;
    }
    const mine = position.occupied(side);
    const theirs = position.occupied(opponent(side));
    const origin = bit(cell);

    let flips = EMPTY;
    for (const direction of DIRECTIONS) {
        let ray = EMPTY;
        let cursor = shift(origin, direction);
        while ((cursor & theirs) !== EMPTY) {
            ray |= cursor;
            cursor = shift(cursor, direction);
        }
        if ((cursor & mine) !== EMPTY) {
            flips |= ray;
        }
    }
    return flips;
}

/**
 * Plays a move for the side to move and returns the resulting position
 */
export function applyMove(position: Position, move: Move): Position {
    const side = position.sideToMove;

    if (move.type === 'pass') {
        if (placementMask(position, side) !== EMPTY) {
            throw new IllegalMoveError(`${side} cannot pass while a placement is available`, { side });
        }
        return position.swapTurn();
    }

    const { cell } = move;
    if (!isValidCell(cell)) {
        throw new IllegalMoveError(`Cell ${cell} is not on the board`, { side, cell });
    }
    if (!position.isEmpty(cell)) {
        throw new IllegalMoveError(`Cell ${cell} is already occupied`, { side, cell });
    }
    const flips = captures(position, cell, side);
    if (flips === EMPTY) {
        throw new IllegalMoveError(`Placing on cell ${cell} captures no discs`, { side, cell });
    }

    const mine = position.occupied(side) | bit(cell) | flips;
    const theirs = position.occupied(opponent(side)) & ~flips;
    return side === Side.BLACK
        ? new Position(mine, theirs, Side.WHITE)
        : new Position(theirs, mine, Side.BLACK);
}

/**
 * True when neither side can place a disc
 */
export function isTerminal(position: Position): boolean {
    return placementMask(position, Side.BLACK) === EMPTY && placementMask(position, Side.WHITE) === EMPTY;
}

/**
 * Gets the result of a finished game by comparing disc counts
 */
export function winner(position: Position): Outcome {
    if (!isTerminal(position)) {
        throw new GameError(GameErrorCode.GAME_NOT_OVER, 'The game is not over yet');
    }
    const black = position.discCount(Side.BLACK);
    const white = position.discCount(Side.WHITE);
    if (black > white) {
        return Outcome.BLACK;
    }
    if (white > black) {
        return Outcome.WHITE;
    }
    return Outcome.DRAW;
}

/**
 * Counts the move sequences of `depth` plies from a position, passes
 * included; a line that reaches the end of the game early counts once
 */
export function countLeafPositions(position: Position, depth: number): number {
    if (depth === 0 || isTerminal(position)) {
        return 1;
    }
    let total = 0;
    for (const move of legalMoves(position)) {
        total += countLeafPositions(applyMove(position, move), depth - 1);
    }
    return total;
}
