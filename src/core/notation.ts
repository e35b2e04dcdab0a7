import { GameError, GameErrorCode } from './errors';
import { BOARD_SIZE, Move, PASS, cellOf, isValidCell, place } from './types';

const FILES = 'abcdefgh';

/**
 * Converts a cell index to a square name such as `d3`
 */
export function cellToSquare(cell: number): string {
    if (!isValidCell(cell)) {
        throw new GameError(GameErrorCode.MOVE_INVALID_NOTATION, `Cell ${cell} is not on the board`, { cell });
    }
    const row = Math.floor(cell / BOARD_SIZE);
    const col = cell % BOARD_SIZE;
    return `${FILES[col]}${row + 1}`;
}

export function squareToCell(square: string): number {
    const match = /^([a-h])([1-8])$/.exec(square.trim().toLowerCase());
    if (!match) {
        throw new GameError(GameErrorCode.MOVE_INVALID_NOTATION, `Invalid square '${square}'`, { square });
    }
    const col = FILES.indexOf(match[1]);
    const row = Number(match[2]) - 1;
    return cellOf(row, col);
}

export function formatMove(move: Move): string {
    return move.type === 'pass' ? 'pass' : cellToSquare(move.cell);
}

export function parseMove(text: string): Move {
    if (text.trim().toLowerCase() === 'pass') {
        return PASS;
    }
    return place(squareToCell(text));
}
