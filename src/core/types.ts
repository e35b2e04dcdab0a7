/**
 * Number of rows and columns on the board
 */
export const BOARD_SIZE = 8;

/**
 * Number of cells on the board; cell indices run from 0 to CELL_COUNT - 1
 */
export const CELL_COUNT = BOARD_SIZE * BOARD_SIZE;

/**
 * Represents the color of a player's discs
 */
export enum Side {
    BLACK = 'BLACK',
    WHITE = 'WHITE'
}

/**
 * Result of a finished game
 */
export enum Outcome {
    BLACK = 'BLACK',
    WHITE = 'WHITE',
    DRAW = 'DRAW'
}

/**
 * Represents the state of the game
 */
export enum GameState {
    IN_PROGRESS = 'IN_PROGRESS',
    BLACK_WIN = 'BLACK_WIN',
    WHITE_WIN = 'WHITE_WIN',
    DRAW = 'DRAW'
}

/**
 * Places a disc on a cell (row * BOARD_SIZE + col)
 */
export interface PlaceMove {
    readonly type: 'place';
    readonly cell: number;
}

/**
 * Gives up the turn; only legal when no placement exists
 */
export interface PassMove {
    readonly type: 'pass';
}

export type Move = PlaceMove | PassMove;

/**
 * A move together with the side that played it
 */
export interface MoveRecord {
    move: Move;
    side: Side;
}

export const PASS: PassMove = Object.freeze({ type: 'pass' });

export function place(cell: number): PlaceMove {
    return { type: 'place', cell };
}

export function movesEqual(a: Move, b: Move): boolean {
    if (a.type === 'pass' || b.type === 'pass') {
        return a.type === b.type;
    }
    return a.cell === b.cell;
}

export function opponent(side: Side): Side {
    return side === Side.BLACK ? Side.WHITE : Side.BLACK;
}

export function cellOf(row: number, col: number): number {
    return row * BOARD_SIZE + col;
}

export function isValidCell(cell: number): boolean {
    return Number.isInteger(cell) && cell >= 0 && cell < CELL_COUNT;
}
