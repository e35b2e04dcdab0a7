import { EMPTY, FULL, bit, hasBit, popCount } from './BitBoard';
import { type Rng, pickOne } from '../utils/random';
import { InvalidPositionError } from './errors';
import { BOARD_SIZE, CELL_COUNT, Side, cellOf, isValidCell, opponent } from './types';

const CELL_CONTENTS: readonly (Side | null)[] = [null, Side.BLACK, Side.WHITE];

const GLYPHS = new Map<string, Side | null>([
    ['X', Side.BLACK],
    ['O', Side.WHITE],
    ['.', null]
]);

/**
 * Represents an Othello position: the discs of both sides and the side to move.
 * Positions are immutable; the rules engine returns a new one for every move.
 */
export class Position {
    public readonly black: bigint;
    public readonly white: bigint;
    public readonly sideToMove: Side;

    constructor(black: bigint, white: bigint, sideToMove: Side = Side.BLACK) {
        if (black < 0n || white < 0n || black > FULL || white > FULL) {
            throw new InvalidPositionError('OUT_OF_RANGE', 'Occupancy set does not fit on the board', {
                black: black.toString(16),
                white: white.toString(16)
            });
        }
        if ((black & white) !== EMPTY) {
            throw new InvalidPositionError('OVERLAPPING_DISCS', 'A cell is occupied by both sides', {
                overlap: (black & white).toString(16)
            });
        }
        this.black = black;
        this.white = white;
        this.sideToMove = sideToMove;
    }

    /**
     * Standard opening: white on d4 and e5, black on d5 and e4, Black to move
     */
    public static initial(): Position {
        const black = bit(cellOf(3, 4)) | bit(cellOf(4, 3));
        const white = bit(cellOf(3, 3)) | bit(cellOf(4, 4));
        return new Position(black, white, Side.BLACK);
    }

    /**
     * Fills every cell with nothing, a black disc or a white disc with equal
     * odds. The result need not be reachable from the opening; it is meant
     * for timing move generation over varied boards.
     */
    public static random(rng: Rng, sideToMove: Side = Side.BLACK): Position {
        let black = EMPTY;
        let white = EMPTY;
        for (let cell = 0; cell < CELL_COUNT; cell++) {
            const side = pickOne(CELL_CONTENTS, rng);
            if (side === Side.BLACK) {
                black |= bit(cell);
            } else if (side === Side.WHITE) {
                white |= bit(cell);
            }
        }
        return new Position(black, white, sideToMove);
    }

    /**
     * Reads a position from rows of `X` (black), `O` (white) and `.` (empty).
     * Missing rows and columns are treated as empty.
     */
    public static parse(text: string, sideToMove: Side = Side.BLACK): Position {
        let black = EMPTY;
        let white = EMPTY;
        const lines = text.split('\n');
        // A trailing newline does not start another row
        if (lines.length > 0 && lines[lines.length - 1] === '') {
            lines.pop();
        }

        lines.forEach((line, row) => {
            if (row >= BOARD_SIZE) {
                throw new InvalidPositionError('TOO_MANY_ROWS', `Position has more than ${BOARD_SIZE} rows`);
            }
            [...line].forEach((ch, col) => {
                const side = GLYPHS.get(ch);
                if (side === undefined) {
                    throw new InvalidPositionError('INVALID_PIECE', `Unknown piece '${ch}'`, { row, col });
                }
                if (col >= BOARD_SIZE) {
                    throw new InvalidPositionError('TOO_MANY_COLUMNS', `Row ${row + 1} has more than ${BOARD_SIZE} columns`);
                }
                if (side === Side.BLACK) {
                    black |= bit(cellOf(row, col));
                } else if (side === Side.WHITE) {
                    white |= bit(cellOf(row, col));
                }
            });
        });

        return new Position(black, white, sideToMove);
    }

    /**
     * Gets the discs of one side
     */
    public occupied(side: Side): bigint {
        return side === Side.BLACK ? this.black : this.white;
    }

    /**
     * Gets all occupied cells
     */
    public occupiedCells(): bigint {
        return this.black | this.white;
    }

    /**
     * Gets the side whose disc is on the cell, or null for an empty cell or
     * one off the board
     */
    public getCell(cell: number): Side | null {
        if (!isValidCell(cell)) {
            return null;
        }
        if (hasBit(this.black, cell)) {
            return Side.BLACK;
        }
        if (hasBit(this.white, cell)) {
            return Side.WHITE;
        }
        return null;
    }

    /**
     * True for a cell on the board with no disc on it
     */
    public isEmpty(cell: number): boolean {
        return isValidCell(cell) && this.getCell(cell) === null;
    }

    public discCount(side: Side): number {
        return popCount(this.occupied(side));
    }

    public emptyCount(): number {
        return CELL_COUNT - popCount(this.occupiedCells());
    }

    public isFull(): boolean {
        return this.occupiedCells() === FULL;
    }

    public withSideToMove(side: Side): Position {
        return new Position(this.black, this.white, side);
    }

    /**
     * Same discs with the other side to move
     */
    public swapTurn(): Position {
        return this.withSideToMove(opponent(this.sideToMove));
    }

    public equals(other: Position): boolean {
        return this.black === other.black && this.white === other.white && this.sideToMove === other.sideToMove;
    }

    public toString(): string {
        const rows: string[] = [];
        for (let row = 0; row < BOARD_SIZE; row++) {
            let line = '';
            for (let col = 0; col < BOARD_SIZE; col++) {
                const side = this.getCell(cellOf(row, col));
                line += side === Side.BLACK ? 'X' : side === Side.WHITE ? 'O' : '.';
            }
            rows.push(line);
        }
        return rows.join('\n');
    }
}
