import { BOARD_SIZE, CELL_COUNT } from './types';

/**
 * Helpers for 64-bit occupancy sets stored as bigints.
 * Bit i stands for cell i = row * 8 + col; row 0 is rank 1 and col 0 is file a.
 */

export const EMPTY = 0n;
export const FULL = (1n << BigInt(CELL_COUNT)) - 1n;

const FILE_A = 0x0101010101010101n;
const FILE_H = 0x8080808080808080n;
const NOT_FILE_A = FULL & ~FILE_A;
const NOT_FILE_H = FULL & ~FILE_H;

export const CORNERS = 0x8100000000000081n;
export const BORDER = 0xff818181818181ffn;
export const EDGES = BORDER & ~CORNERS;

/**
 * The eight ray directions, as signed bit shifts
 */
export enum Direction {
    N = -BOARD_SIZE,
    S = BOARD_SIZE,
    E = 1,
    W = -1,
    NE = -BOARD_SIZE + 1,
    NW = -BOARD_SIZE - 1,
    SE = BOARD_SIZE + 1,
    SW = BOARD_SIZE - 1
}

export const DIRECTIONS: readonly Direction[] = [
    Direction.N,
    Direction.S,
    Direction.E,
    Direction.W,
    Direction.NE,
    Direction.NW,
    Direction.SE,
    Direction.SW
];

/**
 * Moves every bit one step in the given direction, dropping bits that
 * would wrap around to the opposite file or fall off the board
 */
export function shift(bits: bigint, direction: Direction): bigint {
    const shifted = direction > 0
        ? (bits << BigInt(direction)) & FULL
        : bits >> BigInt(-direction);

    switch (direction) {
        case Direction.E:
        case Direction.NE:
        case Direction.SE:
            return shifted & NOT_FILE_A;
        case Direction.W:
        case Direction.NW:
        case Direction.SW:
            return shifted & NOT_FILE_H;
        default:
            return shifted;
    }
}

export function bit(cell: number): bigint {
    return 1n << BigInt(cell);
}

export function hasBit(bits: bigint, cell: number): boolean {
    return ((bits >> BigInt(cell)) & 1n) === 1n;
}

export function popCount(bits: bigint): number {
    let count = 0;
    let rest = bits;
    while (rest !== 0n) {
        rest &= rest - 1n;
        count++;
    }
    return count;
}

/**
 * Lists the set cells in ascending order
 */
export function cells(bits: bigint): number[] {
    const result: number[] = [];
    for (let cell = 0; cell < CELL_COUNT && bits >> BigInt(cell) !== 0n; cell++) {
        if (hasBit(bits, cell)) {
            result.push(cell);
        }
    }
    return result;
}

export function fromCells(list: readonly number[]): bigint {
    return list.reduce((acc, cell) => acc | bit(cell), EMPTY);
}

/**
 * Cells reachable from `gen` by stepping through `pro` in one direction,
 * not counting the starting cells (an occluded fill)
 */
export function fillOccluded(gen: bigint, pro: bigint, direction: Direction): bigint {
    let flood = EMPTY;
    let frontier = shift(gen, direction) & pro;
    while (frontier !== EMPTY) {
        flood |= frontier;
        frontier = shift(frontier, direction) & pro;
    }
    return flood;
}
