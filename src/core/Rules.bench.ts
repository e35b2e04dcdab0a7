import { bench, describe } from 'vitest';
import { playout } from '../testing/positions';
import { mulberry32 } from '../utils/random';
import { Position } from './Position';
import { legalMoves, placementMask } from './Rules';
import { Side } from './types';

const BOARD_COUNT = 100;

const rng = mulberry32(2024);
const randomBoards = Array.from({ length: BOARD_COUNT }, () => Position.random(rng));
const playedBoards = Array.from({ length: BOARD_COUNT }, (_, index) =>
    playout(Array.from({ length: 8 }, () => Math.floor(rng() * 1000)), index % 60)
);

describe('move generation', () => {
    bench('placementMask over random boards', () => {
        for (const position of randomBoards) {
            placementMask(position, Side.BLACK);
            placementMask(position, Side.WHITE);
        }
    });

    bench('legalMoves over played boards', () => {
        for (const position of playedBoards) {
            legalMoves(position);
        }
    });
});
