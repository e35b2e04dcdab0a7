import { bench, describe } from 'vitest';
import { Position } from '../core/Position';
import { legalMoves } from '../core/Rules';
import { playout } from '../testing/positions';
import { mulberry32 } from '../utils/random';
import { AlphaBetaAgent } from './AlphaBetaAgent';
import { MinimaxAgent } from './MinimaxAgent';

const BOARD_COUNT = 100;

const rng = mulberry32(7);
const boards: Position[] = Array.from({ length: BOARD_COUNT }, (_, index) =>
    playout(Array.from({ length: 8 }, () => Math.floor(rng() * 1000)), 10 + (index % 40))
);

const minimax = new MinimaxAgent({ depth: 3 });
const alphaBeta = new AlphaBetaAgent({ depth: 3 });
const ordered = new AlphaBetaAgent({ depth: 3, moveOrdering: true });

describe('depth 3 search', () => {
    bench('minimax', () => {
        for (const position of boards) {
            minimax.chooseMove(position, legalMoves(position));
        }
    });

    bench('alphabeta', () => {
        for (const position of boards) {
            alphaBeta.chooseMove(position, legalMoves(position));
        }
    });

    bench('alphabeta with move ordering', () => {
        for (const position of boards) {
            ordered.chooseMove(position, legalMoves(position));
        }
    });
});
