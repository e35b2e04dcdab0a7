import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Position } from '../core/Position';
import { legalMoves } from '../core/Rules';
import { PASS, Side, place } from '../core/types';
import { lateGamePosition, reachablePosition } from '../testing/positions';
import { AlphaBetaAgent } from './AlphaBetaAgent';
import { WIN_SCORE } from './evaluation';
import { MinimaxAgent } from './MinimaxAgent';

/**
 * Folds -0 into 0; both searches may reach a zero score by different signs
 */
function exact(score: number): number {
    return score + 0;
}

describe('AlphaBetaAgent', () => {
    it('finds a forced win', () => {
        const agent = new AlphaBetaAgent({ depth: 3 });
        expect(agent.search(Position.parse('XO.'))).toEqual({ move: place(2), score: WIN_SCORE + 3 });
    });

    it('passes when it must', () => {
        const position = Position.parse('OX', Side.BLACK);
        expect(new AlphaBetaAgent({ depth: 2 }).chooseMove(position, [PASS])).toBe(PASS);
    });

    it('searches fewer nodes than minimax for the same answer', () => {
        const minimax = new MinimaxAgent({ depth: 4 });
        const alphaBeta = new AlphaBetaAgent({ depth: 4 });

        const expected = minimax.search(Position.initial());
        const actual = alphaBeta.search(Position.initial());

        expect(actual.move).toEqual(expected.move);
        expect(exact(actual.score)).toBe(exact(expected.score));
        expect(minimax.getStats().lastNodesSearched).toBe(316);
        expect(alphaBeta.getStats().lastNodesSearched).toBeLessThan(316);
        expect(alphaBeta.getStats().lastNumChoices).toBe(4);
    });

    it('chooses the same move and score as minimax', () => {
        fc.assert(
            fc.property(reachablePosition, fc.integer({ min: 1, max: 3 }), fc.boolean(), (position, depth, moveOrdering) => {
                const expected = new MinimaxAgent({ depth }).search(position);
                const actual = new AlphaBetaAgent({ depth, moveOrdering }).search(position);

                expect(actual.move).toEqual(expected.move);
                expect(exact(actual.score)).toBe(exact(expected.score));
            }),
            { numRuns: 60 }
        );
    });

    it('matches minimax deeper in the late game', () => {
        fc.assert(
            fc.property(lateGamePosition, fc.boolean(), (position, moveOrdering) => {
                const expected = new MinimaxAgent({ depth: 4 }).search(position);
                const actual = new AlphaBetaAgent({ depth: 4, moveOrdering }).search(position);

                expect(actual.move).toEqual(expected.move);
                expect(exact(actual.score)).toBe(exact(expected.score));
            }),
            { numRuns: 30 }
        );
    });

    it('keeps the result when move ordering is switched on', () => {
        const plain = new AlphaBetaAgent({ depth: 5 });
        const ordered = new AlphaBetaAgent({ depth: 5, moveOrdering: true });
        const position = Position.initial();

        expect(ordered.chooseMove(position, legalMoves(position))).toEqual(plain.chooseMove(position, legalMoves(position)));
    });
});
