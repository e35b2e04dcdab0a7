import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { GameError } from '../core/errors';
import { Position } from '../core/Position';
import { legalMoves } from '../core/Rules';
import { PASS, Side, place } from '../core/types';
import { reachablePosition } from '../testing/positions';
import { WIN_SCORE } from './evaluation';
import { ImmediateAgent } from './ImmediateAgent';
import { MinimaxAgent } from './MinimaxAgent';

const DISCS_ONLY = { discWeight: 1, cornerWeight: 0, edgeWeight: 0, mobilityWeight: 0 };

describe('MinimaxAgent', () => {
    it('defaults to depth 4', () => {
        expect(new MinimaxAgent().depth).toBe(4);
    });

    it('rejects an invalid depth', () => {
        expect(() => new MinimaxAgent({ depth: 0 })).toThrow(GameError);
    });

    it('scores a one-ply search by the resulting position', () => {
        const agent = new MinimaxAgent({ ...DISCS_ONLY, depth: 1 });

        expect(agent.search(Position.parse('XOO.\n........\nXO.'))).toEqual({ move: place(3), score: 4 });
    });

    it('finds a forced win and scores it above any heuristic value', () => {
        const agent = new MinimaxAgent({ depth: 3 });

        expect(agent.search(Position.parse('XO.'))).toEqual({ move: place(2), score: WIN_SCORE + 3 });
        expect(agent.getStats()).toEqual({ totalNodesSearched: 1, lastNodesSearched: 1, lastNumChoices: 1 });
    });

    it('passes when it must', () => {
        const position = Position.parse('OX', Side.BLACK);
        expect(new MinimaxAgent({ depth: 2 }).chooseMove(position, [PASS])).toBe(PASS);
    });

    it('visits every node of the tree', () => {
        const agent = new MinimaxAgent({ depth: 2 });
        agent.chooseMove(Position.initial(), legalMoves(Position.initial()));

        expect(agent.getStats()).toEqual({ totalNodesSearched: 16, lastNodesSearched: 16, lastNumChoices: 4 });

        agent.chooseMove(Position.initial(), legalMoves(Position.initial()));
        expect(agent.getStats().totalNodesSearched).toBe(32);
    });

    it('agrees with the immediate agent at depth one', () => {
        const minimax = new MinimaxAgent({ depth: 1 });
        const immediate = new ImmediateAgent();

        fc.assert(
            fc.property(reachablePosition, (position) => {
                const moves = legalMoves(position);
                expect(minimax.chooseMove(position, moves)).toEqual(immediate.chooseMove(position, moves));
            })
        );
    });
});
