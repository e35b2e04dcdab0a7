import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Position } from '../core/Position';
import { applyMove, isTerminal } from '../core/Rules';
import { Side, place } from '../core/types';
import { finishedPosition, reachablePosition } from '../testing/positions';
import { DEFAULT_WEIGHTS } from './config';
import { WIN_SCORE, evaluatePosition, scorePosition, terminalScore } from './evaluation';

describe('evaluation', () => {
    describe('evaluatePosition', () => {
        it('scores the opening as even', () => {
            expect(evaluatePosition(Position.initial(), Side.BLACK)).toBe(0);
        });

        it('adds up corner, edge and mobility differences', () => {
            // Black holds a corner and can move; White holds an edge and cannot
            const position = Position.parse('XO.');

            expect(evaluatePosition(position, Side.BLACK)).toBe(25 - 5 + 2);
            expect(evaluatePosition(position, Side.WHITE)).toBe(-22);
        });

        it('uses the weights it is given', () => {
            const position = Position.parse('XO.');
            const discsOnly = { ...DEFAULT_WEIGHTS, cornerWeight: 0, edgeWeight: 0, mobilityWeight: 0 };

            expect(evaluatePosition(position, Side.BLACK, discsOnly)).toBe(0);
            expect(evaluatePosition(Position.parse('XXO'), Side.BLACK, discsOnly)).toBe(1);
        });

        it('is zero-sum over reachable positions', () => {
            fc.assert(
                fc.property(reachablePosition, (position) => {
                    const black = scorePosition(position, Side.BLACK);
                    const white = scorePosition(position, Side.WHITE);
                    expect(black + white).toBe(0);
                })
            );
        });
    });

    describe('terminalScore', () => {
        it('rewards a win with the base score plus the margin', () => {
            const finished = applyMove(Position.parse('XO.'), place(2));

            expect(isTerminal(finished)).toBe(true);
            expect(terminalScore(finished, Side.BLACK)).toBe(WIN_SCORE + 3);
            expect(terminalScore(finished, Side.WHITE)).toBe(-(WIN_SCORE + 3));
        });

        it('is zero-sum for finished games', () => {
            fc.assert(
                fc.property(finishedPosition, (position) => {
                    const black = terminalScore(position, Side.BLACK);

                    expect(scorePosition(position, Side.BLACK)).toBe(black);
                    expect(black + terminalScore(position, Side.WHITE)).toBe(0);
                    expect(Math.abs(black) === 0 || Math.abs(black) > WIN_SCORE).toBe(true);
                })
            );
        });

        it('scores a draw as zero', () => {
            expect(terminalScore(Position.parse('X.O'), Side.BLACK)).toBe(0);
        });
    });

    describe('scorePosition', () => {
        it('uses the heuristic until the game is over', () => {
            const position = Position.parse('XO.');

            expect(scorePosition(position, Side.BLACK)).toBe(22);
            expect(scorePosition(applyMove(position, place(2)), Side.BLACK)).toBe(WIN_SCORE + 3);
        });

        it('ranks any win above any heuristic score', () => {
            const full = Position.parse('XXXXXXXX\n'.repeat(8));
            expect(evaluatePosition(full, Side.BLACK)).toBeLessThan(WIN_SCORE);
        });
    });
});
