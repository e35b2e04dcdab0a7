import { describe, it, expect, vi } from 'vitest';
import { ImmediateAgent } from './ai/ImmediateAgent';
import { RandomAgent } from './ai/RandomAgent';
import { Position } from './core/Position';
import { GameState, PASS, Side, place } from './core/types';
import { playMatch } from './match';
import { mulberry32 } from './utils/random';

describe('playMatch', () => {
    it('plays through a forced pass to the end', () => {
        const result = playMatch({
            black: new ImmediateAgent(),
            white: new ImmediateAgent(),
            start: Position.parse('OX', Side.BLACK)
        });

        expect(result.state).toBe(GameState.WHITE_WIN);
        expect(result.winner).toBe(Side.WHITE);
        expect(result.reason).toBe('terminal');
        expect(result.blackDiscs).toBe(0);
        expect(result.whiteDiscs).toBe(3);
        expect(result.plies).toBe(2);
        expect(result.passes).toBe(1);
        expect(result.branchingFactor).toBe(1);
        expect(result.history).toEqual([
            { move: PASS, side: Side.BLACK },
            { move: place(2), side: Side.WHITE }
        ]);
    });

    it('returns at once when the start is already over', () => {
        const result = playMatch({
            black: new RandomAgent(),
            white: new RandomAgent(),
            start: Position.parse('X.O')
        });

        expect(result.state).toBe(GameState.DRAW);
        expect(result.winner).toBeNull();
        expect(result.plies).toBe(0);
        expect(result.branchingFactor).toBe(0);
    });

    it('stops at the ply limit', () => {
        const result = playMatch({
            black: new RandomAgent(mulberry32(1)),
            white: new RandomAgent(mulberry32(2)),
            maxPlies: 3
        });

        expect(result.reason).toBe('maxPlies');
        expect(result.state).toBe(GameState.IN_PROGRESS);
        expect(result.plies).toBe(3);
        expect(result.finalPosition.discCount(Side.BLACK) + result.finalPosition.discCount(Side.WHITE)).toBe(7);
    });

    it('plays a full game between random agents', () => {
        const onPly = vi.fn();
        const result = playMatch({
            black: new RandomAgent(mulberry32(11)),
            white: new RandomAgent(mulberry32(12)),
            onPly
        });

        expect(result.reason).toBe('terminal');
        expect(result.state).not.toBe(GameState.IN_PROGRESS);
        expect(result.history).toHaveLength(result.plies);
        expect(onPly).toHaveBeenCalledTimes(result.plies);
        expect(result.blackDiscs + result.whiteDiscs).toBe(4 + result.plies - result.passes);
        expect(result.branchingFactor).toBeGreaterThanOrEqual(1);
    });
});
