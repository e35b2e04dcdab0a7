import { describe, it, expect } from 'vitest';
import { GameError, GameErrorCode } from '../core/errors';
import { DEFAULT_WEIGHTS, parseAgentConfig } from './config';

function configError(input: unknown): GameError {
    try {
        parseAgentConfig(input);
    } catch (error) {
        if (error instanceof GameError) {
            return error;
        }
        throw error;
    }
    throw new Error('Expected the configuration to be rejected');
}

describe('parseAgentConfig', () => {
    it('fills in defaults', () => {
        expect(parseAgentConfig()).toEqual({
            discWeight: 1,
            cornerWeight: 25,
            edgeWeight: 5,
            mobilityWeight: 2,
            depth: 4,
            moveOrdering: false
        });
    });

    it('keeps the values it is given', () => {
        const config = parseAgentConfig({ depth: 6, moveOrdering: true, seed: 42, cornerWeight: 0 });

        expect(config.depth).toBe(6);
        expect(config.moveOrdering).toBe(true);
        expect(config.seed).toBe(42);
        expect(config.cornerWeight).toBe(0);
        expect(config.edgeWeight).toBe(5);
    });

    it('rejects depths outside 1 to 12', () => {
        expect(configError({ depth: 0 }).code).toBe(GameErrorCode.CONFIGURATION_ERROR);
        expect(configError({ depth: 13 }).message).toContain('depth:');
        expect(configError({ depth: 2.5 }).message).toContain('depth:');
    });

    it('rejects negative weights', () => {
        expect(configError({ mobilityWeight: -1 }).message).toContain('mobilityWeight:');
    });

    it('rejects unknown options', () => {
        const error = configError({ depht: 3 });

        expect(error.message).toContain('(root)');
        expect(error.message).toContain('depht');
    });

    it('rejects input that is not an object', () => {
        expect(configError('deep').code).toBe(GameErrorCode.CONFIGURATION_ERROR);
    });

    it('lists every problem in the context', () => {
        expect(configError({ depth: 0, seed: 'x' }).context.issues).toHaveLength(2);
    });
});

describe('DEFAULT_WEIGHTS', () => {
    it('matches the documented defaults', () => {
        expect(DEFAULT_WEIGHTS).toEqual({ discWeight: 1, cornerWeight: 25, edgeWeight: 5, mobilityWeight: 2 });
    });
});
