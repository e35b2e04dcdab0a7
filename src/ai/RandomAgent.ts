import { Position } from '../core/Position';
import { Move } from '../core/types';
import { Rng, pickOne } from '../utils/random';
import { Agent } from './Agent';

/**
 * Baseline agent: picks uniformly among the legal moves
 */
export class RandomAgent implements Agent {
    public readonly name = 'random';

    constructor(private readonly rng: Rng = Math.random) {}

    public chooseMove(_position: Position, legalMoves: readonly Move[]): Move {
        return pickOne(legalMoves, this.rng);
    }
}
