import { Position } from '../core/Position';
import { applyMove } from '../core/Rules';
import { Move } from '../core/types';
import { Agent, pickBestMove } from './Agent';
import { DEFAULT_WEIGHTS, EvaluationWeights } from './config';
import { scorePosition } from './evaluation';

/**
 * Greedy agent: plays the move whose resulting position scores best for
 * the mover, looking no further than one ply. Ties go to the earliest move.
 */
export class ImmediateAgent implements Agent {
    public readonly name = 'immediate';

    constructor(private readonly weights: EvaluationWeights = DEFAULT_WEIGHTS) {}

    public chooseMove(position: Position, legalMoves: readonly Move[]): Move {
        const mover = position.sideToMove;
        return pickBestMove(legalMoves, (move) => scorePosition(applyMove(position, move), mover, this.weights)).move;
    }
}
