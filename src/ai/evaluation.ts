import { CORNERS, EDGES, popCount } from '../core/BitBoard';
import { Position } from '../core/Position';
import { isTerminal, mobility } from '../core/Rules';
import { Side, opponent } from '../core/types';
import { DEFAULT_WEIGHTS, EvaluationWeights } from './config';

/**
 * Base score of a won game. It is far above anything the heuristic can
 * return, so a forced win always outranks a non-terminal position.
 */
export const WIN_SCORE = 1_000_000_000;

/**
 * Static heuristic from the point of view of `side`.
 * Every term is (side's count - opponent's count) times its weight, which
 * makes the result exactly the negation of the opponent's score.
 */
export function evaluatePosition(
    position: Position,
    side: Side,
    weights: EvaluationWeights = DEFAULT_WEIGHTS
): number {
    const other = opponent(side);
    const mine = position.occupied(side);
    const theirs = position.occupied(other);

    const discs = popCount(mine) - popCount(theirs);
    const corners = popCount(mine & CORNERS) - popCount(theirs & CORNERS);
    const edges = popCount(mine & EDGES) - popCount(theirs & EDGES);
    const moves = weights.mobilityWeight === 0 ? 0 : mobility(position, side) - mobility(position, other);

    return (
        weights.discWeight * discs +
        weights.cornerWeight * corners +
        weights.edgeWeight * edges +
        weights.mobilityWeight * moves
    );
}

/**
 * Score of a finished game for `side`: WIN_SCORE plus the disc margin for a
 * win, the negation for a loss, zero for a draw
 */
export function terminalScore(position: Position, side: Side): number {
    const margin = position.discCount(side) - position.discCount(opponent(side));
    if (margin === 0) {
        return 0;
    }
    return Math.sign(margin) * WIN_SCORE + margin;
}

/**
 * Scores any position for `side`, using the terminal score once the game is over
 */
export function scorePosition(
    position: Position,
    side: Side,
    weights: EvaluationWeights = DEFAULT_WEIGHTS
): number {
    return isTerminal(position) ? terminalScore(position, side) : evaluatePosition(position, side, weights);
}
