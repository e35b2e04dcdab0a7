import { formatMove } from '../core/notation';
import { Position } from '../core/Position';
import { applyMove, isTerminal, legalMoves } from '../core/Rules';
import { Move } from '../core/types';
import { childLogger } from '../utils/logger';
import { Agent, ScoredMove, SearchCounter, SearchStats, pickBestMove } from './Agent';
import { AgentConfig, AgentConfigInput, parseAgentConfig } from './config';
import { scorePosition } from './evaluation';

const log = childLogger('minimax');

/**
 * Full-width negamax search to a fixed depth.
 *
 * The value of a node is the best of its children's values, each negated
 * because the children are scored for the opponent. A forced pass is an
 * ordinary child and still uses up one ply. Ties keep the earliest move.
 */
export class MinimaxAgent implements Agent {
    public readonly name = 'minimax';
    private readonly config: AgentConfig;
    private readonly counter = new SearchCounter();

    constructor(options: AgentConfigInput = {}) {
        this.config = parseAgentConfig(options);
    }

    public get depth(): number {
        return this.config.depth;
    }

    public chooseMove(position: Position, moves: readonly Move[]): Move {
        return this.searchRoot(position, moves).move;
    }

    /**
     * Searches from a position and returns the chosen move with its score
     */
    public search(position: Position): ScoredMove {
        return this.searchRoot(position, legalMoves(position));
    }

    public getStats(): SearchStats {
        return this.counter.snapshot();
    }

    private searchRoot(position: Position, moves: readonly Move[]): ScoredMove {
        this.counter.beginSearch(moves.length);
        const result = pickBestMove(moves, (move) => -this.negamax(applyMove(position, move), this.config.depth - 1));
        this.counter.finishSearch();

        log.debug('search complete', {
            depth: this.config.depth,
            move: formatMove(result.move),
            score: result.score,
            nodes: this.counter.snapshot().lastNodesSearched
        });
        return result;
    }

    /**
     * Value of a position for its side to move
     */
    private negamax(position: Position, depth: number): number {
        this.counter.addNode();

        if (depth === 0 || isTerminal(position)) {
            return scorePosition(position, position.sideToMove, this.config);
        }

        let best = -Infinity;
        for (const move of legalMoves(position)) {
            const score = -this.negamax(applyMove(position, move), depth - 1);
            if (score > best) {
                best = score;
            }
        }
        return best;
    }
}
