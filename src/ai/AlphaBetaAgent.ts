import { AgentContractError } from '../core/errors';
import { formatMove } from '../core/notation';
import { Position } from '../core/Position';
import { applyMove, isTerminal, legalMoves } from '../core/Rules';
import { Move } from '../core/types';
import { childLogger } from '../utils/logger';
import { Agent, ScoredMove, SearchCounter, SearchStats } from './Agent';
import { AgentConfig, AgentConfigInput, parseAgentConfig } from './config';
import { scorePosition } from './evaluation';

const log = childLogger('alphabeta');

/**
 * Negamax with alpha-beta pruning.
 *
 * Each call gets a window [alpha, beta] in the point of view of the side to
 * move. Once a child proves the node is worth at least beta, the remaining
 * children cannot change the parent's choice and are skipped. Scores and the
 * chosen root move are the same as a full minimax search of the same depth.
 */
export class AlphaBetaAgent implements Agent {
    public readonly name = 'alphabeta';
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

    public search(position: Position): ScoredMove {
        return this.searchRoot(position, legalMoves(position));
    }

    public getStats(): SearchStats {
        return this.counter.snapshot();
    }

    private searchRoot(position: Position, moves: readonly Move[]): ScoredMove {
        if (moves.length === 0) {
            throw new AgentContractError('Agent was asked to choose from no moves');
        }
        this.counter.beginSearch(moves.length);

        // The root keeps enumeration order so ties resolve like minimax
        let best: ScoredMove | null = null;
        let alpha = -Infinity;
        for (const move of moves) {
            const score = -this.alphaBeta(applyMove(position, move), this.config.depth - 1, -Infinity, -alpha);
            if (best === null || score > best.score) {
                best = { move, score };
            }
            if (best.score > alpha) {
                alpha = best.score;
            }
        }
        this.counter.finishSearch();

        if (best === null) {
            throw new AgentContractError('Agent was asked to choose from no moves');
        }
        log.debug('search complete', {
            depth: this.config.depth,
            move: formatMove(best.move),
            score: best.score,
            nodes: this.counter.snapshot().lastNodesSearched
        });
        return best;
    }

    private alphaBeta(position: Position, depth: number, alpha: number, beta: number): number {
        this.counter.addNode();

        if (depth === 0 || isTerminal(position)) {
            return scorePosition(position, position.sideToMove, this.config);
        }

        let best = -Infinity;
        for (const child of this.children(position, depth)) {
            const score = -this.alphaBeta(child, depth - 1, -beta, -alpha);
            if (score > best) {
                best = score;
            }
            if (best > alpha) {
                alpha = best;
            }
            if (alpha >= beta) {
                break;
            }
        }
        return best;
    }

    /**
     * Child positions in search order. With move ordering on, the children
     * that look worst for the opponent come first; leaf parents skip the sort
     * because their children are scored right away.
     */
    private children(position: Position, depth: number): Position[] {
        const children = legalMoves(position).map((move) => applyMove(position, move));
        if (!this.config.moveOrdering || depth < 2 || children.length < 2) {
            return children;
        }
        return children
            .map((child) => ({ child, key: scorePosition(child, child.sideToMove, this.config) }))
            .sort((a, b) => a.key - b.key)
            .map(({ child }) => child);
    }
}
