import { AgentContractError } from '../core/errors';
import { formatMove } from '../core/notation';
import { Position } from '../core/Position';
import { Move, movesEqual } from '../core/types';

/**
 * Interface for move-choosing agents.
 * Implement this interface to create different strategies; a driver can
 * swap them without any other change.
 */
export interface Agent {
    /** Short strategy name used in logs and match reports */
    readonly name: string;

    /**
     * Picks the next move for the side to move
     * @param legalMoves - Non-empty list from the rules engine; the returned
     * move must be one of its elements
     */
    chooseMove(position: Position, legalMoves: readonly Move[]): Move;

    /**
     * Optional search statistics for agents that walk a game tree
     */
    getStats?(): SearchStats;
}

export interface SearchStats {
    /** Nodes visited over the lifetime of the agent */
    totalNodesSearched: number;
    /** Nodes visited by the latest decision */
    lastNodesSearched: number;
    /** Legal moves offered to the latest decision */
    lastNumChoices: number;
}

/**
 * A root move with the score the search gave it
 */
export interface ScoredMove {
    move: Move;
    score: number;
}

/**
 * Node counters kept by a search agent, one instance per agent
 */
export class SearchCounter {
    private totalNodes = 0;
    private lastNodes = 0;
    private lastChoices = 0;

    public beginSearch(numChoices: number): void {
        this.lastChoices = numChoices;
        this.lastNodes = 0;
    }

    public addNode(): void {
        this.lastNodes++;
    }

    public finishSearch(): void {
        this.totalNodes += this.lastNodes;
    }

    public snapshot(): SearchStats {
        return {
            totalNodesSearched: this.totalNodes,
            lastNodesSearched: this.lastNodes,
            lastNumChoices: this.lastChoices
        };
    }
}

/**
 * Returns the first move with the highest score; later moves must score
 * strictly higher to replace it
 */
export function pickBestMove(legalMoves: readonly Move[], score: (move: Move) => number): ScoredMove {
    if (legalMoves.length === 0) {
        throw new AgentContractError('Agent was asked to choose from no moves');
    }
    let best: ScoredMove = { move: legalMoves[0], score: score(legalMoves[0]) };
    for (let i = 1; i < legalMoves.length; i++) {
        const value = score(legalMoves[i]);
        if (value > best.score) {
            best = { move: legalMoves[i], score: value };
        }
    }
    return best;
}

/**
 * Checks that an agent answered with one of the moves it was offered
 */
export function assertLegalChoice(agent: Agent, move: Move, legalMoves: readonly Move[]): void {
    if (!legalMoves.some((candidate) => movesEqual(candidate, move))) {
        throw new AgentContractError(`${agent.name} chose a move it was not offered`, {
            agent: agent.name,
            move: move.type === 'pass' ? 'pass' : String(move.cell),
            offered: legalMoves.map(formatMove)
        });
    }
}
