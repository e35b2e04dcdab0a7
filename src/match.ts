import type { Agent } from './ai/Agent';
import { Game } from './core/Game';
import { Position } from './core/Position';
import { GameState, MoveRecord, Side } from './core/types';

export interface MatchOptions {
    black: Agent;
    white: Agent;
    /** Starting position; defaults to the standard opening */
    start?: Position;
    /** Stop after this many plies even if the game is not over */
    maxPlies?: number;
    /** Called after every ply with the new position */
    onPly?: (position: Position, record: MoveRecord) => void;
}

export interface MatchResult {
    state: GameState;
    winner: Side | null;
    blackDiscs: number;
    whiteDiscs: number;
    plies: number;
    passes: number;
    /** Mean number of legal moves offered per decision */
    branchingFactor: number;
    reason: 'terminal' | 'maxPlies';
    history: MoveRecord[];
    finalPosition: Position;
}

/**
 * Plays two agents against each other until the game ends
 */
export function playMatch(opts: MatchOptions): MatchResult {
    const game = new Game(opts.start);
    const maxPlies = opts.maxPlies ?? Number.POSITIVE_INFINITY;
    let plies = 0;
    let passes = 0;
    let offered = 0;

    while (game.getGameState() === GameState.IN_PROGRESS && plies < maxPlies) {
        const side = game.getCurrentPlayer();
        const agent = side === Side.BLACK ? opts.black : opts.white;
        offered += game.getLegalMoves().length;

        const move = game.playTurn(agent);
        plies++;
        if (move.type === 'pass') {
            passes++;
        }
        opts.onPly?.(game.getPosition(), { move, side });
    }

    const position = game.getPosition();
    return {
        state: game.getGameState(),
        winner: game.getWinner(),
        blackDiscs: position.discCount(Side.BLACK),
        whiteDiscs: position.discCount(Side.WHITE),
        plies,
        passes,
        branchingFactor: plies === 0 ? 0 : offered / plies,
        reason: game.getGameState() === GameState.IN_PROGRESS ? 'maxPlies' : 'terminal',
        history: game.getMoveHistory(),
        finalPosition: position
    };
}
