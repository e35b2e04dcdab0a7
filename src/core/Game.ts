import type { Agent } from '../ai/Agent';
import { assertLegalChoice } from '../ai/Agent';
import { childLogger } from '../utils/logger';
import { GameError, GameErrorCode } from './errors';
import { formatMove } from './notation';
import { Position } from './Position';
import { applyMove, isTerminal, legalMoves, winner } from './Rules';
import { GameState, Move, MoveRecord, Outcome, Side, movesEqual } from './types';

const log = childLogger('game');

/**
 * Represents an Othello game in progress: the current position, the moves
 * played so far and whether the game has ended
 */
export class Game {
    private readonly start: Position;
    private position: Position;
    private gameState: GameState;
    private moveHistory: MoveRecord[];

    constructor(start: Position = Position.initial()) {
        this.start = start;
        this.position = start;
        this.moveHistory = [];
        this.gameState = Game.stateOf(start);
    }

    /**
     * Gets the current position
     */
    public getPosition(): Position {
        return this.position;
    }

    /**
     * Gets the side to move
     */
    public getCurrentPlayer(): Side {
        return this.position.sideToMove;
    }

    /**
     * Gets the current game state
     */
    public getGameState(): GameState {
        return this.gameState;
    }

    /**
     * Gets the move history
     */
    public getMoveHistory(): MoveRecord[] {
        return [...this.moveHistory];
    }

    /**
     * Gets the legal moves of the side to move, or nothing once the game is over
     */
    public getLegalMoves(): Move[] {
        if (this.gameState !== GameState.IN_PROGRESS) {
            return [];
        }
        return legalMoves(this.position);
    }

    /**
     * Plays a move for the side to move; throws if it is not legal
     */
    public makeMove(move: Move): void {
        if (this.gameState !== GameState.IN_PROGRESS) {
            throw new GameError(GameErrorCode.GAME_ALREADY_OVER, 'The game is already over', {
                move: formatMove(move)
            });
        }

        const side = this.position.sideToMove;
        this.position = applyMove(this.position, move);
        this.moveHistory.push({ move, side });
        this.gameState = Game.stateOf(this.position);

        if (this.gameState !== GameState.IN_PROGRESS) {
            log.info('game over', {
                state: this.gameState,
                black: this.position.discCount(Side.BLACK),
                white: this.position.discCount(Side.WHITE),
                plies: this.moveHistory.length
            });
        }
    }

    /**
     * Asks an agent for the side to move's decision and plays it
     */
    public playTurn(agent: Agent): Move {
        const moves = this.getLegalMoves();
        if (moves.length === 0) {
            throw new GameError(GameErrorCode.GAME_ALREADY_OVER, 'The game is already over', { agent: agent.name });
        }

        const move = agent.chooseMove(this.position, moves);
        try {
            assertLegalChoice(agent, move, moves);
        } catch (error) {
            log.error('agent broke its contract', { agent: agent.name, error });
            throw error;
        }
        this.makeMove(move);
        return move;
    }

    /**
     * Resets the game to the position it started from
     */
    public reset(): void {
        this.position = this.start;
        this.gameState = Game.stateOf(this.start);
        this.moveHistory = [];
    }

    /**
     * Checks if a move is valid
     */
    public isValidMove(move: Move): boolean {
        return this.getLegalMoves().some((candidate) => movesEqual(candidate, move));
    }

    /**
     * Gets the winner (if any)
     */
    public getWinner(): Side | null {
        if (this.gameState === GameState.BLACK_WIN) {
            return Side.BLACK;
        }
        if (this.gameState === GameState.WHITE_WIN) {
            return Side.WHITE;
        }
        return null;
    }

    private static stateOf(position: Position): GameState {
        if (!isTerminal(position)) {
            return GameState.IN_PROGRESS;
        }
        switch (winner(position)) {
            case Outcome.BLACK:
                return GameState.BLACK_WIN;
            case Outcome.WHITE:
                return GameState.WHITE_WIN;
            case Outcome.DRAW:
                return GameState.DRAW;
        }
    }
}
