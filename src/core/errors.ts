/**
 * Error codes raised by the engine, grouped by prefix:
 * - POSITION_*: malformed positions
 * - MOVE_*: moves that cannot be applied or parsed
 * - GAME_*: queries that need a particular game state
 * - AGENT_*: agents breaking their contract
 */
export enum GameErrorCode {
    POSITION_INVALID = 'POSITION_INVALID',
    MOVE_ILLEGAL = 'MOVE_ILLEGAL',
    MOVE_INVALID_NOTATION = 'MOVE_INVALID_NOTATION',
    GAME_NOT_OVER = 'GAME_NOT_OVER',
    GAME_ALREADY_OVER = 'GAME_ALREADY_OVER',
    AGENT_CONTRACT_VIOLATION = 'AGENT_CONTRACT_VIOLATION',
    CONFIGURATION_ERROR = 'CONFIGURATION_ERROR'
}

/**
 * Base class for all engine errors
 */
export class GameError extends Error {
    /** Error code for programmatic handling */
    public readonly code: GameErrorCode;

    /** Additional context for debugging */
    public readonly context: Record<string, unknown>;

    /** Whether the error means a caller is broken rather than the input */
    public readonly isFatal: boolean;

    constructor(
        code: GameErrorCode,
        message: string,
        context: Record<string, unknown> = {},
        isFatal: boolean = false
    ) {
        super(message);
        this.name = 'GameError';
        this.code = code;
        this.context = context;
        this.isFatal = isFatal;

        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export type InvalidPositionReason =
    | 'OVERLAPPING_DISCS'
    | 'OUT_OF_RANGE'
    | 'TOO_MANY_ROWS'
    | 'TOO_MANY_COLUMNS'
    | 'INVALID_PIECE';

/**
 * Thrown when a position would break the board invariants
 */
export class InvalidPositionError extends GameError {
    public readonly reason: InvalidPositionReason;

    constructor(reason: InvalidPositionReason, message: string, context: Record<string, unknown> = {}) {
        super(GameErrorCode.POSITION_INVALID, message, { ...context, reason });
        this.name = 'InvalidPositionError';
        this.reason = reason;
    }
}

/**
 * Thrown when a move is not in the legal moves of the position it is applied to
 */
export class IllegalMoveError extends GameError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super(GameErrorCode.MOVE_ILLEGAL, message, context);
        this.name = 'IllegalMoveError';
    }
}

/**
 * Thrown when an agent returns a move it was not offered
 */
export class AgentContractError extends GameError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super(GameErrorCode.AGENT_CONTRACT_VIOLATION, message, context, true);
        this.name = 'AgentContractError';
    }
}
