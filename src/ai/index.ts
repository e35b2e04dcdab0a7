import { mulberry32 } from '../utils/random';
import type { Agent } from './Agent';
import { AlphaBetaAgent } from './AlphaBetaAgent';
import { type AgentConfigInput, parseAgentConfig } from './config';
import { ImmediateAgent } from './ImmediateAgent';
import { MinimaxAgent } from './MinimaxAgent';
import { RandomAgent } from './RandomAgent';

export type { Agent, ScoredMove, SearchStats } from './Agent';
export { SearchCounter, assertLegalChoice, pickBestMove } from './Agent';
export { AlphaBetaAgent } from './AlphaBetaAgent';
export type { AgentConfig, AgentConfigInput, EvaluationWeights } from './config';
export { AgentConfigSchema, DEFAULT_WEIGHTS, EvaluationWeightsSchema, parseAgentConfig } from './config';
export { WIN_SCORE, evaluatePosition, scorePosition, terminalScore } from './evaluation';
export { ImmediateAgent } from './ImmediateAgent';
export { MinimaxAgent } from './MinimaxAgent';
export { RandomAgent } from './RandomAgent';

export const AGENT_KINDS = ['random', 'immediate', 'minimax', 'alphabeta'] as const;
export type AgentKind = (typeof AGENT_KINDS)[number];

export function isAgentKind(value: string): value is AgentKind {
    return AGENT_KINDS.some((kind) => kind === value);
}

/**
 * Builds an agent by strategy name
 */
export function createAgent(kind: AgentKind, options: AgentConfigInput = {}): Agent {
    const config = parseAgentConfig(options);
    switch (kind) {
        case 'random':
            return new RandomAgent(config.seed === undefined ? Math.random : mulberry32(config.seed));
        case 'immediate':
            return new ImmediateAgent(config);
        case 'minimax':
            return new MinimaxAgent(config);
        case 'alphabeta':
            return new AlphaBetaAgent(config);
    }
}
