import { z } from 'zod';
import { GameError, GameErrorCode } from '../core/errors';

const WeightSchema = z.number().finite().min(0).max(10_000);

/**
 * Weights of the static evaluation. Each term is the difference between the
 * side being scored and its opponent, so a higher weight makes that term
 * count for more.
 */
export const EvaluationWeightsSchema = z.object({
    /** Per disc */
    discWeight: WeightSchema.default(1),
    /** Per corner disc */
    cornerWeight: WeightSchema.default(25),
    /** Per disc on a border cell that is not a corner */
    edgeWeight: WeightSchema.default(5),
    /** Per available placement */
    mobilityWeight: WeightSchema.default(2)
});

export type EvaluationWeights = z.infer<typeof EvaluationWeightsSchema>;

/**
 * Options recognized by every agent; strategies ignore the ones they do not use.
 */
export const AgentConfigSchema = EvaluationWeightsSchema.extend({
    /** Search depth in plies */
    depth: z.number().int().min(1).max(12).default(4),
    /** Sort children by static score below the root (alpha-beta only) */
    moveOrdering: z.boolean().default(false),
    /** Seed for the random agent; unseeded agents use Math.random */
    seed: z.number().int().optional()
}).strict();

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;

/**
 * Validates agent options and fills in defaults
 */
export function parseAgentConfig(input: unknown = {}): AgentConfig {
    const result = AgentConfigSchema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new GameError(
            GameErrorCode.CONFIGURATION_ERROR,
            `Invalid agent configuration: ${issues.join('; ')}`,
            { issues }
        );
    }
    return result.data;
}

export const DEFAULT_WEIGHTS: EvaluationWeights = EvaluationWeightsSchema.parse({});
