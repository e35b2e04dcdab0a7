import { readFileSync } from 'node:fs';
import minimist from 'minimist';
import { AGENT_KINDS, type AgentConfig, type AgentKind, createAgent, isAgentKind, parseAgentConfig } from './ai';
import { GameError, GameErrorCode } from './core/errors';
import { formatMove } from './core/notation';
import { Side } from './core/types';
import { playMatch } from './match';

type Args = ReturnType<typeof minimist>;

const USAGE = `Usage: reversi [options]

  --black <kind>     agent for Black (${AGENT_KINDS.join(', ')}; default alphabeta)
  --white <kind>     agent for White (default random)
  --depth <n>        search depth in plies for minimax and alphabeta
  --seed <n>         seed for random agents
  --config <file>    JSON file with agent options (depth, weights, moveOrdering, seed)
  --games <n>        number of games to play (default 1)
  --quiet            only print results
  --help             show this message
`;

function agentKind(args: Args, key: 'black' | 'white', fallback: AgentKind): AgentKind {
    const value: unknown = args[key];
    if (value === undefined) {
        return fallback;
    }
    const text = String(value);
    if (!isAgentKind(text)) {
        throw new GameError(GameErrorCode.CONFIGURATION_ERROR, `Unknown agent '${text}' for --${key}`, {
            expected: AGENT_KINDS
        });
    }
    return text;
}

function numberFlag(args: Args, key: string): number | undefined {
    const value: unknown = args[key];
    return value === undefined ? undefined : Number(value);
}

function loadConfigFile(path: string | undefined): AgentConfig {
    if (path === undefined) {
        return parseAgentConfig({});
    }
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
    return parseAgentConfig(parsed);
}

/**
 * Runs the command line driver and returns the process exit code
 */
export function main(argv: string[]): number {
    const args = minimist(argv, {
        string: ['black', 'white', 'config'],
        boolean: ['quiet', 'help'],
        default: { games: 1 }
    });

    if (args.help) {
        process.stdout.write(USAGE);
        return 0;
    }

    const fileConfig = loadConfigFile(typeof args.config === 'string' ? args.config : undefined);
    const depth = numberFlag(args, 'depth');
    const seed = numberFlag(args, 'seed');
    const base = parseAgentConfig({
        ...fileConfig,
        ...(depth === undefined ? {} : { depth }),
        ...(seed === undefined ? {} : { seed })
    });

    const blackKind = agentKind(args, 'black', 'alphabeta');
    const whiteKind = agentKind(args, 'white', 'random');
    const games = Number(args.games);
    if (!Number.isInteger(games) || games < 1) {
        throw new GameError(GameErrorCode.CONFIGURATION_ERROR, `--games must be a positive integer, got '${String(args.games)}'`);
    }
    const quiet = Boolean(args.quiet);
    const tally = { black: 0, white: 0, draw: 0 };

    for (let index = 0; index < games; index++) {
        const gameSeed = base.seed === undefined ? undefined : base.seed + index * 2;
        const black = createAgent(blackKind, { ...base, seed: gameSeed });
        const white = createAgent(whiteKind, { ...base, seed: gameSeed === undefined ? undefined : gameSeed + 1 });

        const result = playMatch({
            black,
            white,
            onPly: quiet
                ? undefined
                : (position, record) => {
                    console.log(`${record.side} plays ${formatMove(record.move)}`);
                    console.log(`${position.toString()}\n`);
                }
        });

        if (result.winner === null) {
            tally.draw++;
        } else if (result.winner === Side.BLACK) {
            tally.black++;
        } else {
            tally.white++;
        }
        console.log(
            `Game ${index + 1}: ${result.state} ${result.blackDiscs}-${result.whiteDiscs} ` +
            `after ${result.plies} plies (${result.passes} passes, ` +
            `branching factor ${result.branchingFactor.toFixed(2)})`
        );
    }

    if (games > 1) {
        console.log(`${blackKind} (Black) ${tally.black} - ${tally.white} ${whiteKind} (White), ${tally.draw} drawn`);
    }
    return 0;
}
