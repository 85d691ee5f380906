import type { LogLevel } from '@nestjs/common';
import { SCENARIO_NAMES, type ScenarioName } from './scenarios';

export type CliCommand =
  | { mode: 'interactive' }
  | { mode: 'scenario'; scenarios: ScenarioName[] }
  | { mode: 'search'; query: string; userId?: string }
  | { mode: 'stats'; userId: string }
  | { mode: 'help' };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = [
  'Usage: conversation-agent [options]',
  '',
  'Options:',
  '  --interactive                  Interactive shell (default)',
  `  --scenario <${[...SCENARIO_NAMES, 'all'].join('|')}>`,
  '                                 Run demo scenarios',
  '  --search <query> [--user <id>] Search indexed conversations',
  '  --stats <userId>               Show statistics for a user',
  '  --help                         Show this help',
].join('\n');

function isScenarioName(value: string): value is ScenarioName {
  return SCENARIO_NAMES.some((name) => name === value);
}

function valueAfter(argv: string[], flag: string): string {
  const index = argv.indexOf(flag);
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

export function parseCliArgs(argv: string[]): CliCommand {
  if (argv.length === 0 || argv[0] === '--interactive') {
    return { mode: 'interactive' };
  }

  switch (argv[0]) {
    case '--help':
    case '-h':
      return { mode: 'help' };
    case '--scenario': {
      const name = valueAfter(argv, '--scenario');
      if (name === 'all') {
        return { mode: 'scenario', scenarios: [...SCENARIO_NAMES] };
      }
      if (!isScenarioName(name)) {
        throw new CliUsageError(`Unknown scenario: ${name}`);
      }
      return { mode: 'scenario', scenarios: [name] };
    }
    case '--search': {
      const query = valueAfter(argv, '--search');
      return argv.includes('--user')
        ? { mode: 'search', query, userId: valueAfter(argv, '--user') }
        : { mode: 'search', query };
    }
    case '--stats':
      return { mode: 'stats', userId: valueAfter(argv, '--stats') };
    default:
      throw new CliUsageError(`Unknown option: ${argv[0]}`);
  }
}

const LOG_LEVEL_ORDER: LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'log',
  'debug',
  'verbose',
];

/** LOG_LEVEL names the most verbose level to print. Default: log. */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const normalized = (level ?? 'log').trim().toLowerCase();
  const index = LOG_LEVEL_ORDER.findIndex((name) => name === normalized);
  return LOG_LEVEL_ORDER.slice(0, (index === -1 ? 3 : index) + 1);
}
