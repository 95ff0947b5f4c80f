/**
 * Command-line parsing for term-2048
 */

import {
  type GameConfig,
  MAX_TARGET,
  MAX_UNDOS,
  MIN_TARGET,
  isDifficulty,
  isValidTarget,
  isValidUndos,
} from './config';
import { getThemeModes, isValidThemeMode } from './themes';

export type Command = 'play' | 'stats' | 'setup' | 'themes' | 'help';

export interface CliOptions {
  command: Command;
  overrides: Partial<GameConfig>;
  /** stats: wipe the stats file */
  reset: boolean;
  /** stats: how many recent games to list */
  recent: number;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const COMMANDS: readonly Command[] = ['play', 'stats', 'setup', 'themes', 'help'];

function isCommand(value: string): value is Command {
  return COMMANDS.some(c => c === value);
}

function parseInteger(flag: string, value: string): number {
  if (!/^\d+$/.test(value)) throw new UsageError(`${flag} expects a whole number, got "${value}"`);
  return Number(value);
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { command: 'play', overrides: {}, reset: false, recent: 10 };
  const args = [...argv];
  let commandSeen = false;

  while (args.length > 0) {
    const arg = args.shift() ?? '';

    if (arg === '--help' || arg === '-h') {
      options.command = 'help';
      continue;
    }
    if (arg === '--reset') {
      options.reset = true;
      continue;
    }

    if (arg.startsWith('--')) {
      const value = args.shift();
      if (value === undefined) throw new UsageError(`${arg} needs a value`);

      switch (arg) {
        case '--theme':
          if (!isValidThemeMode(value)) {
            throw new UsageError(`Unknown theme "${value}". Available: ${getThemeModes().join(', ')}`);
          }
          options.overrides.theme = value;
          break;
        case '--difficulty':
          if (!isDifficulty(value)) throw new UsageError(`Unknown difficulty "${value}". Use easy, medium or hard`);
          options.overrides.difficulty = value;
          break;
        case '--target': {
          const target = parseInteger(arg, value);
          if (!isValidTarget(target)) {
            throw new UsageError(`--target must be a power of two between ${MIN_TARGET} and ${MAX_TARGET}`);
          }
          options.overrides.target = target;
          break;
        }
        case '--undos': {
          const undos = parseInteger(arg, value);
          if (!isValidUndos(undos)) throw new UsageError(`--undos must be between 0 and ${MAX_UNDOS}`);
          options.overrides.undos = undos;
          break;
        }
        case '--recent':
          options.recent = parseInteger(arg, value);
          break;
        default:
          throw new UsageError(`Unknown option ${arg}`);
      }
      continue;
    }

    if (commandSeen || !isCommand(arg)) throw new UsageError(`Unknown command "${arg}"`);
    if (options.command !== 'help') options.command = arg;
    commandSeen = true;
  }

  return options;
}
