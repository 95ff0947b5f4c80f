/**
 * CLI entry point for term-2048
 *
 * `term-2048` plays in the current terminal; `stats` and `setup`
 * are interactive clack flows over the same config and stats files.
 */

import * as p from '@clack/prompts';
import { type CliOptions, UsageError, parseArgs } from './args';
import {
  type Difficulty,
  type GameConfig,
  DIFFICULTIES,
  getConfigPath,
  isValidTarget,
  loadConfig,
  saveConfig,
} from './config';
import { run2048Game } from './game';
import { StatsStore, getStatsPath } from './stats/statsStore';
import { formatHighScores, formatRecentGames } from './stats/format';
import { createNodeTerminal } from './terminal';
import { getTheme, getThemeModes } from './themes';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function printHelp() {
  console.log(`
  term-2048: slide and merge tiles to reach 2048

  Usage:
    term-2048                      Play
    term-2048 stats                High scores and recent games
    term-2048 stats --reset        Delete recorded games
    term-2048 setup                Choose theme, difficulty and target
    term-2048 themes               List color themes
    term-2048 --help               Show this help

  Options:
    --theme <theme>          Color theme (see \`term-2048 themes\`)
    --difficulty <level>     easy | medium | hard (more 4s spawn on harder levels)
    --target <tile>          Winning tile, power of two (default 2048)
    --undos <n>              Undos per game, 0-10 (default 3)
    --recent <n>             stats: number of recent games to list

  Controls:
    Arrow keys / WASD    Slide tiles
    U                    Undo
    ESC                  Pause menu
    Q                    Quit (from menus)

  Config: ${getConfigPath()}
  Stats:  ${getStatsPath()}
`);
}

function listThemes() {
  for (const mode of getThemeModes()) {
    const theme = getTheme(mode);
    console.log(`  ${theme.accent}${mode.padEnd(12)}\x1b[0m ${theme.name}${theme.light ? ' (light)' : ''}`);
  }
}

function play(options: CliOptions) {
  const config: GameConfig = { ...loadConfig(), ...options.overrides };
  const store = new StatsStore();
  const highScore = store.getHighScores()[config.difficulty]?.bestScore ?? 0;

  const terminal = createNodeTerminal();
  let recordError: unknown = null;

  const controller = run2048Game(terminal, {
    config,
    recorder: store,
    highScore,
    onRecordError: (err) => { recordError = err; },
    onQuit: () => {
      terminal.restore();
      process.exit();
    },
  });

  // Every way out (quit, Ctrl+C, signals) ends here: record the game in
  // progress, then report a failed save with a non-zero exit code
  process.on('exit', () => {
    controller.stop();
    if (recordError !== null) {
      console.error(`[Stats] Could not save game: ${errorMessage(recordError)}`);
      process.exitCode = 1;
    }
  });
}

async function stats(options: CliOptions) {
  const store = new StatsStore();
  p.intro('term-2048 stats');

  if (options.reset) {
    const confirmed = await p.confirm({ message: 'Delete all recorded games?', initialValue: false });
    if (p.isCancel(confirmed) || !confirmed) {
      p.cancel('Stats kept.');
      return;
    }
    store.reset();
    p.outro('Stats cleared.');
    return;
  }

  p.note(formatHighScores(store.getHighScores()), 'High scores');
  p.note(formatRecentGames(store.getRecentGames(options.recent)), 'Recent games');
  p.outro(getStatsPath());
}

async function setup() {
  const current = loadConfig();
  p.intro('term-2048 setup');

  const theme = await p.select({
    message: 'Color theme',
    initialValue: current.theme,
    options: getThemeModes().map(mode => ({ value: mode, label: getTheme(mode).name, hint: mode })),
  });
  if (p.isCancel(theme)) {
    p.cancel('Setup cancelled.');
    return;
  }

  const difficulties: Difficulty[] = ['easy', 'medium', 'hard'];
  const difficulty = await p.select({
    message: 'Difficulty',
    initialValue: current.difficulty,
    options: difficulties.map(level => ({
      value: level,
      label: DIFFICULTIES[level].label,
      hint: `${Math.round(DIFFICULTIES[level].fourProbability * 100)}% of new tiles are 4s`,
    })),
  });
  if (p.isCancel(difficulty)) {
    p.cancel('Setup cancelled.');
    return;
  }

  const target = await p.text({
    message: 'Winning tile',
    initialValue: String(current.target),
    validate: (value) => isValidTarget(Number(value)) ? undefined : 'Enter a power of two between 8 and 131072',
  });
  if (p.isCancel(target)) {
    p.cancel('Setup cancelled.');
    return;
  }

  const config: GameConfig = { ...current, theme, difficulty, target: Number(target) };
  try {
    saveConfig(config);
  } catch (err) {
    p.log.error(`Could not save config: ${errorMessage(err)}`);
    process.exitCode = 1;
    return;
  }
  p.outro(`Saved to ${getConfigPath()}`);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function fail(err: unknown): never {
  console.error(`  ${errorMessage(err)}`);
  process.exit(1);
}

function main() {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`  ${err.message}`);
      console.error('  Run `term-2048 --help` for usage.');
      process.exit(1);
    }
    throw err;
  }

  switch (options.command) {
    case 'help': printHelp(); break;
    case 'themes': listThemes(); break;
    case 'stats': stats(options).catch(fail); break;
    case 'setup': setup().catch(fail); break;
    case 'play': play(options); break;
  }
}

main();
