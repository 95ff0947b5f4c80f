import { type Difficulty, DIFFICULTIES } from '../config';
import type { GameRecord } from '../game/session';
import type { StatsData } from './statsStore';

export function formatDuration(seconds: number): string {
  const total = Math.round(seconds);
  const minutes = Math.floor(total / 60);
  const rest = total % 60;
  if (minutes === 0) return `${rest}s`;
  return `${minutes}m ${rest.toString().padStart(2, '0')}s`;
}

/**
 * High-score table, one line per difficulty that has been played
 */
export function formatHighScores(highScores: StatsData['highScores']): string {
  const lines: string[] = [];
  const order: Difficulty[] = ['easy', 'medium', 'hard'];

  for (const difficulty of order) {
    const entry = highScores[difficulty];
    if (!entry) continue;
    lines.push(
      `${DIFFICULTIES[difficulty].label.padEnd(7)} ` +
      `best ${entry.bestScore.toString().padStart(6)}  ` +
      `tile ${entry.bestMaxTile.toString().padStart(5)}  ` +
      `games ${entry.gamesPlayed}  won ${entry.gamesWon}  ` +
      `played ${formatDuration(entry.totalSeconds)}`
    );
  }

  return lines.length > 0 ? lines.join('\n') : 'No games recorded yet.';
}

export function formatRecentGames(games: GameRecord[]): string {
  if (games.length === 0) return 'No games recorded yet.';
  return games.map(game => {
    const date = game.finishedAt.slice(0, 10);
    const result = game.won ? 'won ' : 'lost';
    return `${date}  ${result}  ${game.score.toString().padStart(6)}  ` +
      `tile ${game.maxTile.toString().padStart(5)}  ${game.moves} moves  ${formatDuration(game.durationSeconds)}`;
  }).join('\n');
}
