import { describe, it, expect } from 'vitest';
import {
  applyMove,
  canUndo,
  continueAfterWin,
  createSession,
  finalizeSession,
  undoMove,
} from './session';
import { countTiles } from './board';

// random() === 0 always picks the first empty cell and, at the default
// medium difficulty, a 4 (0 < 0.1)
const first = () => 0;
const clock = (...times: number[]) => {
  let i = 0;
  return () => times[Math.min(i++, times.length - 1)];
};

describe('createSession', () => {
  it('starts with two tiles and zeroed counters', () => {
    const session = createSession({ random: first, now: () => 1000 });
    expect(countTiles(session.board)).toBe(2);
    expect(session.board[0][0]).toBe(4);
    expect(session.board[0][1]).toBe(4);
    expect(session.score).toBe(0);
    expect(session.moves).toBe(0);
    expect(session.maxTile).toBe(4);
    expect(session.status).toBe('playing');
  });

  it('can start from a given board', () => {
    const session = createSession({
      board: [
        [2, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ],
    });
    expect(countTiles(session.board)).toBe(1);
    expect(session.maxTile).toBe(2);
  });
});

describe('applyMove', () => {
  const start = [
    [2, 2, 0, 0],
    [0, 0, 0, 0],
    [0, 0, 0, 0],
    [0, 0, 0, 4],
  ];

  it('merges, scores, counts the move and spawns one tile', () => {
    const session = createSession({ board: start, random: first });
    const turn = applyMove(session, 'left');

    expect(turn.accepted).toBe(true);
    expect(turn.scoreDelta).toBe(4);
    expect(turn.spawn?.cell).toEqual([1, 0]);
    expect(session.board).toEqual([
      [4, 4, 0, 0],
      [0, 0, 0, 0],
      [0, 0, 0, 0],
      [4, 0, 0, 0],
    ]);
    expect(session.score).toBe(4);
    expect(session.moves).toBe(1);
    expect(session.maxTile).toBe(4);
  });

  it('rejects a move that changes nothing', () => {
    const board = [
      [2, 4, 0, 0],
      [0, 0, 0, 0],
      [0, 0, 0, 0],
      [0, 0, 0, 0],
    ];
    const session = createSession({ board, random: first });
    const turn = applyMove(session, 'left');

    expect(turn.accepted).toBe(false);
    expect(session.board).toEqual(board);
    expect(session.moves).toBe(0);
    expect(countTiles(session.board)).toBe(2);
    expect(canUndo(session)).toBe(false);
  });

  it('only adds merge values to the score, never spawned tiles', () => {
    const session = createSession({ board: start, random: first });
    applyMove(session, 'right');
    expect(session.score).toBe(4);
    applyMove(session, 'down');
    expect(session.score).toBe(4 + 8);
  });

  it('reports a win the moment the target tile appears', () => {
    const session = createSession({
      board: [
        [1024, 1024, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ],
      random: first,
    });
    const turn = applyMove(session, 'left');
    expect(turn.status).toBe('won');
    expect(session.won).toBe(true);
    expect(applyMove(session, 'right').accepted).toBe(false);
  });

  it('uses a configured target', () => {
    const session = createSession({
      board: [
        [64, 64, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ],
      target: 128,
      random: first,
    });
    expect(applyMove(session, 'left').status).toBe('won');
  });

  it('reports a loss when the spawned tile leaves no moves', () => {
    const session = createSession({
      board: [
        [2, 4, 2, 4],
        [4, 2, 4, 2],
        [2, 4, 2, 8],
        [8, 16, 32, 32],
      ],
      random: first,
    });
    const turn = applyMove(session, 'left');
    expect(turn.accepted).toBe(true);
    expect(session.board[3]).toEqual([8, 16, 64, 4]);
    expect(turn.status).toBe('lost');
    expect(applyMove(session, 'up').accepted).toBe(false);
  });
});

describe('continueAfterWin', () => {
  it('keeps playing without reporting the target again', () => {
    const session = createSession({
      board: [
        [1024, 1024, 0, 0],
        [2, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ],
      random: first,
    });
    applyMove(session, 'left');
    continueAfterWin(session);
    expect(session.status).toBe('playing');

    const turn = applyMove(session, 'down');
    expect(turn.accepted).toBe(true);
    expect(turn.status).toBe('playing');
    expect(session.won).toBe(true);
  });
});

describe('undoMove', () => {
  it('restores board, score and move count', () => {
    const board = [
      [2, 2, 0, 0],
      [0, 0, 0, 0],
      [0, 0, 0, 0],
      [0, 0, 0, 0],
    ];
    const session = createSession({ board, random: first, maxUndos: 2 });
    applyMove(session, 'left');
    expect(undoMove(session)).toBe(true);
    expect(session.board).toEqual(board);
    expect(session.score).toBe(0);
    expect(session.moves).toBe(0);
    expect(session.undosRemaining).toBe(1);
  });

  it('stops once undos run out', () => {
    const session = createSession({ random: first, maxUndos: 1 });
    applyMove(session, 'down');
    applyMove(session, 'right');
    expect(undoMove(session)).toBe(true);
    expect(undoMove(session)).toBe(false);
  });

  it('keeps no snapshots when undos are disabled', () => {
    const session = createSession({ random: first, maxUndos: 0 });
    applyMove(session, 'down');
    expect(session.undoStack).toHaveLength(0);
    expect(undoMove(session)).toBe(false);
  });

  it('reports the target again after undoing a continued win', () => {
    const session = createSession({
      board: [
        [1024, 1024, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ],
      random: first,
    });
    applyMove(session, 'left');
    continueAfterWin(session);
    expect(undoMove(session)).toBe(true);
    expect(session.won).toBe(false);
    expect(session.continuedAfterWin).toBe(false);

    expect(applyMove(session, 'left').status).toBe('won');
    expect(session.board[0][0]).toBe(2048);
    expect(finalizeSession(session).won).toBe(true);
  });

  it('brings a lost game back into play', () => {
    const session = createSession({
      board: [
        [2, 4, 2, 4],
        [4, 2, 4, 2],
        [2, 4, 2, 8],
        [8, 16, 32, 32],
      ],
      random: first,
    });
    applyMove(session, 'left');
    expect(session.status).toBe('lost');
    undoMove(session);
    expect(session.status).toBe('playing');
    expect(session.board[3]).toEqual([8, 16, 32, 32]);
  });
});

describe('finalizeSession', () => {
  it('builds the game record', () => {
    const session = createSession({
      board: [
        [2, 2, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ],
      difficulty: 'hard',
      random: first,
      now: clock(1000, 66500),
    });
    applyMove(session, 'left');
    expect(finalizeSession(session)).toEqual({
      score: 4,
      maxTile: 4,
      moves: 1,
      durationSeconds: 65.5,
      difficulty: 'hard',
      won: false,
      finishedAt: '1970-01-01T00:01:06.500Z',
    });
  });

  it('returns the same record when called twice and freezes the session', () => {
    const session = createSession({ random: first, now: clock(0, 1000, 5000) });
    applyMove(session, 'down');
    const record = finalizeSession(session);
    expect(finalizeSession(session)).toBe(record);
    expect(record.durationSeconds).toBe(1);
    expect(applyMove(session, 'up').accepted).toBe(false);
    expect(canUndo(session)).toBe(false);
  });
});
