import { describe, expect, it } from 'vitest';
import type { DailyResult, DaySnapshot } from '../shared/index.js';
import { formatHistoryRow, formatLeaderboard, formatSnapshot } from './format.js';

const RESULT: DailyResult = {
  date: '2025-03-03',
  actualTime: '17:05',
  rankings: [
    { participant: 'Gaurav', guess: '17:00', difference: 5, rank: 1, isWinner: true },
    { participant: 'Upanshu', guess: '17:15', difference: 10, rank: 2, isWinner: false },
    { participant: 'Yatin', guess: '18:20', difference: 75, rank: 3, isWinner: false },
  ],
  winners: ['Gaurav'],
};

describe('formatSnapshot', () => {
  it('shows missing guesses as placeholders', () => {
    const snapshot: DaySnapshot = {
      date: '2025-03-04',
      participants: ['Gaurav', 'Upanshu', 'Yatin'],
      record: { guesses: { Upanshu: '17:30' } },
      phase: 'guessing',
      result: null,
      leaderboard: [],
    };

    expect(formatSnapshot(snapshot)).toEqual([
      'Date: 2025-03-04 (collecting guesses)',
      '  Gaurav: --:--',
      '  Upanshu: 17:30',
      '  Yatin: --:--',
    ]);
  });

  it('lists rankings once the day is revealed', () => {
    const snapshot: DaySnapshot = {
      date: '2025-03-03',
      participants: ['Gaurav', 'Upanshu', 'Yatin'],
      record: { guesses: { Gaurav: '17:00', Upanshu: '17:15', Yatin: '18:20' }, actual_time: '17:05' },
      phase: 'revealed',
      result: RESULT,
      leaderboard: [],
    };

    expect(formatSnapshot(snapshot).slice(4)).toEqual([
      'Actual leave time: 17:05',
      '  🥇 Gaurav: 17:00 (off by 5m)',
      '  🥈 Upanshu: 17:15 (off by 10m)',
      '  🥉 Yatin: 18:20 (off by 1h 15m)',
    ]);
  });
});

describe('formatLeaderboard', () => {
  it('pluralizes wins and shares medals on ties', () => {
    expect(
      formatLeaderboard([
        { participant: 'Gaurav', wins: 1, totalError: 5, daysPlayed: 2, rank: 1 },
        { participant: 'Yatin', wins: 1, totalError: 30, daysPlayed: 2, rank: 1 },
        { participant: 'Upanshu', wins: 0, totalError: 20, daysPlayed: 2, rank: 3 },
      ])
    ).toEqual(['👑 Gaurav: 1 win', '👑 Yatin: 1 win', '🎖️ Upanshu: 0 wins']);
  });
});

describe('formatHistoryRow', () => {
  it('joins tied winners', () => {
    expect(formatHistoryRow({ ...RESULT, winners: ['Gaurav', 'Upanshu'] })).toBe(
      '2025-03-03  17:05  Gaurav & Upanshu (off by 5m)'
    );
  });
});
