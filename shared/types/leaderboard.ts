// Leaderboard types

import type { DateKey, TimeOfDay } from './game';

export interface GuessRanking {
  participant: string;
  guess: TimeOfDay;
  difference: number; // minutes
  rank: number;
  isWinner: boolean;
}

export interface DailyResult {
  date: DateKey;
  actualTime: TimeOfDay;
  rankings: GuessRanking[];
  winners: string[];
}

export interface LeaderboardEntry {
  participant: string;
  wins: number;
  totalError: number; // minutes, summed over scored days
  daysPlayed: number;
  rank: number;
}

export interface Leaderboard {
  entries: LeaderboardEntry[];
  revealedDays: number;
}
