// What the server hands to clients for a single date

import type { DailyRecord, DateKey, RecordPhase } from './game';
import type { DailyResult, LeaderboardEntry } from './leaderboard';

export interface DaySnapshot {
  date: DateKey;
  participants: string[];
  record: DailyRecord;
  phase: RecordPhase;
  result: DailyResult | null;
  leaderboard: LeaderboardEntry[];
}
