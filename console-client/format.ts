import { LEADERBOARD_MEDALS, RESULT_MEDALS, formatDifference, getGuess } from '../shared/index.js';
import type { DailyResult, DaySnapshot, LeaderboardEntry } from '../shared/index.js';

const PHASE_LABELS: Record<DaySnapshot['phase'], string> = {
  empty: 'waiting for the first guess',
  guessing: 'collecting guesses',
  ready_to_reveal: 'everyone has guessed, waiting for the actual time',
  revealed: 'revealed',
};

export function formatRankings(result: DailyResult): string[] {
  return result.rankings.map(ranking => {
    const medal = RESULT_MEDALS[ranking.rank - 1] ?? `#${ranking.rank}`;
    return `${medal} ${ranking.participant}: ${ranking.guess} (off by ${formatDifference(ranking.difference)})`;
  });
}

export function formatLeaderboard(entries: LeaderboardEntry[]): string[] {
  return entries.map(entry => {
    const medal = LEADERBOARD_MEDALS[entry.rank - 1] ?? `#${entry.rank}`;
    return `${medal} ${entry.participant}: ${entry.wins} ${entry.wins === 1 ? 'win' : 'wins'}`;
  });
}

export function formatSnapshot(snapshot: DaySnapshot): string[] {
  const lines = [`Date: ${snapshot.date} (${PHASE_LABELS[snapshot.phase]})`];

  for (const name of snapshot.participants) {
    lines.push(`  ${name}: ${getGuess(snapshot.record, name) ?? '--:--'}`);
  }

  if (snapshot.result) {
    lines.push(`Actual leave time: ${snapshot.result.actualTime}`);
    lines.push(...formatRankings(snapshot.result).map(line => `  ${line}`));
  }

  return lines;
}

export function formatHistoryRow(day: DailyResult): string {
  const best = day.rankings[0]?.difference ?? 0;
  return `${day.date}  ${day.actualTime}  ${day.winners.join(' & ')} (off by ${formatDifference(best)})`;
}
