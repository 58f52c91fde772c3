import { getGuess, parseTimeOfDay } from '@shared';
import type {
  DailyRecord,
  DailyResult,
  DateKey,
  GameDocument,
  GuessRanking,
  Leaderboard,
  LeaderboardEntry,
} from '@shared';

/**
 * Scores one day. Returns null unless the record has an actual time and a
 * guess from every participant; guesses under any other name are ignored.
 *
 * Everyone sharing the smallest difference is a winner.
 */
export function calculateDailyResult(
  date: DateKey,
  record: DailyRecord,
  participants: readonly string[]
): DailyResult | null {
  if (record.actual_time === undefined) {
    return null;
  }

  const actualMinutes = parseTimeOfDay(record.actual_time);
  if (actualMinutes === null) {
    return null;
  }

  const scored: Array<{ participant: string; guess: string; difference: number }> = [];
  for (const participant of participants) {
    const guess = getGuess(record, participant);
    const guessMinutes = guess === undefined ? null : parseTimeOfDay(guess);
    if (guess === undefined || guessMinutes === null) {
      return null;
    }
    scored.push({ participant, guess, difference: Math.abs(guessMinutes - actualMinutes) });
  }

  scored.sort((a, b) => a.difference - b.difference || a.participant.localeCompare(b.participant));

  const best = scored[0]?.difference;
  const rankings: GuessRanking[] = [];
  scored.forEach((entry, index) => {
    const previous = rankings[index - 1];
    const rank = previous && scored[index - 1]?.difference === entry.difference ? previous.rank : index + 1;
    rankings.push({ ...entry, rank, isWinner: entry.difference === best });
  });

  return {
    date,
    actualTime: record.actual_time,
    rankings,
    winners: rankings.filter(r => r.isWinner).map(r => r.participant),
  };
}

/** Daily results for every scored day, newest first. */
export function calculateHistory(document: GameDocument, participants: readonly string[]): DailyResult[] {
  const results: DailyResult[] = [];

  for (const [date, record] of Object.entries(document)) {
    const result = calculateDailyResult(date, record, participants);
    if (result) {
      results.push(result);
    }
  }

  return results.sort((a, b) => b.date.localeCompare(a.date));
}

/**
 * Cumulative standings ranked by win count (descending), then name.
 * Pass `dates` to restrict the calculation to a subset of days.
 */
export function calculateLeaderboard(
  document: GameDocument,
  participants: readonly string[],
  dates?: readonly DateKey[]
): Leaderboard {
  const totals = new Map<string, LeaderboardEntry>();
  for (const participant of participants) {
    totals.set(participant, { participant, wins: 0, totalError: 0, daysPlayed: 0, rank: 0 });
  }

  const selected = dates ?? Object.keys(document);
  let revealedDays = 0;

  for (const date of new Set(selected)) {
    const record = document[date];
    const result = record ? calculateDailyResult(date, record, participants) : null;
    if (!result) {
      continue;
    }

    revealedDays++;
    for (const ranking of result.rankings) {
      const entry = totals.get(ranking.participant);
      if (!entry) continue;
      entry.daysPlayed++;
      entry.totalError += ranking.difference;
      if (ranking.isWinner) {
        entry.wins++;
      }
    }
  }

  const entries = [...totals.values()].sort(
    (a, b) => b.wins - a.wins || a.participant.localeCompare(b.participant)
  );

  entries.forEach((entry, index) => {
    const previous = entries[index - 1];
    entry.rank = previous && previous.wins === entry.wins ? previous.rank : index + 1;
  });

  return { entries, revealedDays };
}
