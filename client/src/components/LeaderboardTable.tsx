import { LEADERBOARD_MEDALS, formatDifference } from '@shared';
import type { LeaderboardEntry } from '@shared';

interface LeaderboardTableProps {
  entries: LeaderboardEntry[];
  showDetails?: boolean;
}

function LeaderboardTable({ entries, showDetails = false }: LeaderboardTableProps) {
  return (
    <div className="card leaderboard">
      {entries.map((entry) => (
        <div key={entry.participant} className="leaderboard-row">
          <span className="rank">{LEADERBOARD_MEDALS[entry.rank - 1] ?? `#${entry.rank}`}</span>
          <span className="row-name">{entry.participant}</span>
          <span className="row-wins">
            {entry.wins} {entry.wins === 1 ? 'win' : 'wins'}
          </span>
          {showDetails && (
            <span className="row-error">
              {entry.daysPlayed > 0 ? `${formatDifference(entry.totalError)} total off` : '--'}
            </span>
          )}
        </div>
      ))}
    </div>
  );
}

export default LeaderboardTable;
