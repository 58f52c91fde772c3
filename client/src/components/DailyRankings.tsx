import { RESULT_MEDALS, formatDifference } from '@shared';
import type { DailyResult } from '@shared';

interface DailyRankingsProps {
  result: DailyResult;
}

function DailyRankings({ result }: DailyRankingsProps) {
  return (
    <div className="card rankings">
      <p className="actual-time">
        <strong>Actual leave time:</strong> {result.actualTime}
      </p>
      <ol className="ranking-list">
        {result.rankings.map((ranking) => (
          <li key={ranking.participant} className={ranking.isWinner ? 'winner' : ''}>
            <span className="rank">{RESULT_MEDALS[ranking.rank - 1] ?? `#${ranking.rank}`}</span>
            <span className="row-name">{ranking.participant}</span>
            <span className="row-guess">{ranking.guess}</span>
            <span className="row-diff">off by {formatDifference(ranking.difference)}</span>
          </li>
        ))}
      </ol>
      {result.winners.length > 1 && (
        <p className="tie-note">Tie! {result.winners.join(' & ')} each get a win.</p>
      )}
    </div>
  );
}

export default DailyRankings;
