import { useEffect } from 'react';
import { Link } from 'react-router-dom';
import { formatDifference } from '@shared';
import { useGameStore } from '../store/gameStore';
import { LeaderboardTable } from '../components';
import './Leaderboard.css';

function Leaderboard() {
  const { leaderboard, history, error, loadLeaderboard, loadHistory } = useGameStore();

  useEffect(() => {
    void loadLeaderboard();
    void loadHistory();
  }, [loadLeaderboard, loadHistory]);

  return (
    <div className="screen leaderboard-screen">
      <div className="leaderboard-content animate-slide-up">
        <h1>📊 Overall Leaderboard</h1>
        {error && <p className="error-text">{error}</p>}

        {leaderboard && (
          <>
            <p>{leaderboard.revealedDays} scored {leaderboard.revealedDays === 1 ? 'day' : 'days'}</p>
            <LeaderboardTable entries={leaderboard.entries} showDetails />
          </>
        )}

        <h2>History</h2>
        {history.length === 0 && <p>No days have been scored yet.</p>}
        <div className="history-list">
          {history.map(day => (
            <div key={day.date} className="card history-row">
              <span className="history-date">{day.date}</span>
              <span className="history-actual">{day.actualTime}</span>
              <span className="history-winners">🏆 {day.winners.join(' & ')}</span>
              <span className="history-diff">
                off by {formatDifference(day.rankings[0]?.difference ?? 0)}
              </span>
            </div>
          ))}
        </div>

        <Link to="/" className="btn btn-primary">Back to today</Link>
      </div>
    </div>
  );
}

export default Leaderboard;
