import { useEffect } from 'react';
import { Link } from 'react-router-dom';
import { getGuess, hasGuessed } from '@shared';
import { useGameStore } from '../store/gameStore';
import { useNetworkStore } from '../store/networkStore';
import { DailyRankings, DataFileInfo, GuessForm, LeaderboardTable, RevealForm } from '../components';
import './Today.css';

function Today() {
  const {
    snapshot,
    loading,
    error,
    notice,
    loadToday,
    submitGuesses,
    revealActualTime,
    resetToday,
  } = useGameStore();
  const { connected } = useNetworkStore();

  useEffect(() => {
    void loadToday();
  }, [loadToday]);

  if (!snapshot) {
    return (
      <div className="screen today">
        {error ? <p className="error-text">{error}</p> : <p>Loading...</p>}
      </div>
    );
  }

  const { record, phase, participants } = snapshot;
  const waitingFor = participants.filter(name => !hasGuessed(record, name));
  const guessedNames = Object.keys(record.guesses).sort((a, b) => a.localeCompare(b));

  const handleReset = () => {
    if (window.confirm("Reset today's guesses?")) {
      void resetToday();
    }
  };

  return (
    <div className="screen today">
      <div className="today-content animate-slide-up">
        <h1 className="game-title">
          {phase === 'empty' ? '🐭 When will the rat go home today?' : '🐭 Rat Office Time Guess'}
        </h1>

        <div className="connection-status">
          <span className={`status-dot ${connected ? 'connected' : 'disconnected'}`} />
          {connected ? 'Live' : 'Offline'}
        </div>

        <p><strong>Date:</strong> {snapshot.date}</p>

        {error && <p className="error-text">{error}</p>}
        {notice && <p className="notice-text">{notice}</p>}

        {/* Guesses */}
        <section>
          <h2>📝 Submit Your Guess</h2>
          {(phase === 'empty' || phase === 'guessing') && (
            <GuessForm participants={waitingFor} disabled={loading} onSubmit={submitGuesses} />
          )}

          {guessedNames.length > 0 && (
            <div className="guess-list">
              <h3>Today's Guesses:</h3>
              <ul>
                {guessedNames.map(name => (
                  <li key={name}><strong>{name}</strong>: {getGuess(record, name)}</li>
                ))}
              </ul>
            </div>
          )}
        </section>

        {/* Actual time, once everyone has guessed */}
        {phase === 'ready_to_reveal' && (
          <section>
            <h2>⏰ Actual Leave Time</h2>
            <RevealForm disabled={loading} onSubmit={revealActualTime} />
          </section>
        )}

        {/* Results */}
        {snapshot.result && (
          <section>
            <h2>🏆 Today's Results</h2>
            <DailyRankings result={snapshot.result} />

            <h2>📊 Overall Leaderboard</h2>
            <LeaderboardTable entries={snapshot.leaderboard} />
            <Link to="/leaderboard" className="btn btn-ghost">Full leaderboard &amp; history</Link>
          </section>
        )}

        <section>
          <h2>🔄 Reset</h2>
          <button className="btn btn-secondary" onClick={handleReset} disabled={loading}>
            Reset today's guesses
          </button>
        </section>

        <DataFileInfo />
      </div>
    </div>
  );
}

export default Today;
