import { useState } from 'react';
import { useGameStore } from '../store/gameStore';

function DataFileInfo() {
  const { stats, loadStats } = useGameStore();
  const [open, setOpen] = useState(false);

  const toggle = () => {
    if (!open) {
      void loadStats();
    }
    setOpen(!open);
  };

  return (
    <div className="card data-info">
      <div className="data-info-header" onClick={toggle}>
        <h3>📁 Data File Info</h3>
        <span className="toggle">{open ? '▲' : '▼'}</span>
      </div>
      {open && stats && (
        <ul>
          {stats.exists
            ? <li>Data file: <code>{stats.dataFile}</code> exists</li>
            : <li>Data file: <code>{stats.dataFile}</code> will be created on first use</li>}
          <li>Days recorded: {stats.totalDays}</li>
          <li>Total guesses: {stats.totalGuesses}</li>
          <li>Total actual times: {stats.totalActualTimes}</li>
          <li>Scored days: {stats.revealedDays}</li>
        </ul>
      )}
    </div>
  );
}

export default DataFileInfo;
