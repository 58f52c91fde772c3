import { Routes, Route } from 'react-router-dom';
import { useEffect, useRef } from 'react';
import { useNetworkStore } from './store/networkStore';

import Today from './screens/Today';
import Leaderboard from './screens/Leaderboard';

function App() {
  const connectRef = useRef(useNetworkStore.getState().connect);

  useEffect(() => {
    // Connect to server only once
    connectRef.current();
  }, []);

  return (
    <div className="app">
      <Routes>
        <Route path="/" element={<Today />} />
        <Route path="/leaderboard" element={<Leaderboard />} />
      </Routes>
    </div>
  );
}

export default App;
