import { create } from 'zustand';
import { validateTimeOfDay } from '@shared';
import type { DailyResult, DaySnapshot, DocumentStats, Leaderboard, TimeOfDay } from '@shared';
import { apiRequest, errorMessage } from '../utils/api';
import { debugLogger } from '../utils/debugLogger';

interface GameState {
  snapshot: DaySnapshot | null;
  leaderboard: Leaderboard | null;
  history: DailyResult[];
  stats: DocumentStats | null;
  loading: boolean;
  error: string | null;
  notice: string | null;

  // Actions
  loadToday: () => Promise<void>;
  submitGuesses: (guesses: Record<string, TimeOfDay>) => Promise<boolean>;
  revealActualTime: (time: TimeOfDay) => Promise<boolean>;
  resetToday: () => Promise<boolean>;
  loadLeaderboard: () => Promise<void>;
  loadHistory: () => Promise<void>;
  loadStats: () => Promise<void>;
  applySnapshot: (snapshot: DaySnapshot) => void;
  clearMessages: () => void;
}

export const useGameStore = create<GameState>((set, get) => {
  // Runs a mutating request and stores the returned snapshot
  const mutate = async (action: string, request: () => Promise<DaySnapshot>, notice: string): Promise<boolean> => {
    set({ loading: true, error: null, notice: null });
    try {
      const snapshot = await request();
      set({ snapshot, loading: false, notice });
      debugLogger.log('GAME', `${action} accepted`, { date: snapshot.date, phase: snapshot.phase });
      return true;
    } catch (err) {
      set({ loading: false, error: errorMessage(err) });
      debugLogger.log('GAME', `${action} rejected`, { error: errorMessage(err) });
      return false;
    }
  };

  const currentDate = (): string | null => get().snapshot?.date ?? null;

  return {
    snapshot: null,
    leaderboard: null,
    history: [],
    stats: null,
    loading: false,
    error: null,
    notice: null,

    loadToday: async () => {
      set({ loading: true, error: null });
      try {
        const snapshot = await apiRequest<DaySnapshot>('/today');
        set({ snapshot, loading: false });
      } catch (err) {
        set({ loading: false, error: errorMessage(err) });
      }
    },

    submitGuesses: async (guesses) => {
      const date = currentDate();
      if (!date) return false;

      const filled = Object.entries(guesses).filter(([, time]) => time.trim().length > 0);
      if (filled.length === 0) {
        set({ error: 'Enter at least one guess', notice: null });
        return false;
      }

      // Time format is checked here, before anything reaches the server
      for (const [name, time] of filled) {
        if (!validateTimeOfDay(time).valid) {
          set({ error: `Invalid time format for ${name}. Please use HH:MM format.`, notice: null });
          return false;
        }
      }

      return mutate(
        'Guess',
        () => apiRequest<DaySnapshot>(`/days/${date}/guesses`, {
          method: 'POST',
          body: { guesses: Object.fromEntries(filled.map(([name, time]) => [name, time.trim()])) },
        }),
        'Guess(es) submitted successfully!'
      );
    },

    revealActualTime: async (time) => {
      const date = currentDate();
      if (!date) return false;

      const validation = validateTimeOfDay(time);
      if (!validation.valid) {
        set({ error: validation.error ?? 'Invalid time', notice: null });
        return false;
      }

      return mutate(
        'Reveal',
        () => apiRequest<DaySnapshot>(`/days/${date}/reveal`, { method: 'POST', body: { time: time.trim() } }),
        'Actual time recorded!'
      );
    },

    resetToday: async () => {
      const date = currentDate();
      if (!date) return false;

      return mutate(
        'Reset',
        () => apiRequest<DaySnapshot>(`/days/${date}`, { method: 'DELETE' }),
        "Today's data has been reset!"
      );
    },

    loadLeaderboard: async () => {
      try {
        set({ leaderboard: await apiRequest<Leaderboard>('/leaderboard') });
      } catch (err) {
        set({ error: errorMessage(err) });
      }
    },

    loadHistory: async () => {
      try {
        set({ history: await apiRequest<DailyResult[]>('/history') });
      } catch (err) {
        set({ error: errorMessage(err) });
      }
    },

    loadStats: async () => {
      try {
        set({ stats: await apiRequest<DocumentStats>('/stats') });
      } catch (err) {
        set({ error: errorMessage(err) });
      }
    },

    applySnapshot: (snapshot) => {
      // Only the day on screen is replaced; updates for other dates are ignored
      const date = currentDate();
      if (date !== null && date !== snapshot.date) return;
      set({ snapshot });
    },

    clearMessages: () => set({ error: null, notice: null }),
  };
});
