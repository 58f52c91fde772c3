import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { DaySnapshot } from '@shared';
import { useGameStore } from './gameStore';

const PARTICIPANTS = ['Gaurav', 'Upanshu', 'Yatin'];

function snapshot(overrides: Partial<DaySnapshot> = {}): DaySnapshot {
  return {
    date: '2025-03-03',
    participants: PARTICIPANTS,
    record: { guesses: {} },
    phase: 'empty',
    result: null,
    leaderboard: [],
    ...overrides,
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('useGameStore', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    useGameStore.setState({
      snapshot: null,
      leaderboard: null,
      history: [],
      stats: null,
      loading: false,
      error: null,
      notice: null,
    });
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('loads today from the server', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(snapshot()));

    await useGameStore.getState().loadToday();

    expect(fetchMock).toHaveBeenCalledWith('http://localhost:3000/api/today', {
      method: 'GET',
      headers: undefined,
      body: undefined,
    });
    expect(useGameStore.getState().snapshot?.date).toBe('2025-03-03');
    expect(useGameStore.getState().loading).toBe(false);
  });

  it('submits only the filled-in guesses', async () => {
    useGameStore.setState({ snapshot: snapshot() });
    const updated = snapshot({ phase: 'guessing', record: { guesses: { Gaurav: '17:00' } } });
    fetchMock.mockResolvedValueOnce(jsonResponse(updated));

    const ok = await useGameStore.getState().submitGuesses({ Gaurav: ' 17:00 ', Upanshu: '', Yatin: '  ' });

    expect(ok).toBe(true);
    expect(fetchMock).toHaveBeenCalledWith('http://localhost:3000/api/days/2025-03-03/guesses', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ guesses: { Gaurav: '17:00' } }),
    });
    expect(useGameStore.getState().snapshot).toEqual(updated);
    expect(useGameStore.getState().notice).toBe('Guess(es) submitted successfully!');
  });

  it('checks time format before sending anything', async () => {
    useGameStore.setState({ snapshot: snapshot() });

    const ok = await useGameStore.getState().submitGuesses({ Gaurav: '5pm' });

    expect(ok).toBe(false);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(useGameStore.getState().error).toBe('Invalid time format for Gaurav. Please use HH:MM format.');
  });

  it('asks for at least one guess', async () => {
    useGameStore.setState({ snapshot: snapshot() });

    expect(await useGameStore.getState().submitGuesses({ Gaurav: '' })).toBe(false);
    expect(useGameStore.getState().error).toBe('Enter at least one guess');
  });

  it('shows the server message when a request is rejected', async () => {
    useGameStore.setState({ snapshot: snapshot() });
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ error: 'Still waiting for guesses from Yatin', code: 'INCOMPLETE_GUESSES' }, 409)
    );

    const ok = await useGameStore.getState().revealActualTime('17:05');

    expect(ok).toBe(false);
    expect(useGameStore.getState().error).toBe('Still waiting for guesses from Yatin');
    expect(useGameStore.getState().snapshot?.phase).toBe('empty');
  });

  it('resets today', async () => {
    useGameStore.setState({ snapshot: snapshot({ phase: 'guessing', record: { guesses: { Yatin: '16:50' } } }) });
    fetchMock.mockResolvedValueOnce(jsonResponse(snapshot()));

    expect(await useGameStore.getState().resetToday()).toBe(true);
    expect(fetchMock).toHaveBeenCalledWith('http://localhost:3000/api/days/2025-03-03', {
      method: 'DELETE',
      headers: undefined,
      body: undefined,
    });
    expect(useGameStore.getState().notice).toBe("Today's data has been reset!");
  });

  it('applies broadcasts for the day on screen only', () => {
    useGameStore.setState({ snapshot: snapshot() });

    useGameStore.getState().applySnapshot(snapshot({ date: '2025-03-02', phase: 'revealed' }));
    expect(useGameStore.getState().snapshot?.phase).toBe('empty');

    useGameStore.getState().applySnapshot(snapshot({ phase: 'guessing' }));
    expect(useGameStore.getState().snapshot?.phase).toBe('guessing');
  });
});
