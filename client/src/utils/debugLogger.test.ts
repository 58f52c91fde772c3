import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DebugLogger } from './debugLogger';

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

describe('DebugLogger', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.useFakeTimers();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it('stays local when the server has debug logging off', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ enabled: false }));
    const logger = new DebugLogger('test-client');
    await logger.initialize();

    logger.log('GAME', 'Guess accepted');
    await vi.advanceTimersByTimeAsync(1000);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(console.log).toHaveBeenCalledWith('[GAME] Guess accepted');
  });

  it('sends entries in one batch after a short delay', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ enabled: true }));
    fetchMock.mockResolvedValueOnce(jsonResponse({ logged: true, count: 2 }));
    const logger = new DebugLogger('test-client');
    await logger.initialize();

    logger.log('GAME', 'Guess accepted', { date: '2025-03-03' });
    logger.log('SOCKET', 'Connected to server');
    expect(fetchMock).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(500);

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock).toHaveBeenLastCalledWith('http://localhost:3000/api/debug/log', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        clientId: 'test-client',
        logs: [
          { category: 'GAME', message: 'Guess accepted', data: { date: '2025-03-03' } },
          { category: 'SOCKET', message: 'Connected to server' },
        ],
      }),
    });
  });

  it('turns remote logging off when the server cannot be reached', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    fetchMock.mockResolvedValueOnce(jsonResponse({ enabled: true }));
    fetchMock.mockRejectedValueOnce(new Error('offline'));
    const logger = new DebugLogger('test-client');
    await logger.initialize();

    logger.log('GAME', 'first');
    await logger.flush();
    logger.log('GAME', 'second');
    await vi.advanceTimersByTimeAsync(1000);

    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
