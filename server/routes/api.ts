import { Router, type Request, type Response } from 'express';
import { formatDateKey, validateDateKey } from '@shared';
import type { DateKey, DaySnapshot, GameError, GameErrorCode, TimeOfDay } from '@shared';
import { GameStateManager, type ActionResult } from '../game/gameStateManager.js';
import { StorageError } from '../storage/storageError.js';
import { logger } from '../utils/logger.js';

export interface DayUpdateListener {
  dayUpdated(snapshot: DaySnapshot): void;
}

export interface ApiOptions {
  /** Date the server treats as "today". */
  today?: () => DateKey;
}

const ERROR_STATUS: Record<GameErrorCode, number> = {
  INVALID_PARTICIPANT: 400,
  MALFORMED_TIME: 400,
  NO_GUESSES: 400,
  INVALID_DATE: 400,
  DUPLICATE_GUESS: 409,
  ALREADY_REVEALED: 409,
  INCOMPLETE_GUESSES: 409,
  STORAGE_UNAVAILABLE: 503,
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Accepts `{ participant, time }` or `{ guesses: { name: time } }`. */
export function readGuessBody(body: unknown): Record<string, TimeOfDay> | null {
  if (!isPlainObject(body)) {
    return null;
  }

  const participant = body['participant'];
  const time = body['time'];
  if (typeof participant === 'string' && typeof time === 'string') {
    return { [participant]: time };
  }

  const guesses = body['guesses'];
  if (!isPlainObject(guesses)) {
    return null;
  }

  const result: Array<[string, TimeOfDay]> = [];
  for (const [name, value] of Object.entries(guesses)) {
    if (typeof value !== 'string') {
      return null;
    }
    result.push([name, value]);
  }
  return Object.fromEntries(result);
}

function sendError(res: Response, error: GameError): void {
  res.status(ERROR_STATUS[error.code]).json({ error: error.message, code: error.code });
}

function handleFailure(res: Response, err: unknown, action: string): void {
  if (err instanceof StorageError) {
    console.error(`Storage error while trying to ${action}:`, err.message);
    logger.log('STORAGE', `Failed to ${action}`, { code: err.code, message: err.message });
    res.status(ERROR_STATUS[err.code]).json({ error: err.message, code: err.code });
    return;
  }

  console.error(`Failed to ${action}:`, err);
  logger.log('API', `Failed to ${action}`, { message: err instanceof Error ? err.message : String(err) });
  res.status(500).json({ error: `Failed to ${action}` });
}

export function createApiRoutes(
  gameStateManager: GameStateManager,
  listener: DayUpdateListener,
  options: ApiOptions = {}
): Router {
  const router = Router();
  const today = options.today ?? (() => formatDateKey());

  // Returns the date parameter, or null after answering with INVALID_DATE
  const readDate = (req: Request, res: Response): DateKey | null => {
    const date = req.params['date'] ?? '';
    const validation = validateDateKey(date);
    if (!validation.valid) {
      sendError(res, { code: 'INVALID_DATE', message: validation.error ?? 'Invalid date' });
      return null;
    }
    return date;
  };

  const respond = (res: Response, result: ActionResult): void => {
    if (!result.success) {
      sendError(res, result.error);
      return;
    }
    listener.dayUpdated(result.snapshot);
    res.json(result.snapshot);
  };

  router.get('/participants', (_req: Request, res: Response) => {
    res.json(gameStateManager.participants);
  });

  // Day endpoints
  router.get('/today', async (_req: Request, res: Response) => {
    try {
      res.json(await gameStateManager.getDay(today()));
    } catch (err) {
      handleFailure(res, err, 'load today');
    }
  });

  router.get('/days/:date', async (req: Request, res: Response) => {
    const date = readDate(req, res);
    if (!date) return;

    try {
      res.json(await gameStateManager.getDay(date));
    } catch (err) {
      handleFailure(res, err, `load ${date}`);
    }
  });

  router.post('/days/:date/guesses', async (req: Request, res: Response) => {
    const date = readDate(req, res);
    if (!date) return;

    const guesses = readGuessBody(req.body);
    if (!guesses) {
      sendError(res, { code: 'NO_GUESSES', message: 'Send { participant, time } or { guesses: { name: time } }' });
      return;
    }

    try {
      respond(res, await gameStateManager.submitGuesses(date, guesses));
    } catch (err) {
      handleFailure(res, err, 'save guess');
    }
  });

  router.post('/days/:date/reveal', async (req: Request, res: Response) => {
    const date = readDate(req, res);
    if (!date) return;

    const body: unknown = req.body;
    const time = isPlainObject(body) ? body['time'] : undefined;
    if (typeof time !== 'string') {
      sendError(res, { code: 'MALFORMED_TIME', message: 'Send { time: "HH:MM" }' });
      return;
    }

    try {
      respond(res, await gameStateManager.revealActualTime(date, time));
    } catch (err) {
      handleFailure(res, err, 'save actual time');
    }
  });

  router.delete('/days/:date', async (req: Request, res: Response) => {
    const date = readDate(req, res);
    if (!date) return;

    try {
      const snapshot = await gameStateManager.resetDay(date);
      listener.dayUpdated(snapshot);
      res.json(snapshot);
    } catch (err) {
      handleFailure(res, err, `reset ${date}`);
    }
  });

  // Leaderboard endpoints
  router.get('/leaderboard', async (_req: Request, res: Response) => {
    try {
      res.json(await gameStateManager.getLeaderboard());
    } catch (err) {
      handleFailure(res, err, 'load leaderboard');
    }
  });

  router.get('/history', async (_req: Request, res: Response) => {
    try {
      res.json(await gameStateManager.getHistory());
    } catch (err) {
      handleFailure(res, err, 'load history');
    }
  });

  router.get('/stats', async (_req: Request, res: Response) => {
    try {
      res.json(await gameStateManager.getStats());
    } catch (err) {
      handleFailure(res, err, 'load stats');
    }
  });

  // Debug logging endpoints
  router.get('/debug/status', (_req: Request, res: Response) => {
    res.json({ enabled: logger.isEnabled() });
  });

  router.post('/debug/log', (req: Request, res: Response) => {
    if (!logger.isEnabled()) {
      res.json({ logged: false, reason: 'disabled' });
      return;
    }

    const body: unknown = req.body;
    if (!isPlainObject(body)) {
      res.status(400).json({ error: 'Expected a JSON object' });
      return;
    }

    const rawClientId = body['clientId'];
    const clientId = typeof rawClientId === 'string' ? rawClientId : 'unknown';
    const rawLogs = body['logs'];
    const logs: unknown[] = Array.isArray(rawLogs) ? rawLogs : [body];
    let count = 0;
    for (const entry of logs) {
      if (!isPlainObject(entry)) continue;
      const category = entry['category'];
      const message = entry['message'];
      logger.logFromClient(
        clientId,
        typeof category === 'string' ? category : 'CLIENT',
        typeof message === 'string' ? message : '',
        entry['data']
      );
      count++;
    }
    res.json({ logged: true, count });
  });

  // Health check
  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  return router;
}
