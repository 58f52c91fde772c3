import express, { type Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import fs from 'fs';
import path from 'path';
import { GameStateManager } from './game/gameStateManager.js';
import { createApiRoutes, type ApiOptions, type DayUpdateListener } from './routes/api.js';

export interface AppOptions extends ApiOptions {
  clientUrl?: string;
  /** Directory of the built web client, served when set. */
  clientDist?: string;
}

export function createApp(
  gameStateManager: GameStateManager,
  listener: DayUpdateListener,
  options: AppOptions = {}
): Express {
  const app = express();

  // Middleware
  app.use(compression());
  app.use(cors({
    origin: options.clientDist ? false : (options.clientUrl ?? false),
    credentials: true,
  }));
  app.use(express.json());

  // API routes
  app.use('/api', createApiRoutes(gameStateManager, listener, options));

  // Serve static files in production
  if (options.clientDist) {
    const clientDist = options.clientDist;
    if (!fs.existsSync(clientDist)) {
      console.warn(`Warning: Client dist not found at ${clientDist}`);
    }
    app.use(express.static(clientDist));
    app.get('*', (_req, res) => {
      res.sendFile(path.join(clientDist, 'index.html'));
    });
  }

  return app;
}
