import 'dotenv/config';
import { createServer } from 'http';
import path from 'path';
import { Server } from 'socket.io';

import { loadConfig } from './config.js';
import { createApp } from './app.js';
import { GameStateManager } from './game/gameStateManager.js';
import { SocketHandler } from './network/socketHandler.js';
import { DocumentStore } from './storage/documentStore.js';
import { logger } from './utils/logger.js';

async function main() {
  const config = loadConfig();

  logger.configure({ enabled: config.debug, logFile: path.resolve(config.dataDir, 'debug.log') });

  // Initialize services
  const store = new DocumentStore(config.dataDir, config.dataFile);
  await store.initialize();

  const gameStateManager = new GameStateManager(store, config.participants);

  // Socket.io needs the HTTP server, the routes need the socket handler
  const io = new Server({
    cors: {
      origin: config.production ? false : config.clientUrl,
      methods: ['GET', 'POST', 'DELETE'],
      credentials: true,
    },
    pingInterval: 10000,
    pingTimeout: 5000,
  });

  const socketHandler = new SocketHandler(io);
  socketHandler.initialize();

  const app = createApp(gameStateManager, socketHandler, {
    clientUrl: config.clientUrl,
    clientDist: config.production ? config.clientDist : undefined,
  });
  const httpServer = createServer(app);
  io.attach(httpServer);

  // Start server
  httpServer.listen(config.port, () => {
    console.log(`🐭 Rat time guess server running on port ${config.port}`);
    console.log(`   Environment: ${config.production ? 'production' : 'development'}`);
    console.log(`   Data file: ${store.path}`);
    console.log(`   Participants: ${config.participants.join(', ')}`);
  });

  // Graceful shutdown
  process.on('SIGTERM', () => {
    console.log('SIGTERM received, shutting down...');
    // Closes the attached HTTP server as well
    io.close(() => {
      logger.close();
      console.log('Server closed');
      process.exit(0);
    });
  });
}

main().catch(err => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
