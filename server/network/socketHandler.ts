import { Server, Socket } from 'socket.io';
import type { ClientMessage, DaySnapshot, ServerMessage } from '@shared';
import type { DayUpdateListener } from '../routes/api.js';
import { logger } from '../utils/logger.js';

/** Pushes every day change to all connected browsers and console clients. */
export class SocketHandler implements DayUpdateListener {
  private io: Server;

  constructor(io: Server) {
    this.io = io;
  }

  initialize(): void {
    this.io.on('connection', (socket) => {
      logger.log('SOCKET', 'Client connected', { socketId: socket.id });

      this.send(socket, { type: 'welcome', serverTime: Date.now() });

      socket.on('message', (msg: ClientMessage) => {
        this.handleMessage(socket, msg);
      });

      socket.on('disconnect', (reason) => {
        logger.log('SOCKET', 'Client disconnected', { socketId: socket.id, reason });
      });
    });
  }

  dayUpdated(snapshot: DaySnapshot): void {
    logger.log('SOCKET', `Broadcasting ${snapshot.date}`, { phase: snapshot.phase });
    this.broadcast({ type: 'day_updated', snapshot });
  }

  private send(socket: Socket, message: ServerMessage): void {
    socket.emit('message', message);
  }

  private broadcast(message: ServerMessage): void {
    this.io.emit('message', message);
  }

  private handleMessage(socket: Socket, msg: ClientMessage): void {
    switch (msg.type) {
      case 'ping':
        this.send(socket, {
          type: 'pong',
          clientTimestamp: msg.timestamp,
          serverTimestamp: Date.now(),
        });
        break;
    }
  }
}
