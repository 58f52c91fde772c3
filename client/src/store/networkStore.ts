import { create } from 'zustand';
import { io, Socket } from 'socket.io-client';
import type { ClientMessage, ServerMessage } from '@shared';
import { useGameStore } from './gameStore';
import { API_URL, serverOrigin } from '../utils/api';
import { debugLogger } from '../utils/debugLogger';

interface NetworkState {
  socket: Socket | null;
  connected: boolean;
  latency: number;

  // Actions
  connect: () => void;
  disconnect: () => void;
  send: (message: ClientMessage) => void;

  // Internal
  _handleMessage: (message: ServerMessage) => void;
  _measureLatency: () => void;
}

let latencyTimer: ReturnType<typeof setInterval> | null = null;

export const useNetworkStore = create<NetworkState>((set, get) => ({
  socket: null,
  connected: false,
  latency: 0,

  connect: () => {
    const existingSocket = get().socket;
    if (existingSocket) return;

    // Same server as the REST calls
    const serverUrl = serverOrigin(API_URL, window.location.origin);

    const socket = io(serverUrl, {
      transports: ['websocket'],
      reconnection: true,
      reconnectionDelay: 1000,
    });

    socket.on('connect', () => {
      set({ connected: true });
      debugLogger.log('SOCKET', 'Connected to server');
      // Anything missed while disconnected
      void useGameStore.getState().loadToday();
    });

    socket.on('disconnect', () => {
      set({ connected: false });
      debugLogger.log('SOCKET', 'Disconnected from server');
    });

    socket.on('message', (msg: ServerMessage) => {
      get()._handleMessage(msg);
    });

    set({ socket });

    latencyTimer = setInterval(() => get()._measureLatency(), 5000);
  },

  disconnect: () => {
    const { socket } = get();
    if (latencyTimer) {
      clearInterval(latencyTimer);
      latencyTimer = null;
    }
    if (socket) {
      socket.disconnect();
      set({ socket: null, connected: false });
    }
  },

  send: (message: ClientMessage) => {
    const { socket, connected } = get();
    if (socket && connected) {
      socket.emit('message', message);
    }
  },

  _handleMessage: (message: ServerMessage) => {
    switch (message.type) {
      case 'welcome':
        debugLogger.log('SOCKET', 'Welcome', { serverTime: message.serverTime });
        break;

      case 'day_updated':
        useGameStore.getState().applySnapshot(message.snapshot);
        break;

      case 'pong':
        set({ latency: Date.now() - message.clientTimestamp });
        break;
    }
  },

  _measureLatency: () => {
    get().send({ type: 'ping', timestamp: Date.now() });
  },
}));
