// Socket message types

import type { DaySnapshot } from './snapshot';

// Client to Server messages
export type ClientMessage =
  | { type: 'ping'; timestamp: number };

// Server to Client messages
export type ServerMessage =
  | { type: 'welcome'; serverTime: number }
  | { type: 'day_updated'; snapshot: DaySnapshot }
  | { type: 'pong'; clientTimestamp: number; serverTimestamp: number };
