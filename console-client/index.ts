/**
 * Console client for the rat time guess game.
 *
 * Talks to the same HTTP API as the web client and prints live updates
 * pushed over socket.io while the prompt is open.
 *
 * Usage: npm run dev:console
 *
 * Environment variables:
 *   SERVER_URL - Server URL (default: http://localhost:3000)
 */

import { io, Socket } from 'socket.io-client';
import readline from 'readline';
import type { DailyResult, DaySnapshot, Leaderboard, ServerMessage } from '../shared/index.js';
import { HELP_TEXT, parseCommand, type Command } from './commands.js';
import { formatHistoryRow, formatLeaderboard, formatSnapshot } from './format.js';
import { GameSession } from './session.js';

const SERVER_URL = process.env['SERVER_URL'] || 'http://localhost:3000';

// ANSI colors
const C = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
};

let socket: Socket | null = null;

// ── Logging helpers ────────────────────────────────────────────────
function log(category: string, color: string, message: string): void {
  console.log(`${color}[${category.padEnd(5)}]${C.reset} ${message}`);
}

function logNet(msg: string): void { log('NET', C.blue, msg); }
function logLive(msg: string): void { log('LIVE', C.yellow, msg); }
function logError(msg: string): void { log('ERROR', C.red, msg); }

function printLines(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

const session = new GameSession(SERVER_URL);

async function runCommand(command: Command): Promise<boolean> {
  switch (command.type) {
    case 'empty':
      return true;

    case 'help':
      console.log(HELP_TEXT);
      return true;

    case 'quit':
      return false;

    case 'invalid':
      logError(command.message);
      return true;

    case 'status':
      printLines(formatSnapshot(await session.loadToday()));
      return true;

    case 'guess': {
      const date = await session.dateForChange();
      const snapshot = await session.request<DaySnapshot>(`/days/${date}/guesses`, 'POST', {
        participant: command.participant,
        time: command.time,
      });
      log('GAME', C.green, `Guess saved for ${command.participant}`);
      printLines(formatSnapshot(snapshot));
      return true;
    }

    case 'reveal': {
      const date = await session.dateForChange();
      const snapshot = await session.request<DaySnapshot>(`/days/${date}/reveal`, 'POST', { time: command.time });
      log('GAME', C.green, 'Actual time recorded');
      printLines(formatSnapshot(snapshot));
      return true;
    }

    case 'reset': {
      const date = await session.dateForChange();
      await session.request<DaySnapshot>(`/days/${date}`, 'DELETE');
      log('GAME', C.green, `Reset ${date}`);
      return true;
    }

    case 'board': {
      const leaderboard = await session.request<Leaderboard>('/leaderboard');
      console.log(`${C.bright}Overall leaderboard${C.reset} ${C.dim}(${leaderboard.revealedDays} scored days)${C.reset}`);
      printLines(formatLeaderboard(leaderboard.entries));
      return true;
    }

    case 'history': {
      const history = await session.request<DailyResult[]>('/history');
      if (history.length === 0) {
        console.log('No days have been scored yet.');
      }
      printLines(history.map(formatHistoryRow));
      return true;
    }
  }
}

// ── Connection ─────────────────────────────────────────────────────

function handleMessage(message: ServerMessage): void {
  switch (message.type) {
    case 'welcome':
      logNet(`Server time ${new Date(message.serverTime).toISOString()}`);
      break;

    case 'day_updated':
      if (message.snapshot.date === session.date) {
        logLive(`${message.snapshot.date} is now ${message.snapshot.phase.replace(/_/g, ' ')}`);
      }
      break;

    case 'pong':
      break;
  }
}

function connect(): void {
  logNet(`Connecting to ${C.bright}${SERVER_URL}${C.reset}...`);

  socket = io(SERVER_URL, {
    transports: ['websocket'],
    reconnection: true,
    reconnectionAttempts: 10,
    reconnectionDelay: 2000,
  });

  socket.on('connect', () => {
    logNet(`${C.green}Connected!${C.reset}`);
  });

  socket.on('disconnect', (reason) => {
    logNet(`${C.red}Disconnected:${C.reset} ${reason}`);
  });

  socket.on('connect_error', (err) => {
    logError(`Connection error: ${err.message}`);
  });

  socket.on('message', (msg: ServerMessage) => {
    handleMessage(msg);
  });
}

// ── Main ───────────────────────────────────────────────────────────

function shutdown(): void {
  socket?.disconnect();
  process.exit(0);
}

function main(): void {
  console.log(`${C.bright}🐭 Rat Office Time Guess${C.reset} ${C.gray}(type "help" for commands)${C.reset}`);
  connect();

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: 'rat> ' });

  rl.on('line', (line) => {
    rl.pause();
    runCommand(parseCommand(line))
      .then(keepGoing => {
        if (!keepGoing) {
          rl.close();
          return;
        }
        rl.resume();
        rl.prompt();
      })
      .catch((err: unknown) => {
        logError(err instanceof Error ? err.message : String(err));
        rl.resume();
        rl.prompt();
      });
  });

  rl.on('close', shutdown);
  process.on('SIGTERM', shutdown);

  rl.prompt();
}

main();
