import { apiRequest } from './api';

interface LogEntry {
  category: string;
  message: string;
  data?: unknown;
}

const FLUSH_DELAY_MS = 500;
const MAX_BATCH = 20;

function sessionClientId(): string {
  const fresh = () => Math.random().toString(36).substring(2, 10);
  if (typeof sessionStorage === 'undefined') {
    return fresh();
  }
  const stored = sessionStorage.getItem('ratDebugClientId');
  if (stored) return stored;
  const id = fresh();
  sessionStorage.setItem('ratDebugClientId', id);
  return id;
}

/**
 * Echoes client events to the console and, when the server runs with
 * DEBUG=true, ships them to its debug log in small batches.
 */
export class DebugLogger {
  readonly clientId: string;
  private remote: boolean = false;
  private pending: LogEntry[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(clientId: string = sessionClientId()) {
    this.clientId = clientId;
  }

  async initialize(): Promise<void> {
    try {
      const status = await apiRequest<{ enabled: boolean }>('/debug/status');
      this.remote = status.enabled === true;
    } catch (err) {
      console.warn('[debug] Could not reach the server, logging to the console only:', err);
      this.remote = false;
    }
  }

  log(category: string, message: string, data?: unknown): void {
    if (data === undefined) {
      console.log(`[${category}] ${message}`);
    } else {
      console.log(`[${category}] ${message}`, data);
    }

    if (!this.remote) return;

    this.pending.push(data === undefined ? { category, message } : { category, message, data });
    if (this.pending.length >= MAX_BATCH) {
      void this.flush();
    } else if (!this.timer) {
      this.timer = setTimeout(() => void this.flush(), FLUSH_DELAY_MS);
    }
  }

  async flush(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.pending.length === 0) return;

    const logs = this.pending;
    this.pending = [];

    try {
      await apiRequest('/debug/log', { method: 'POST', body: { clientId: this.clientId, logs } });
    } catch (err) {
      this.remote = false;
      console.warn('[debug] Sending logs failed, remote logging is off:', err);
    }
  }
}

export const debugLogger = new DebugLogger();

export function installDebugLogger(): void {
  void debugLogger.initialize();

  window.addEventListener('pagehide', () => void debugLogger.flush());
  window.addEventListener('unhandledrejection', (event: PromiseRejectionEvent) => {
    const reason: unknown = event.reason;
    debugLogger.log('ERROR', 'Unhandled promise rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
    });
  });
}
