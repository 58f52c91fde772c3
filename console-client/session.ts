import { formatDateKey } from '../shared/index.js';
import type { DateKey, DaySnapshot } from '../shared/index.js';

/** HTTP side of the console client, plus the day it is currently acting on. */
export class GameSession {
  private serverUrl: string;
  private today: () => DateKey;
  private currentDate: DateKey | null = null;

  constructor(serverUrl: string, today: () => DateKey = () => formatDateKey()) {
    this.serverUrl = serverUrl;
    this.today = today;
  }

  get date(): DateKey | null {
    return this.currentDate;
  }

  async request<T>(path: string, method: string = 'GET', body?: unknown): Promise<T> {
    const response = await fetch(`${this.serverUrl}/api${path}`, {
      method,
      headers: body !== undefined ? { 'Content-Type': 'application/json' } : undefined,
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    if (!response.ok) {
      const data: unknown = await response.json().catch(() => null);
      const message = typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string'
        ? data.error
        : `HTTP ${response.status}`;
      throw new Error(message);
    }
    return response.json();
  }

  async loadToday(): Promise<DaySnapshot> {
    const snapshot = await this.request<DaySnapshot>('/today');
    this.currentDate = snapshot.date;
    return snapshot;
  }

  /** Day to send a change to. Asks the server again once the local date has moved past it. */
  async dateForChange(): Promise<DateKey> {
    if (this.currentDate !== null && this.currentDate === this.today()) {
      return this.currentDate;
    }
    return (await this.loadToday()).date;
  }
}
