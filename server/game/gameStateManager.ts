import type {
  DailyResult,
  DateKey,
  DaySnapshot,
  DocumentStats,
  GameDocument,
  GameError,
  Leaderboard,
  TimeOfDay,
} from '@shared';
import { DailyGame, type GameResult } from './dailyGame.js';
import { DocumentStore } from '../storage/documentStore.js';
import {
  calculateDailyResult,
  calculateHistory,
  calculateLeaderboard,
} from '../leaderboards/leaderboardCalculator.js';
import { logger } from '../utils/logger.js';

export type ActionResult =
  | { success: true; snapshot: DaySnapshot }
  | { success: false; error: GameError };

export class GameStateManager {
  private store: DocumentStore;
  private game: DailyGame;

  constructor(store: DocumentStore, participants: readonly string[]) {
    this.store = store;
    this.game = new DailyGame(participants);
  }

  get participants(): string[] {
    return [...this.game.participants];
  }

  async getDay(date: DateKey): Promise<DaySnapshot> {
    const document = await this.store.load();
    return this.buildSnapshot(document, date);
  }

  submitGuess(date: DateKey, participant: string, time: TimeOfDay): Promise<ActionResult> {
    return this.apply(date, 'guess', document => this.game.submitGuess(document, date, participant, time));
  }

  submitGuesses(date: DateKey, guesses: Record<string, TimeOfDay>): Promise<ActionResult> {
    return this.apply(date, 'guesses', document => this.game.submitGuesses(document, date, guesses));
  }

  revealActualTime(date: DateKey, time: TimeOfDay): Promise<ActionResult> {
    return this.apply(date, 'reveal', document => this.game.revealActualTime(document, date, time));
  }

  resetDay(date: DateKey): Promise<DaySnapshot> {
    return this.store.update(document => {
      const next = this.game.resetDay(document, date);
      const changed = next !== document;
      logger.log('GAME', `Reset ${date}`, { hadRecord: changed });
      return { document: changed ? next : null, result: this.buildSnapshot(next, date) };
    });
  }

  async getLeaderboard(dates?: readonly DateKey[]): Promise<Leaderboard> {
    const document = await this.store.load();
    return calculateLeaderboard(document, this.game.participants, dates);
  }

  async getHistory(): Promise<DailyResult[]> {
    const document = await this.store.load();
    return calculateHistory(document, this.game.participants);
  }

  async getStats(): Promise<DocumentStats> {
    const [document, exists] = await Promise.all([this.store.load(), this.store.exists()]);
    const records = Object.values(document);

    return {
      dataFile: this.store.path,
      exists,
      totalDays: records.length,
      revealedDays: calculateLeaderboard(document, this.game.participants).revealedDays,
      totalGuesses: records.reduce((sum, record) => sum + Object.keys(record.guesses).length, 0),
      totalActualTimes: records.filter(record => record.actual_time !== undefined).length,
    };
  }

  private apply(
    date: DateKey,
    action: string,
    operation: (document: GameDocument) => GameResult
  ): Promise<ActionResult> {
    return this.store.update<ActionResult>(document => {
      const result = operation(document);

      if (!result.success) {
        logger.log('GAME', `Rejected ${action} for ${date}`, result.error);
        return { document: null, result: { success: false, error: result.error } };
      }

      logger.log('GAME', `Accepted ${action} for ${date}`, result.record);
      return {
        document: result.document,
        result: { success: true, snapshot: this.buildSnapshot(result.document, date) },
      };
    });
  }

  private buildSnapshot(document: GameDocument, date: DateKey): DaySnapshot {
    const record = this.game.getRecord(document, date);
    const participants = this.participants;

    return {
      date,
      participants,
      record,
      phase: this.game.getPhase(record),
      result: calculateDailyResult(date, record, participants),
      leaderboard: calculateLeaderboard(document, participants).entries,
    };
  }
}
