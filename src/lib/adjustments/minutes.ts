/**
 * Minutes reliability signal from recent playing time
 */

import { median, quartiles } from '../consensus';
import { errorMessage } from '../errors';
import { Logger } from '../logger';
import type { GameLog } from '../model';
import type { PlayerLogService } from '../player-logs';
import { noData, signal, type SignalResult } from './signal';

const logger = new Logger('minutes');

const HEALTHY_MINUTES = 15;
const SAMPLE_GAMES = 7;
const MIN_GAMES = 5;

export interface MinutesSummary {
  median: number;
  iqr: number;
  games: number;
  injuryGames: number;
}

/**
 * Median and spread of the last healthy games. Short appearances count as
 * injury games and widen the spread.
 */
export function summarizeMinutes(logs: GameLog[]): MinutesSummary {
  const mins: number[] = [];
  let injuryGames = 0;
  const newestFirst = [...logs].sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
  for (const game of newestFirst) {
    if (game.minutes >= HEALTHY_MINUTES) {
      mins.push(game.minutes);
    } else if (game.minutes > 0) {
      injuryGames += 1;
    }
    if (mins.length >= SAMPLE_GAMES) break;
  }

  if (mins.length === 0) {
    return { median: 0, iqr: 0, games: 0, injuryGames };
  }

  let iqr: number;
  if (mins.length >= 4) {
    const [q1, q3] = quartiles(mins);
    iqr = Math.max(0, q3 - q1);
  } else {
    iqr = Math.max(0, (Math.max(...mins) - Math.min(...mins)) * 0.5);
  }
  if (injuryGames > 0) {
    iqr *= 1 + Math.min(0.6, injuryGames * 0.2);
  }

  return { median: median(mins), iqr, games: mins.length, injuryGames };
}

export function minutesTag(summary: MinutesSummary): string {
  return `${summary.median.toFixed(1)}/${summary.iqr.toFixed(1)}(n=${summary.games})`;
}

/**
 * Points for a minutes summary; small samples use stricter bands
 */
export function minutesSignal(summary: MinutesSummary): SignalResult {
  const { median: med, iqr, games } = summary;
  const tag = games > 0 ? minutesTag(summary) : '';

  if (games < MIN_GAMES) {
    return { kind: 'insufficient', points: -5, tag, reason: `only ${games} healthy games` };
  }

  if (games < SAMPLE_GAMES) {
    if (med >= 32 && iqr <= 3) return signal(2, tag);
    if (med >= 28 && iqr <= 4) return signal(1, tag);
    if (med < 18 || iqr >= 10) return signal(-4, tag);
    return signal(-1, tag);
  }

  if (med >= 32 && iqr <= 4) return signal(3, tag);
  if (med >= 28 && iqr <= 5) return signal(2, tag);
  if (med >= 24 && iqr <= 6) return signal(1, tag);
  if (med < 16 || iqr >= 12) return signal(-3, tag);
  if (med < 20 || iqr >= 9) return signal(-2, tag);
  return signal(0, tag);
}

/** Unreliable minutes: missing or small sample, or spread above 40% of the median */
export function isHighVariance(summary: MinutesSummary | null): boolean {
  if (!summary || summary.games < MIN_GAMES) return true;
  return summary.iqr / Math.max(1, summary.median) > 0.4;
}

export class MinutesService {
  constructor(private logs: PlayerLogService) {}

  /** Summary for a player, null when the player or the feed is unavailable */
  async summary(playerName: string): Promise<MinutesSummary | null> {
    try {
      const logs = await this.logs.logsFor(playerName);
      return logs ? summarizeMinutes(logs) : null;
    } catch (error) {
      logger.warn(`Minutes lookup failed for ${playerName}: ${errorMessage(error)}`);
      return null;
    }
  }

  async playerSignal(playerName: string): Promise<SignalResult> {
    const summary = await this.summary(playerName);
    if (!summary) return noData(`no minutes data for ${playerName}`);
    return minutesSignal(summary);
  }
}
