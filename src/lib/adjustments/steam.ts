/**
 * Sharp-book line movement ("steam") toward a side
 */

import { subSeconds } from 'date-fns';
import { systemClock, type Clock } from '../cache';
import { errorMessage } from '../errors';
import { Logger } from '../logger';
import { americanToProbability } from '../prob';
import type { MarketStore } from '../store';
import type { MarketKey, Side, TickRecord } from '../../types/candidate';
import { noData, signal, type SignalResult } from './signal';

const logger = new Logger('steam');

const MOVE_FLOOR = 0.02;
const MAX_POINTS = 2;

/**
 * Points for the average favourable implied-probability move across sharp
 * books between their earliest and latest tick
 */
export function steamFromTicks(ticks: TickRecord[], sharpBooks: readonly string[]): SignalResult {
  if (ticks.length === 0) return noData('no ticks in window');

  const earliest = new Map<string, TickRecord>();
  const latest = new Map<string, TickRecord>();
  for (const tick of ticks) {
    if (!sharpBooks.includes(tick.book)) continue;
    const t = new Date(tick.taken_at).getTime();
    const first = earliest.get(tick.book);
    if (!first || t < new Date(first.taken_at).getTime()) earliest.set(tick.book, tick);
    const last = latest.get(tick.book);
    if (!last || t > new Date(last.taken_at).getTime()) latest.set(tick.book, tick);
  }

  let totalMove = 0;
  let movers = 0;
  for (const [book, first] of earliest) {
    const last = latest.get(book);
    if (!last) continue;
    const delta = americanToProbability(last.price) - americanToProbability(first.price);
    if (delta > 0) {
      totalMove += delta;
      movers += 1;
    }
  }

  if (movers === 0) return signal(0, '');
  const avgMove = totalMove / movers;
  if (avgMove < MOVE_FLOOR) return signal(0, '');

  const points = Math.min(MAX_POINTS, Math.max(0, (avgMove - MOVE_FLOOR) * 100 * 1.2));
  return signal(points, 'steam');
}

export interface SteamQuery {
  eventId: string;
  subject: string;
  market: MarketKey;
  line: number;
  side: Side;
  windowSec: number;
}

export class SteamService {
  constructor(
    private store: MarketStore,
    private sharpBooks: readonly string[],
    private clock: Clock = systemClock
  ) {}

  async signalFor(query: SteamQuery): Promise<SignalResult> {
    try {
      const ticks = await this.store.readTicks({
        event_id: query.eventId,
        subject: query.subject,
        market: query.market,
        line: query.line,
        side: query.side,
        since: subSeconds(new Date(this.clock()), query.windowSec),
      });
      return steamFromTicks(ticks, this.sharpBooks);
    } catch (error) {
      logger.warn(`Tick read failed for ${query.subject} ${query.market}: ${errorMessage(error)}`);
      return noData('tick store unavailable');
    }
  }
}
