/**
 * Append-only persistence for quote ticks and logged bets
 */

import { config } from './config';
import { StoreWriteError, errorMessage } from './errors';
import { defaultSleep } from './http';
import { Logger } from './logger';
import type { BetRecord, MarketKey, Side, TickRecord } from '../types/candidate';

const logger = new Logger('store');

export interface TickQuery {
  event_id: string;
  subject: string;
  market: MarketKey;
  line: number;
  side: Side;
  since: Date;
}

export interface MarketStore {
  /** Idempotent: records whose id already exists are ignored */
  appendTicks(ticks: TickRecord[]): Promise<void>;
  appendBets(bets: BetRecord[]): Promise<void>;
  /** Ticks for one line and side at or after `since`, oldest first */
  readTicks(query: TickQuery): Promise<TickRecord[]>;
}

export function matchesTick(tick: TickRecord, query: TickQuery): boolean {
  return (
    tick.event_id === query.event_id &&
    tick.subject === query.subject &&
    tick.market === query.market &&
    tick.side === query.side &&
    Math.abs(tick.line - query.line) < 1e-6 &&
    new Date(tick.taken_at).getTime() >= query.since.getTime()
  );
}

/**
 * Process-local store; used when no database is configured and in tests
 */
export class MemoryMarketStore implements MarketStore {
  readonly ticks = new Map<string, TickRecord>();
  readonly bets = new Map<string, BetRecord>();

  async appendTicks(ticks: TickRecord[]): Promise<void> {
    for (const tick of ticks) {
      if (!this.ticks.has(tick.id)) this.ticks.set(tick.id, tick);
    }
  }

  async appendBets(bets: BetRecord[]): Promise<void> {
    for (const bet of bets) {
      if (!this.bets.has(bet.id)) this.bets.set(bet.id, bet);
    }
  }

  async readTicks(query: TickQuery): Promise<TickRecord[]> {
    return [...this.ticks.values()]
      .filter(tick => matchesTick(tick, query))
      .sort((a, b) => a.taken_at.localeCompare(b.taken_at));
  }
}

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  factor: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Run a store write, retrying lock contention with exponential backoff.
 * A write that still fails is logged and dropped; returns whether it landed.
 */
export async function appendWithRetry(
  label: string,
  write: () => Promise<void>,
  policy: RetryPolicy = config.storeRetry
): Promise<boolean> {
  const sleep = policy.sleep ?? defaultSleep;
  let lastError: unknown = null;

  for (let t = 0; t < policy.attempts; t++) {
    try {
      await write();
      return true;
    } catch (error) {
      lastError = error;
      if (!(error instanceof StoreWriteError) || !error.retryable) break;
      if (t < policy.attempts - 1) {
        await sleep(policy.baseDelayMs * policy.factor ** t);
      }
    }
  }

  logger.warn(`Dropped ${label} write after retries: ${errorMessage(lastError)}`);
  return false;
}
