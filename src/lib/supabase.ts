import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { config } from './config';
import { StoreWriteError } from './errors';
import { isMarketKey, isSide } from './quotes';
import { MemoryMarketStore, type MarketStore, type TickQuery } from './store';
import { Logger } from './logger';
import type { BetRecord, TickRecord } from '../types/candidate';

const logger = new Logger('supabase');

// Only create the Supabase client if we have the required keys
export const supabaseAdmin = config.supabaseUrl && config.supabaseServiceRoleKey
  ? createClient(
      config.supabaseUrl,
      config.supabaseServiceRoleKey,
      {
        auth: {
          autoRefreshToken: false,
          persistSession: false,
        },
      }
    )
  : null;

export const TICKS_TABLE = 'market_ticks';
export const BETS_TABLE = 'bet_log';

const tickRowSchema = z.object({
  id: z.string(),
  taken_at: z.string(),
  event_id: z.string(),
  subject: z.string(),
  market: z.string(),
  line: z.coerce.number(),
  side: z.string(),
  book: z.string(),
  price: z.coerce.number(),
});

function toTick(row: unknown): TickRecord | null {
  const parsed = tickRowSchema.safeParse(row);
  if (!parsed.success) return null;
  const { market, side, ...rest } = parsed.data;
  if (!isMarketKey(market) || !isSide(side)) return null;
  return { ...rest, market, side };
}

/**
 * Store backed by the market_ticks and bet_log tables. Rows carry
 * deterministic ids, so repeated appends are ignored by the upsert.
 */
export class SupabaseMarketStore implements MarketStore {
  constructor(private client: SupabaseClient) {}

  private async upsert(table: string, rows: Array<TickRecord | BetRecord>): Promise<void> {
    if (rows.length === 0) return;
    const { error } = await this.client
      .from(table)
      .upsert(rows, { onConflict: 'id', ignoreDuplicates: true });
    if (error) {
      throw new StoreWriteError(`${table} upsert failed: ${error.message}`, error.code || null);
    }
  }

  async appendTicks(ticks: TickRecord[]): Promise<void> {
    await this.upsert(TICKS_TABLE, ticks);
  }

  async appendBets(bets: BetRecord[]): Promise<void> {
    await this.upsert(BETS_TABLE, bets);
  }

  async readTicks(query: TickQuery): Promise<TickRecord[]> {
    const { data, error } = await this.client
      .from(TICKS_TABLE)
      .select('*')
      .eq('event_id', query.event_id)
      .eq('subject', query.subject)
      .eq('market', query.market)
      .eq('side', query.side)
      .gte('line', query.line - 1e-6)
      .lte('line', query.line + 1e-6)
      .gte('taken_at', query.since.toISOString())
      .order('taken_at', { ascending: true });

    if (error) {
      throw new Error(`${TICKS_TABLE} read failed: ${error.message}`);
    }

    const ticks: TickRecord[] = [];
    for (const row of data ?? []) {
      const tick = toTick(row);
      if (tick) ticks.push(tick);
    }
    return ticks;
  }
}

/**
 * Database-backed store when configured, otherwise an in-process one
 */
export function createMarketStore(): MarketStore {
  if (supabaseAdmin) {
    return new SupabaseMarketStore(supabaseAdmin);
  }
  logger.warn('Supabase not configured; ticks and bets are kept in memory for this run');
  return new MemoryMarketStore();
}
