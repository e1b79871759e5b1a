/**
 * Quote normalization: raw bookmaker payloads folded into per-line price maps
 */

import { z } from 'zod';
import { noVigProbability } from './prob';
import { recordId } from './ids';
import {
  TOTAL_SUBJECT,
  type GameEvent,
  type MarketKey,
  type PropMarketKey,
  type Side,
  type TickRecord,
} from '../types/candidate';

export const PROP_MARKETS: readonly PropMarketKey[] = [
  'player_points',
  'player_rebounds',
  'player_assists',
  'player_threes',
];

export const ALL_MARKETS: readonly MarketKey[] = [...PROP_MARKETS, 'h2h', 'spreads', 'totals'];

export function isPropMarket(market: MarketKey): market is PropMarketKey {
  return PROP_MARKETS.some(m => m === market);
}

export function isMarketKey(value: string): value is MarketKey {
  return ALL_MARKETS.some(m => m === value);
}

const bookmakerSchema = z.object({
  key: z.string().transform(k => k.toLowerCase()),
  markets: z.array(z.unknown()).default([]),
});

const marketSchema = z.object({
  key: z.string(),
  outcomes: z.array(z.unknown()).default([]),
});

const outcomeSchema = z.object({
  name: z.string(),
  price: z.number().finite().refine(p => p !== 0),
  point: z.number().finite().nullable().optional(),
  description: z.string().optional(),
  participant: z.string().optional(),
});

type Outcome = z.infer<typeof outcomeSchema>;

export type SidePrices = Partial<Record<Side, number>>;

export interface LineQuotes {
  subject: string;
  market: MarketKey;
  line: number;
  books: Map<string, SidePrices>;
}

export interface QuoteBook {
  event: GameEvent;
  lines: Map<string, LineQuotes>;
  /** subject|market → book → offered lines */
  lineVariants: Map<string, Map<string, Set<number>>>;
  ticks: TickRecord[];
}

export interface NormalizeOptions {
  referenceBook: string;
  competitorBooks: readonly string[];
  markets: readonly MarketKey[];
  takenAt: Date;
}

export function lineKey(subject: string, market: MarketKey, line: number): string {
  return `${subject}|${market}|${line}`;
}

function variantKey(subject: string, market: MarketKey): string {
  return `${subject}|${market}`;
}

interface ParsedQuote {
  subject: string;
  line: number;
  side: Side;
}

function readOutcome(market: MarketKey, outcome: Outcome): ParsedQuote | null {
  const point = outcome.point ?? null;
  if (isPropMarket(market)) {
    if (outcome.name !== 'Over' && outcome.name !== 'Under') return null;
    if (point === null) return null;
    const player = outcome.description ?? outcome.participant ?? 'Unknown';
    return { subject: player, line: point, side: outcome.name };
  }
  if (market === 'h2h') {
    const team = outcome.name || outcome.description || '';
    if (!team) return null;
    return { subject: team, line: 0, side: 'Win' };
  }
  if (market === 'spreads') {
    const team = outcome.name || outcome.description || '';
    if (!team || point === null) return null;
    return { subject: team, line: point, side: 'Cover' };
  }
  if (outcome.name !== 'Over' && outcome.name !== 'Under') return null;
  if (point === null) return null;
  return { subject: TOTAL_SUBJECT, line: point, side: outcome.name };
}

/**
 * Fold one event's bookmaker payload into a quote book. Only the reference
 * and competitor books and the requested markets are kept; malformed
 * entries are dropped. Every accepted quote becomes a tick record.
 */
export function normalizeEventOdds(
  event: GameEvent,
  bookmakers: unknown[],
  options: NormalizeOptions
): QuoteBook {
  const allowedBooks = new Set([options.referenceBook, ...options.competitorBooks]);
  const lines = new Map<string, LineQuotes>();
  const lineVariants = new Map<string, Map<string, Set<number>>>();

  for (const rawBook of bookmakers) {
    const book = bookmakerSchema.safeParse(rawBook);
    if (!book.success || !allowedBooks.has(book.data.key)) continue;

    for (const rawMarket of book.data.markets) {
      const market = marketSchema.safeParse(rawMarket);
      if (!market.success) continue;
      const marketKey = market.data.key;
      if (!isMarketKey(marketKey) || !options.markets.includes(marketKey)) continue;

      for (const rawOutcome of market.data.outcomes) {
        const outcome = outcomeSchema.safeParse(rawOutcome);
        if (!outcome.success) continue;
        const quote = readOutcome(marketKey, outcome.data);
        if (!quote) continue;

        const key = lineKey(quote.subject, marketKey, quote.line);
        let entry = lines.get(key);
        if (!entry) {
          entry = { subject: quote.subject, market: marketKey, line: quote.line, books: new Map() };
          lines.set(key, entry);
        }
        const sides = entry.books.get(book.data.key) ?? {};
        sides[quote.side] = Math.round(outcome.data.price);
        entry.books.set(book.data.key, sides);

        if (marketKey !== 'h2h') {
          const vKey = variantKey(quote.subject, marketKey);
          const perBook = lineVariants.get(vKey) ?? new Map<string, Set<number>>();
          const offered = perBook.get(book.data.key) ?? new Set<number>();
          offered.add(quote.line);
          perBook.set(book.data.key, offered);
          lineVariants.set(vKey, perBook);
        }
      }
    }
  }

  return { event, lines, lineVariants, ticks: buildTicks(event, lines, options.takenAt) };
}

function buildTicks(event: GameEvent, lines: Map<string, LineQuotes>, takenAt: Date): TickRecord[] {
  const ts = takenAt.toISOString();
  const ticks: TickRecord[] = [];
  for (const entry of lines.values()) {
    for (const [book, sides] of entry.books) {
      for (const side of Object.keys(sides)) {
        if (!isSide(side)) continue;
        const price = sides[side];
        if (price === undefined) continue;
        ticks.push({
          id: recordId(ts, event.id, entry.subject, entry.market, entry.line, side, book),
          taken_at: ts,
          event_id: event.id,
          subject: entry.subject,
          market: entry.market,
          line: entry.line,
          side,
          book,
          price,
        });
      }
    }
  }
  return ticks;
}

export function isSide(value: string): value is Side {
  return value === 'Over' || value === 'Under' || value === 'Win' || value === 'Cover';
}

export function opponentOf(event: GameEvent, team: string): string {
  return team === event.home ? event.away : event.home;
}

/**
 * Opponent's spread price at a book: the exact mirrored line, otherwise the
 * closest mirrored line within half a point
 */
export function opponentSpreadPrice(
  quotes: QuoteBook,
  opponent: string,
  line: number,
  book: string
): number | null {
  const exact = quotes.lines.get(lineKey(opponent, 'spreads', -line))?.books.get(book)?.Cover;
  if (exact !== undefined) return exact;

  let best: { distance: number; price: number } | null = null;
  for (const entry of quotes.lines.values()) {
    if (entry.market !== 'spreads' || entry.subject !== opponent) continue;
    const distance = Math.abs(entry.line + line);
    if (distance > 0.5) continue;
    const price = entry.books.get(book)?.Cover;
    if (price === undefined) continue;
    if (best === null || distance < best.distance) {
      best = { distance, price };
    }
  }
  return best ? best.price : null;
}

export interface BookSample {
  book: string;
  probability: number;
}

/**
 * No-vig probabilities for one side from every non-reference book that
 * quotes both sides of the pairing
 */
export function pairedSamples(
  quotes: QuoteBook,
  entry: LineQuotes,
  side: Side,
  referenceBook: string
): BookSample[] {
  const samples: BookSample[] = [];
  const opponent = opponentOf(quotes.event, entry.subject);
  const opponentMoneyline = entry.market === 'h2h'
    ? quotes.lines.get(lineKey(opponent, 'h2h', 0))
    : undefined;

  for (const [book, sides] of entry.books) {
    if (book === referenceBook) continue;

    let own: number | undefined;
    let other: number | null | undefined;
    if (entry.market === 'h2h') {
      own = sides.Win;
      other = opponentMoneyline?.books.get(book)?.Win;
    } else if (entry.market === 'spreads') {
      own = sides.Cover;
      other = opponentSpreadPrice(quotes, opponent, entry.line, book);
    } else {
      own = side === 'Over' ? sides.Over : sides.Under;
      other = side === 'Over' ? sides.Under : sides.Over;
    }
    if (own === undefined || other === undefined || other === null) continue;
    samples.push({ book, probability: noVigProbability(own, other) });
  }
  return samples;
}

/**
 * Closest line each non-reference book hangs for the same subject and market
 */
export function nearestOtherLines(
  quotes: QuoteBook,
  entry: LineQuotes,
  referenceBook: string
): number[] {
  const perBook = quotes.lineVariants.get(variantKey(entry.subject, entry.market));
  if (!perBook) return [];
  const nearest: number[] = [];
  for (const [book, offered] of perBook) {
    if (book === referenceBook || offered.size === 0) continue;
    let best: number | null = null;
    for (const line of offered) {
      if (best === null || Math.abs(line - entry.line) < Math.abs(best - entry.line)) {
        best = line;
      }
    }
    if (best !== null) nearest.push(best);
  }
  return nearest;
}
