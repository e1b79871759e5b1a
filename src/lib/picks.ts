/**
 * Daily card: locks, long shots and best parlays from one full scan
 */

import { bestByHitProbability, type Parlay } from './parlays';
import { roundTo } from './prob';
import type { Badge, Candidate, PropMarketKey } from '../types/candidate';

export interface CardPick {
  rank: number;
  pick: string;
  matchup: string;
  commence_time: string;
  market: string;
  subject: string;
  side: string;
  line: number;
  ref_price: number;
  confidence: number;
  true_prob: number;
  badge: Badge;
}

export interface CardParlay {
  legs: string[];
  american_odds: number;
  decimal_odds: number;
  hit_probability: number;
  ev_pct: number;
}

export interface DailyCard {
  generated_at: string;
  preset: string;
  locks: CardPick[];
  long_shots: CardPick[];
  parlays: CardParlay[];
}

const PROP_SHORT: Record<PropMarketKey, string> = {
  player_points: 'PTS',
  player_rebounds: 'REB',
  player_assists: 'AST',
  player_threes: '3PM',
};

/**
 * Ticket wording: "BOS ML", "BOS +3.5", "Over 220.5 (Total)", "Jayson Tatum o27.5 PTS"
 */
export function formatPick(c: Candidate): string {
  switch (c.market) {
    case 'h2h':
      return `${c.subject} ML`;
    case 'spreads':
      return `${c.subject} ${c.line >= 0 ? '+' : ''}${c.line}`;
    case 'totals':
      return `${c.side} ${c.line} (Total)`;
    default:
      return `${c.subject} ${c.side === 'Over' ? 'o' : 'u'}${c.line} ${PROP_SHORT[c.market]}`;
  }
}

export function cardPick(c: Candidate, rank: number): CardPick {
  return {
    rank,
    pick: formatPick(c),
    matchup: c.matchup,
    commence_time: c.commence_time,
    market: c.market,
    subject: c.subject,
    side: c.side,
    line: c.line,
    ref_price: c.ref_price,
    confidence: c.confidence,
    true_prob: roundTo(c.true_prob * 100, 2),
    badge: c.badge,
  };
}

export function cardParlay(parlay: Parlay): CardParlay {
  return {
    legs: parlay.legs.map(formatPick),
    american_odds: parlay.americanOdds,
    decimal_odds: roundTo(parlay.decimalOdds, 2),
    hit_probability: roundTo(parlay.hitProbability * 100, 2),
    ev_pct: parlay.evPct,
  };
}

const byConfidence = (a: Candidate, b: Candidate): number => b.confidence - a.confidence;

/**
 * Short favourites with solid confidence, closest to -150 first among equals
 */
export function selectLocks(candidates: Candidate[], count = 3): Candidate[] {
  return candidates
    .filter(c => c.ref_price >= -250 && c.ref_price < -110 && c.confidence >= 55)
    .sort((a, b) => byConfidence(a, b) || Math.abs(a.ref_price + 150) - Math.abs(b.ref_price + 150))
    .slice(0, count);
}

export function selectLongShots(candidates: Candidate[], count = 3): Candidate[] {
  return candidates
    .filter(c => c.ref_price >= 100 && c.ref_price <= 400 && c.confidence >= 35)
    .sort(byConfidence)
    .slice(0, count);
}

/**
 * Parlay legs not already on the card, priced -200..+150 with confidence of at least 50
 */
export function parlayPool(candidates: Candidate[], used: Candidate[], size = 15): Candidate[] {
  const usedKeys = new Set(used.map(c => c.key));
  return candidates
    .filter(c => !usedKeys.has(c.key))
    .filter(c => c.ref_price >= -200 && c.ref_price <= 150 && c.confidence >= 50)
    .sort(byConfidence)
    .slice(0, size);
}

export function buildDailyCard(candidates: Candidate[], preset: string, now: Date): DailyCard {
  const locks = selectLocks(candidates);
  const longShots = selectLongShots(candidates);
  const pool = parlayPool(candidates, [...locks, ...longShots]);

  const parlays: Parlay[] = [];
  if (pool.length >= 4) {
    for (const [k, size] of [[2, 8], [3, 10], [4, 12]]) {
      const best = bestByHitProbability(pool, k, size);
      if (best) parlays.push(best);
    }
  }

  return {
    generated_at: now.toISOString(),
    preset,
    locks: locks.map((c, i) => cardPick(c, i + 1)),
    long_shots: longShots.map((c, i) => cardPick(c, i + 1)),
    parlays: parlays.map(cardParlay),
  };
}
