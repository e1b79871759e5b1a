/**
 * Parlay combination search over ranked candidates
 */

import { correlationPenalties, subjectGroup } from './correlation';
import { americanToDecimal, decimalToAmerican, roundTo } from './prob';
import type { Candidate } from '../types/candidate';

export interface Parlay {
  legs: Candidate[];
  hitProbability: number;
  decimalOdds: number;
  americanOdds: number;
  evPct: number;
}

export interface ParlayOptions {
  /** Floor on the correlation discount applied to the hit probability */
  discountFloor?: number;
  /** Legs considered, best first, before any combinations are enumerated */
  maxPool?: number;
  topPairs?: number;
  topTriples?: number;
}

export interface ParlayLists {
  pairs: Parlay[];
  triples: Parlay[];
}

export const BUILDER_DISCOUNT_FLOOR = 0.3;
export const DAILY_CARD_DISCOUNT_FLOOR = 0.5;

/**
 * Hit probability multiplier for legs that share players or games
 */
export function independenceDiscount(legs: Candidate[], floor: number = BUILDER_DISCOUNT_FLOOR): number {
  let total = 0;
  for (const { points } of correlationPenalties(legs).values()) {
    total += points;
  }
  return Math.max(floor, Math.exp(-total / 20));
}

export function parlayMetrics(legs: Candidate[], floor: number = BUILDER_DISCOUNT_FLOOR): Parlay {
  let probability = 1;
  let decimal = 1;
  for (const leg of legs) {
    probability *= leg.true_prob;
    decimal *= americanToDecimal(leg.ref_price);
  }
  probability *= independenceDiscount(legs, floor);
  return {
    legs,
    hitProbability: probability,
    decimalOdds: decimal,
    americanOdds: decimalToAmerican(decimal),
    evPct: roundTo((probability * decimal - 1) * 100, 2),
  };
}

/** Drop repeated legs, keeping the first occurrence */
export function dedupeLegs(candidates: Candidate[]): Candidate[] {
  const seen = new Set<string>();
  return candidates.filter(c => {
    if (seen.has(c.key)) return false;
    seen.add(c.key);
    return true;
  });
}

/**
 * All k-element combinations, in lexicographic index order
 */
export function* combinations<T>(items: T[], k: number, start = 0, prefix: T[] = []): Generator<T[]> {
  if (prefix.length === k) {
    yield prefix;
    return;
  }
  for (let i = start; i <= items.length - (k - prefix.length); i++) {
    yield* combinations(items, k, i + 1, [...prefix, items[i]]);
  }
}

function distinctSubjects(legs: Candidate[]): boolean {
  return new Set(legs.map(subjectGroup)).size === legs.length;
}

/**
 * Safe pairs ranked by hit probability and aggressive triples ranked by EV.
 * Legs on the same subject never share a ticket.
 */
export function buildParlays(pool: Candidate[], options: ParlayOptions = {}): ParlayLists {
  const floor = options.discountFloor ?? BUILDER_DISCOUNT_FLOOR;
  const legs = dedupeLegs(pool).slice(0, options.maxPool ?? 25);

  const pairs: Parlay[] = [];
  for (const combo of combinations(legs, 2)) {
    if (!distinctSubjects(combo)) continue;
    pairs.push(parlayMetrics(combo, floor));
  }
  pairs.sort((a, b) => b.hitProbability - a.hitProbability || b.evPct - a.evPct);

  const triples: Parlay[] = [];
  for (const combo of combinations(legs, 3)) {
    if (!distinctSubjects(combo)) continue;
    triples.push(parlayMetrics(combo, floor));
  }
  triples.sort((a, b) => b.evPct - a.evPct || b.hitProbability - a.hitProbability);

  return {
    pairs: pairs.slice(0, options.topPairs ?? 20),
    triples: triples.slice(0, options.topTriples ?? 20),
  };
}

/**
 * Highest hit-probability k-leg ticket from the first `poolSize` legs
 */
export function bestByHitProbability(
  legs: Candidate[],
  k: number,
  poolSize: number,
  floor: number = DAILY_CARD_DISCOUNT_FLOOR
): Parlay | null {
  let best: Parlay | null = null;
  for (const combo of combinations(legs.slice(0, poolSize), k)) {
    const parlay = parlayMetrics(combo, floor);
    if (best === null || parlay.hitProbability > best.hitProbability) {
      best = parlay;
    }
  }
  return best;
}
