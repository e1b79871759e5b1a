/**
 * Correlation penalties, ranking and portfolio caps
 */

import { clamp } from './prob';
import { kellyPct, stakeAmount } from './scoring';
import type { WindowPreset } from './presets';
import { TOTAL_SUBJECT, type Candidate } from '../types/candidate';

export interface CorrelationResult {
  points: number;
  flag: string;
}

export function candidateKey(c: Pick<Candidate, 'matchup' | 'subject' | 'market' | 'side' | 'line'>): string {
  return `${c.matchup}|${c.subject}|${c.market}|${c.side}|${c.line}`;
}

// Game totals share a sentinel subject, so they group per game
export function subjectGroup(c: Pick<Candidate, 'matchup' | 'subject'>): string {
  return c.subject === TOTAL_SUBJECT ? `${c.matchup}|${c.subject}` : c.subject;
}

/**
 * Penalty points and flag per candidate key. Repeated bets on one subject
 * are penalized progressively (halved when they span different markets);
 * games holding more than two bets are penalized by how alike the bets are.
 */
export function correlationPenalties(candidates: Candidate[]): Map<string, CorrelationResult> {
  const result = new Map<string, CorrelationResult>();
  const bySubject = new Map<string, Candidate[]>();
  const byGame = new Map<string, Candidate[]>();

  for (const c of candidates) {
    result.set(c.key, { points: 0, flag: 'OK' });
    const s = subjectGroup(c);
    bySubject.set(s, [...(bySubject.get(s) ?? []), c]);
    byGame.set(c.matchup, [...(byGame.get(c.matchup) ?? []), c]);
  }

  for (const group of bySubject.values()) {
    if (group.length < 2) continue;
    const markets = new Set(group.map(c => c.market));
    const mult = markets.size > 1 ? 0.5 : 1.0;
    group.forEach((c, i) => {
      const entry = result.get(c.key);
      if (!entry) return;
      entry.points += Math.trunc(Math.min(20, i * 5) * mult);
      entry.flag = `P${group.length}`;
    });
  }

  for (const group of byGame.values()) {
    if (group.length <= 2) continue;
    const uniqueSubjects = new Set(group.map(c => c.subject)).size;
    const uniqueMarkets = new Set(group.map(c => c.market)).size;
    const diversity = Math.min(1, (uniqueSubjects + uniqueMarkets) / (group.length * 2));
    const penalty = Math.max(0, Math.trunc((group.length - 2) * 3 * (1 - diversity * 0.5)));
    for (const c of group) {
      const entry = result.get(c.key);
      if (!entry) continue;
      entry.points += penalty;
      if (!entry.flag.startsWith('P')) entry.flag = `G${group.length}`;
    }
  }

  return result;
}

/** Kelly multiplier for a penalty, never below half stake */
export function correlationHaircut(points: number): number {
  return clamp(1 - points / 100, 0.5, 1);
}

/**
 * Confidence first, then the preset's sort criterion, then key for determinism
 */
export function compareCandidates(sortBy: WindowPreset['sortBy']) {
  return (a: Candidate, b: Candidate): number => {
    if (b.confidence !== a.confidence) return b.confidence - a.confidence;
    if (sortBy === 'EV') {
      if (b.ev_pct !== a.ev_pct) return b.ev_pct - a.ev_pct;
      if (b.true_prob !== a.true_prob) return b.true_prob - a.true_prob;
    } else {
      if (b.true_prob !== a.true_prob) return b.true_prob - a.true_prob;
      if (b.ev_pct !== a.ev_pct) return b.ev_pct - a.ev_pct;
    }
    return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
  };
}

export interface PortfolioCaps {
  maxPerGame: number;
  maxPerPlayer: number;
}

/**
 * Greedy selection in ranked order honouring per-game and per-subject limits
 */
export function enforcePortfolioCaps(ranked: Candidate[], caps: PortfolioCaps): Candidate[] {
  const perGame = new Map<string, number>();
  const perSubject = new Map<string, number>();
  const kept: Candidate[] = [];
  for (const c of ranked) {
    const g = perGame.get(c.matchup) ?? 0;
    const s = subjectGroup(c);
    const p = perSubject.get(s) ?? 0;
    if (g >= caps.maxPerGame || p >= caps.maxPerPlayer) continue;
    perGame.set(c.matchup, g + 1);
    perSubject.set(s, p + 1);
    kept.push(c);
  }
  return kept;
}

export interface RankOptions extends PortfolioCaps {
  sortBy: WindowPreset['sortBy'];
  topN: number | null;
  bankroll: number;
  kellyMultiplier?: number;
  kellyCapPct?: number;
}

/**
 * Apply correlation haircuts to Kelly, sort, cap and truncate
 */
export function rankCandidates(candidates: Candidate[], options: RankOptions): Candidate[] {
  // best-ranked bet of a group carries no progressive penalty
  const sorted = [...candidates].sort(compareCandidates(options.sortBy));
  const penalties = correlationPenalties(sorted);
  const adjusted = sorted.map(c => {
    const corr = penalties.get(c.key) ?? { points: 0, flag: 'OK' };
    const kelly = kellyPct(
      c.true_prob,
      c.ref_price,
      correlationHaircut(corr.points),
      options.kellyMultiplier,
      options.kellyCapPct
    );
    return { ...c, kelly_pct: kelly, stake: stakeAmount(options.bankroll, kelly), corr_flag: corr.flag };
  });

  const ranked = enforcePortfolioCaps(adjusted, options);
  return options.topN === null ? ranked : ranked.slice(0, options.topN);
}
