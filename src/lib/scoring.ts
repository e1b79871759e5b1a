/**
 * Confidence, badge and stake sizing
 */

import { config } from './config';
import { americanToDecimal, clamp, kellyFraction, roundTo } from './prob';
import type { Badge } from '../types/candidate';

export interface BadgeThresholds {
  high: number;
  med: number;
  low: number;
}

export interface ConfidenceScore {
  confidence: number;
  badge: Badge;
}

export interface Adjustments {
  injury: number;
  minutes: number;
  steam: number;
}

export function badgeFor(confidence: number, thresholds: BadgeThresholds): Badge {
  if (confidence >= thresholds.high) return 'HIGH';
  if (confidence >= thresholds.med) return 'MED';
  if (confidence >= thresholds.low) return 'LOW';
  return 'PASS';
}

/**
 * Confidence from the blended probability shifted by adjustment points (1 point = 1%)
 */
export function confidenceFromProbability(
  trueProb: number,
  adj: Adjustments,
  thresholds: BadgeThresholds = config.badges.standard
): ConfidenceScore {
  const adjusted = clamp(trueProb + (adj.injury + adj.minutes + adj.steam) * 0.01, 0, 1);
  const confidence = Math.round(adjusted * 100);
  return { confidence, badge: badgeFor(confidence, thresholds) };
}

export interface PlusOddsInputs {
  trueProb: number;
  price: number;
  gapCents: number;
  booksUsed: number;
  injury: number;
  minutes: number;
}

/**
 * Long-shot scoring: rewards wide price gaps and broad book coverage,
 * penalizes prices beyond +250
 */
export function plusOddsConfidence(
  inputs: PlusOddsInputs,
  thresholds: BadgeThresholds = config.badges.plusOdds
): ConfidenceScore {
  const base = inputs.trueProb * 100;
  const gapBonus = Math.min(15, inputs.gapCents / 2);
  const booksBonus = Math.min(10, (inputs.booksUsed - 3) * 2);
  const pricePenalty = inputs.price > 250 ? (inputs.price - 250) / 20 : 0;

  const raw = base + gapBonus + booksBonus - pricePenalty + inputs.injury * 0.5 + inputs.minutes * 0.7;
  const confidence = Math.round(clamp(raw, 0, 100));
  return { confidence, badge: badgeFor(confidence, thresholds) };
}

/**
 * Fractional Kelly stake in percent of bankroll, after an optional
 * correlation haircut, capped and rounded to 2 decimals
 */
export function kellyPct(
  trueProb: number,
  american: number,
  haircut = 1,
  multiplier: number = config.kelly.multiplier,
  capPct: number = config.kelly.capPct
): number {
  const fraction = kellyFraction(trueProb, americanToDecimal(american)) * multiplier * haircut;
  return roundTo(Math.min(capPct, Math.max(0, fraction * 100)), 2);
}

export function stakeAmount(bankroll: number, kelly: number): number {
  return roundTo((bankroll * kelly) / 100, 2);
}
