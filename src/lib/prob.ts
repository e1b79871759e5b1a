/**
 * Odds conversion and price comparison utilities
 */

const PROB_EPSILON = 1e-6;

function isValidAmerican(american: number): boolean {
  return Number.isFinite(american) && american !== 0;
}

/** Round to a fixed number of decimals without producing -0 */
export function roundTo(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  const rounded = Math.round(value * factor) / factor;
  return rounded === 0 ? 0 : rounded;
}

export function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value));
}

/**
 * Convert American odds to implied probability (vig included).
 * Malformed odds map to an even 50%.
 */
export function americanToProbability(american: number): number {
  if (!isValidAmerican(american)) return 0.5;
  if (american >= 100) {
    return 100 / (american + 100);
  }
  const abs = Math.abs(american);
  return abs / (abs + 100);
}

/**
 * Convert American odds to decimal odds. Malformed odds map to 2.0.
 */
export function americanToDecimal(american: number): number {
  if (!isValidAmerican(american)) return 2.0;
  if (american >= 100) {
    return 1 + american / 100;
  }
  return 1 + 100 / Math.abs(american);
}

/**
 * Convert decimal odds to probability
 */
export function decimalToProbability(decimal: number): number {
  return 1 / decimal;
}

/**
 * Convert probability to decimal odds
 */
export function probabilityToDecimal(probability: number): number {
  return 1 / clamp(probability, PROB_EPSILON, 1 - PROB_EPSILON);
}

/**
 * Convert probability to American odds, clamped away from 0 and 1
 */
export function probabilityToAmerican(probability: number): number {
  const p = Number.isFinite(probability)
    ? clamp(probability, PROB_EPSILON, 1 - PROB_EPSILON)
    : 0.5;
  if (p >= 0.5) {
    return Math.round((-100 * p) / (1 - p));
  }
  return Math.round((100 * (1 - p)) / p);
}

/**
 * Convert decimal odds back to American
 */
export function decimalToAmerican(decimal: number): number {
  if (!Number.isFinite(decimal) || decimal <= 1) return -100000;
  if (decimal >= 2) {
    return Math.round((decimal - 1) * 100);
  }
  return Math.round(-100 / (decimal - 1));
}

/**
 * De-vig probabilities for 2-way market
 */
export function devigTwoWay(prob1: number, prob2: number): [number, number] {
  const total = prob1 + prob2;
  if (total <= 0) return [0.5, 0.5];
  return [prob1 / total, 1 - prob1 / total];
}

/**
 * No-vig probability of the first side from a two-sided American price pair
 */
export function noVigProbability(price: number, opposite: number): number {
  return devigTwoWay(americanToProbability(price), americanToProbability(opposite))[0];
}

/**
 * Whether price `a` pays more than price `b`
 */
export function priceBetterForBettor(a: number, b: number): boolean {
  if (a >= 0 && b >= 0) return a > b;
  if (a <= 0 && b <= 0) return Math.abs(a) < Math.abs(b);
  return a > b;
}

/**
 * Cents by which the reference price beats `other`; negative when `other` pays more
 */
export function centsDiff(ref: number, other: number | null): number {
  if (other === null) return 0;
  if (ref >= 0 && other >= 0) return ref - other;
  if (ref <= 0 && other <= 0) return Math.abs(other) - Math.abs(ref);
  return (ref > 0 ? ref : 0) + (other < 0 ? Math.abs(other) : 0);
}

/**
 * Expected value in percent of stake, rounded to 2 decimals
 */
export function expectedValuePct(trueProb: number, american: number): number {
  return roundTo((trueProb * americanToDecimal(american) - 1) * 100, 2);
}

/**
 * Full Kelly fraction for a win probability at decimal odds
 */
export function kellyFraction(trueProb: number, decimal: number): number {
  const b = decimal - 1;
  if (b <= 0) return 0;
  const q = 1 - trueProb;
  return Math.max(0, (b * trueProb - q) / b);
}
