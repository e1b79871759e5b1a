/**
 * Statistical hit-probability model for player stat lines and its blend with market consensus
 */

import { clamp } from './prob';
import { median } from './consensus';

export type StatKey = 'pts' | 'reb' | 'ast' | 'fg3m';

export interface GameLog {
  date: string;
  minutes: number;
  pts: number;
  reb: number;
  ast: number;
  fg3m: number;
}

export interface StatProfile {
  mean: number;
  stdev: number;
  cv: number;
  rollingMean: number;
  games: number;
}

export interface BlendTuning {
  recentGames: number;
  longGames: number;
  minMinutes: number;
  minGames: number;
  highCv: number;
  midCv: number;
  alphaHighCv: number;
  alphaMidCv: number;
  alphaMax: number;
  alphaMin: number;
  iqrScale: number;
  maxVariancePenalty: number;
  rangeBuffer: number;
  medianBand: number;
}

export const BLEND_TUNING: BlendTuning = {
  recentGames: 10,
  longGames: 30,
  minMinutes: 10,
  minGames: 3,
  highCv: 0.6,
  midCv: 0.4,
  alphaHighCv: 0.9,
  alphaMidCv: 0.85,
  alphaMax: 0.9,
  alphaMin: 0.75,
  iqrScale: 0.35,
  maxVariancePenalty: 0.15,
  rangeBuffer: 0.05,
  medianBand: 0.1,
};

export type HitSide = 'Over' | 'Under';

function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

function sampleStdev(values: number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  const ss = values.reduce((acc, v) => acc + (v - m) ** 2, 0);
  return Math.sqrt(ss / (values.length - 1));
}

function newestFirst(logs: GameLog[]): GameLog[] {
  return [...logs].sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
}

/**
 * Recent mean, spread and minutes-inflated CV for one stat; null when fewer
 * than the minimum number of meaningful games exist
 */
export function statProfile(
  logs: GameLog[],
  stat: StatKey,
  tuning: BlendTuning = BLEND_TUNING
): StatProfile | null {
  const window = newestFirst(logs).slice(0, tuning.longGames);
  const played = window.filter(g => g.minutes > tuning.minMinutes);
  if (played.length < tuning.minGames) return null;

  const recent = played.slice(0, tuning.recentGames).map(g => g[stat]);
  const m = mean(recent);
  const stdev = sampleStdev(recent);
  const cv = m > 0 ? stdev / m : 1;

  const minutes = played.map(g => g.minutes);
  const minutesCv =
    minutes.length >= tuning.recentGames
      ? sampleStdev(minutes.slice(0, tuning.recentGames)) / mean(minutes.slice(0, tuning.recentGames))
      : 1;

  const all = window.map(g => g[stat]);
  const short = mean(all.slice(0, tuning.recentGames));
  const long = mean(all);

  return {
    mean: m,
    stdev,
    cv: cv * (1 + minutesCv * 0.5),
    rollingMean: 0.5 * short + 0.5 * long,
    games: played.length,
  };
}

function logFactorial(x: number): number {
  if (x > 170) {
    // Stirling
    return x * Math.log(x) - x + 0.5 * Math.log(2 * Math.PI * x);
  }
  let s = 0;
  for (let i = 2; i <= x; i++) s += Math.log(i);
  return s;
}

/**
 * P(X > line) or P(X <= floor(line)) for X ~ Poisson(mean)
 */
export function poissonHitProb(lambda: number, line: number, side: HitSide): number {
  if (lambda <= 0) return side === 'Over' ? 0 : 1;

  const kFloor = Math.floor(line);
  let cdf = 0;
  for (let x = 0; x <= kFloor; x++) {
    cdf += Math.exp(-lambda + x * Math.log(lambda) - logFactorial(x));
  }
  return side === 'Over' ? clamp(1 - cdf, 0, 1) : clamp(cdf, 0, 1);
}

/**
 * Error function, Abramowitz & Stegun 7.1.26
 */
export function erf(x: number): number {
  const sign = x < 0 ? -1 : 1;
  const ax = Math.abs(x);
  const t = 1 / (1 + 0.3275911 * ax);
  const y =
    1 -
    ((((1.061405429 * t - 1.453152027) * t + 1.421413741) * t - 0.284496736) * t + 0.254829592) *
      t *
      Math.exp(-ax * ax);
  return sign * y;
}

export function normalCdf(z: number): number {
  return 0.5 * (1 + erf(z / Math.SQRT2));
}

/**
 * Overdispersed hit probability; falls back to Poisson when the variance
 * does not exceed the mean or the shape is small
 */
export function negativeBinomialHitProb(
  m: number,
  variance: number,
  line: number,
  side: HitSide
): number {
  if (m <= 0) return side === 'Over' ? 0 : 1;
  if (variance <= m * 1.1) return poissonHitProb(m, line, side);

  const p = m / variance;
  const r = (m * m) / (variance - m);
  if (r <= 0 || p <= 0 || p >= 1) return poissonHitProb(m, line, side);

  if (r > 30) {
    const nbMean = (r * (1 - p)) / p;
    const nbStd = Math.sqrt((r * (1 - p)) / (p * p));
    const z = (line + 0.5 - nbMean) / nbStd;
    return clamp(side === 'Over' ? normalCdf(-z) : normalCdf(z), 0, 1);
  }
  return poissonHitProb(m, line, side);
}

/**
 * Model hit probability for a stat line from a player's profile
 */
export function modelHitProbability(
  profile: StatProfile,
  line: number,
  side: HitSide,
  tuning: BlendTuning = BLEND_TUNING
): number {
  if (profile.cv > tuning.highCv) {
    const variance = profile.stdev > 0 ? profile.stdev ** 2 : profile.mean * 1.5;
    const raw = negativeBinomialHitProb(profile.mean, variance, line, side);
    const penalty = Math.min(tuning.maxVariancePenalty, profile.cv * 0.1);
    return 0.5 + (raw - 0.5) * (1 - penalty);
  }
  return poissonHitProb(profile.rollingMean, line, side);
}

/** Weight given to the market consensus in the blend */
export function blendAlpha(cv: number, iqr: number, tuning: BlendTuning = BLEND_TUNING): number {
  if (cv > tuning.highCv) return tuning.alphaHighCv;
  if (cv > tuning.midCv) return tuning.alphaMidCv;
  return clamp(tuning.alphaMax - iqr / tuning.iqrScale, tuning.alphaMin, tuning.alphaMax);
}

/**
 * Blend consensus with the model and keep the result near the sample range
 */
export function blendProbability(
  consensus: number,
  model: number | null,
  samples: number[],
  iqr: number,
  cv: number,
  tuning: BlendTuning = BLEND_TUNING
): number {
  let p = consensus;
  if (model !== null) {
    const alpha = blendAlpha(cv, iqr, tuning);
    p = alpha * consensus + (1 - alpha) * model;
  }
  if (samples.length > 0) {
    p = clamp(p, Math.min(...samples) - tuning.rangeBuffer, Math.max(...samples) + tuning.rangeBuffer);
    const med = median(samples);
    p = clamp(p, med - tuning.medianBand, med + tuning.medianBand);
  }
  return clamp(p, 0, 1);
}
