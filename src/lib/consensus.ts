/**
 * Consensus calculation utilities
 */

export interface ConsensusTuning {
  smallSampleMax: number;
  madFloor: number;
  zScale: number;
  outlierZ: number;
  outlierWeight: number;
  hardPathShare: number;
  winsorizeMax: number;
  winsorizeShift: number;
  defaultDispersion: number;
}

export const CONSENSUS_TUNING: ConsensusTuning = {
  smallSampleMax: 3,
  madFloor: 0.001,
  zScale: 0.6745,
  outlierZ: 2.5,
  outlierWeight: 0.1,
  hardPathShare: 0.4,
  winsorizeMax: 6,
  winsorizeShift: 0.25,
  defaultDispersion: 0.2,
};

export interface WeightedSample {
  value: number;
  weight: number;
}

export interface ConsensusResult {
  fairProbability: number;
  bookCount: number;
  dispersion: number;
}

/**
 * Calculate median
 */
export function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);

  if (sorted.length % 2 === 0) {
    return (sorted[mid - 1] + sorted[mid]) / 2;
  }

  return sorted[mid];
}

/**
 * Lower and upper quartiles using the exclusive method
 */
export function quartiles(values: number[]): [number, number] {
  const d = [...values].sort((a, b) => a - b);
  const m = d.length + 1;
  const at = (i: number): number => {
    const j = Math.floor((i * m) / 4);
    const delta = i * m - 4 * j;
    const lo = d[Math.max(0, j - 1)];
    const hi = d[Math.min(d.length - 1, j)];
    return (lo * (4 - delta) + hi * delta) / 4;
  };
  return [at(1), at(3)];
}

function weightedMean(samples: WeightedSample[]): number | null {
  let num = 0;
  let den = 0;
  for (const { value, weight } of samples) {
    num += value * weight;
    den += weight;
  }
  return den > 0 ? num / den : null;
}

/**
 * Robust weighted mean: median for tiny samples, MAD-based outlier
 * down-weighting otherwise, with a winsorize/trim fallback when too many
 * samples look like outliers.
 */
export function robustWeightedMean(
  samples: WeightedSample[],
  trim: number,
  tuning: ConsensusTuning = CONSENSUS_TUNING
): number | null {
  const n = samples.length;
  if (n === 0) return null;

  const values = samples.map(s => s.value);
  if (n <= tuning.smallSampleMax) {
    return median(values);
  }

  const med = median(values);
  const mad = median(values.map(v => Math.abs(v - med)));
  if (mad < tuning.madFloor) {
    return weightedMean(samples);
  }

  let outliers = 0;
  const cleaned = samples.map(s => {
    const z = (tuning.zScale * (s.value - med)) / mad;
    if (Math.abs(z) > tuning.outlierZ) {
      outliers += 1;
      return { value: s.value, weight: s.weight * tuning.outlierWeight };
    }
    return s;
  });

  if (outliers <= n * tuning.hardPathShare) {
    return weightedMean(cleaned);
  }

  let sorted = [...samples].sort((a, b) => a.value - b.value);
  if (n <= tuning.winsorizeMax) {
    const keep = 1 - tuning.winsorizeShift;
    sorted[0] = {
      value: sorted[0].value * keep + sorted[1].value * tuning.winsorizeShift,
      weight: sorted[0].weight,
    };
    sorted[n - 1] = {
      value: sorted[n - 1].value * keep + sorted[n - 2].value * tuning.winsorizeShift,
      weight: sorted[n - 1].weight,
    };
  } else {
    const k = Math.floor(n * trim);
    if (n - 2 * k > 0) {
      sorted = sorted.slice(k, n - k);
    }
  }
  return weightedMean(sorted);
}

/**
 * Spread of the contributing probabilities
 */
export function dispersion(values: number[], tuning: ConsensusTuning = CONSENSUS_TUNING): number {
  if (values.length >= 4) {
    const [q1, q3] = quartiles(values);
    return Math.max(1e-6, q3 - q1);
  }
  if (values.length === 3) {
    return Math.max(1e-6, (Math.max(...values) - Math.min(...values)) * 0.5);
  }
  return tuning.defaultDispersion;
}

/**
 * Fair probability, book count and dispersion for one side of a market
 */
export function buildConsensus(
  samples: WeightedSample[],
  trim: number,
  tuning: ConsensusTuning = CONSENSUS_TUNING
): ConsensusResult | null {
  const fair = robustWeightedMean(samples, trim, tuning);
  if (fair === null) return null;
  return {
    fairProbability: fair,
    bookCount: samples.length,
    dispersion: dispersion(samples.map(s => s.value), tuning),
  };
}
