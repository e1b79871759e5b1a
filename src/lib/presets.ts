/**
 * Scan window presets
 */

export type PresetName = 'morning' | 'pretip' | 'plus_odds';

export interface WindowPreset {
  name: PresetName;
  sortBy: 'EV' | 'CONF';
  minBooksDelta: number;
  trim: number;
  mlPressureScale: number;
  spreadPressureScale: number;
  requireEv: boolean;
  requireGap: boolean;
  minGapCents: number;
  minAvgGapCents: number;
  minTrueProbPct: number;
  steamWindowSec: number;
  minPrice: number | null;
  maxPrice: number | null;
  plusOddsScoring: boolean;
}

export const PRESETS: Record<PresetName, WindowPreset> = {
  morning: {
    name: 'morning',
    sortBy: 'EV',
    minBooksDelta: -1,
    trim: 0.2,
    mlPressureScale: 0.5,
    spreadPressureScale: 0.4,
    requireEv: true,
    requireGap: true,
    minGapCents: 5,
    minAvgGapCents: 5,
    minTrueProbPct: 52,
    steamWindowSec: 4 * 60 * 60,
    minPrice: null,
    maxPrice: null,
    plusOddsScoring: false,
  },
  pretip: {
    name: 'pretip',
    sortBy: 'CONF',
    minBooksDelta: -2,
    trim: 0.15,
    mlPressureScale: 1.0,
    spreadPressureScale: 0.6,
    requireEv: false,
    requireGap: false,
    minGapCents: 0,
    minAvgGapCents: 0,
    minTrueProbPct: 55,
    steamWindowSec: 30 * 60,
    minPrice: -240,
    maxPrice: -140,
    plusOddsScoring: false,
  },
  plus_odds: {
    name: 'plus_odds',
    sortBy: 'EV',
    minBooksDelta: 0,
    trim: 0.18,
    mlPressureScale: 0.7,
    spreadPressureScale: 0.5,
    requireEv: true,
    requireGap: true,
    minGapCents: 8,
    // average gap is only enforced for morning
    minAvgGapCents: 0,
    minTrueProbPct: 45,
    steamWindowSec: 2 * 60 * 60,
    minPrice: 100,
    maxPrice: 400,
    plusOddsScoring: true,
  },
};

export function isPresetName(value: string): value is PresetName {
  return value === 'morning' || value === 'pretip' || value === 'plus_odds';
}

/** Minimum contributing books after the preset's delta, never below 1 */
export function effectiveMinBooks(minBooks: number, preset: WindowPreset): number {
  return Math.max(1, minBooks + preset.minBooksDelta);
}

export function priceInBounds(price: number, preset: WindowPreset): boolean {
  if (preset.minPrice !== null && price < preset.minPrice) return false;
  if (preset.maxPrice !== null && price > preset.maxPrice) return false;
  return true;
}
