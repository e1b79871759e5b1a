export type PropMarketKey =
  | 'player_points'
  | 'player_rebounds'
  | 'player_assists'
  | 'player_threes';

export type TeamMarketKey = 'h2h' | 'spreads' | 'totals';

export type MarketKey = PropMarketKey | TeamMarketKey;

export type Side = 'Over' | 'Under' | 'Win' | 'Cover';

export type Badge = 'HIGH' | 'MED' | 'LOW' | 'PASS';

/** Subject used for game totals, which belong to neither team */
export const TOTAL_SUBJECT = 'TOTAL';

export interface GameEvent {
  id: string;
  home: string;
  away: string;
  commence_time: string;
}

/** Tags produced by the situational adjustment layer */
export interface AdjustmentTags {
  injury: string;
  minutes: string;
  steam: string;
  team_pressure: string;
}

export interface Candidate {
  key: string;
  event_id: string;
  matchup: string;
  commence_time: string;
  subject: string;
  market: MarketKey;
  side: Side;
  line: number;
  ref_book: string;
  ref_price: number;
  fair_prob: number;
  fair_price: number;
  true_prob: number;
  ev_pct: number;
  confidence: number;
  badge: Badge;
  kelly_pct: number;
  stake: number;
  corr_flag: string;
  tags: AdjustmentTags;
  best_book: string | null;
  best_price: number | null;
  best_gap_cents: number;
  avg_gap_cents: number;
  line_advantage: number;
  worse_line_count: number;
  books_count: number;
  injury_points: number;
  minutes_points: number;
  steam_points: number;
  team_pressure_bump: number;
  high_variance_minutes: boolean;
}

export interface TickRecord {
  id: string;
  taken_at: string;
  event_id: string;
  subject: string;
  market: MarketKey;
  line: number;
  side: Side;
  book: string;
  price: number;
}

export interface BetRecord {
  id: string;
  logged_at: string;
  preset: string;
  candidate_key: string;
  event_id: string;
  matchup: string;
  subject: string;
  market: MarketKey;
  side: Side;
  line: number;
  ref_price: number;
  fair_prob: number;
  true_prob: number;
  ev_pct: number;
  confidence: number;
  badge: Badge;
  kelly_pct: number;
  stake: number;
  corr_flag: string;
}
