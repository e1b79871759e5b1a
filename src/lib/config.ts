function list(value: string | undefined, fallback: string): string[] {
  return (value || fallback)
    .split(',')
    .map(s => s.trim().toLowerCase())
    .filter(s => s.length > 0);
}

export const config = {
  // The Odds API Configuration
  oddsApiKey: process.env.ODDS_API_KEY || '',
  oddsApiBaseUrl: process.env.ODDS_API_BASE_URL || 'https://api.the-odds-api.com/v4',
  sport: process.env.ODDS_SPORT || 'basketball_nba',
  regions: process.env.ODDS_REGIONS || 'us',

  // Books
  referenceBook: (process.env.REFERENCE_BOOK || 'fanduel').toLowerCase(),
  competitorBooks: list(
    process.env.COMPETITOR_BOOKS,
    'draftkings,betmgm,caesars,pointsbetus,betrivers,espnbet,wynnbet'
  ),
  sharpBooks: list(process.env.SHARP_BOOKS, 'draftkings,betmgm,caesars'),
  bookWeightsPath: process.env.BOOK_WEIGHTS_PATH || 'data/book-weights.json',

  // Player stats feed
  statsApiBaseUrl: process.env.STATS_API_BASE_URL || 'https://api.balldontlie.io/v1',
  statsApiKey: process.env.STATS_API_KEY || '',
  statsSeason: parseInt(process.env.STATS_SEASON || '2025', 10),

  // Injury feed
  injuryApiUrl: process.env.INJURY_API_URL || 'https://nba-injuries-reports.p.rapidapi.com/injuries/nba',
  injuryApiHost: process.env.INJURY_API_HOST || 'nba-injuries-reports.p.rapidapi.com',
  injuryApiKey: process.env.INJURY_API_KEY || '',

  // Supabase Configuration
  supabaseUrl: process.env.SUPABASE_URL || process.env.NEXT_PUBLIC_SUPABASE_URL || '',
  supabaseServiceRoleKey: process.env.SUPABASE_SERVICE_ROLE_KEY || '',

  // HTTP
  httpTimeoutMs: parseInt(process.env.HTTP_TIMEOUT_MS || '10000', 10),
  httpRetries: parseInt(process.env.HTTP_RETRIES || '3', 10),
  scanConcurrency: parseInt(process.env.SCAN_CONCURRENCY || '8', 10),

  // Scan defaults
  defaults: {
    minBooks: 3,
    minEvPct: 2.0,
    bankroll: 1000,
    topN: 10,
    maxPerGame: 3,
    maxPerPlayer: 3,
  },

  // Badge thresholds (confidence points)
  badges: {
    standard: { high: 70, med: 60, low: 55 },
    plusOdds: { high: 55, med: 48, low: 42 },
  },

  // Stake sizing
  kelly: {
    multiplier: parseFloat(process.env.KELLY_MULTIPLIER || '0.5'),
    capPct: parseFloat(process.env.KELLY_CAP_PCT || '2.5'),
  },

  // Near-miss tracking
  nearMissThreshold: 0.5, // 50% of the EV floor counts as near-miss

  // Cache lifetimes
  cacheTtlMs: {
    injuries: 5 * 60 * 1000,
    minutes: 2 * 60 * 60 * 1000,
    teamPressure: 2 * 60 * 1000,
  },

  // Store write retries on lock contention
  storeRetry: {
    attempts: 4,
    baseDelayMs: 80,
    factor: 1.6,
  },
} as const;

export type AppConfig = typeof config;
