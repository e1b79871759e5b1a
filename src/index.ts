export { ScanEngine } from './lib/engine';
export type { EngineDeps, EngineSettings, ScanCounts, ScanProgress, ScanRequest, ScanResult } from './lib/engine';
export { createScanEngine } from './lib/bootstrap';
export { buildParlays, parlayMetrics } from './lib/parlays';
export type { Parlay, ParlayLists, ParlayOptions } from './lib/parlays';
export { buildDailyCard, formatPick } from './lib/picks';
export type { CardParlay, CardPick, DailyCard } from './lib/picks';
export { PRESETS } from './lib/presets';
export type { PresetName, WindowPreset } from './lib/presets';
export { BookWeights, loadBookWeights, saveBookWeights, setBookWeight } from './lib/book-weights';
export { MemoryMarketStore } from './lib/store';
export type { MarketStore, TickQuery } from './lib/store';
export { SupabaseMarketStore, createMarketStore } from './lib/supabase';
export { OddsApiClient } from './lib/odds-api';
export type { EventOdds, OddsFeed } from './lib/odds-api';
export { StatsApiClient } from './lib/stats-api';
export type { StatsFeed } from './lib/stats-api';
export { InjuryApiClient } from './lib/injury-api';
export type { InjuryFeed, InjuryRecord } from './lib/injury-api';
export { ConfigError, HttpError, StoreWriteError } from './lib/errors';
export type {
  Badge,
  BetRecord,
  Candidate,
  GameEvent,
  MarketKey,
  PropMarketKey,
  Side,
  TeamMarketKey,
  TickRecord,
} from './types/candidate';
export { TOTAL_SUBJECT } from './types/candidate';
