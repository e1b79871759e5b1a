/**
 * Scan engine: owns the feeds, caches and store, and runs scans end to end
 */

import { systemClock, type Clock } from './cache';
import { config } from './config';
import { rankCandidates } from './correlation';
import { ConfigError, errorMessage } from './errors';
import { recordId } from './ids';
import { Logger } from './logger';
import {
  emptySkips,
  EventScorer,
  matchupLabel,
  SKIP_REASONS,
  type ScoringContext,
  type SkipReason,
} from './odds-engine';
import type { OddsFeed } from './odds-api';
import { buildParlays, type ParlayLists, type ParlayOptions } from './parlays';
import { buildDailyCard, type DailyCard } from './picks';
import { PlayerLogService } from './player-logs';
import { mapWithConcurrency } from './pool';
import { effectiveMinBooks, isPresetName, PRESETS, type PresetName } from './presets';
import { isMarketKey, normalizeEventOdds } from './quotes';
import { appendWithRetry, type MarketStore } from './store';
import type { StatsFeed } from './stats-api';
import type { InjuryFeed } from './injury-api';
import { teamFilterSet, teamKey } from './teams';
import type { BookWeights } from './book-weights';
import { InjuryService } from './adjustments/injuries';
import { MinutesService } from './adjustments/minutes';
import { SteamService } from './adjustments/steam';
import { TeamPressureService } from './adjustments/team-pressure';
import type { BetRecord, Candidate, GameEvent, MarketKey } from '../types/candidate';

const logger = new Logger('engine');

export interface ScanProgress {
  stage: 'events' | 'odds' | 'ranking' | 'done';
  completed: number;
  total: number;
}

export interface ScanRequest {
  markets: readonly string[];
  preset: string;
  minBooks?: number;
  minEvPct?: number;
  bankroll?: number;
  /** null keeps every ranked candidate */
  topN?: number | null;
  maxPerGame?: number;
  maxPerPlayer?: number;
  teams?: readonly string[];
  /** Persist the ranked candidates to the bet log */
  logBets?: boolean;
  signal?: AbortSignal;
  onProgress?: (progress: ScanProgress) => void;
}

export interface ScanCounts {
  events: number;
  scanned: number;
  failed: number;
  scored: number;
  ranked: number;
  skipped: Record<SkipReason, number>;
}

export interface ScanResult {
  preset: PresetName;
  generated_at: string;
  candidates: Candidate[];
  messages: string[];
  counts: ScanCounts;
}

interface ValidScan {
  markets: MarketKey[];
  preset: PresetName;
  minBooks: number;
  minEvPct: number;
  bankroll: number;
  topN: number | null;
  maxPerGame: number;
  maxPerPlayer: number;
  teamFilter: Set<string> | null;
}

interface EventOutcome {
  candidates: Candidate[];
  skipped: Record<SkipReason, number>;
  message?: string;
  failed: boolean;
}

export interface EngineSettings {
  referenceBook: string;
  competitorBooks: readonly string[];
  sharpBooks: readonly string[];
  concurrency: number;
}

export interface EngineDeps {
  odds: OddsFeed | null;
  stats: StatsFeed | null;
  injuries: InjuryFeed | null;
  store: MarketStore;
  weights: BookWeights;
  clock?: Clock;
  settings?: Partial<EngineSettings>;
}

// Stand-ins for feeds without credentials: every lookup comes back empty
const noStats: StatsFeed = {
  findPlayerId: async () => null,
  getGameLogs: async () => [],
};
const noInjuries: InjuryFeed = {
  getInjuries: async () => [],
};

function positiveInt(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

export class ScanEngine {
  private readonly settings: EngineSettings;
  private readonly clock: Clock;
  private readonly odds: OddsFeed | null;
  private readonly store: MarketStore;
  private readonly weights: BookWeights;
  private readonly playerLogs: PlayerLogService;
  private readonly injuries: InjuryService;
  private readonly minutes: MinutesService;
  private readonly teamPressure: TeamPressureService;
  private readonly scorer: EventScorer;

  constructor(deps: EngineDeps) {
    this.settings = {
      referenceBook: config.referenceBook,
      competitorBooks: config.competitorBooks,
      sharpBooks: config.sharpBooks,
      concurrency: config.scanConcurrency,
      ...deps.settings,
    };
    this.clock = deps.clock ?? systemClock;
    this.odds = deps.odds;
    this.store = deps.store;
    this.weights = deps.weights;

    if (!deps.stats) logger.info('Stats feed not configured; player props use market consensus only');
    if (!deps.injuries) logger.info('Injury feed not configured; injury adjustments are neutral');

    this.playerLogs = new PlayerLogService(deps.stats ?? noStats, this.clock);
    this.injuries = new InjuryService(deps.injuries ?? noInjuries, this.clock);
    this.minutes = new MinutesService(this.playerLogs);
    this.teamPressure = new TeamPressureService(this.injuries, this.minutes, this.clock);
    this.scorer = new EventScorer({
      injuries: this.injuries,
      minutes: this.minutes,
      playerLogs: this.playerLogs,
      steam: new SteamService(this.store, this.settings.sharpBooks, this.clock),
      teamPressure: this.teamPressure,
    });
  }

  /**
   * Check a request before any feed is touched
   */
  validate(request: ScanRequest): ValidScan {
    if (!this.odds) {
      throw new ConfigError('ODDS_API_KEY is not configured');
    }
    const preset = request.preset;
    if (!isPresetName(preset)) {
      throw new ConfigError(`Unknown preset "${preset}"`);
    }
    if (request.markets.length === 0) {
      throw new ConfigError('At least one market is required');
    }
    const markets: MarketKey[] = [];
    for (const m of request.markets) {
      if (!isMarketKey(m)) throw new ConfigError(`Unknown market "${m}"`);
      if (!markets.includes(m)) markets.push(m);
    }

    const bankroll = request.bankroll ?? config.defaults.bankroll;
    if (!Number.isFinite(bankroll) || bankroll <= 0) {
      throw new ConfigError(`Bankroll must be a positive amount, got ${bankroll}`);
    }
    const minEvPct = request.minEvPct ?? config.defaults.minEvPct;
    if (!Number.isFinite(minEvPct)) {
      throw new ConfigError(`Minimum EV must be a number, got ${minEvPct}`);
    }
    const topN = request.topN === undefined ? config.defaults.topN : request.topN;

    return {
      markets,
      preset,
      minBooks: positiveInt(request.minBooks ?? config.defaults.minBooks, 'minBooks'),
      minEvPct,
      bankroll,
      topN: topN === null ? null : positiveInt(topN, 'topN'),
      maxPerGame: positiveInt(request.maxPerGame ?? config.defaults.maxPerGame, 'maxPerGame'),
      maxPerPlayer: positiveInt(request.maxPerPlayer ?? config.defaults.maxPerPlayer, 'maxPerPlayer'),
      teamFilter: teamFilterSet(request.teams),
    };
  }

  async scan(request: ScanRequest): Promise<ScanResult> {
    const valid = this.validate(request);
    const odds = this.odds;
    if (!odds) throw new ConfigError('ODDS_API_KEY is not configured');

    const preset = PRESETS[valid.preset];
    const progress = request.onProgress ?? (() => {});
    const done = logger.time(`scan ${valid.preset}`);
    const now = new Date(this.clock());

    logger.section(`Scan ${valid.preset}`, '🏀');
    progress({ stage: 'events', completed: 0, total: 0 });

    const allEvents = await odds.getEvents();
    const events = valid.teamFilter
      ? allEvents.filter(e => this.eventMatches(e, valid.teamFilter))
      : allEvents;

    const ctx: ScoringContext = {
      preset,
      minBooks: effectiveMinBooks(valid.minBooks, preset),
      minEvPct: valid.minEvPct,
      bankroll: valid.bankroll,
      referenceBook: this.settings.referenceBook,
      weights: this.weights,
      teamFilter: valid.teamFilter,
    };

    let completed = 0;
    progress({ stage: 'odds', completed, total: events.length });
    const outcomes = await mapWithConcurrency(
      events,
      async event => {
        const outcome = await this.processEvent(odds, event, valid.markets, ctx, now);
        completed += 1;
        progress({ stage: 'odds', completed, total: events.length });
        return outcome;
      },
      { concurrency: this.settings.concurrency, signal: request.signal }
    );

    const messages: string[] = [];
    const scored: Candidate[] = [];
    const skipped = emptySkips();
    for (const outcome of outcomes) {
      scored.push(...outcome.candidates);
      if (outcome.message) messages.push(outcome.message);
      for (const reason of SKIP_REASONS) {
        skipped[reason] += outcome.skipped[reason];
      }
    }
    if (request.signal?.aborted) {
      messages.push(`Scan stopped after ${outcomes.length} of ${events.length} events`);
    }

    progress({ stage: 'ranking', completed: scored.length, total: scored.length });
    const ranked = rankCandidates(scored, {
      sortBy: preset.sortBy,
      topN: valid.topN,
      bankroll: valid.bankroll,
      maxPerGame: valid.maxPerGame,
      maxPerPlayer: valid.maxPerPlayer,
    });

    if (request.logBets) {
      await appendWithRetry('bets', () => this.store.appendBets(this.betRecords(ranked, valid.preset, now)));
    }

    ranked.forEach((c, i) => logger.candidate(i + 1, c));
    const counts: ScanCounts = {
      events: events.length,
      scanned: outcomes.length,
      failed: outcomes.filter(o => o.failed).length,
      scored: scored.length,
      ranked: ranked.length,
      skipped,
    };
    logger.summary({
      preset: valid.preset,
      events: counts.events,
      failed_events: counts.failed,
      scored: counts.scored,
      ranked: counts.ranked,
    });
    progress({ stage: 'done', completed: ranked.length, total: ranked.length });
    done();

    return { preset: valid.preset, generated_at: now.toISOString(), candidates: ranked, messages, counts };
  }

  /**
   * Ranked 2-leg and 3-leg suggestions from already-scored candidates
   */
  buildParlays(pool: Candidate[], options: ParlayOptions = {}): ParlayLists {
    return buildParlays(pool, options);
  }

  /**
   * Full uncapped scan condensed into locks, long shots and parlays
   */
  async dailyCard(request: Omit<ScanRequest, 'topN' | 'maxPerGame' | 'maxPerPlayer'>): Promise<DailyCard> {
    const result = await this.scan({ ...request, topN: null, maxPerGame: 10, maxPerPlayer: 10 });
    return buildDailyCard(result.candidates, result.preset, new Date(this.clock()));
  }

  /** Drop every cached lookup so the next scan reads the feeds again */
  invalidateCaches(): void {
    this.injuries.invalidate();
    this.playerLogs.invalidate();
    this.teamPressure.invalidate();
  }

  private eventMatches(event: GameEvent, filter: ReadonlySet<string> | null): boolean {
    if (!filter) return true;
    return filter.has(teamKey(event.home)) || filter.has(teamKey(event.away));
  }

  private async processEvent(
    odds: OddsFeed,
    event: GameEvent,
    markets: MarketKey[],
    ctx: ScoringContext,
    takenAt: Date
  ): Promise<EventOutcome> {
    const label = `${event.away} @ ${event.home}`;
    try {
      const books = [this.settings.referenceBook, ...this.settings.competitorBooks];
      const payload = await odds.getEventOdds(event.id, markets, books);
      const quotes = normalizeEventOdds(event, payload.bookmakers, {
        referenceBook: this.settings.referenceBook,
        competitorBooks: this.settings.competitorBooks,
        markets,
        takenAt,
      });
      if (quotes.lines.size === 0) {
        return { candidates: [], skipped: emptySkips(), message: `${label}: no quotes posted yet`, failed: false };
      }

      await appendWithRetry(`ticks ${event.id}`, () => this.store.appendTicks(quotes.ticks));
      const score = await this.scorer.scoreEvent(quotes, ctx);
      logger.debug(() => `${matchupLabel(quotes)}: ${score.candidates.length} candidates from ${quotes.lines.size} lines`);
      return { candidates: score.candidates, skipped: score.skipped, failed: false };
    } catch (error) {
      logger.warn(`Skipping ${label}: ${errorMessage(error)}`);
      return { candidates: [], skipped: emptySkips(), message: `Skipped ${label}: ${errorMessage(error)}`, failed: true };
    }
  }

  private betRecords(ranked: Candidate[], preset: PresetName, loggedAt: Date): BetRecord[] {
    const ts = loggedAt.toISOString();
    return ranked.map(c => ({
      id: recordId(ts, preset, c.key),
      logged_at: ts,
      preset,
      candidate_key: c.key,
      event_id: c.event_id,
      matchup: c.matchup,
      subject: c.subject,
      market: c.market,
      side: c.side,
      line: c.line,
      ref_price: c.ref_price,
      fair_prob: c.fair_prob,
      true_prob: c.true_prob,
      ev_pct: c.ev_pct,
      confidence: c.confidence,
      badge: c.badge,
      kelly_pct: c.kelly_pct,
      stake: c.stake,
      corr_flag: c.corr_flag,
    }));
  }
}
