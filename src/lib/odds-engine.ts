/**
 * Odds engine - scores one event's quote book into candidates
 * Price bounds → consensus → blend → adjustments → filters → confidence → Kelly
 */

import { buildConsensus, type WeightedSample } from './consensus';
import { candidateKey } from './correlation';
import { config } from './config';
import { errorMessage } from './errors';
import { lineAdvantage, priceGaps, worseLineCount } from './line-shopping';
import { Logger } from './logger';
import { blendProbability, modelHitProbability, statProfile, type StatKey } from './model';
import { priceInBounds, type WindowPreset } from './presets';
import { clamp, expectedValuePct, probabilityToAmerican, roundTo } from './prob';
import {
  isPropMarket,
  nearestOtherLines,
  opponentOf,
  pairedSamples,
  type LineQuotes,
  type QuoteBook,
} from './quotes';
import { confidenceFromProbability, kellyPct, plusOddsConfidence, stakeAmount } from './scoring';
import type { BookWeights } from './book-weights';
import type { PlayerLogService } from './player-logs';
import { isHighVariance, type MinutesService } from './adjustments/minutes';
import type { InjuryService } from './adjustments/injuries';
import type { SteamService } from './adjustments/steam';
import type { TeamPressureService } from './adjustments/team-pressure';
import { signal, signalPoints, signalTag, type SignalResult } from './adjustments/signal';
import { TOTAL_SUBJECT, type Candidate, type PropMarketKey, type Side } from '../types/candidate';

const logger = new Logger('odds-engine');

const STAT_FOR_MARKET: Record<PropMarketKey, StatKey> = {
  player_points: 'pts',
  player_rebounds: 'reb',
  player_assists: 'ast',
  player_threes: 'fg3m',
};

export interface AdjustmentServices {
  injuries: InjuryService;
  minutes: MinutesService;
  playerLogs: PlayerLogService;
  steam: SteamService;
  teamPressure: TeamPressureService;
}

export interface ScoringContext {
  preset: WindowPreset;
  /** Minimum contributing books after the preset delta */
  minBooks: number;
  minEvPct: number;
  bankroll: number;
  referenceBook: string;
  weights: BookWeights;
  teamFilter: ReadonlySet<string> | null;
}

/** Why a side was dropped, counted per event for the scan summary */
export const SKIP_REASONS = [
  'price-bounds',
  'thin-market',
  'minutes-insufficient',
  'filters',
  'low-confidence',
] as const;

export type SkipReason = (typeof SKIP_REASONS)[number];

export interface EventScore {
  candidates: Candidate[];
  skipped: Record<SkipReason, number>;
}

interface ProbabilityEstimate {
  fairProb: number;
  trueProb: number;
  booksUsed: number;
  pressureBump: number;
  pressureTag: string;
}

export function sidesFor(entry: LineQuotes): Side[] {
  if (entry.market === 'h2h') return ['Win'];
  if (entry.market === 'spreads') return ['Cover'];
  return ['Over', 'Under'];
}

export function matchupLabel(quotes: QuoteBook): string {
  return `${quotes.event.away} @ ${quotes.event.home}`;
}

export function emptySkips(): Record<SkipReason, number> {
  return { 'price-bounds': 0, 'thin-market': 0, 'minutes-insufficient': 0, filters: 0, 'low-confidence': 0 };
}

/**
 * Gap, probability and EV filters of the preset
 */
export function passesFilters(
  preset: WindowPreset,
  inputs: { trueProb: number; evPct: number; bestGapCents: number; avgGapCents: number },
  minEvPct: number
): boolean {
  let edgeOk = true;
  if (preset.requireGap) {
    edgeOk = inputs.bestGapCents >= preset.minGapCents;
    if (preset.minAvgGapCents > 0) {
      edgeOk = edgeOk && inputs.avgGapCents >= preset.minAvgGapCents;
    }
  }
  const probOk = preset.minTrueProbPct > 0
    ? roundTo(inputs.trueProb * 100, 2) >= preset.minTrueProbPct
    : true;
  const evOk = !preset.requireEv || inputs.evPct >= minEvPct;
  return edgeOk && probOk && evOk;
}

export class EventScorer {
  constructor(private services: AdjustmentServices) {}

  /**
   * Every surviving side of every line in the quote book
   */
  async scoreEvent(quotes: QuoteBook, ctx: ScoringContext): Promise<EventScore> {
    const candidates: Candidate[] = [];
    const skipped = emptySkips();

    for (const entry of quotes.lines.values()) {
      for (const side of sidesFor(entry)) {
        const outcome = await this.scoreSide(quotes, entry, side, ctx);
        if (outcome.kind === 'candidate') {
          candidates.push(outcome.candidate);
        } else if (outcome.kind === 'skipped') {
          skipped[outcome.reason] += 1;
        }
      }
    }
    return { candidates, skipped };
  }

  private async scoreSide(
    quotes: QuoteBook,
    entry: LineQuotes,
    side: Side,
    ctx: ScoringContext
  ): Promise<
    | { kind: 'candidate'; candidate: Candidate }
    | { kind: 'skipped'; reason: SkipReason }
    | { kind: 'unquoted' }
  > {
    const { preset } = ctx;
    const refPrice = entry.books.get(ctx.referenceBook)?.[side];
    if (refPrice === undefined) return { kind: 'unquoted' };
    if (!priceInBounds(refPrice, preset)) return { kind: 'skipped', reason: 'price-bounds' };

    const gaps = priceGaps(entry, side, ctx.referenceBook, refPrice);
    const estimate = await this.estimate(quotes, entry, side, ctx);
    if (!estimate) return { kind: 'skipped', reason: 'thin-market' };

    const prop = isPropMarket(entry.market);
    const injury: SignalResult = prop
      ? await this.services.injuries.playerSignal(entry.subject)
      : entry.subject === TOTAL_SUBJECT
        ? signal(0, '')
        : await this.services.injuries.opponentSignal(opponentOf(quotes.event, entry.subject));
    const minutesSummary = prop ? await this.services.minutes.summary(entry.subject) : null;
    const minutes: SignalResult = prop
      ? await this.services.minutes.playerSignal(entry.subject)
      : signal(0, '');
    if (minutes.kind === 'insufficient') {
      logger.debug(() => `Excluded ${entry.subject} ${entry.market}: ${minutes.reason}`);
      return { kind: 'skipped', reason: 'minutes-insufficient' };
    }
    const steam = await this.services.steam.signalFor({
      eventId: quotes.event.id,
      subject: entry.subject,
      market: entry.market,
      line: entry.line,
      side,
      windowSec: preset.steamWindowSec,
    });

    const { trueProb } = estimate;
    const evPct = expectedValuePct(trueProb, refPrice);
    const selection = `${entry.subject} ${entry.market} ${side} ${entry.line} @ ${refPrice}`;

    if (!passesFilters(preset, { trueProb, evPct, ...gaps }, ctx.minEvPct)) {
      const floor = ctx.minEvPct * config.nearMissThreshold;
      if (preset.requireEv && evPct < ctx.minEvPct && evPct >= floor && evPct > 0) {
        logger.nearMiss(selection, evPct, ctx.minEvPct, 'EV below threshold');
      }
      return { kind: 'skipped', reason: 'filters' };
    }

    const injuryPts = signalPoints(injury);
    const minutesPts = signalPoints(minutes);
    const steamPts = signalPoints(steam);
    const score = preset.plusOddsScoring
      ? plusOddsConfidence({
          trueProb,
          price: refPrice,
          gapCents: gaps.bestGapCents,
          booksUsed: estimate.booksUsed,
          injury: injuryPts,
          minutes: minutesPts,
        })
      : confidenceFromProbability(trueProb, { injury: injuryPts, minutes: minutesPts, steam: steamPts });
    if (score.confidence < preset.minTrueProbPct) {
      return { kind: 'skipped', reason: 'low-confidence' };
    }

    const otherLines = entry.market === 'h2h' ? [] : nearestOtherLines(quotes, entry, ctx.referenceBook);
    const kelly = kellyPct(trueProb, refPrice);
    const matchup = matchupLabel(quotes);
    const identity = { matchup, subject: entry.subject, market: entry.market, side, line: entry.line };

    const candidate: Candidate = {
      key: candidateKey(identity),
      event_id: quotes.event.id,
      commence_time: quotes.event.commence_time,
      ...identity,
      ref_book: ctx.referenceBook,
      ref_price: refPrice,
      fair_prob: roundTo(estimate.fairProb, 4),
      fair_price: probabilityToAmerican(estimate.fairProb),
      true_prob: roundTo(trueProb, 4),
      ev_pct: evPct,
      confidence: score.confidence,
      badge: score.badge,
      kelly_pct: kelly,
      stake: stakeAmount(ctx.bankroll, kelly),
      corr_flag: 'OK',
      tags: {
        injury: signalTag(injury),
        minutes: signalTag(minutes),
        steam: signalTag(steam),
        team_pressure: estimate.pressureTag,
      },
      best_book: gaps.bestBook,
      best_price: gaps.bestPrice,
      best_gap_cents: gaps.bestGapCents,
      avg_gap_cents: gaps.avgGapCents,
      line_advantage: roundTo(lineAdvantage(entry.line, otherLines, side), 2),
      worse_line_count: worseLineCount(entry.line, otherLines, side),
      books_count: estimate.booksUsed,
      injury_points: injuryPts,
      minutes_points: minutesPts,
      steam_points: steamPts,
      team_pressure_bump: roundTo(estimate.pressureBump, 4),
      high_variance_minutes: prop ? isHighVariance(minutesSummary) : false,
    };
    return { kind: 'candidate', candidate };
  }

  /**
   * Consensus plus the market-specific step: the statistical blend for
   * player props, the team pressure bump for moneylines and spreads
   */
  private async estimate(
    quotes: QuoteBook,
    entry: LineQuotes,
    side: Side,
    ctx: ScoringContext
  ): Promise<ProbabilityEstimate | null> {
    const samples = pairedSamples(quotes, entry, side, ctx.referenceBook);
    const required = entry.market === 'h2h' ? Math.max(2, ctx.minBooks) : ctx.minBooks;
    if (samples.length < required) return null;

    const weighted: WeightedSample[] = samples.map(s => ({
      value: s.probability,
      weight: ctx.weights.weightOf(s.book),
    }));
    const consensus = buildConsensus(weighted, ctx.preset.trim);
    if (!consensus) return null;

    const fairProb = consensus.fairProbability;
    const base = { fairProb, booksUsed: consensus.bookCount, pressureBump: 0, pressureTag: '' };

    if (isPropMarket(entry.market) && (side === 'Over' || side === 'Under')) {
      const values = samples.map(s => s.probability);
      const profile = await this.profileFor(entry.subject, STAT_FOR_MARKET[entry.market]);
      const model = profile ? modelHitProbability(profile, entry.line, side) : null;
      const trueProb = blendProbability(fairProb, model, values, consensus.dispersion, profile?.cv ?? 0);
      return { ...base, trueProb };
    }

    if (entry.market === 'h2h' || entry.market === 'spreads') {
      const scale = entry.market === 'h2h' ? ctx.preset.mlPressureScale : ctx.preset.spreadPressureScale;
      const opponent = opponentOf(quotes.event, entry.subject);
      const pressure = await this.services.teamPressure.scoreFor(entry.subject, opponent, ctx.teamFilter, scale);
      if (pressure.kind === 'no-data') {
        return { ...base, trueProb: fairProb };
      }
      return {
        ...base,
        trueProb: clamp(fairProb + pressure.bump, 0, 1),
        pressureBump: pressure.bump,
        pressureTag: Math.abs(pressure.bump) > 1e-6 ? pressure.tag : '',
      };
    }

    return { ...base, trueProb: fairProb };
  }

  private async profileFor(player: string, stat: StatKey) {
    try {
      const logs = await this.services.playerLogs.logsFor(player);
      return logs ? statProfile(logs, stat) : null;
    } catch (error) {
      logger.warn(`Game logs unavailable for ${player}: ${errorMessage(error)}`);
      return null;
    }
  }
}
