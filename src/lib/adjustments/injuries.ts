/**
 * Injury report lookups and the injury confidence adjustment
 */

import { TtlCache, systemClock, type Clock } from '../cache';
import { config } from '../config';
import { errorMessage } from '../errors';
import type { InjuryFeed, InjuryRecord } from '../injury-api';
import { Logger } from '../logger';
import { normalizeName, teamKey } from '../teams';
import { noData, signal, type SignalResult } from './signal';

const logger = new Logger('injuries');

export type InjuryStatus = 'Out' | 'Doubtful' | 'Q/GTD' | 'Probable';

const OWN_POINTS: Record<InjuryStatus, number> = {
  Out: -50,
  Doubtful: -30,
  'Q/GTD': -15,
  Probable: -5,
};

const OPPONENT_POINTS: Record<InjuryStatus, number> = {
  Out: 5,
  Doubtful: 3,
  'Q/GTD': 2,
  Probable: 0,
};

/**
 * Map a free-text report status onto the four tracked tiers
 */
export function normalizeInjuryStatus(raw: string): InjuryStatus | null {
  const s = normalizeName(raw);
  if (!s) return null;
  if (s.includes('out')) return 'Out';
  if (s.includes('doubt')) return 'Doubtful';
  if (s.includes('question') || s.includes('gtd')) return 'Q/GTD';
  if (s.includes('probable')) return 'Probable';
  if (s.includes('available')) return null;
  if (s.includes('rest') || s.includes('load') || s.includes('management')) return 'Q/GTD';
  return null;
}

export class InjuryReport {
  private byName = new Map<string, InjuryRecord>();

  constructor(readonly records: InjuryRecord[]) {
    for (const record of records) {
      this.byName.set(normalizeName(record.player), record);
    }
  }

  /**
   * Exact normalized match, else the record sharing the most name tokens
   */
  find(playerName: string): InjuryRecord | null {
    const name = normalizeName(playerName);
    const exact = this.byName.get(name);
    if (exact) return exact;

    const target = new Set(name.split(' '));
    let best: InjuryRecord | null = null;
    let bestScore = 0;
    for (const record of this.records) {
      const score = normalizeName(record.player)
        .split(' ')
        .filter(token => target.has(token)).length;
      if (score > bestScore) {
        best = record;
        bestScore = score;
      }
    }
    return best;
  }
}

/**
 * Confidence points for a status, from the bettor's side or the opponent's
 */
export function injuryPoints(status: InjuryStatus | null, isOpponent: boolean): SignalResult {
  if (status === null) return signal(0, '');
  if (isOpponent) return signal(OPPONENT_POINTS[status], `Opp-${status}`);
  return signal(OWN_POINTS[status], status);
}

export class InjuryService {
  private cache: TtlCache<string, InjuryReport>;

  constructor(
    private feed: InjuryFeed,
    private clock: Clock = systemClock,
    ttlMs: number = config.cacheTtlMs.injuries
  ) {
    this.cache = new TtlCache(ttlMs, clock);
  }

  /**
   * Today's report; a failed refresh falls back to the last report, or null
   */
  async report(): Promise<InjuryReport | null> {
    try {
      return await this.cache.getOrLoad('report', async () => {
        const records = await this.feed.getInjuries(new Date(this.clock()));
        logger.debug(() => `Loaded ${records.length} injury records`);
        return new InjuryReport(records);
      });
    } catch (error) {
      const stale = this.cache.getStale('report');
      logger.warn(`Injury feed failed${stale ? ', using cached report' : ''}: ${errorMessage(error)}`);
      return stale ?? null;
    }
  }

  async playerSignal(playerName: string): Promise<SignalResult> {
    const report = await this.report();
    if (!report) return noData('injury feed unavailable');
    const record = report.find(playerName);
    return injuryPoints(record ? normalizeInjuryStatus(record.status) : null, false);
  }

  /**
   * Summed nudge from every listed absence on the opposing team
   */
  async opponentSignal(opponent: string): Promise<SignalResult> {
    const report = await this.report();
    if (!report) return noData('injury feed unavailable');
    const key = teamKey(opponent);
    let points = 0;
    const tags: string[] = [];
    for (const record of report.records) {
      if (!record.team || teamKey(record.team) !== key) continue;
      const result = injuryPoints(normalizeInjuryStatus(record.status), true);
      if (result.kind !== 'signal' || result.points === 0) continue;
      points += result.points;
      tags.push(result.tag);
    }
    return signal(points, tags.join(','));
  }

  invalidate(): void {
    this.cache.invalidate();
  }
}
