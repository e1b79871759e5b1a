/**
 * Team-level injury pressure and the moneyline/spread probability bump it implies
 */

import { TtlCache, systemClock, type Clock } from '../cache';
import { config } from '../config';
import { normalizeName, teamKey } from '../teams';
import type { InjuryService } from './injuries';
import type { MinutesService } from './minutes';

export type PressureMap = Map<string, number>;

export interface TeamPressure {
  team: number;
  opponent: number;
  diff: number;
  bump: number;
  tag: string;
}

export type TeamPressureResult =
  | ({ kind: 'signal' } & TeamPressure)
  | { kind: 'no-data'; reason: string };

/** Severity of a report status: out/inactive 2, doubtful 1, otherwise 0 */
export function injuryBucket(status: string): number {
  const s = normalizeName(status);
  if (s.includes('out') || s.includes('inactive')) return 2;
  if (s.includes('doubt')) return 1;
  return 0;
}

/** Weight of a missing player by typical minutes */
export function minutesMultiplier(medianMinutes: number): number {
  if (medianMinutes >= 32) return 2.0;
  if (medianMinutes >= 28) return 1.6;
  if (medianMinutes >= 24) return 1.3;
  if (medianMinutes >= 18) return 1.0;
  if (medianMinutes > 0) return 0.7;
  return 0.8;
}

/**
 * Probability bump for a team given both sides' pressure totals
 */
export function pressureBump(team: number, opponent: number): TeamPressure {
  const diff = opponent - team;
  if (team === 0 && opponent === 0) {
    return { team, opponent, diff, bump: 0, tag: '' };
  }
  const relative = diff / Math.max(1, team, opponent);
  const bump = Math.max(-0.05, Math.min(0.05, Math.tanh(relative) * 0.04));
  const signed = diff >= 0 ? `+${diff}` : `${diff}`;
  return { team, opponent, diff, bump, tag: `+${team} / +${opponent} (Δ${signed})` };
}

function filterKey(filter: ReadonlySet<string> | null): string {
  return filter && filter.size > 0 ? [...filter].sort().join(',') : '*';
}

export class TeamPressureService {
  private cache: TtlCache<string, PressureMap>;

  constructor(
    private injuries: InjuryService,
    private minutes: MinutesService,
    clock: Clock = systemClock,
    ttlMs: number = config.cacheTtlMs.teamPressure
  ) {
    this.cache = new TtlCache(ttlMs, clock);
  }

  /**
   * Summed pressure per canonical team, optionally limited to a team set;
   * null when no injury report is available
   */
  async pressureMap(filter: ReadonlySet<string> | null): Promise<PressureMap | null> {
    const report = await this.injuries.report();
    if (!report) return null;

    return this.cache.getOrLoad(filterKey(filter), async () => {
      const totals: PressureMap = new Map();
      for (const record of report.records) {
        if (!record.team) continue;
        const team = teamKey(record.team);
        if (filter && filter.size > 0 && !filter.has(team)) continue;

        const bucket = injuryBucket(record.status);
        if (bucket === 0) continue;

        const summary = await this.minutes.summary(record.player);
        const add = Math.max(1, Math.round(bucket * minutesMultiplier(summary?.median ?? 0)));
        totals.set(team, (totals.get(team) ?? 0) + add);
      }
      return totals;
    });
  }

  /**
   * Bump for `team` against `opponent`, scaled by the market's preset scale
   */
  async scoreFor(
    team: string,
    opponent: string,
    filter: ReadonlySet<string> | null,
    scale: number
  ): Promise<TeamPressureResult> {
    const map = await this.pressureMap(filter);
    if (!map) return { kind: 'no-data', reason: 'injury feed unavailable' };
    const base = pressureBump(map.get(teamKey(team)) ?? 0, map.get(teamKey(opponent)) ?? 0);
    return { kind: 'signal', ...base, bump: base.bump * scale };
  }

  invalidate(): void {
    this.cache.invalidate();
  }
}
