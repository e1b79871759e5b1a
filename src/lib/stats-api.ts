/**
 * Player game-log feed
 */

import { z } from 'zod';
import { config } from './config';
import { fetchJson, type HttpOptions } from './http';
import { normalizeName } from './teams';
import type { GameLog } from './model';

const playerSchema = z.object({
  id: z.number(),
  first_name: z.string(),
  last_name: z.string(),
});

const statRowSchema = z.object({
  min: z.union([z.string(), z.number()]).nullable().optional(),
  pts: z.number().nullable().optional(),
  reb: z.number().nullable().optional(),
  ast: z.number().nullable().optional(),
  fg3m: z.number().nullable().optional(),
  game: z.object({ date: z.string() }),
});

const pageSchema = z.object({ data: z.array(z.unknown()) });

export interface StatsFeed {
  findPlayerId(name: string): Promise<number | null>;
  getGameLogs(playerId: number): Promise<GameLog[]>;
}

/**
 * Parse "34:12", "34" or 34 into fractional minutes
 */
export function parseMinutes(value: string | number | null | undefined): number {
  if (value === null || value === undefined || value === '') return 0;
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
  if (value.includes(':')) {
    const [mm, ss] = value.split(':');
    const minutes = parseInt(mm, 10);
    const seconds = parseInt(ss, 10);
    if (Number.isNaN(minutes) || Number.isNaN(seconds)) return 0;
    return minutes + seconds / 60;
  }
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? 0 : parsed;
}

/** Number of shared name tokens */
export function tokenOverlap(a: string, b: string): number {
  const target = new Set(normalizeName(a).split(' '));
  return normalizeName(b)
    .split(' ')
    .filter(token => target.has(token)).length;
}

export class StatsApiClient implements StatsFeed {
  private idCache = new Map<string, number>();

  constructor(
    private apiKey: string,
    private baseUrl: string = config.statsApiBaseUrl,
    private season: number = config.statsSeason,
    private http: HttpOptions = {}
  ) {}

  private async get(endpoint: string, params: Array<[string, string]>): Promise<unknown[]> {
    const url = new URL(`${this.baseUrl}${endpoint}`);
    for (const [key, value] of params) {
      url.searchParams.append(key, value);
    }
    const body = await fetchJson(url.toString(), {
      ...this.http,
      headers: { Authorization: this.apiKey, ...this.http.headers },
    });
    return pageSchema.parse(body).data;
  }

  /**
   * Search by first name, then pick the candidate sharing the most name tokens
   */
  async findPlayerId(name: string): Promise<number | null> {
    const key = normalizeName(name);
    const cached = this.idCache.get(key);
    if (cached !== undefined) return cached;

    const [firstName] = name.trim().split(/\s+/);
    if (!firstName) return null;

    const rows = await this.get('/players', [
      ['first_name', firstName],
      ['per_page', '100'],
    ]);

    let bestId: number | null = null;
    let bestScore = 0;
    for (const row of rows) {
      const parsed = playerSchema.safeParse(row);
      if (!parsed.success) continue;
      const score = tokenOverlap(name, `${parsed.data.first_name} ${parsed.data.last_name}`);
      if (score > bestScore) {
        bestId = parsed.data.id;
        bestScore = score;
      }
    }

    if (bestId !== null) this.idCache.set(key, bestId);
    return bestId;
  }

  /**
   * Season game logs, newest first
   */
  async getGameLogs(playerId: number): Promise<GameLog[]> {
    const rows = await this.get('/stats', [
      ['player_ids[]', String(playerId)],
      ['seasons[]', String(this.season)],
      ['per_page', '100'],
    ]);

    const logs: GameLog[] = [];
    for (const row of rows) {
      const parsed = statRowSchema.safeParse(row);
      if (!parsed.success) continue;
      const r = parsed.data;
      logs.push({
        date: r.game.date,
        minutes: parseMinutes(r.min),
        pts: r.pts ?? 0,
        reb: r.reb ?? 0,
        ast: r.ast ?? 0,
        fg3m: r.fg3m ?? 0,
      });
    }
    return logs.sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
  }
}
