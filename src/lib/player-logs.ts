/**
 * Cached per-player game logs shared by the blend model and the minutes signal
 */

import { TtlCache, systemClock, type Clock } from './cache';
import { config } from './config';
import type { GameLog } from './model';
import type { StatsFeed } from './stats-api';
import { normalizeName } from './teams';

export class PlayerLogService {
  private cache: TtlCache<string, GameLog[] | null>;

  constructor(
    private feed: StatsFeed,
    clock: Clock = systemClock,
    ttlMs: number = config.cacheTtlMs.minutes
  ) {
    this.cache = new TtlCache(ttlMs, clock);
  }

  /**
   * Game logs newest first, or null when the player cannot be identified.
   * Feed failures propagate and are not cached.
   */
  async logsFor(playerName: string): Promise<GameLog[] | null> {
    return this.cache.getOrLoad(normalizeName(playerName), async () => {
      const id = await this.feed.findPlayerId(playerName);
      if (id === null) return null;
      return this.feed.getGameLogs(id);
    });
  }

  invalidate(): void {
    this.cache.invalidate();
  }
}
