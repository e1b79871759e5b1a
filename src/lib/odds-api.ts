import { z } from 'zod';
import { config } from './config';
import { fetchJson, type HttpOptions } from './http';
import type { GameEvent, MarketKey } from '../types/candidate';

const eventSchema = z.object({
  id: z.string(),
  sport_key: z.string().optional(),
  commence_time: z.string(),
  home_team: z.string(),
  away_team: z.string(),
});

const eventOddsSchema = eventSchema.extend({
  bookmakers: z.array(z.unknown()).default([]),
});

export type OddsApiEvent = z.infer<typeof eventSchema>;

export interface EventOdds {
  event: GameEvent;
  /** Raw bookmaker entries; validated outcome by outcome during normalization */
  bookmakers: unknown[];
}

/** What the scanner needs from an odds provider */
export interface OddsFeed {
  getEvents(): Promise<GameEvent[]>;
  getEventOdds(eventId: string, markets: readonly MarketKey[], books: readonly string[]): Promise<EventOdds>;
}

function toGameEvent(event: OddsApiEvent): GameEvent {
  return {
    id: event.id,
    home: event.home_team,
    away: event.away_team,
    commence_time: event.commence_time,
  };
}

export class OddsApiClient implements OddsFeed {
  private baseUrl: string;

  constructor(
    private apiKey: string,
    private sport: string = config.sport,
    private regions: string = config.regions,
    private http: HttpOptions = {}
  ) {
    this.baseUrl = config.oddsApiBaseUrl;
  }

  private async makeRequest(endpoint: string, params: Record<string, string> = {}): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${endpoint}`);

    // Add API key
    url.searchParams.set('apiKey', this.apiKey);

    // Add other parameters
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    return fetchJson(url.toString(), this.http);
  }

  /**
   * Upcoming events for the configured sport; malformed entries are skipped
   */
  async getEvents(): Promise<GameEvent[]> {
    const body = await this.makeRequest(`/sports/${this.sport}/events`, { dateFormat: 'iso' });
    const items = Array.isArray(body) ? body : [];
    const events: GameEvent[] = [];
    for (const item of items) {
      const parsed = eventSchema.safeParse(item);
      if (parsed.success) {
        events.push(toGameEvent(parsed.data));
      }
    }
    return events;
  }

  /**
   * American-format odds for one event, restricted to the given markets and books
   */
  async getEventOdds(
    eventId: string,
    markets: readonly MarketKey[],
    books: readonly string[]
  ): Promise<EventOdds> {
    const body = await this.makeRequest(`/sports/${this.sport}/events/${eventId}/odds`, {
      regions: this.regions,
      markets: markets.join(','),
      bookmakers: books.join(','),
      oddsFormat: 'american',
      dateFormat: 'iso',
    });
    const parsed = eventOddsSchema.parse(body);
    return { event: toGameEvent(parsed), bookmakers: parsed.bookmakers };
  }
}

// Singleton instance - only create if API key is configured
export const oddsApiClient = config.oddsApiKey && config.oddsApiKey.length > 0
  ? new OddsApiClient(config.oddsApiKey)
  : null;
