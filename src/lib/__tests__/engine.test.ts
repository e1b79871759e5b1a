import { ScanEngine, type ScanProgress, type ScanRequest } from '../engine';
import { BookWeights } from '../book-weights';
import { ConfigError } from '../errors';
import type { EventOdds, OddsFeed } from '../odds-api';
import { MemoryMarketStore } from '../store';
import type { GameEvent, MarketKey } from '../../types/candidate';
import { sampleEvent } from './fixtures';

const NOW = Date.parse('2025-01-14T18:00:00Z');

const events: GameEvent[] = [
  sampleEvent,
  { id: 'evt-2', home: 'Denver Nuggets', away: 'Los Angeles Lakers', commence_time: '2025-01-15T02:00:00Z' },
  { id: 'evt-3', home: 'Miami Heat', away: 'Chicago Bulls', commence_time: '2025-01-15T00:00:00Z' },
];

const ou = (over: number, under: number) => ({
  key: 'player_points',
  outcomes: [
    { name: 'Over', description: 'Jalen Test', price: over, point: 20.5 },
    { name: 'Under', description: 'Jalen Test', price: under, point: 20.5 },
  ],
});

const bookmakers = [
  { key: 'fanduel', markets: [ou(-105, -115)] },
  { key: 'draftkings', markets: [ou(-125, 105)] },
  { key: 'betmgm', markets: [ou(-130, 110)] },
  { key: 'caesars', markets: [ou(-128, 108)] },
];

function setup(odds: OddsFeed | null = null) {
  const getEventOdds = jest.fn(
    async (eventId: string, _markets: readonly MarketKey[], _books: readonly string[]): Promise<EventOdds> => {
      const event = events.find(e => e.id === eventId);
      if (!event) throw new Error(`unknown event ${eventId}`);
      if (eventId === 'evt-2') throw new Error('API request failed: 500 Internal Server Error');
      return { event, bookmakers: eventId === 'evt-1' ? bookmakers : [] };
    }
  );
  const feed: OddsFeed = odds ?? { getEvents: async () => events, getEventOdds };
  const store = new MemoryMarketStore();
  const engine = new ScanEngine({
    odds: feed,
    stats: null,
    injuries: null,
    store,
    weights: new BookWeights(),
    clock: () => NOW,
    settings: {
      referenceBook: 'fanduel',
      competitorBooks: ['draftkings', 'betmgm', 'caesars'],
      sharpBooks: ['draftkings'],
      concurrency: 2,
    },
  });
  return { engine, store, getEventOdds };
}

const request: ScanRequest = {
  markets: ['player_points'],
  preset: 'morning',
  minBooks: 3,
  minEvPct: 2,
  bankroll: 1000,
  topN: 10,
};

describe('ScanEngine', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('validate', () => {
    const { engine } = setup();

    it('should require an odds feed', () => {
      const noFeed = new ScanEngine({ odds: null, stats: null, injuries: null, store: new MemoryMarketStore(), weights: new BookWeights() });
      expect(() => noFeed.validate(request)).toThrow(new ConfigError('ODDS_API_KEY is not configured'));
    });

    it('should reject unknown presets and markets', () => {
      expect(() => engine.validate({ ...request, preset: 'evening' })).toThrow('Unknown preset "evening"');
      expect(() => engine.validate({ ...request, markets: [] })).toThrow('At least one market is required');
      expect(() => engine.validate({ ...request, markets: ['player_blocks'] })).toThrow(
        'Unknown market "player_blocks"'
      );
    });

    it('should reject non-positive limits', () => {
      expect(() => engine.validate({ ...request, bankroll: 0 })).toThrow(ConfigError);
      expect(() => engine.validate({ ...request, minBooks: 0 })).toThrow('minBooks must be a positive integer, got 0');
      expect(() => engine.validate({ ...request, topN: 1.5 })).toThrow(ConfigError);
      expect(() => engine.validate({ ...request, maxPerGame: -1 })).toThrow(ConfigError);
      expect(() => engine.validate({ ...request, minEvPct: Number.NaN })).toThrow(ConfigError);
    });

    it('should dedupe markets and canonicalize teams', () => {
      const valid = engine.validate({ ...request, markets: ['h2h', 'totals', 'h2h'], teams: ['celtics'], topN: null });
      expect(valid.markets).toEqual(['h2h', 'totals']);
      expect(valid.teamFilter).toEqual(new Set(['BOS']));
      expect(valid.topN).toBeNull();
    });
  });

  describe('scan', () => {
    it('should score, rank and report per-event problems', async () => {
      const { engine, store } = setup();
      const result = await engine.scan(request);

      expect(result.preset).toBe('morning');
      expect(result.generated_at).toBe('2025-01-14T18:00:00.000Z');
      expect(result.candidates.map(c => c.key)).toEqual([
        'New York Knicks @ Boston Celtics|Jalen Test|player_points|Over|20.5',
      ]);
      expect(result.messages).toEqual([
        'Skipped Los Angeles Lakers @ Denver Nuggets: API request failed: 500 Internal Server Error',
        'Chicago Bulls @ Miami Heat: no quotes posted yet',
      ]);
      expect(result.counts).toEqual({
        events: 3,
        scanned: 3,
        failed: 1,
        scored: 1,
        ranked: 1,
        skipped: { 'price-bounds': 0, 'thin-market': 0, 'minutes-insufficient': 0, filters: 1, 'low-confidence': 0 },
      });
      expect(store.ticks.size).toBe(8);
      expect(store.bets.size).toBe(0);
    });

    it('should log ranked bets when asked', async () => {
      const { engine, store } = setup();
      const result = await engine.scan({ ...request, logBets: true });

      const [bet] = [...store.bets.values()];
      expect(store.bets.size).toBe(1);
      expect(bet).toMatchObject({
        logged_at: '2025-01-14T18:00:00.000Z',
        preset: 'morning',
        candidate_key: result.candidates[0].key,
        fair_prob: result.candidates[0].fair_prob,
        true_prob: result.candidates[0].true_prob,
        stake: result.candidates[0].stake,
      });
    });

    it('should only fetch games for the requested teams', async () => {
      const { engine, getEventOdds } = setup();
      const result = await engine.scan({ ...request, teams: ['Celtics'] });

      expect(getEventOdds).toHaveBeenCalledTimes(1);
      expect(getEventOdds.mock.calls[0][0]).toBe('evt-1');
      expect(getEventOdds.mock.calls[0][2]).toEqual(['fanduel', 'draftkings', 'betmgm', 'caesars']);
      expect(result.counts.events).toBe(1);
    });

    it('should report progress through every stage', async () => {
      const { engine } = setup();
      const seen: ScanProgress[] = [];
      await engine.scan({ ...request, onProgress: p => seen.push(p) });

      expect(seen[0]).toEqual({ stage: 'events', completed: 0, total: 0 });
      expect(seen.filter(p => p.stage === 'odds').map(p => p.completed)).toEqual([0, 1, 2, 3]);
      expect(seen[seen.length - 1]).toEqual({ stage: 'done', completed: 1, total: 1 });
    });

    it('should stop early when aborted', async () => {
      const { engine, getEventOdds } = setup();
      const controller = new AbortController();
      controller.abort();

      const result = await engine.scan({ ...request, signal: controller.signal });
      expect(getEventOdds).not.toHaveBeenCalled();
      expect(result.candidates).toEqual([]);
      expect(result.messages).toEqual(['Scan stopped after 0 of 3 events']);
    });

    it('should fail fast when the event list is unavailable', async () => {
      const broken: OddsFeed = {
        getEvents: async () => Promise.reject(new Error('API request failed: 401 Unauthorized')),
        getEventOdds: async () => Promise.reject(new Error('unreachable')),
      };
      const { engine } = setup(broken);
      await expect(engine.scan(request)).rejects.toThrow('401 Unauthorized');
    });
  });

  describe('dailyCard', () => {
    it('should condense a full scan into a card', async () => {
      const { engine } = setup();
      const card = await engine.dailyCard({ markets: ['player_points'], preset: 'morning', minBooks: 3 });

      expect(card.preset).toBe('morning');
      expect(card.generated_at).toBe('2025-01-14T18:00:00.000Z');
      // -105 is neither a lock nor a long shot, and one leg is too few for parlays
      expect(card.locks).toEqual([]);
      expect(card.long_shots).toEqual([]);
      expect(card.parlays).toEqual([]);
    });
  });

  describe('buildParlays', () => {
    it('should return empty lists for an empty pool', () => {
      const { engine } = setup();
      expect(engine.buildParlays([])).toEqual({ pairs: [], triples: [] });
    });
  });
});
