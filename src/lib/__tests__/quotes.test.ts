import {
  isMarketKey,
  isPropMarket,
  lineKey,
  nearestOtherLines,
  normalizeEventOdds,
  opponentSpreadPrice,
  pairedSamples,
  ALL_MARKETS,
  type QuoteBook,
} from '../quotes';
import { noVigProbability } from '../prob';
import { sampleBookmakers, sampleEvent } from './fixtures';

const options = {
  referenceBook: 'fanduel',
  competitorBooks: ['draftkings', 'betmgm'],
  markets: ALL_MARKETS,
  takenAt: new Date('2025-01-14T18:00:00Z'),
};

function entry(quotes: QuoteBook, key: string) {
  const found = quotes.lines.get(key);
  if (!found) throw new Error(`missing line ${key}`);
  return found;
}

describe('Quote normalization', () => {
  describe('market keys', () => {
    it('should recognise supported markets', () => {
      expect(isMarketKey('player_threes')).toBe(true);
      expect(isMarketKey('player_blocks')).toBe(false);
      expect(isPropMarket('player_points')).toBe(true);
      expect(isPropMarket('totals')).toBe(false);
    });
  });

  describe('normalizeEventOdds', () => {
    const quotes = normalizeEventOdds(sampleEvent, sampleBookmakers(), options);

    it('should fold outcomes into per-line price maps', () => {
      expect([...quotes.lines.keys()].sort()).toEqual([
        'Boston Celtics|h2h|0',
        'Boston Celtics|spreads|-3.5',
        'Jalen Test|player_points|20.5',
        'Jalen Test|player_points|21.5',
        'Jalen Test|player_points|22.5',
        'New York Knicks|h2h|0',
        'New York Knicks|spreads|4',
        'New York Knicks|spreads|4.5',
        'TOTAL|totals|220.5',
      ]);
    });

    it('should lowercase book keys and keep both sides', () => {
      const points = entry(quotes, 'Jalen Test|player_points|20.5');
      expect(Object.fromEntries(points.books)).toEqual({
        fanduel: { Over: -110, Under: -110 },
        draftkings: { Over: -120, Under: 100 },
      });
    });

    it('should drop books outside the configured set', () => {
      const moneyline = entry(quotes, 'Boston Celtics|h2h|0');
      expect([...moneyline.books.keys()]).toEqual(['fanduel', 'draftkings']);
    });

    it('should respect the requested markets', () => {
      const propsOnly = normalizeEventOdds(sampleEvent, sampleBookmakers(), {
        ...options,
        markets: ['player_points'],
      });
      expect([...propsOnly.lines.values()].every(l => l.market === 'player_points')).toBe(true);
      expect(propsOnly.lines.size).toBe(3);
    });

    it('should record one tick per accepted quote', () => {
      expect(quotes.ticks).toHaveLength(18);
      const tick = quotes.ticks.find(t => t.book === 'betmgm' && t.market === 'player_points');
      expect(tick).toMatchObject({
        taken_at: '2025-01-14T18:00:00.000Z',
        event_id: 'evt-1',
        subject: 'Jalen Test',
        line: 22.5,
        side: 'Under',
        price: -115,
      });
    });

    it('should give ticks stable ids', () => {
      const again = normalizeEventOdds(sampleEvent, sampleBookmakers(), options);
      expect(again.ticks.map(t => t.id)).toEqual(quotes.ticks.map(t => t.id));
      expect(new Set(quotes.ticks.map(t => t.id)).size).toBe(quotes.ticks.length);
    });

    it('should handle an empty payload', () => {
      const empty = normalizeEventOdds(sampleEvent, [], options);
      expect(empty.lines.size).toBe(0);
      expect(empty.ticks).toEqual([]);
    });
  });

  describe('pairedSamples', () => {
    const quotes = normalizeEventOdds(sampleEvent, sampleBookmakers(), options);

    it('should de-vig over/under pairs from competing books', () => {
      const samples = pairedSamples(quotes, entry(quotes, 'Jalen Test|player_points|20.5'), 'Over', 'fanduel');
      expect(samples).toHaveLength(1);
      expect(samples[0].book).toBe('draftkings');
      expect(samples[0].probability).toBeCloseTo(12 / 23, 10);
    });

    it('should skip books quoting one side only', () => {
      expect(pairedSamples(quotes, entry(quotes, 'Jalen Test|player_points|22.5'), 'Under', 'fanduel')).toEqual([]);
    });

    it('should pair moneylines against the opponent', () => {
      const samples = pairedSamples(quotes, entry(quotes, 'Boston Celtics|h2h|0'), 'Win', 'fanduel');
      expect(samples.map(s => s.book)).toEqual(['draftkings']);
      expect(samples[0].probability).toBeCloseTo(77 / 137, 10);
    });

    it('should pair spreads with the nearest mirrored line within half a point', () => {
      const samples = pairedSamples(quotes, entry(quotes, 'Boston Celtics|spreads|-3.5'), 'Cover', 'fanduel');
      expect(samples.map(s => s.book)).toEqual(['draftkings']);
      expect(samples[0].probability).toBe(noVigProbability(-110, -105));
    });
  });

  describe('opponentSpreadPrice', () => {
    const quotes = normalizeEventOdds(sampleEvent, sampleBookmakers(), options);

    it('should return null when no mirrored line is close enough', () => {
      expect(opponentSpreadPrice(quotes, 'New York Knicks', -3.5, 'betmgm')).toBeNull();
      expect(opponentSpreadPrice(quotes, 'New York Knicks', -3.5, 'draftkings')).toBe(-105);
    });
  });

  describe('nearestOtherLines', () => {
    const quotes = normalizeEventOdds(sampleEvent, sampleBookmakers(), options);

    it('should take the closest line each competitor hangs', () => {
      const lines = nearestOtherLines(quotes, entry(quotes, lineKey('Jalen Test', 'player_points', 20.5)), 'fanduel');
      expect(lines).toEqual([20.5, 22.5]);
    });
  });
});
