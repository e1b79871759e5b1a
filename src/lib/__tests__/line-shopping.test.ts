import { lineAdvantage, priceGaps, worseLineCount } from '../line-shopping';
import type { LineQuotes, SidePrices } from '../quotes';

function quotes(books: Record<string, SidePrices>): LineQuotes {
  return {
    subject: 'Jalen Test',
    market: 'player_points',
    line: 20.5,
    books: new Map(Object.entries(books)),
  };
}

describe('Line shopping', () => {
  describe('priceGaps', () => {
    const entry = quotes({
      fanduel: { Over: -110 },
      draftkings: { Over: -105 },
      betmgm: { Over: -115 },
      caesars: { Over: 100 },
    });

    it('should find the best competing price', () => {
      expect(priceGaps(entry, 'Over', 'fanduel', -110)).toEqual({
        bestBook: 'draftkings',
        bestPrice: -105,
        bestGapCents: -5,
        avgGapCents: 0,
      });
    });

    it('should report a positive gap when the reference pays more', () => {
      const gap = priceGaps(quotes({ fanduel: { Under: 120 }, draftkings: { Under: 105 }, betmgm: { Under: 110 } }), 'Under', 'fanduel', 120);
      expect(gap.bestBook).toBe('betmgm');
      expect(gap.bestGapCents).toBe(10);
      // mean competitor 107.5 rounds to 108
      expect(gap.avgGapCents).toBe(12);
    });

    it('should be empty without competitors on that side', () => {
      expect(priceGaps(entry, 'Under', 'fanduel', -110)).toEqual({
        bestBook: null,
        bestPrice: null,
        bestGapCents: 0,
        avgGapCents: 0,
      });
    });
  });

  describe('lineAdvantage', () => {
    it('should sign the difference by side', () => {
      expect(lineAdvantage(20.5, [21.5, 22.5], 'Over')).toBe(1.5);
      expect(lineAdvantage(20.5, [21.5, 22.5], 'Under')).toBe(-1.5);
      expect(lineAdvantage(20.5, [], 'Over')).toBe(0);
    });
  });

  describe('worseLineCount', () => {
    it('should count competitors beyond the reference line', () => {
      expect(worseLineCount(20.5, [20.5, 21.5, 19.5], 'Over')).toBe(1);
      expect(worseLineCount(20.5, [20.5, 21.5, 19.5], 'Under')).toBe(1);
      expect(worseLineCount(-3.5, [-2.5, -3.5], 'Cover')).toBe(1);
    });
  });
});
