/**
 * Unit tests for odds conversions and price comparison
 */

import {
  americanToProbability,
  americanToDecimal,
  decimalToProbability,
  probabilityToDecimal,
  probabilityToAmerican,
  decimalToAmerican,
  devigTwoWay,
  noVigProbability,
  priceBetterForBettor,
  centsDiff,
  expectedValuePct,
  kellyFraction,
  roundTo,
} from '../prob';

describe('Probability Calculations', () => {
  describe('americanToProbability', () => {
    it('should convert favourites and underdogs', () => {
      expect(americanToProbability(-150)).toBeCloseTo(0.6, 10);
      expect(americanToProbability(150)).toBeCloseTo(0.4, 10);
      expect(americanToProbability(100)).toBe(0.5);
    });

    it('should map malformed odds to 50%', () => {
      expect(americanToProbability(0)).toBe(0.5);
      expect(americanToProbability(NaN)).toBe(0.5);
      expect(americanToProbability(Infinity)).toBe(0.5);
    });
  });

  describe('americanToDecimal', () => {
    it('should convert American odds to decimal', () => {
      expect(americanToDecimal(150)).toBe(2.5);
      expect(americanToDecimal(-200)).toBe(1.5);
      expect(americanToDecimal(100)).toBe(2.0);
    });

    it('should map malformed odds to an even price', () => {
      expect(americanToDecimal(0)).toBe(2.0);
      expect(americanToDecimal(NaN)).toBe(2.0);
    });
  });

  describe('decimal round trip', () => {
    it('should recover the implied probability through decimal odds', () => {
      for (const american of [-300, -150, -110, 100, 120, 250]) {
        const p = americanToProbability(american);
        expect(decimalToProbability(americanToDecimal(american))).toBeCloseTo(p, 10);
        expect(decimalToProbability(probabilityToDecimal(p))).toBeCloseTo(p, 10);
      }
    });

    it('should clamp probabilities before converting', () => {
      expect(Number.isFinite(probabilityToDecimal(0))).toBe(true);
      expect(probabilityToDecimal(1)).toBeGreaterThan(1);
    });
  });

  describe('probabilityToAmerican', () => {
    it('should produce negative prices for favourites', () => {
      expect(probabilityToAmerican(0.6)).toBe(-150);
      expect(probabilityToAmerican(0.5)).toBe(-100);
    });

    it('should produce positive prices for underdogs', () => {
      expect(probabilityToAmerican(0.4)).toBe(150);
      expect(probabilityToAmerican(0.2)).toBe(400);
    });
  });

  describe('decimalToAmerican', () => {
    it('should convert back to American odds', () => {
      expect(decimalToAmerican(2.5)).toBe(150);
      expect(decimalToAmerican(1.5)).toBe(-200);
      expect(decimalToAmerican(2.0)).toBe(100);
    });
  });

  describe('devigTwoWay', () => {
    it('should de-vig 2-way probabilities', () => {
      const [prob1, prob2] = devigTwoWay(0.6, 0.5);
      expect(prob1 + prob2).toBeCloseTo(1.0, 6);
      expect(prob1).toBeCloseTo(0.5455, 4);
      expect(prob2).toBeCloseTo(0.4545, 4);
    });

    it('should split evenly when both sides are empty', () => {
      expect(devigTwoWay(0, 0)).toEqual([0.5, 0.5]);
    });
  });

  describe('noVigProbability', () => {
    it('should remove the vig from a symmetric pair', () => {
      expect(noVigProbability(-110, -110)).toBeCloseTo(0.5, 10);
    });

    it('should favour the shorter price', () => {
      expect(noVigProbability(-150, 130)).toBeGreaterThan(0.5);
    });
  });

  describe('priceBetterForBettor', () => {
    it('should compare prices of the same sign', () => {
      expect(priceBetterForBettor(150, 140)).toBe(true);
      expect(priceBetterForBettor(-105, -110)).toBe(true);
      expect(priceBetterForBettor(-110, -105)).toBe(false);
    });

    it('should prefer plus money over minus money', () => {
      expect(priceBetterForBettor(100, -110)).toBe(true);
      expect(priceBetterForBettor(-110, 100)).toBe(false);
    });
  });

  describe('centsDiff', () => {
    it('should be positive when the reference pays more', () => {
      expect(centsDiff(-105, -110)).toBe(5);
      expect(centsDiff(120, 110)).toBe(10);
    });

    it('should be negative when the other book pays more', () => {
      expect(centsDiff(-110, -105)).toBe(-5);
      expect(centsDiff(110, 125)).toBe(-15);
    });

    it('should add both distances across even money', () => {
      expect(centsDiff(105, -105)).toBe(210);
    });

    it('should be zero without a competing price', () => {
      expect(centsDiff(-110, null)).toBe(0);
    });
  });

  describe('expectedValuePct', () => {
    it('should be exactly zero at a fair price', () => {
      expect(expectedValuePct(0.6, -150)).toBe(0);
      expect(Object.is(expectedValuePct(0.6, -150), -0)).toBe(false);
    });

    it('should round to two decimals', () => {
      // 0.55 * 1.9091 - 1
      expect(expectedValuePct(0.55, -110)).toBe(5);
      expect(expectedValuePct(0.45, 120)).toBe(-1);
    });
  });

  describe('kellyFraction', () => {
    it('should size an edge at even money', () => {
      expect(kellyFraction(0.6, 2.0)).toBeCloseTo(0.2, 10);
    });

    it('should never go negative', () => {
      expect(kellyFraction(0.4, 2.0)).toBe(0);
      expect(kellyFraction(0.9, 1.0)).toBe(0);
    });
  });

  describe('roundTo', () => {
    it('should not produce negative zero', () => {
      expect(Object.is(roundTo(-0.0001, 2), 0)).toBe(true);
    });
  });
});
