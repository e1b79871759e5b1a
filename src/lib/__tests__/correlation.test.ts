import {
  candidateKey,
  compareCandidates,
  correlationHaircut,
  correlationPenalties,
  enforcePortfolioCaps,
  rankCandidates,
} from '../correlation';
import { makeCandidate } from './fixtures';

describe('Correlation & portfolio', () => {
  describe('candidateKey', () => {
    it('should join the identifying fields', () => {
      const c = makeCandidate({ subject: 'Player B', line: 7.5, market: 'player_assists', side: 'Under' });
      expect(candidateKey(c)).toBe('NYK @ BOS|Player B|player_assists|Under|7.5');
    });
  });

  describe('correlationPenalties', () => {
    it('should penalize repeated bets on one player progressively', () => {
      const legs = [
        makeCandidate({ line: 18.5 }),
        makeCandidate({ line: 20.5 }),
        makeCandidate({ line: 22.5 }),
      ];
      const result = correlationPenalties(legs);
      // subject penalty 0/5/10 plus a same-game penalty of 2
      expect(legs.map(c => result.get(c.key))).toEqual([
        { points: 2, flag: 'P3' },
        { points: 7, flag: 'P3' },
        { points: 12, flag: 'P3' },
      ]);
    });

    it('should penalize different markets less than the same market', () => {
      const sameMarket = [makeCandidate({ line: 18.5 }), makeCandidate({ line: 20.5 })];
      const mixed = [makeCandidate(), makeCandidate({ market: 'player_rebounds', line: 8.5 })];
      const same = correlationPenalties(sameMarket).get(sameMarket[1].key)?.points ?? 0;
      const diff = correlationPenalties(mixed).get(mixed[1].key)?.points ?? 0;
      expect(same).toBe(5);
      expect(diff).toBe(2);
      expect(diff).toBeLessThan(same);
    });

    it('should flag crowded games', () => {
      const legs = ['A', 'B', 'C', 'D'].map(p => makeCandidate({ subject: `Player ${p}` }));
      const result = correlationPenalties(legs);
      for (const c of legs) {
        expect(result.get(c.key)).toEqual({ points: 4, flag: 'G4' });
      }
    });

    it('should group game totals per matchup', () => {
      const legs = [
        makeCandidate({ subject: 'TOTAL', market: 'totals', line: 220.5 }),
        makeCandidate({ subject: 'TOTAL', market: 'totals', line: 215.5, matchup: 'LAL @ DEN' }),
      ];
      const result = correlationPenalties(legs);
      expect(result.get(legs[0].key)).toEqual({ points: 0, flag: 'OK' });
      expect(result.get(legs[1].key)).toEqual({ points: 0, flag: 'OK' });
    });
  });

  describe('correlationHaircut', () => {
    it('should scale Kelly down but never below half', () => {
      expect(correlationHaircut(0)).toBe(1);
      expect(correlationHaircut(30)).toBeCloseTo(0.7, 10);
      expect(correlationHaircut(80)).toBe(0.5);
    });
  });

  describe('compareCandidates', () => {
    it('should sort by confidence, then the preset criterion', () => {
      const a = makeCandidate({ subject: 'A', confidence: 60, ev_pct: 3, true_prob: 0.6 });
      const b = makeCandidate({ subject: 'B', confidence: 60, ev_pct: 5, true_prob: 0.58 });
      const c = makeCandidate({ subject: 'C', confidence: 65, ev_pct: 1, true_prob: 0.55 });

      expect([a, b, c].sort(compareCandidates('EV')).map(x => x.subject)).toEqual(['C', 'B', 'A']);
      expect([a, b, c].sort(compareCandidates('CONF')).map(x => x.subject)).toEqual(['C', 'A', 'B']);
    });
  });

  describe('enforcePortfolioCaps', () => {
    it('should keep the best bets within per-game and per-player limits', () => {
      const ranked = [
        makeCandidate({ subject: 'A', line: 10.5 }),
        makeCandidate({ subject: 'A', line: 12.5 }),
        makeCandidate({ subject: 'B' }),
        makeCandidate({ subject: 'C', matchup: 'LAL @ DEN' }),
      ];
      const kept = enforcePortfolioCaps(ranked, { maxPerGame: 2, maxPerPlayer: 1 });
      expect(kept.map(c => c.key)).toEqual([ranked[0].key, ranked[2].key, ranked[3].key]);
    });
  });

  describe('rankCandidates', () => {
    const options = {
      sortBy: 'EV' as const,
      topN: null,
      bankroll: 1000,
      maxPerGame: 3,
      maxPerPlayer: 3,
      kellyMultiplier: 0.5,
      kellyCapPct: 2.5,
    };

    it('should haircut Kelly for correlated bets and recompute stakes', () => {
      const first = makeCandidate({ line: 20.5, confidence: 60, true_prob: 0.52, ref_price: 100 });
      const second = makeCandidate({ line: 22.5, confidence: 58, true_prob: 0.52, ref_price: 100 });

      const ranked = rankCandidates([second, first], options);
      expect(ranked.map(c => c.key)).toEqual([first.key, second.key]);
      expect(ranked.map(c => [c.kelly_pct, c.stake, c.corr_flag])).toEqual([
        [2, 20, 'P2'],
        [1.9, 19, 'P2'],
      ]);
    });

    it('should truncate to the requested count', () => {
      const legs = ['A', 'B', 'C'].map((p, i) => makeCandidate({ subject: p, confidence: 60 - i, matchup: `G${i}` }));
      expect(rankCandidates(legs, { ...options, topN: 2 })).toHaveLength(2);
    });

    it('should be independent of input order', () => {
      const legs = ['A', 'B', 'C', 'D'].map((p, i) => makeCandidate({ subject: p, confidence: 60 + (i % 2) }));
      const forward = rankCandidates(legs, options).map(c => c.key);
      const backward = rankCandidates([...legs].reverse(), options).map(c => c.key);
      expect(backward).toEqual(forward);
    });
  });
});
