import { candidateKey } from '../correlation';
import type { Candidate, GameEvent } from '../../types/candidate';

export function makeCandidate(overrides: Partial<Candidate> = {}): Candidate {
  const base: Candidate = {
    key: '',
    event_id: 'evt-1',
    matchup: 'NYK @ BOS',
    commence_time: '2025-01-15T00:30:00Z',
    subject: 'Player A',
    market: 'player_points',
    side: 'Over',
    line: 20.5,
    ref_book: 'fanduel',
    ref_price: -110,
    fair_prob: 0.55,
    fair_price: -122,
    true_prob: 0.56,
    ev_pct: 6.91,
    confidence: 56,
    badge: 'LOW',
    kelly_pct: 2.5,
    stake: 25,
    corr_flag: 'OK',
    tags: { injury: '', minutes: '', steam: '', team_pressure: '' },
    best_book: 'draftkings',
    best_price: -115,
    best_gap_cents: 5,
    avg_gap_cents: 5,
    line_advantage: 0,
    worse_line_count: 0,
    books_count: 4,
    injury_points: 0,
    minutes_points: 0,
    steam_points: 0,
    team_pressure_bump: 0,
    high_variance_minutes: false,
    ...overrides,
  };
  return { ...base, key: overrides.key ?? candidateKey(base) };
}

export const sampleEvent: GameEvent = {
  id: 'evt-1',
  home: 'Boston Celtics',
  away: 'New York Knicks',
  commence_time: '2025-01-15T00:30:00Z',
};

const prop = (name: 'Over' | 'Under', price: unknown, point?: number, player = 'Jalen Test') => ({
  name,
  description: player,
  price,
  point,
});

/** Odds payload for sampleEvent: three usable books, one foreign book and some junk */
export function sampleBookmakers(): unknown[] {
  return [
    {
      key: 'FanDuel',
      markets: [
        { key: 'player_points', outcomes: [prop('Over', -110, 20.5), prop('Under', -110, 20.5)] },
        {
          key: 'h2h',
          outcomes: [
            { name: 'Boston Celtics', price: -150 },
            { name: 'New York Knicks', price: 130 },
          ],
        },
        { key: 'spreads', outcomes: [{ name: 'Boston Celtics', price: -108, point: -3.5 }] },
        {
          key: 'totals',
          outcomes: [
            { name: 'Over', price: -110, point: 220.5 },
            { name: 'Under', price: -110, point: 220.5 },
          ],
        },
      ],
    },
    {
      key: 'draftkings',
      markets: [
        {
          key: 'player_points',
          outcomes: [prop('Over', -120, 20.5), prop('Under', 100, 20.5), prop('Over', -105, 21.5), prop('Under', -125, 21.5)],
        },
        {
          key: 'h2h',
          outcomes: [
            { name: 'Boston Celtics', price: -140 },
            { name: 'New York Knicks', price: 120 },
          ],
        },
        {
          key: 'spreads',
          outcomes: [
            { name: 'Boston Celtics', price: -110, point: -3.5 },
            { name: 'New York Knicks', price: -105, point: 4 },
          ],
        },
        { key: 'player_blocks', outcomes: [prop('Over', -110, 1.5)] },
      ],
    },
    {
      key: 'betmgm',
      markets: [
        {
          key: 'player_points',
          outcomes: [prop('Over', 'bad', 20.5), prop('Under', 0, 20.5), prop('Under', -115, 22.5), prop('Over', -110)],
        },
        {
          key: 'spreads',
          outcomes: [
            { name: 'Boston Celtics', price: -112, point: -3.5 },
            { name: 'New York Knicks', price: -108, point: 4.5 },
          ],
        },
      ],
    },
    {
      key: 'pinnacle',
      markets: [
        {
          key: 'h2h',
          outcomes: [
            { name: 'Boston Celtics', price: -145 },
            { name: 'New York Knicks', price: 125 },
          ],
        },
      ],
    },
    'not a book',
  ];
}
