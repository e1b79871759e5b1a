import { normalizeName, teamFilterSet, teamKey } from '../teams';

describe('Team names', () => {
  it('should normalize punctuation, case and spacing', () => {
    expect(normalizeName('  Trail-Blazers. ')).toBe('trail blazers');
    expect(normalizeName('N.Y.  Knicks')).toBe('ny knicks');
  });

  it('should resolve aliases to team codes', () => {
    expect(teamKey('Boston Celtics')).toBe('BOS');
    expect(teamKey('celtics')).toBe('BOS');
    expect(teamKey('N.Y. Knicks')).toBe('NYK');
    expect(teamKey('nyk')).toBe('NYK');
  });

  it('should upper-case unknown names', () => {
    expect(teamKey('Seattle Supersonics')).toBe('SEATTLE SUPERSONICS');
  });

  describe('teamFilterSet', () => {
    it('should treat an empty filter as no filter', () => {
      expect(teamFilterSet(undefined)).toBeNull();
      expect(teamFilterSet([])).toBeNull();
    });

    it('should canonicalize the requested teams', () => {
      expect(teamFilterSet(['celtics', 'NYK', 'Boston'])).toEqual(new Set(['BOS', 'NYK']));
    });
  });
});
