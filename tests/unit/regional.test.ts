import { RegionalValidator } from '../../src/services/regional.service';

describe('RegionalValidator', () => {
  const validator = new RegionalValidator({
    eligibleRegions: ['RS', 'SC', 'SP'],
    interestRegions: ['BA', 'pe', 'SP'],
  });

  it('classifies eligible regions case-insensitively', () => {
    expect(validator.classify('RS')).toBe('eligible');
    expect(validator.classify('rs')).toBe('eligible');
    expect(validator.classify('  sc ')).toBe('eligible');
  });

  it('classifies interest regions', () => {
    expect(validator.classify('BA')).toBe('interest');
    expect(validator.classify('PE')).toBe('interest');
  });

  it('prefers eligible when a code is in both lists', () => {
    expect(validator.classify('SP')).toBe('eligible');
  });

  it('returns unknown for absent, empty or unlisted codes', () => {
    expect(validator.classify(null)).toBe('unknown');
    expect(validator.classify(undefined)).toBe('unknown');
    expect(validator.classify('   ')).toBe('unknown');
    expect(validator.classify('AM')).toBe('unknown');
  });

  it('returns the same answer on repeated calls', () => {
    expect([validator.classify('ba'), validator.classify('ba')]).toEqual(['interest', 'interest']);
  });

  it('describes regions with their macro-region', () => {
    expect(validator.describe('rs')).toEqual({ region: 'RS', status: 'eligible', description: 'Elegível - Região Sul' });
    expect(validator.describe('BA')).toEqual({
      region: 'BA',
      status: 'interest',
      description: 'Região em avaliação - Nordeste',
    });
    expect(validator.describe('ZZ')).toEqual({ region: 'ZZ', status: 'unknown', description: 'Região ZZ desconhecida' });
    expect(validator.describe('')).toEqual({ region: null, status: 'unknown', description: 'Região não informada' });
  });

  it('lists regions in configured order', () => {
    expect(validator.listEligible()).toEqual([
      { code: 'RS', name: 'Sul', status: 'available' },
      { code: 'SC', name: 'Sul', status: 'available' },
      { code: 'SP', name: 'Sudeste', status: 'available' },
    ]);
    expect(validator.listInterest().map((entry) => entry.code)).toEqual(['BA', 'PE', 'SP']);
  });

  it('title-cases hyphenated macro-regions', () => {
    const centerWest = new RegionalValidator({ eligibleRegions: ['DF'], interestRegions: [] });
    expect(centerWest.listEligible()).toEqual([{ code: 'DF', name: 'Centro-Oeste', status: 'available' }]);
  });
});
