/**
 * Place Normalizer Tests
 *
 * Exact, case-insensitive lookup of place surface forms in the alias and region tables.
 */

import { describe, it, expect } from 'vitest';

import { getPlaceNormalizer, PlaceNormalizer } from '../src/search/place-normalizer.js';
import type { Concept } from '../src/types.js';

describe('PlaceNormalizer', () => {
  const normalizer = getPlaceNormalizer();

  it('should map a city to its country', () => {
    const result = normalizer.normalize({ text: 'Chemnitz', kind: 'place', rank: 2 });

    expect(result).toEqual({ text: 'Chemnitz', kind: 'place', rank: 2, normalized: 'Deutschland' });
  });

  it('should ignore case and surrounding whitespace', () => {
    expect(normalizer.normalize({ text: '  LEIPZIG ', kind: 'place', rank: 0 }).normalized).toBe('Deutschland');
    expect(normalizer.normalize({ text: 'München', kind: 'place', rank: 0 }).normalized).toBe('Deutschland');
  });

  it('should map a country to itself', () => {
    expect(normalizer.normalize({ text: 'frankreich', kind: 'place', rank: 0 }).normalized).toBe('Frankreich');
  });

  it('should keep the literal text for unknown places', () => {
    expect(normalizer.normalize({ text: 'Atlantis', kind: 'place', rank: 0 }).normalized).toBe('Atlantis');
  });

  it('should pass non-place concepts through unchanged', () => {
    const keyword: Concept = { text: 'Chemnitz', kind: 'keyword', rank: 0 };

    expect(normalizer.normalize(keyword)).toBe(keyword);
  });

  it('should not match partial names', () => {
    expect(normalizer.countryOf('Chemnitzer Land')).toBeUndefined();
  });

  it('should tell countries from subdivisions', () => {
    expect(normalizer.isCountry('Deutschland')).toBe(true);
    expect(normalizer.isCountry('Sachsen')).toBe(false);
  });

  it('should map continent forms to their continent', () => {
    expect(normalizer.normalize({ text: 'asiatisch', kind: 'place', rank: 0 }).normalized).toBe('Asien');
    expect(normalizer.normalize({ text: 'weltweit', kind: 'place', rank: 0 }).normalized).toBe('Global');
    expect(normalizer.isContinent('Asien')).toBe(true);
    expect(normalizer.isCountry('Asien')).toBe(false);
  });

  it('should list the regions containing a place', () => {
    expect(normalizer.regionsContaining('Dresden')).toEqual(['sachsen', 'ostdeutschland']);
    expect(normalizer.regionsContaining('Köln')).toEqual(['nordrhein-westfalen']);
    expect(normalizer.regionsContaining('Paris')).toEqual([]);
  });

  it('should work with a custom alias table', () => {
    const custom = new PlaceNormalizer(new Map([['wien', 'Österreich'], ['österreich', 'Österreich']]), new Set(['österreich']));

    expect(custom.normalize({ text: 'Wien', kind: 'place', rank: 0 }).normalized).toBe('Österreich');
    expect(custom.isCountry('ÖSTERREICH')).toBe(true);
    expect(custom.regionsContaining('Wien')).toEqual([]);
  });
});
