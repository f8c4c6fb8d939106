/**
 * Notation Helper Tests
 */

import { describe, it, expect } from 'vitest';

import { formatPath, hierarchyLevel, rvkOnlineUrl } from '../src/search/notation.js';
import type { NotationNode } from '../src/types.js';

describe('Notation helpers', () => {
  describe('hierarchyLevel', () => {
    it('should name the RVK levels', () => {
      expect(hierarchyLevel('M')).toBe('Hauptgruppe');
      expect(hierarchyLevel('MS')).toBe('Untergruppe');
      expect(hierarchyLevel('MS 1000')).toBe('Feingruppe');
      expect(hierarchyLevel('MS 1000 G4')).toBe('Feingruppe + Schlüssel');
    });

    it('should classify a range by its lower bound', () => {
      expect(hierarchyLevel('AN 70000 - AN 79900')).toBe('Feingruppe');
    });

    it('should report unknown shapes', () => {
      expect(hierarchyLevel('')).toBe('Unbekannt');
      expect(hierarchyLevel('A1')).toBe('Unbekannt');
      expect(hierarchyLevel('1000 MS')).toBe('Unbekannt');
    });
  });

  describe('formatPath', () => {
    const node = (notation: string, label: string, depth: number): NotationNode =>
      ({ notation, label, depth, has_children: true });

    it('should join notation and label pairs', () => {
      expect(formatPath([node('N', 'Geschichte', 0), node('NQ', 'Deutschland', 1)]))
        .toBe('N (Geschichte) → NQ (Deutschland)');
    });

    it('should shorten long labels', () => {
      const long = 'x'.repeat(80);

      expect(formatPath([node('A', long, 0)])).toBe(`A (${'x'.repeat(67)}...)`);
    });
  });

  describe('rvkOnlineUrl', () => {
    it('should encode the notation', () => {
      expect(rvkOnlineUrl('MS 1000')).toBe(
        'https://rvk.uni-regensburg.de/regensburger-verbundklassifikation-online#notation=MS%201000'
      );
    });
  });
});
