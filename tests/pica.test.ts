/**
 * PICA Parser Tests
 *
 * PICA3 (K10plus) and PICA+ field lines into a MetadataRecord.
 */

import { describe, it, expect } from 'vitest';

import { parsePica, parsePicaFields, recordText } from '../src/record/pica.js';

// ============================================================================
// Fixtures
// ============================================================================

const PICA3_RECORD = [
  '0500 Aau',
  '1100 2021',
  '3000 Müller, Anna',
  '3000 Schmidt, Jan',
  '4000 Migration in Sachsen : eine Studie',
  '4030 Leipzig : Universitätsverlag',
  '',
  '5550 Migration',
  '5550 Integration',
  '5100 Sachsen ; Migration',
  '4207 Die Studie untersucht Zuwanderung.',
].join('\n');

const PICA_PLUS_RECORD = [
  '021A $aKünstliche Intelligenz$dGrundlagen',
  '028A $dAnna$aMüller',
  '011@ $a2020',
  '044K/01 $aInformatik',
  '044K/02 $aMedizin',
].join('\r\n');

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

// ============================================================================
// Tests
// ============================================================================

describe('PICA parser', () => {
  describe('parsePicaFields', () => {
    it('should split tag, content and subfields', () => {
      const [field] = parsePicaFields('021A $aKünstliche Intelligenz$dGrundlagen');

      expect(field).toEqual({
        tag: '021A',
        content: '$aKünstliche Intelligenz$dGrundlagen',
        subfields: { a: 'Künstliche Intelligenz', d: 'Grundlagen' },
      });
    });

    it('should skip lines that are not fields', () => {
      expect(parsePicaFields('Titel ohne Tag\n\n4000 Titel')).toHaveLength(1);
    });
  });

  describe('parsePica', () => {
    it('should map PICA3 fields to metadata', () => {
      const record = parsePica(PICA3_RECORD);

      expect(record).toMatchObject({
        title: 'Migration in Sachsen : eine Studie',
        authors: ['Müller, Anna', 'Schmidt, Jan'],
        year: '2021',
        publisher: 'Leipzig : Universitätsverlag',
        subjects: ['Migration', 'Integration', 'Sachsen ; Migration'],
        abstract: 'Die Studie untersucht Zuwanderung.',
      });
      expect(record.fields['0500']).toEqual(['Aau']);
    });

    it('should map PICA+ fields using subfield $a', () => {
      const record = parsePica(PICA_PLUS_RECORD);

      expect(record).toMatchObject({
        title: 'Künstliche Intelligenz',
        authors: ['Müller'],
        year: '2020',
        subjects: ['Informatik', 'Medizin'],
      });
      expect(record.publisher).toBeUndefined();
      expect(record.abstract).toBeUndefined();
    });

    it('should drop duplicate subjects', () => {
      const record = parsePica('5550 Migration\n044K $aMigration');

      expect(record.subjects).toEqual(['Migration']);
    });

    it('should fail with PARSE_ERROR when there is no field', () => {
      expect(catchError(() => parsePica('kein PICA'))).toMatchObject({ code: 'PARSE_ERROR' });
    });
  });

  describe('recordText', () => {
    it('should join title, subjects and abstract', () => {
      const record = parsePica('4000 Titel\n5550 Thema\n4207 Zusammenfassung\n3000 Autor');

      expect(recordText(record)).toBe('Titel Thema Zusammenfassung');
    });
  });
});
