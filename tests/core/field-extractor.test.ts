import { describe, it, expect } from 'vitest';
import {
  FieldExtractor,
  createFieldExtractor,
  createRegexBackend,
  extractFields,
} from '../../src/core/field-extractor.js';

const fixedNow = () => new Date(2024, 5, 1);

const BIOGRAPHY = [
  'Sergey Revin',
  '- Born: (1966-01-12) Moscow, Soviet Union',
  '- Nationality: Russian',
  '- Occupation(s): Cosmonaut, Test engineer',
  '- Time in space: 124 days 23 hours 52 minutes',
  '- He graduated from the Moscow Institute of Electronic Technology in 1989 and qualified as an Engineer-Physicist.',
  '- He completed post-graduate studies at the Moscow Aviation Institute in 2005.',
  '- In 2013 he became a Candidate of Pedagogic Sciences (2013).',
  '- In his free time he enjoys tourism, water skiing and balloon flights.',
  '',
].join('\n');

describe('FieldExtractor', () => {
  describe('full biography', () => {
    it('should extract every field', () => {
      const result = createFieldExtractor({ now: fixedNow }).extract(BIOGRAPHY);

      expect(result).toEqual({
        degrees: [
          'Engineer-Physicist (Moscow Institute of Electronic Technology, 1989)',
          'Candidate of Pedagogic Sciences (2013)',
        ],
        education: [
          {
            institution: 'Moscow Institute of Electronic Technology',
            year: 1989,
            qualification: 'Engineer-Physicist',
          },
          { institution: 'Moscow Aviation Institute', year: 2005, qualification: null },
        ],
        occupations: ['Cosmonaut', 'Test engineer'],
        time_in_space: '124 days 23 hours 52 minutes',
        interests: ['tourism', 'water skiing', 'balloon flights'],
        nationality: 'Russian',
        age: 58,
      });
    });

    it('should return the same result on repeated calls', () => {
      const extractor = createFieldExtractor({ now: fixedNow });
      expect(extractor.extract(BIOGRAPHY)).toEqual(extractor.extract(BIOGRAPHY));
    });

    it('should accept CRLF line endings', () => {
      const extractor = createFieldExtractor({ now: fixedNow });
      const crlf = BIOGRAPHY.replace(/\n/g, '\r\n');
      expect(extractor.extract(crlf)).toEqual(extractor.extract(BIOGRAPHY));
    });

    it('should return a frozen result', () => {
      const result = extractFields(BIOGRAPHY);
      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.degrees)).toBe(true);
      expect(Object.isFrozen(result.education)).toBe(true);
      expect(Object.isFrozen(result.education[0])).toBe(true);
      expect(Object.isFrozen(result.interests)).toBe(true);
    });
  });

  describe('sparse input', () => {
    it('should return empty fields for empty text', () => {
      expect(extractFields('')).toEqual({
        degrees: [],
        education: [],
        occupations: [],
        time_in_space: null,
        interests: [],
        nationality: null,
        age: null,
      });
    });

    it('should return null nationality when no Nationality line exists', () => {
      expect(extractFields('- Occupation(s): Pilot\n').nationality).toBeNull();
    });

    it('should not throw on arbitrary text', () => {
      expect(() => extractFields('Born: (abcd-ef-gh) (age) enjoys ... - graduated')).not.toThrow();
    });
  });

  describe('age', () => {
    it('should prefer an explicit age over a birth date', () => {
      const text = '- Born: (1966-01-12)\n- Still active (age 59)\n';
      expect(createFieldExtractor({ now: fixedNow }).extract(text).age).toBe(59);
    });

    it('should prefer the ISO date in parentheses over other date formats', () => {
      const text = 'Joined on March 3, 1950.\n- Born: (1970-07-20)\n';
      expect(createFieldExtractor({ now: fixedNow }).extract(text).age).toBe(53);
    });

    it('should read the ISO date when a textual date follows on the same line', () => {
      const text = 'Born: (1966-01-12) January 12, 1966';
      expect(createFieldExtractor({ now: fixedNow }).extract(text).age).toBe(58);
    });

    it('should compute the age from a day-month-year date', () => {
      const text = 'He was born 2 June 1980 in Kaluga.';
      expect(createFieldExtractor({ now: fixedNow }).extract(text).age).toBe(43);
    });

    it('should count the birthday itself as a completed year', () => {
      const text = 'Born June 1, 1980.';
      expect(createFieldExtractor({ now: fixedNow }).extract(text).age).toBe(44);
    });

    it('should return null without a date or explicit age', () => {
      expect(extractFields('- Nationality: Russian\n').age).toBeNull();
    });
  });

  describe('birthDate', () => {
    it('should expose the resolved birth date', () => {
      const extractor = new FieldExtractor();
      expect(extractor.birthDate('Born: ( 1966-01-12 )')).toEqual({ year: 1966, month: 1, day: 12 });
    });

    it('should take the ISO date over a different textual date on the same line', () => {
      expect(new FieldExtractor().birthDate('Born: (1966-01-12) March 3, 1950')).toEqual({
        year: 1966,
        month: 1,
        day: 12,
      });
    });

    it('should return null when no date matches', () => {
      expect(new FieldExtractor().birthDate('no dates here')).toBeNull();
    });
  });

  describe('degrees', () => {
    it('should deduplicate degrees produced by different lines', () => {
      const text = [
        '- He graduated and qualified as a Pilot-Engineer, 1990.',
        '-  He graduated and qualified as a Pilot-Engineer, 1990.',
      ].join('\n');

      const result = extractFields(text);
      expect(result.degrees).toEqual(['Pilot-Engineer (1990)']);
      expect(result.education).toEqual([
        { institution: null, year: 1990, qualification: 'Pilot-Engineer' },
        { institution: null, year: 1990, qualification: 'Pilot-Engineer' },
      ]);
    });

    it('should process identical candidate lines once', () => {
      const line = '- He graduated from the Kharkov Higher Military Aviation School in 1985.';
      const result = extractFields(`${line}\n${line}\n`);
      expect(result.education).toEqual([
        { institution: 'Kharkov Higher Military Aviation School', year: 1985, qualification: null },
      ]);
    });
  });

  describe('createRegexBackend', () => {
    it('should wrap the extractor as an async backend', async () => {
      const backend = createRegexBackend(createFieldExtractor({ now: fixedNow }));
      expect(backend.kind).toBe('regex');
      await expect(backend.extract('- Nationality: Russian\n')).resolves.toMatchObject({
        nationality: 'Russian',
      });
    });
  });
});
