import {
  cleanText,
  domainFromUrl,
  isPlaceholder,
  normalizeEmail,
  normalizeKey,
} from '@/modules/leads/application/utils/normalize';

describe('normalize', () => {
  describe('isPlaceholder', () => {
    it.each([null, undefined, '', '   ', 'N/A', ' none ', '-', 'null', 'undefined', 'na'])(
      'treats %p as empty',
      (value) => {
        expect(isPlaceholder(value)).toBe(true);
      },
    );

    it('keeps real values and non-strings', () => {
      expect(isPlaceholder('Downey')).toBe(false);
      expect(isPlaceholder(0)).toBe(false);
    });
  });

  describe('cleanText', () => {
    it('returns the value verbatim, whitespace included', () => {
      expect(cleanText('  Riverside Academy ')).toBe('  Riverside Academy ');
    });

    it('maps placeholders to null', () => {
      expect(cleanText('n/a')).toBeNull();
      expect(cleanText(undefined)).toBeNull();
    });
  });

  describe('normalizeEmail', () => {
    it('strips mailto and lower-cases', () => {
      expect(normalizeEmail(' MailTo:Info@Riverside.ORG ')).toBe('info@riverside.org');
    });

    it('rejects malformed addresses', () => {
      expect(normalizeEmail('info at riverside.org')).toBeNull();
      expect(normalizeEmail('a@b')).toBeNull();
      expect(normalizeEmail(42)).toBeNull();
    });
  });

  describe('domainFromUrl', () => {
    it.each([
      ['https://www.Example.org/admissions', 'example.org'],
      ['example.org/', 'example.org'],
      ['http://user:pw@WWW.foo.edu:8080/x?y=1', 'foo.edu'],
      ['https://example.org.', 'example.org'],
      ['sub.school.k12.ca.us', 'sub.school.k12.ca.us'],
    ])('%s -> %s', (input, expected) => {
      expect(domainFromUrl(input)).toBe(expected);
    });

    it.each(['', 'n/a', null, undefined, 'http://'])('returns null for %p', (input) => {
      expect(domainFromUrl(input)).toBeNull();
    });
  });

  it('normalizeKey folds accents, ampersands and punctuation', () => {
    expect(normalizeKey('  Saint-Élise & Co. ')).toBe('saint elise and co');
  });
});
