import {
  collapseWhitespace,
  containsNormalizedPhrase,
  normalizeTextForSearch,
} from '@/common/utils/text-normalize.utils';

describe('text-normalize.utils', () => {
  describe('collapseWhitespace', () => {
    it('collapses newlines, tabs and repeated spaces', () => {
      expect(collapseWhitespace('  Ticket ID:\n\tSUP-1   done ')).toBe('Ticket ID: SUP-1 done');
    });
  });

  describe('normalizeTextForSearch', () => {
    it('lowercases, strips accents and punctuation', () => {
      expect(normalizeTextForSearch('Feedback, PLEASE! Café')).toBe('feedback please cafe');
    });
  });

  describe('containsNormalizedPhrase', () => {
    it('matches regardless of case and punctuation', () => {
      expect(containsNormalizedPhrase('Thanks! Feedback   please?', 'feedback please')).toBe(true);
    });

    it('does not match unrelated text', () => {
      expect(containsNormalizedPhrase('please send feedback', 'feedback please')).toBe(false);
    });

    it('never matches an empty phrase', () => {
      expect(containsNormalizedPhrase('anything', '  ')).toBe(false);
    });
  });
});
