import { MAX_TITLE_LENGTH, normalizeTitle, titleProblems } from '../titleRules';

describe('titleRules', () => {
  describe('titleProblems', () => {
    it('accepts a lowercase underscore-joined title', () => {
      expect(titleProblems('acme_invoice_2023_01')).toEqual([]);
    });

    it('accepts letters outside ASCII', () => {
      expect(titleProblems('rechnung_müller_2023')).toEqual([]);
    });

    it('reports uppercase letters and spaces', () => {
      expect(titleProblems('Acme Invoice')).toEqual([
        'not lowercase',
        'contains characters other than letters, digits and underscores',
      ]);
    });

    it('reports stray underscores', () => {
      expect(titleProblems('_acme__invoice')).toEqual(['has leading, trailing or repeated underscores']);
    });

    it('reports titles over the length limit', () => {
      expect(titleProblems('a'.repeat(MAX_TITLE_LENGTH + 1))).toEqual(['longer than 32 characters']);
      expect(titleProblems('a'.repeat(MAX_TITLE_LENGTH))).toEqual([]);
    });
  });

  describe('normalizeTitle', () => {
    it('lowercases and joins words with single underscores', () => {
      expect(normalizeTitle('Invoice Acme 2023-01-05')).toBe('invoice_acme_2023_01_05');
    });

    it('drops leading and trailing separators', () => {
      expect(normalizeTitle('  --Tax / Return__ ')).toBe('tax_return');
    });

    it('truncates to the length limit without leaving a trailing underscore', () => {
      const normalized = normalizeTitle('electricity bill from the municipal utility 2023');

      expect(normalized).toBe('electricity_bill_from_the_munici');
      expect(normalized).toHaveLength(MAX_TITLE_LENGTH);
    });

    it('strips an underscore exposed by truncation', () => {
      expect(normalizeTitle('abcdefghij abcdefghij abcdefghi xyz')).toBe('abcdefghij_abcdefghij_abcdefghi');
    });

    it('returns an empty string when nothing usable remains', () => {
      expect(normalizeTitle('!!! ???')).toBe('');
    });

    it('produces titles that pass the rules', () => {
      expect(titleProblems(normalizeTitle('Kontoauszug März 2024 (Girokonto)'))).toEqual([]);
    });
  });
});
