import { describe, expect, it } from 'vitest';

import { formatSpanishLongDate } from './format';

describe('formatSpanishLongDate', () => {
  it('writes the day, month name and year in Spanish', () => {
    expect(formatSpanishLongDate(new Date('2024-01-15T18:00:00Z'))).toBe('15 de enero de 2024');
  });

  it('uses the Mexico City calendar day', () => {
    expect(formatSpanishLongDate(new Date('2024-03-01T03:00:00Z'))).toBe('29 de febrero de 2024');
  });
});
