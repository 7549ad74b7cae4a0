import { describe, expect, test } from '@jest/globals';
import { buildDocumentNumber, DOCUMENT_NUMBER_PATTERN } from '../lib/documentNumbers';

describe('buildDocumentNumber', () => {
  test('prefix plus eight upper-case hex characters', () => {
    const number = buildDocumentNumber('ORD');
    expect(number).toMatch(/^ORD-[0-9A-F]{8}$/);
    expect(DOCUMENT_NUMBER_PATTERN.test(number)).toBe(true);
  });

  test('numbers differ between calls', () => {
    const numbers = new Set(Array.from({ length: 20 }, () => buildDocumentNumber('PAY')));
    expect(numbers.size).toBe(20);
  });
});
