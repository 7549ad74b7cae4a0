import { randomUUID } from 'crypto';

/**
 * Builds a document number such as `ORD-1A2B3C4D`: the prefix plus the first
 * eight hex characters of a random UUID, upper-cased.
 */
export function buildDocumentNumber(prefix: string): string {
  const suffix = randomUUID().replace(/-/g, '').slice(0, 8).toUpperCase();
  return `${prefix}-${suffix}`;
}

export const DOCUMENT_NUMBER_PATTERN = /^[A-Z0-9]{1,10}-[0-9A-F]{8}$/;

/** Attempts before giving up on finding an unused number. */
export const DOCUMENT_NUMBER_ATTEMPTS = 5;
