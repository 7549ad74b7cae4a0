import { afterEach, describe, expect, test } from '@jest/globals';
import { formatLog, redactSensitiveData, shouldLog } from '../logger';

const originalEnv = { NODE_ENV: process.env.NODE_ENV, LOG_LEVEL: process.env.LOG_LEVEL };

afterEach(() => {
  process.env.NODE_ENV = originalEnv.NODE_ENV;
  if (originalEnv.LOG_LEVEL === undefined) {
    delete process.env.LOG_LEVEL;
  } else {
    process.env.LOG_LEVEL = originalEnv.LOG_LEVEL;
  }
});

describe('logger', () => {
  test('redacts secret-looking keys at any depth', () => {
    expect(redactSensitiveData({
      password: 'test-secret',
      nested: { apiKey: 'test-key', orderId: 'o1' },
      list: [{ token: 't' }],
    })).toEqual({
      password: '[REDACTED]',
      nested: { apiKey: '[REDACTED]', orderId: 'o1' },
      list: [{ token: '[REDACTED]' }],
    });
  });

  test('readable lines outside production', () => {
    process.env.NODE_ENV = 'test';
    const line = formatLog('info', 'Order created', { orderId: 'o1' }, new Date('2024-01-02T03:04:05.000Z'));
    expect(line).toBe('[2024-01-02T03:04:05.000Z] INFO Order created {"orderId":"o1"}');
  });

  test('JSON lines in production', () => {
    process.env.NODE_ENV = 'production';
    const line = formatLog('warn', 'Stock release failed', { orderId: 'o1' }, new Date('2024-01-02T03:04:05.000Z'));
    expect(JSON.parse(line)).toEqual({
      level: 'warn',
      msg: 'Stock release failed',
      timestamp: '2024-01-02T03:04:05.000Z',
      orderId: 'o1',
    });
  });

  test('LOG_LEVEL filters lower levels', () => {
    process.env.LOG_LEVEL = 'warn';
    expect(shouldLog('info')).toBe(false);
    expect(shouldLog('warn')).toBe(true);
    expect(shouldLog('error')).toBe(true);
  });
});
