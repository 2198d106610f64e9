import { describe, it, expect } from '@jest/globals';
import { extractErrorMessage } from '@/lib/errors';

describe('extractErrorMessage', () => {
  it('normalizes thrown values', () => {
    expect(extractErrorMessage(new Error('boom'))).toBe('boom');
    expect(extractErrorMessage('plain')).toBe('plain');
    expect(extractErrorMessage({ code: 1 })).toBe('{"code":1}');
    expect(extractErrorMessage(undefined)).toBe('undefined');
  });
});
