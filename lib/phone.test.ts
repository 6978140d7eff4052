import { describe, it, expect } from 'vitest';
import { extractPhoneNumber } from './phone';

describe('extractPhoneNumber', () => {
  it('finds a number with country code and parenthesised area code', () => {
    expect(extractPhoneNumber('Call-in: +1 (415) 555-0132')).toBe('+1 (415) 555-0132');
  });

  it('finds hyphenated and bare ten-digit numbers', () => {
    expect(extractPhoneNumber('415-555-0132')).toBe('415-555-0132');
    expect(extractPhoneNumber('4155550132')).toBe('4155550132');
  });

  // invites often print numbers as 415.555.0132
  it('accepts dots as separators', () => {
    expect(extractPhoneNumber('Phone: 415.555.0132 (PIN 9876)')).toBe('415.555.0132');
    expect(extractPhoneNumber('+1.212.555.0100')).toBe('+1.212.555.0100');
  });

  it('returns the match verbatim without surrounding text', () => {
    expect(extractPhoneNumber('dial 555-123-4567 then press #')).toBe('555-123-4567');
    expect(extractPhoneNumber('Bridge:\n1-800-555-0199,,123#')).toBe('1-800-555-0199');
  });

  it('only reports the first of several numbers', () => {
    expect(extractPhoneNumber('US 212 555 0100 / alt 646-555-0111')).toBe('212 555 0100');
  });

  it('ignores digit runs that are too long to be a phone number', () => {
    expect(extractPhoneNumber('Meeting ID: 1234567890123')).toBeNull();
  });

  it('returns null when there is nothing to match', () => {
    expect(extractPhoneNumber('no number here')).toBeNull();
    expect(extractPhoneNumber('')).toBeNull();
    expect(extractPhoneNumber(undefined)).toBeNull();
    expect(extractPhoneNumber(null)).toBeNull();
  });
});
