import { describe, expect, it } from 'vitest';
import {
  formatDate,
  formatNumber,
  matchCulture,
  negotiateCulture,
  parseAcceptLanguage,
} from '../../src/shared/i18n/cultures';
import { t } from '../../src/shared/i18n/messages';

describe('culture negotiation', () => {
  it('orders Accept-Language tags by quality and drops q=0', () => {
    expect(parseAcceptLanguage('fr;q=0.5, hi-IN, en;q=0.8, de;q=0')).toEqual(['hi-IN', 'en', 'fr']);
  });

  it('matches exact tags and language prefixes', () => {
    expect(matchCulture('HI-in')).toBe('hi-IN');
    expect(matchCulture('hi')).toBe('hi-IN');
    expect(matchCulture('en-GB')).toBe('en-US');
    expect(matchCulture('fr')).toBeNull();
    expect(matchCulture('*')).toBeNull();
  });

  it('prefers the query, then the cookie, then the header', () => {
    expect(negotiateCulture({ query: 'hi-IN', cookie: 'en-US', acceptLanguage: 'en-US' })).toBe('hi-IN');
    expect(negotiateCulture({ query: 'xx', cookie: 'hi-IN', acceptLanguage: 'en-US' })).toBe('hi-IN');
    expect(negotiateCulture({ acceptLanguage: 'fr, hi;q=0.7' })).toBe('hi-IN');
  });

  it('falls back to en-US', () => {
    expect(negotiateCulture({})).toBe('en-US');
    expect(negotiateCulture({ acceptLanguage: 'fr, de' })).toBe('en-US');
  });
});

describe('formatting', () => {
  it('groups digits per culture', () => {
    expect(formatNumber(1234567.5, 'en-US')).toBe('1,234,567.50');
    expect(formatNumber(1234567.5, 'hi-IN')).toBe('12,34,567.50');
    expect(formatNumber(42, 'en-US', 0)).toBe('42');
  });

  it('formats calendar dates without a time-zone shift', () => {
    expect(formatDate('2026-01-05', 'en-US')).toBe('Jan 5, 2026');
  });

  it('translates labels', () => {
    expect(t('en-US', 'signIn')).toBe('Sign in');
    expect(t('hi-IN', 'logout')).toBe('लॉग आउट');
  });
});
