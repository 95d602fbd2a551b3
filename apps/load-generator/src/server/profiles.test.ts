import { describe, expect, it } from 'vitest';
import { DEFAULT_PROFILE_MIX, getProfile, listProfiles, profileSelector, resolveEndpoint } from './profiles.js';

describe('profile registry', () => {
  it('registers the five session profiles', () => {
    expect(listProfiles().map((p) => p.key)).toEqual([
      'casual_browser',
      'power_user',
      'shopper',
      'bot',
      'mobile_user',
    ]);
  });

  it('has endpoint weights summing to 1 for every profile', () => {
    for (const p of listProfiles()) {
      const sum = p.endpoints.reduce((acc, [, w]) => acc + w, 0);
      expect(sum).toBeCloseTo(1, 9);
    }
  });

  it('has a default mix summing to 1 over registered keys', () => {
    const sum = Object.values(DEFAULT_PROFILE_MIX).reduce((a, b) => a + b, 0);
    expect(sum).toBeCloseTo(1, 9);
    for (const key of Object.keys(DEFAULT_PROFILE_MIX)) {
      expect(getProfile(key)).toBeDefined();
    }
  });

  it('keeps registered profiles immutable', () => {
    const shopper = getProfile('shopper');
    expect(shopper).toBeDefined();
    expect(Object.isFrozen(shopper?.profile)).toBe(true);
  });
});

describe('profileSelector', () => {
  it('always returns the named profile for a single key', () => {
    const selector = profileSelector('bot');
    expect(selector.sample(() => 0).profile.key).toBe('bot');
    expect(selector.sample(() => 0.99).profile.key).toBe('bot');
  });

  it('uses the default mix for "mix"', () => {
    const selector = profileSelector('mix');
    expect(selector.size).toBe(5);
    expect(selector.sample(() => 0).profile.key).toBe('casual_browser');
    expect(selector.sample(() => 0.99).profile.key).toBe('mobile_user');
  });

  it('accepts an explicit mix', () => {
    const selector = profileSelector({ shopper: 1, bot: 0 });
    expect(selector.size).toBe(1);
    expect(selector.sample(() => 0.5).profile.key).toBe('shopper');
  });

  it('uses a custom profile for every session', () => {
    const selector = profileSelector({
      key: 'landing_only',
      name: 'Landing Only',
      sessionDurationSec: [1, 1],
      pagesPerSession: [2, 2],
      thinkTimeSec: [0, 0],
      endpoints: [['/', 3], ['/checkout', 1]],
    });
    expect(selector.size).toBe(1);
    const { profile, endpoints } = selector.sample(() => 0.7);
    expect(profile.key).toBe('landing_only');
    expect(Object.isFrozen(profile)).toBe(true);
    expect(endpoints.sample(() => 0.74)).toBe('/');
    expect(endpoints.sample(() => 0.76)).toBe('/checkout');
  });

  it('rejects unknown keys', () => {
    expect(() => profileSelector('nobody')).toThrow(/Unknown profile "nobody"/);
    expect(() => profileSelector({ ghost: 1 })).toThrow(/Unknown profile "ghost" in mix/);
  });
});

describe('resolveEndpoint', () => {
  it('leaves plain paths untouched', () => {
    expect(resolveEndpoint('/dashboard', () => 0.5)).toBe('/dashboard');
  });

  it('fills product ids in 1..1000', () => {
    expect(resolveEndpoint('/product/{}', () => 0)).toBe('/product/item1');
    expect(resolveEndpoint('/product/{}', () => 0.9999)).toBe('/product/item1000');
  });

  it('fills search terms from the term list', () => {
    expect(resolveEndpoint('/search?q={}', () => 0)).toBe('/search?q=laptop');
    expect(resolveEndpoint('/search?q={}', () => 0.99)).toBe('/search?q=camera');
  });

  it('fills other placeholders with a number', () => {
    expect(resolveEndpoint('/media/{}', () => 0.5)).toBe('/media/501');
  });
});
