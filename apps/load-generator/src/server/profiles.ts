import { DiscreteSampler } from './sampler.js';
import type { Rng } from './rng.js';
import type { ProfileMix, SessionProfile } from './types.js';

export const PLACEHOLDER = '{}';

const SEARCH_TERMS = ['laptop', 'phone', 'book', 'shoes', 'watch', 'camera'] as const;

const PROFILES: SessionProfile[] = [
  {
    key: 'casual_browser',
    name: 'Casual Browser',
    sessionDurationSec: [60, 300],
    pagesPerSession: [3, 8],
    thinkTimeSec: [5, 15],
    endpoints: [['/', 0.50], ['/product/{}', 0.20], ['/api/data', 0.15], ['/search?q={}', 0.15]],
  },
  {
    key: 'power_user',
    name: 'Power User',
    sessionDurationSec: [300, 900],
    pagesPerSession: [15, 30],
    thinkTimeSec: [2, 8],
    endpoints: [['/dashboard', 0.30], ['/api/data', 0.30], ['/search?q={}', 0.20], ['/product/{}', 0.10], ['/', 0.10]],
  },
  {
    key: 'shopper',
    name: 'Shopper',
    sessionDurationSec: [180, 600],
    pagesPerSession: [8, 15],
    thinkTimeSec: [3, 12],
    endpoints: [['/product/{}', 0.40], ['/search?q={}', 0.30], ['/checkout', 0.20], ['/', 0.10]],
  },
  {
    key: 'bot',
    name: 'Bot/Crawler',
    sessionDurationSec: [600, 3600],
    pagesPerSession: [50, 200],
    thinkTimeSec: [0.5, 2],
    endpoints: [['/', 0.20], ['/product/{}', 0.25], ['/api/data', 0.25], ['/dashboard', 0.15], ['/search?q={}', 0.15]],
  },
  {
    key: 'mobile_user',
    name: 'Mobile User',
    sessionDurationSec: [60, 180],
    pagesPerSession: [2, 5],
    thinkTimeSec: [8, 20],
    endpoints: [['/', 0.60], ['/product/{}', 0.20], ['/api/data', 0.15], ['/search?q={}', 0.05]],
  },
];

export const DEFAULT_PROFILE_MIX: ProfileMix = Object.freeze({
  casual_browser: 0.40,
  power_user: 0.25,
  shopper: 0.20,
  bot: 0.10,
  mobile_user: 0.05,
});

/** A profile together with its precomputed endpoint distribution. */
export interface CompiledProfile {
  profile: SessionProfile;
  endpoints: DiscreteSampler<string>;
}

export function compileProfile(profile: SessionProfile): CompiledProfile {
  return { profile, endpoints: new DiscreteSampler(profile.endpoints) };
}

function freezeProfile(p: SessionProfile): SessionProfile {
  return Object.freeze({
    ...p,
    sessionDurationSec: Object.freeze([...p.sessionDurationSec] as const),
    pagesPerSession: Object.freeze([...p.pagesPerSession] as const),
    thinkTimeSec: Object.freeze([...p.thinkTimeSec] as const),
    endpoints: Object.freeze(p.endpoints.map((e) => Object.freeze([...e] as const))),
  });
}

const registry: ReadonlyMap<string, CompiledProfile> = new Map(
  PROFILES.map((p) => [p.key, compileProfile(freezeProfile(p))]),
);

export function listProfiles(): SessionProfile[] {
  return [...registry.values()].map((c) => c.profile);
}

export function getProfile(key: string): CompiledProfile | undefined {
  return registry.get(key);
}

export function isSessionProfile(selection: SessionProfile | ProfileMix): selection is SessionProfile {
  return Array.isArray(selection.endpoints);
}

/**
 * Builds a sampler that picks a compiled profile per session.
 * Accepts a registered key, the literal 'mix' (default distribution), an
 * explicit mix, or an unregistered profile used for every session. Unknown
 * keys in a mix are an error.
 */
export function profileSelector(selection: string | ProfileMix | SessionProfile): DiscreteSampler<CompiledProfile> {
  if (typeof selection !== 'string' && isSessionProfile(selection)) {
    return new DiscreteSampler([[compileProfile(freezeProfile(selection)), 1]]);
  }
  if (typeof selection === 'string' && selection !== 'mix') {
    const compiled = registry.get(selection);
    if (!compiled) {
      throw new Error(`Unknown profile "${selection}". Known: ${[...registry.keys()].join(', ')}`);
    }
    return new DiscreteSampler([[compiled, 1]]);
  }

  const mix = typeof selection === 'string' ? DEFAULT_PROFILE_MIX : selection;
  const entries: Array<[CompiledProfile, number]> = [];
  for (const [key, weight] of Object.entries(mix)) {
    const compiled = registry.get(key);
    if (!compiled) {
      throw new Error(`Unknown profile "${key}" in mix`);
    }
    entries.push([compiled, weight]);
  }
  return new DiscreteSampler(entries);
}

/** Fills the placeholder with a synthetic identifier so lookups look distinct. */
export function resolveEndpoint(template: string, rng: Rng): string {
  if (!template.includes(PLACEHOLDER)) return template;

  let value: string;
  if (template.includes('product')) {
    value = `item${1 + Math.floor(rng() * 1000)}`;
  } else if (template.includes('search')) {
    value = SEARCH_TERMS[Math.floor(rng() * SEARCH_TERMS.length)];
  } else {
    value = String(1 + Math.floor(rng() * 1000));
  }
  return template.replace(PLACEHOLDER, value);
}
