/**
 * Site Profile Registry - selector hints per provider domain
 *
 * Provider quirks live in data/site-profiles.json as ordered selector lists,
 * so adding a provider never touches the navigation code. Profiles are read
 * once, merged over the generic lists and frozen.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { SiteProfile } from '../types/index.js';
import { domainKey } from '../utils/url.js';
import { ConfigValidationError } from '../utils/config-schemas.js';

const selectorList = z.array(z.string().min(1));

const genericProfileSchema = z.object({
  domain: z.string(),
  name: z.string(),
  cookieSelectors: selectorList.min(1),
  postcodeInputSelectors: selectorList.min(1),
  submitSelectors: selectorList.min(1),
  resultSelectors: selectorList.min(1),
  fallbackPaths: z.array(z.string()),
});

const providerProfileSchema = z.object({
  domain: z.string().min(3),
  name: z.string(),
  cookieSelectors: selectorList.optional(),
  postcodeInputSelectors: selectorList.optional(),
  submitSelectors: selectorList.optional(),
  resultSelectors: selectorList.optional(),
  fallbackPaths: z.array(z.string()).default([]),
  preCta: z.object({
    selectors: selectorList.min(1),
    landingPath: z.string().min(1),
  }).optional(),
  directLink: z.string().url().optional(),
  sessionBrokenSignals: z.object({
    urlTokens: z.array(z.string()),
    phrases: z.array(z.string()),
  }).optional(),
  maxAttempts: z.number().int().min(1).max(10).optional(),
});

export const siteProfileFileSchema = z.object({
  generic: genericProfileSchema,
  providers: z.array(providerProfileSchema),
  defaultProviderUrls: z.record(z.string().url()),
});

export type SiteProfileFile = z.infer<typeof siteProfileFileSchema>;
type ProviderProfileInput = z.infer<typeof providerProfileSchema>;

const PROFILE_FILE = fileURLToPath(new URL('../../data/site-profiles.json', import.meta.url));

function nonEmpty(list: string[] | undefined, fallback: readonly string[]): readonly string[] {
  return list && list.length > 0 ? list : fallback;
}

function buildProfile(input: ProviderProfileInput, generic: SiteProfile): SiteProfile {
  const profile: SiteProfile = {
    domain: input.domain,
    name: input.name,
    cookieSelectors: nonEmpty(input.cookieSelectors, generic.cookieSelectors),
    postcodeInputSelectors: nonEmpty(input.postcodeInputSelectors, generic.postcodeInputSelectors),
    submitSelectors: nonEmpty(input.submitSelectors, generic.submitSelectors),
    resultSelectors: nonEmpty(input.resultSelectors, generic.resultSelectors),
    fallbackPaths: input.fallbackPaths,
    ...(input.preCta ? { preCta: input.preCta } : {}),
    ...(input.directLink ? { directLink: input.directLink } : {}),
    ...(input.sessionBrokenSignals ? { sessionBrokenSignals: input.sessionBrokenSignals } : {}),
    ...(input.maxAttempts !== undefined ? { maxAttempts: input.maxAttempts } : {}),
  };
  return deepFreeze(profile);
}

function deepFreeze<T extends object>(value: T): T {
  for (const inner of Object.values(value)) {
    if (inner && typeof inner === 'object' && !Object.isFrozen(inner)) {
      deepFreeze(inner);
    }
  }
  return Object.freeze(value);
}

/**
 * Registry of provider profiles keyed by registrable domain
 */
export class SiteProfileRegistry {
  private readonly byDomain: ReadonlyMap<string, SiteProfile>;
  readonly generic: SiteProfile;
  readonly defaultProviderUrls: Readonly<Record<string, string>>;

  constructor(file: SiteProfileFile) {
    this.generic = deepFreeze({ ...file.generic });
    const entries = file.providers.map((p) => [p.domain, buildProfile(p, this.generic)] as const);
    this.byDomain = new Map(entries);
    this.defaultProviderUrls = Object.freeze({ ...file.defaultProviderUrls });
  }

  /**
   * Profile for a URL, or the generic profile for unknown domains
   *
   * The two-label key misses for hosts under a public suffix such as
   * `co.uk`, so a registered domain that the host ends with also matches.
   */
  profileFor(url: string): SiteProfile {
    const key = domainKey(url);
    const direct = this.byDomain.get(key);
    if (direct) return direct;

    let host = '';
    try {
      host = new URL(url).hostname;
    } catch {
      return this.generic;
    }
    for (const [domain, profile] of this.byDomain) {
      if (host === domain || host.endsWith(`.${domain}`)) {
        return profile;
      }
    }
    return this.generic;
  }

  /**
   * Registered provider domains
   */
  domains(): string[] {
    return [...this.byDomain.keys()];
  }
}

/**
 * Parse a profile file's contents
 *
 * @throws ConfigValidationError
 */
export function parseSiteProfiles(raw: unknown): SiteProfileFile {
  const result = siteProfileFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError('siteProfiles', result.error);
  }
  return result.data;
}

/**
 * Load the registry from data/site-profiles.json
 */
export function loadSiteProfiles(filePath: string = PROFILE_FILE): SiteProfileRegistry {
  const content = readFileSync(filePath, 'utf-8');
  return new SiteProfileRegistry(parseSiteProfiles(JSON.parse(content)));
}

let defaultRegistry: SiteProfileRegistry | null = null;

/**
 * Process-wide registry, loaded on first use
 */
export function getSiteProfiles(): SiteProfileRegistry {
  if (!defaultRegistry) {
    defaultRegistry = loadSiteProfiles();
  }
  return defaultRegistry;
}

/**
 * Profile for a URL from the process-wide registry
 */
export function profileFor(url: string): SiteProfile {
  return getSiteProfiles().profileFor(url);
}
