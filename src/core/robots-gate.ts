/**
 * Robots Gate
 *
 * Answers "may this URL be navigated?" from the host's robots.txt. One gate
 * lives for one batch; each host's rules are fetched once and shared by every
 * session of the batch. Anything that stops the rules from being read
 * (network failure, HTTP error, empty body) counts as allowed.
 */

import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { errorMessage, type RobotsChecker } from '../types/index.js';

const log = logger.robots;

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface RobotsRule {
  allow: boolean;
  path: string;
}

/**
 * Rule groups of a robots.txt, keyed by lower-cased user-agent token
 */
export interface ParsedRobotsTxt {
  groups: Map<string, RobotsRule[]>;
}

export interface RobotsGateOptions {
  /** User-agent token matched against robots.txt groups */
  userAgent?: string;
  timeout?: number;
  fetchFn?: FetchFn;
}

const DEFAULT_USER_AGENT = 'Mozilla/5.0';

/**
 * Parse robots.txt content into per-agent rule groups
 *
 * Consecutive `User-agent` lines share the rules that follow them.
 */
export function parseRobotsTxt(content: string): ParsedRobotsTxt {
  const groups = new Map<string, RobotsRule[]>();
  let currentAgents: string[] = [];
  let lastWasAgent = false;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) continue;

    const colonIndex = line.indexOf(':');
    if (colonIndex === -1) continue;

    const directive = line.slice(0, colonIndex).trim().toLowerCase();
    const value = line.slice(colonIndex + 1).trim();

    switch (directive) {
      case 'user-agent': {
        const agent = value.toLowerCase();
        currentAgents = lastWasAgent ? [...currentAgents, agent] : [agent];
        if (!groups.has(agent)) groups.set(agent, []);
        lastWasAgent = true;
        break;
      }
      case 'allow':
      case 'disallow': {
        lastWasAgent = false;
        // An empty Disallow allows everything; no rule needed
        if (!value) break;
        for (const agent of currentAgents) {
          groups.get(agent)?.push({ allow: directive === 'allow', path: value });
        }
        break;
      }
      default:
        lastWasAgent = false;
    }
  }

  return { groups };
}

function ruleToRegExp(path: string): RegExp {
  const anchored = path.endsWith('$');
  const body = anchored ? path.slice(0, -1) : path;
  const escaped = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${escaped}${anchored ? '$' : ''}`);
}

function rulesFor(parsed: ParsedRobotsTxt, userAgent: string): RobotsRule[] {
  const token = userAgent.toLowerCase().split('/')[0];
  for (const [agent, rules] of parsed.groups) {
    if (agent && agent !== '*' && token.includes(agent)) {
      return rules;
    }
  }
  return parsed.groups.get('*') ?? [];
}

/**
 * Whether a path (with query) may be fetched; longest matching rule wins,
 * and Allow wins a tie.
 */
export function isPathAllowed(parsed: ParsedRobotsTxt, pathWithQuery: string, userAgent: string = DEFAULT_USER_AGENT): boolean {
  let best: RobotsRule | null = null;
  for (const rule of rulesFor(parsed, userAgent)) {
    if (!ruleToRegExp(rule.path).test(pathWithQuery)) continue;
    if (
      !best ||
      rule.path.length > best.path.length ||
      (rule.path.length === best.path.length && rule.allow && !best.allow)
    ) {
      best = rule;
    }
  }
  return best ? best.allow : true;
}

/**
 * Fetch status and body under one timeout; the abort also covers a slow body
 */
async function fetchTextWithTimeout(
  url: string,
  options: { timeout: number; fetchFn: FetchFn; userAgent: string }
): Promise<{ status: number; text: string }> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeout);

  try {
    const response = await options.fetchFn(url, {
      signal: controller.signal,
      redirect: 'follow',
      headers: {
        'User-Agent': options.userAgent,
        Accept: 'text/plain, */*',
      },
    });
    if (response.status >= 400) {
      return { status: response.status, text: '' };
    }
    return { status: response.status, text: await response.text() };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Per-batch robots.txt oracle
 */
export class RobotsGate implements RobotsChecker {
  private readonly userAgent: string;
  private readonly timeout: number;
  private readonly fetchFn: FetchFn;
  private readonly byHost = new Map<string, Promise<ParsedRobotsTxt | null>>();

  constructor(options: RobotsGateOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeout = options.timeout ?? TIMEOUTS.ROBOTS_FETCH;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async isAllowed(url: string): Promise<boolean> {
    let parsedUrl: URL;
    try {
      parsedUrl = new URL(url);
    } catch {
      return true;
    }
    const host = parsedUrl.hostname;
    if (!host) return true;

    let pending = this.byHost.get(host);
    if (!pending) {
      pending = this.load(host);
      this.byHost.set(host, pending);
    }
    const rules = await pending;
    if (!rules) return true;

    const allowed = isPathAllowed(rules, `${parsedUrl.pathname}${parsedUrl.search}`, this.userAgent);
    if (!allowed) {
      log.info('Disallowed by robots.txt', { url });
    }
    return allowed;
  }

  private async load(host: string): Promise<ParsedRobotsTxt | null> {
    const robotsUrl = `https://${host}/robots.txt`;
    try {
      const { status, text } = await fetchTextWithTimeout(robotsUrl, {
        timeout: this.timeout,
        fetchFn: this.fetchFn,
        userAgent: this.userAgent,
      });
      if (status >= 400) {
        log.debug('robots.txt unavailable, allowing', { host, status });
        return null;
      }
      if (!text) return null;
      return parseRobotsTxt(text);
    } catch (error) {
      log.debug('robots.txt fetch failed, allowing', { host, error: errorMessage(error) });
      return null;
    }
  }
}
