/**
 * Tests for the robots.txt gate
 */

import { describe, it, expect, vi } from 'vitest';
import { RobotsGate, isPathAllowed, parseRobotsTxt, type FetchFn } from '../../src/core/robots-gate.js';

function textResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'Content-Type': 'text/plain' } });
}

const SAMPLE = `
# sample
User-agent: *
Disallow: /checkout
Allow: /checkout/postcode
Disallow: /*.pdf$

User-agent: BadBot
User-agent: OtherBot
Disallow: /
`;

describe('parseRobotsTxt', () => {
  it('should group rules by user agent', () => {
    const parsed = parseRobotsTxt(SAMPLE);
    expect(parsed.groups.get('*')).toEqual([
      { allow: false, path: '/checkout' },
      { allow: true, path: '/checkout/postcode' },
      { allow: false, path: '/*.pdf$' },
    ]);
    expect(parsed.groups.get('badbot')).toEqual([{ allow: false, path: '/' }]);
    expect(parsed.groups.get('otherbot')).toEqual([{ allow: false, path: '/' }]);
  });

  it('should treat an empty Disallow as no rule', () => {
    const parsed = parseRobotsTxt('User-agent: *\nDisallow:\n');
    expect(parsed.groups.get('*')).toEqual([]);
  });
});

describe('isPathAllowed', () => {
  const parsed = parseRobotsTxt(SAMPLE);

  it('should allow paths no rule matches', () => {
    expect(isPathAllowed(parsed, '/broadband')).toBe(true);
  });

  it('should let the longest match win', () => {
    expect(isPathAllowed(parsed, '/checkout/basket')).toBe(false);
    expect(isPathAllowed(parsed, '/checkout/postcode?pc=TW8')).toBe(true);
  });

  it('should support wildcards and end anchors', () => {
    expect(isPathAllowed(parsed, '/files/terms.pdf')).toBe(false);
    expect(isPathAllowed(parsed, '/files/terms.pdf?v=2')).toBe(true);
  });

  it('should let Allow win a tie', () => {
    const tied = parseRobotsTxt('User-agent: *\nDisallow: /deals\nAllow: /deals\n');
    expect(isPathAllowed(tied, '/deals')).toBe(true);
  });

  it('should prefer a group naming the agent over the wildcard group', () => {
    expect(isPathAllowed(parsed, '/broadband', 'BadBot/1.0')).toBe(false);
  });
});

describe('RobotsGate', () => {
  it('should deny a disallowed URL', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => textResponse('User-agent: *\nDisallow: /broadband\n'));
    const gate = new RobotsGate({ fetchFn });

    expect(await gate.isAllowed('https://www.example.co.uk/broadband/deals')).toBe(false);
    expect(await gate.isAllowed('https://www.example.co.uk/')).toBe(true);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0][0]).toBe('https://www.example.co.uk/robots.txt');
  });

  it('should fetch each host once for concurrent checks', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => textResponse('User-agent: *\nDisallow:\n'));
    const gate = new RobotsGate({ fetchFn });

    const results = await Promise.all([
      gate.isAllowed('https://a.example.com/one'),
      gate.isAllowed('https://a.example.com/two'),
      gate.isAllowed('https://b.example.com/one'),
    ]);

    expect(results).toEqual([true, true, true]);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('should allow when the fetch fails', async () => {
    const gate = new RobotsGate({
      fetchFn: async () => {
        throw new Error('getaddrinfo ENOTFOUND');
      },
    });
    expect(await gate.isAllowed('https://offline.example.com/broadband')).toBe(true);
  });

  it('should give up on a body that outlasts the timeout', async () => {
    const fetchFn: FetchFn = async (_url, init) =>
      new Response(
        new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(new TextEncoder().encode('User-agent: *\n'));
            init?.signal?.addEventListener('abort', () => controller.error(new Error('body aborted')));
          },
        })
      );
    const gate = new RobotsGate({ fetchFn, timeout: 20 });

    expect(await gate.isAllowed('https://slow.example.com/broadband')).toBe(true);
  });

  it('should allow on an HTTP error status', async () => {
    const gate = new RobotsGate({ fetchFn: async () => textResponse('Disallow: /', 404) });
    expect(await gate.isAllowed('https://example.com/broadband')).toBe(true);
  });

  it('should allow on an empty body', async () => {
    const gate = new RobotsGate({ fetchFn: async () => textResponse('') });
    expect(await gate.isAllowed('https://example.com/broadband')).toBe(true);
  });

  it('should allow a URL it cannot parse', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => textResponse('User-agent: *\nDisallow: /\n'));
    const gate = new RobotsGate({ fetchFn });
    expect(await gate.isAllowed('not a url')).toBe(true);
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
