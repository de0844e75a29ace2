const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_4) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
];

const ACCEPTS = [
  'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
  'application/json, text/plain, */*',
];

const ACCEPT_LANGUAGES = ['en-US,en;q=0.9', 'en-US,en;q=0.5', 'en-GB,en;q=0.8'];

export type HeaderSet = Record<string, string>;

function pick<T>(items: readonly T[], random: () => number): T {
  return items[Math.floor(random() * items.length) % items.length];
}

/**
 * Browser-like header set with a rotating User-Agent and Accept-* values.
 * Shared by probes and live traffic.
 */
export function randomBrowserHeaders(
  random: () => number = Math.random,
): HeaderSet {
  return {
    'User-Agent': pick(USER_AGENTS, random),
    Accept: pick(ACCEPTS, random),
    'Accept-Language': pick(ACCEPT_LANGUAGES, random),
    'Accept-Encoding': 'gzip, deflate',
    DNT: '1',
    Connection: 'keep-alive',
    'Upgrade-Insecure-Requests': '1',
  };
}

export const BROWSER_USER_AGENTS: readonly string[] = USER_AGENTS;
