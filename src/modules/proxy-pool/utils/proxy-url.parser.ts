import { ProxyEndpoint, ProxyProtocol } from '../types/proxy-endpoint';
import { isValidProxyUrl } from './proxy-url.validator';

const DEFAULT_PORTS: Record<ProxyProtocol, number> = { http: 80, https: 443 };

function isProxyProtocol(candidate: string): candidate is ProxyProtocol {
  return candidate === 'http' || candidate === 'https';
}

/**
 * Parses proxy URLs from string (supports comma and newline separators,
 * `#` starts a comment line)
 */
export function parseProxyList(raw?: string): string[] {
  if (!raw) {
    return [];
  }

  return raw
    .split(/[,\n]/)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0 && !entry.startsWith('#'));
}

/**
 * Turns one seed entry into an endpoint; `null` when the entry is not a
 * usable proxy address. A bare `host:port` means plain HTTP.
 */
export function parseProxyEndpoint(raw: string): ProxyEndpoint | null {
  const trimmed = raw.trim();
  if (!isValidProxyUrl(trimmed)) {
    return null;
  }

  const withScheme = /^https?:\/\//i.test(trimmed)
    ? trimmed
    : `http://${trimmed}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    return null;
  }

  const protocol = url.protocol.replace(/:$/, '');
  if (!isProxyProtocol(protocol) || !url.hostname) {
    return null;
  }

  // URL drops the port when it is the scheme default
  const port = url.port ? Number(url.port) : DEFAULT_PORTS[protocol];

  return {
    protocol,
    host: url.hostname,
    port,
    ...(url.username
      ? {
          username: decodeURIComponent(url.username),
          password: decodeURIComponent(url.password),
        }
      : {}),
  };
}
