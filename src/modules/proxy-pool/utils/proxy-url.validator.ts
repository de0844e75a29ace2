const PROXY_ADDRESS =
  /^(?:https?:\/\/)?(?:[^:@/\s]+(?::[^@/\s]*)?@)?[a-z0-9.-]+:\d{1,5}\/?$/i;

/**
 * Accepts `host:port` and `http(s)://[user:pass@]host:port`
 */
export function isValidProxyUrl(url: string): boolean {
  if (!PROXY_ADDRESS.test(url.trim())) {
    return false;
  }
  const port = Number(/:(\d{1,5})\/?$/.exec(url.trim())?.[1]);
  return port > 0 && port <= 65535;
}
