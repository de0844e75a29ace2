export type ProxyProtocol = 'http' | 'https';

/**
 * An egress path. Two endpoints are the same proxy when their
 * {@link endpointKey} matches; credentials play no part in identity.
 */
export interface ProxyEndpoint {
  readonly protocol: ProxyProtocol;
  readonly host: string;
  readonly port: number;
  readonly username?: string;
  readonly password?: string;
}

export function endpointKey(endpoint: ProxyEndpoint): string {
  return `${endpoint.protocol}://${endpoint.host.toLowerCase()}:${endpoint.port}`;
}

/**
 * Full proxy URL including credentials, for handing to an HTTP agent only.
 * Use {@link endpointKey} for anything that may reach a log.
 */
export function endpointUrl(endpoint: ProxyEndpoint): string {
  const auth =
    endpoint.username !== undefined
      ? `${encodeURIComponent(endpoint.username)}:${encodeURIComponent(endpoint.password ?? '')}@`
      : '';
  return `${endpoint.protocol}://${auth}${endpoint.host}:${endpoint.port}`;
}
