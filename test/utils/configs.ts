import { ContentConfig } from '@modules/content/content.config';
import { DispatchConfig } from '@modules/dispatch/dispatch.config';
import { ProxyPoolConfig } from '@modules/proxy-pool/proxy-pool.config';
import { ProxyEndpoint } from '@modules/proxy-pool/types/proxy-endpoint';

export function poolConfig(
  overrides: Partial<ProxyPoolConfig> = {},
): ProxyPoolConfig {
  return {
    proxies: [],
    probeUrl: 'http://echo.test/ip',
    fastStartCount: 20,
    fastStartTimeoutMs: 50,
    sweepEnabled: false,
    sweepTimeoutMs: 50,
    sweepProbeDelayMs: 0,
    sweepIdleMs: 10,
    minSampleSize: 5,
    evictionFloor: 0.2,
    reportIntervalMs: 0,
    ...overrides,
  };
}

export function dispatchConfig(
  overrides: Partial<DispatchConfig> = {},
): DispatchConfig {
  return {
    maxAttempts: 3,
    attemptTimeoutMs: 50,
    callTimeoutMs: 5_000,
    backoffMinMs: 0,
    backoffMaxMs: 0,
    ...overrides,
  };
}

export function contentConfig(
  overrides: Partial<ContentConfig> = {},
): ContentConfig {
  return {
    readerUrl: 'https://reader.test/',
    searchUrl: 'https://search.test/',
    ...overrides,
  };
}

export function proxy(octet: number, port = 8080): ProxyEndpoint {
  return { protocol: 'http', host: `10.0.0.${octet}`, port };
}
