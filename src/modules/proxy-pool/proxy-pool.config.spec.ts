import { ConfigValidationError } from '@common/config/config-errors';
import { ProxyPoolConfig } from '@modules/proxy-pool/proxy-pool.config';

describe('Proxy pool config', () => {
  const previousEnv = { ...process.env };

  beforeEach(() => {
    Object.keys(process.env)
      .filter((key) => key.startsWith('PROXY_') || key.startsWith('PROXIES'))
      .forEach((key) => delete process.env[key]);
  });

  afterAll(() => {
    process.env = previousEnv;
  });

  it('Should default to a 30 s pause between sweep passes', () => {
    expect(new ProxyPoolConfig().sweepIdleMs).toBe(30000);
  });

  it('Should reject a zero pause between sweep passes', () => {
    process.env.PROXY_SWEEP_IDLE_MS = '0';

    expect(() => new ProxyPoolConfig()).toThrow(ConfigValidationError);
    expect(() => new ProxyPoolConfig()).toThrow(
      'Invalid ProxyPoolConfig: check sweepIdleMs',
    );
  });
});
