import { ConfigValidationError } from '@common/config/config-errors';
import { DispatchConfig } from '@modules/dispatch/dispatch.config';

const KEYS = [
  'DISPATCH_MAX_ATTEMPTS',
  'DISPATCH_ATTEMPT_TIMEOUT_MS',
  'DISPATCH_CALL_TIMEOUT_MS',
  'DISPATCH_BACKOFF_MIN_MS',
  'DISPATCH_BACKOFF_MAX_MS',
];

describe('Dispatch config', () => {
  beforeEach(() => {
    KEYS.forEach((key) => delete process.env[key]);
  });

  afterAll(() => {
    KEYS.forEach((key) => delete process.env[key]);
  });

  it('Should accept the defaults', () => {
    const config = new DispatchConfig();

    expect(config.attemptTimeoutMs).toBe(15000);
    expect(config.callTimeoutMs).toBe(90000);
    expect(config.backoffMinMs).toBe(1000);
    expect(config.backoffMaxMs).toBe(3000);
  });

  it('Should reject an attempt timeout that fills the call budget', () => {
    process.env.DISPATCH_ATTEMPT_TIMEOUT_MS = '90000';

    expect(() => new DispatchConfig()).toThrow(
      new ConfigValidationError('DispatchConfig', ['attemptTimeoutMs']).message,
    );
  });

  it('Should reject a backoff range with min above max', () => {
    process.env.DISPATCH_BACKOFF_MIN_MS = '5000';

    expect(() => new DispatchConfig()).toThrow(ConfigValidationError);
    expect(() => new DispatchConfig()).toThrow(
      'Invalid DispatchConfig: check backoffMinMs',
    );
  });

  it('Should accept equal backoff bounds', () => {
    process.env.DISPATCH_BACKOFF_MIN_MS = '0';
    process.env.DISPATCH_BACKOFF_MAX_MS = '0';

    expect(new DispatchConfig().backoffMaxMs).toBe(0);
  });
});
