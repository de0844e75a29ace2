import { UseEnv } from '@common/config/use-env.decorator';
import { ConfigTransformError } from '@common/config/config-errors';
import { boolOr, floatOr, intOr } from '@common/config/env-transformers';

describe('"Use-env" decorator', () => {
  it('Should create property from specified env', () => {
    process.env.RELAY_PASSWORD = 'dummy';

    class Config {
      @UseEnv('RELAY_PASSWORD')
      public readonly password!: string;
    }

    const config = new Config();

    expect(config.password).toBe('dummy');
  });

  it('Should apply transformer for env variable, if provided', () => {
    process.env.RELAY_TOKEN_TTL_SEC = '3600';

    class Config {
      @UseEnv('RELAY_TOKEN_TTL_SEC', intOr(0))
      public readonly tokenTtl!: number;
    }

    const config = new Config();

    expect(config.tokenTtl).toBe(3600);
  });

  it('Should fall back to default when env is missing or blank', () => {
    delete process.env.RELAY_MISSING_FLOOR;
    process.env.RELAY_BLANK_FLAG = '  ';

    class Config {
      @UseEnv('RELAY_MISSING_FLOOR', floatOr(0.2))
      public readonly floor!: number;

      @UseEnv('RELAY_BLANK_FLAG', boolOr(true))
      public readonly flag!: boolean;
    }

    const config = new Config();

    expect(config.floor).toBe(0.2);
    expect(config.flag).toBe(true);
  });

  it('Should reflect env changes on next access', () => {
    process.env.RELAY_ATTEMPTS = '3';

    class Config {
      @UseEnv('RELAY_ATTEMPTS', intOr(1))
      public readonly attempts!: number;
    }

    const config = new Config();
    expect(config.attempts).toBe(3);

    process.env.RELAY_ATTEMPTS = '7';
    expect(config.attempts).toBe(7);
  });

  it('Should throw ConfigTransformError if transform throws', () => {
    process.env.RELAY_PORT = 'eighty';

    class Config {
      @UseEnv('RELAY_PORT', intOr(80))
      public readonly port!: number;
    }

    const config = new Config();

    expect(() => config.port).toThrow(ConfigTransformError);
    expect(() => config.port).toThrow(
      'Failed to transform config RELAY_PORT: Error: "eighty" is not an integer',
    );
  });
});
