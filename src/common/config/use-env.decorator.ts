import { ConfigTransformError } from './config-errors';

/**
 * # Binds a config property to an environment variable
 *
 * The value is read on every access, so a fragment always reflects the
 * current `process.env`. With `transform` the raw value (possibly
 * `undefined`) is converted first; a throwing transform surfaces as
 * {@link ConfigTransformError}.
 */
export const UseEnv =
  <TProperty>(
    env: string,
    transform?: (raw?: string) => TProperty,
  ): PropertyDecorator =>
  (proto, propertyKey) => {
    Object.defineProperty(proto, propertyKey, {
      enumerable: true,
      get(): TProperty | string | undefined {
        const raw = process.env[env];
        if (!transform) {
          return raw;
        }

        try {
          return transform(raw);
        } catch (err) {
          throw new ConfigTransformError(env, err);
        }
      },
    });
  };
