import { ConfigFragment } from '@common/config/config-fragment';
import { intOr } from '@common/config/env-transformers';
import {
  IsAtMostProperty,
  IsLessThanProperty,
} from '@common/config/property-relations';
import { UseEnv } from '@common/config/use-env.decorator';
import { IsInt, Max, Min } from 'class-validator';

/**
 * Retry policy of outbound dispatch
 */
export class DispatchConfig extends ConfigFragment {
  /**
   * Proxied attempts per call before the direct fallback
   */
  @IsInt()
  @Min(0)
  @Max(50)
  @UseEnv('DISPATCH_MAX_ATTEMPTS', intOr(3))
  public readonly maxAttempts!: number;

  /**
   * Must leave room in the call budget for the direct fallback
   */
  @IsInt()
  @Min(1)
  @IsLessThanProperty('callTimeoutMs')
  @UseEnv('DISPATCH_ATTEMPT_TIMEOUT_MS', intOr(15000))
  public readonly attemptTimeoutMs!: number;

  /**
   * Budget of a whole call, proxied attempts and direct fallback included
   */
  @IsInt()
  @Min(1)
  @UseEnv('DISPATCH_CALL_TIMEOUT_MS', intOr(90000))
  public readonly callTimeoutMs!: number;

  @IsInt()
  @Min(0)
  @IsAtMostProperty('backoffMaxMs')
  @UseEnv('DISPATCH_BACKOFF_MIN_MS', intOr(1000))
  public readonly backoffMinMs!: number;

  @IsInt()
  @Min(0)
  @UseEnv('DISPATCH_BACKOFF_MAX_MS', intOr(3000))
  public readonly backoffMaxMs!: number;
}
