import { ConfigFragment } from '@common/config/config-fragment';
import { intOr, stringOr } from '@common/config/env-transformers';
import { UseEnv } from '@common/config/use-env.decorator';
import { IsInt, IsString, Max, Min } from 'class-validator';

export class WebserverConfig extends ConfigFragment {
  @IsInt()
  @Min(1)
  @Max(65535)
  @UseEnv('PORT', intOr(5000))
  public readonly port!: number;

  /**
   * Address the service is reachable at, used in the start-up log line
   */
  @IsString()
  @UseEnv('PUBLIC_URL', stringOr('http://localhost:5000'))
  public readonly publicUrl!: string;
}
