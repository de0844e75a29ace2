import { ConfigFragment } from '@common/config/config-fragment';
import {
  boolOr,
  floatOr,
  intOr,
  stringOr,
} from '@common/config/env-transformers';
import { UseEnv } from '@common/config/use-env.decorator';
import {
  IsArray,
  IsBoolean,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
} from 'class-validator';
import { parseProxyList } from './utils/proxy-url.parser';

/**
 * Seed list, probing cadence and eviction thresholds of the proxy pool
 */
export class ProxyPoolConfig extends ConfigFragment {
  /**
   * Seed proxies, comma or newline separated.
   * Example: "http://10.0.0.1:8080,10.0.0.2:3128"
   */
  @IsArray()
  @IsString({ each: true })
  @UseEnv('PROXIES', parseProxyList)
  public readonly proxies!: string[];

  /**
   * Optional text file with one proxy per line, appended after `PROXIES`
   */
  @IsString()
  @IsOptional()
  @UseEnv('PROXIES_FILE')
  public readonly proxiesFile?: string;

  /**
   * Echo target fetched through a proxy to prove it works
   */
  @IsUrl({ require_protocol: true, require_tld: false })
  @UseEnv('PROXY_PROBE_URL', stringOr('http://httpbin.org/ip'))
  public readonly probeUrl!: string;

  /**
   * How many candidates from the head of the list are probed before the
   * server starts taking traffic
   */
  @IsInt()
  @Min(0)
  @UseEnv('PROXY_FAST_START_COUNT', intOr(20))
  public readonly fastStartCount!: number;

  @IsInt()
  @Min(1)
  @UseEnv('PROXY_FAST_START_TIMEOUT_MS', intOr(5000))
  public readonly fastStartTimeoutMs!: number;

  @IsBoolean()
  @UseEnv('PROXY_SWEEP_ENABLED', boolOr(true))
  public readonly sweepEnabled!: boolean;

  @IsInt()
  @Min(1)
  @UseEnv('PROXY_SWEEP_TIMEOUT_MS', intOr(10000))
  public readonly sweepTimeoutMs!: number;

  @IsInt()
  @Min(0)
  @UseEnv('PROXY_SWEEP_PROBE_DELAY_MS', intOr(500))
  public readonly sweepProbeDelayMs!: number;

  /**
   * Pause between sweep passes
   */
  @IsInt()
  @Min(1)
  @UseEnv('PROXY_SWEEP_IDLE_MS', intOr(30000))
  public readonly sweepIdleMs!: number;

  /**
   * Live outcomes needed before a proxy can be evicted on its ratio
   */
  @IsInt()
  @Min(1)
  @UseEnv('PROXY_MIN_SAMPLE_SIZE', intOr(5))
  public readonly minSampleSize!: number;

  /**
   * Success ratio below which a sampled proxy is evicted (strict `<`)
   */
  @IsNumber()
  @Min(0)
  @Max(1)
  @UseEnv('PROXY_EVICTION_FLOOR', floatOr(0.2))
  public readonly evictionFloor!: number;

  /**
   * Period of the pool summary log line, 0 disables it
   */
  @IsInt()
  @Min(0)
  @UseEnv('PROXY_REPORT_INTERVAL_MS', intOr(60000))
  public readonly reportIntervalMs!: number;
}
