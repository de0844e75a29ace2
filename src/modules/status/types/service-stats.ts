import { PoolStats } from '@modules/proxy-pool/types/pool-stats.interface';
import { ProxyClassification } from '@modules/proxy-pool/types/proxy-record';

export interface ServiceStats {
  readonly uptimeSeconds: number;
  /** Dispatch calls since start */
  readonly totalRequests: number;
  /** Selectable share of the pool, like "66.7%" */
  readonly successRate: string;
  readonly pool: PoolStats;
}

export type HealthStatus = 'healthy' | 'degraded';

export interface HealthReport {
  readonly status: HealthStatus;
  readonly service: string;
  readonly timestamp: string;
  readonly stats: ServiceStats;
}

export interface ProxyDetail {
  /** Address with credentials masked */
  readonly proxy: string;
  readonly classification: ProxyClassification;
  readonly successCount: number;
  readonly attemptCount: number;
  readonly successRatio: number;
  readonly lastError: string | null;
}

export interface StatsReport {
  readonly serviceStats: ServiceStats;
  readonly proxyDetails: {
    readonly workingCount: number;
    readonly failedCount: number;
    readonly untestedCount: number;
    /** First five working proxies, masked */
    readonly workingProxies: string[];
    readonly proxies: ProxyDetail[];
    readonly lastUpdated: string;
  };
}

export interface ServiceDescription {
  readonly service: string;
  readonly description: string;
  readonly features: string[];
  readonly endpoints: Record<string, string>;
  readonly usageExamples: Record<string, { method: string; url: string; body: object }>;
  readonly stats: ServiceStats;
}
