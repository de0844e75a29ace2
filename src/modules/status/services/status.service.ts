import { prettyAppName } from '@common/env';
import { ProxyPoolService } from '@modules/proxy-pool/services/proxy-pool.service';
import { TrafficCountersService } from '@modules/proxy-pool/services/traffic-counters.service';
import { endpointUrl } from '@modules/proxy-pool/types/proxy-endpoint';
import {
  ProxyClassification,
  ProxyRecord,
} from '@modules/proxy-pool/types/proxy-record';
import { maskProxyUrl } from '@modules/proxy-pool/utils/proxy-url.masker';
import { Injectable } from '@nestjs/common';
import {
  HealthReport,
  ProxyDetail,
  ServiceDescription,
  ServiceStats,
  StatsReport,
} from '../types/service-stats';

const WORKING_PREVIEW = 5;

function maskedAddress(record: ProxyRecord): string {
  return maskProxyUrl(endpointUrl(record.endpoint));
}

function detail(record: ProxyRecord): ProxyDetail {
  return {
    proxy: maskedAddress(record),
    classification: record.classification,
    successCount: record.successCount,
    attemptCount: record.attemptCount,
    successRatio: record.successRatio,
    lastError: record.lastError,
  };
}

/**
 * Read-only reports over the pool and traffic counters
 */
@Injectable()
export class StatusService {
  private readonly startedAt = Date.now();

  constructor(
    private readonly pool: ProxyPoolService,
    private readonly traffic: TrafficCountersService,
  ) {}

  stats(): ServiceStats {
    const pool = this.pool.snapshotStats();
    const selectable = pool.workingCount + pool.untestedCount;
    const successRate =
      pool.totalCandidates > 0
        ? `${((selectable / pool.totalCandidates) * 100).toFixed(1)}%`
        : '0%';

    return {
      uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
      totalRequests: this.traffic.snapshot().dispatchCalls,
      successRate,
      pool,
    };
  }

  health(): HealthReport {
    return {
      status: this.pool.hasSelectableProxy() ? 'healthy' : 'degraded',
      service: prettyAppName(),
      timestamp: new Date().toISOString(),
      stats: this.stats(),
    };
  }

  report(): StatsReport {
    const serviceStats = this.stats();
    const working = this.pool.records(ProxyClassification.Working);

    return {
      serviceStats,
      proxyDetails: {
        workingCount: serviceStats.pool.workingCount,
        failedCount: serviceStats.pool.failedCount,
        untestedCount: serviceStats.pool.untestedCount,
        workingProxies: working.slice(0, WORKING_PREVIEW).map(maskedAddress),
        proxies: this.pool.records().map(detail),
        lastUpdated: new Date().toISOString(),
      },
    };
  }

  describe(): ServiceDescription {
    return {
      service: prettyAppName(),
      description:
        'Fetches search results and page content through a rotating pool of egress proxies',
      features: [
        'Proxy rotation with live health classification',
        'Direct connection fallback',
        'Background re-probing of failed proxies',
        'Request and pool statistics',
      ],
      endpoints: {
        '/': 'GET - Service description (this page)',
        '/search': 'POST - Search the web, body { "query": string }',
        '/read': 'POST - Read a page, body { "url": string }',
        '/health': 'GET - Health status and statistics',
        '/stats': 'GET - Detailed pool statistics',
      },
      usageExamples: {
        search: { method: 'POST', url: '/search', body: { query: 'latest AI developments' } },
        read: { method: 'POST', url: '/read', body: { url: 'https://example.com' } },
      },
      stats: this.stats(),
    };
  }
}
