import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { ProxyPoolConfig } from '../proxy-pool.config';
import { ProxyPoolService } from './proxy-pool.service';

export const POOL_REPORT_INTERVAL = 'proxy-pool-report';

/**
 * Logs a one-line pool summary on a fixed period
 */
@Injectable()
export class PoolReporterService implements OnApplicationBootstrap {
  private readonly logger = new Logger(PoolReporterService.name);

  constructor(
    private readonly config: ProxyPoolConfig,
    private readonly pool: ProxyPoolService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  onApplicationBootstrap(): void {
    const period = this.config.reportIntervalMs;
    if (period <= 0) {
      return;
    }

    const interval = setInterval(() => this.report(), period);
    this.schedulerRegistry.addInterval(POOL_REPORT_INTERVAL, interval);
  }

  report(): string {
    const stats = this.pool.snapshotStats();
    const line =
      `Pool: ${stats.workingCount} working, ${stats.untestedCount} untested, ` +
      `${stats.failedCount} failed of ${stats.totalCandidates}; ` +
      `attempts ${stats.totalAttempts} (${stats.successfulAttempts} ok, ${stats.failedAttempts} failed)`;
    this.logger.log(line);
    return line;
  }
}
