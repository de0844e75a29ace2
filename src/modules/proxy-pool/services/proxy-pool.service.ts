import { readFileSync } from 'fs';
import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ProxyPoolConfig } from '../proxy-pool.config';
import { PoolStats } from '../types/pool-stats.interface';
import { ProxyEndpoint } from '../types/proxy-endpoint';
import { ProxyClassification, ProxyRecord } from '../types/proxy-record';
import { maskProxyUrl } from '../utils/proxy-url.masker';
import { parseProxyEndpoint, parseProxyList } from '../utils/proxy-url.parser';
import { PoolStateMachine } from './pool-state-machine.service';
import { ProxyRecordStore } from './proxy-record.store';
import { TrafficCountersService } from './traffic-counters.service';

/**
 * # Proxy pool
 *
 * Seeds the record store at start-up and exposes read-only views of the
 * pool for status endpoints and reports.
 */
@Injectable()
export class ProxyPoolService implements OnModuleInit {
  private readonly logger = new Logger(ProxyPoolService.name);

  constructor(
    private readonly config: ProxyPoolConfig,
    private readonly store: ProxyRecordStore,
    private readonly stateMachine: PoolStateMachine,
    private readonly traffic: TrafficCountersService,
  ) {}

  onModuleInit(): void {
    this.seed(this.loadSeedEntries());
  }

  /**
   * Parses raw seed entries and adds the valid ones. Returns how many
   * new candidates were added.
   */
  seed(entries: readonly string[]): number {
    const endpoints: ProxyEndpoint[] = [];
    for (const entry of entries) {
      const endpoint = parseProxyEndpoint(entry);
      if (endpoint) {
        endpoints.push(endpoint);
      } else {
        this.logger.warn(
          `Invalid proxy URL format, skipping: ${maskProxyUrl(entry)}`,
        );
      }
    }

    const added = this.store.addCandidates(endpoints);
    if (this.store.size === 0) {
      this.logger.warn('No proxies configured, every request goes direct');
    } else {
      this.logger.log(
        `Proxy pool seeded with ${added} new candidate(s), ${this.store.size} in total`,
      );
    }
    return added;
  }

  snapshotStats(): PoolStats {
    const counts = this.stateMachine.counts();
    const traffic = this.traffic.snapshot();

    return {
      totalCandidates: this.store.size,
      workingCount: counts.working,
      failedCount: counts.failed,
      untestedCount: counts.untested,
      totalAttempts: traffic.issued,
      successfulAttempts: traffic.successful,
      failedAttempts: traffic.failed,
    };
  }

  records(classification?: ProxyClassification): ProxyRecord[] {
    if (!classification) {
      return this.store.list();
    }
    return this.stateMachine
      .inBucket(classification)
      .map((record) => record.snapshot());
  }

  hasSelectableProxy(): boolean {
    return this.stateMachine.selectable().length > 0;
  }

  private loadSeedEntries(): string[] {
    const entries = [...this.config.proxies];
    const file = this.config.proxiesFile;
    if (file) {
      entries.push(...parseProxyList(readFileSync(file, 'utf8')));
      this.logger.debug(`Loaded seed proxies from ${file}`);
    }
    return entries;
  }
}
