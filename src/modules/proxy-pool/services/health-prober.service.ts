import { randomBrowserHeaders } from '@common/http/browser-headers';
import { delay } from '@common/time';
import { HttpTransport } from '@infra/http-transport/http-transport';
import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ProxyPoolConfig } from '../proxy-pool.config';
import { endpointKey, ProxyEndpoint } from '../types/proxy-endpoint';
import { ProxyClassification } from '../types/proxy-record';
import { ProxyRecordStore } from './proxy-record.store';

export interface ProbePassSummary {
  probed: number;
  working: number;
  failed: number;
  recovered: number;
}

/**
 * # Health prober
 *
 * Tests proxies out of band by fetching an echo target through them.
 *
 * - Fast start: the head of the candidate list is probed before the app
 *   starts serving, so some proxies are confirmed up front.
 * - Sweep: a background loop keeps re-probing everything that is not
 *   Working, which is how Failed proxies come back.
 */
@Injectable()
export class HealthProberService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(HealthProberService.name);

  private readonly lifetime = new AbortController();

  private sweep: Promise<void> | null = null;

  constructor(
    private readonly config: ProxyPoolConfig,
    private readonly store: ProxyRecordStore,
    private readonly transport: HttpTransport,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.runFastStart();
    if (this.config.sweepEnabled) {
      this.startSweep();
    }
  }

  async onApplicationShutdown(): Promise<void> {
    await this.stopSweep();
  }

  /**
   * `true` only for HTTP 200 within `timeoutMs`
   */
  async probe(
    endpoint: ProxyEndpoint,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    try {
      const response = await this.transport.send({
        url: this.config.probeUrl,
        proxy: endpoint,
        headers: randomBrowserHeaders(),
        timeoutMs,
        signal,
      });
      if (response.statusCode !== 200) {
        this.logger.debug(
          `Probe through ${endpointKey(endpoint)} got HTTP ${response.statusCode}`,
        );
        return false;
      }
      return true;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Probe through ${endpointKey(endpoint)} failed: ${reason}`);
      return false;
    }
  }

  async runFastStart(): Promise<ProbePassSummary> {
    const candidates = this.store.list().slice(0, this.config.fastStartCount);
    const summary: ProbePassSummary = { probed: 0, working: 0, failed: 0, recovered: 0 };
    if (candidates.length === 0) {
      return summary;
    }

    this.logger.log(
      `Fast start: probing ${candidates.length} of ${this.store.size} proxy(ies)`,
    );
    const results = await Promise.all(
      candidates.map((record) =>
        this.probeAndRecord(record.endpoint, this.config.fastStartTimeoutMs),
      ),
    );

    for (const result of results) {
      if (result !== null) {
        summary.probed += 1;
        if (result) summary.working += 1;
        else summary.failed += 1;
      }
    }
    this.logger.log(
      `Fast start done: ${summary.working} working, ${summary.failed} failed`,
    );
    return summary;
  }

  /**
   * One walk over every non-Working proxy in seed order
   */
  async runSweepPass(
    signal: AbortSignal = this.lifetime.signal,
  ): Promise<ProbePassSummary> {
    const summary: ProbePassSummary = { probed: 0, working: 0, failed: 0, recovered: 0 };
    const candidates = this.store
      .list()
      .filter((record) => record.classification !== ProxyClassification.Working);

    for (const [index, candidate] of candidates.entries()) {
      if (index > 0) {
        await delay(this.config.sweepProbeDelayMs, signal);
      }
      if (signal.aborted) break;

      // may have been confirmed by another probe since the pass started
      const before = this.store.get(candidate.endpoint);
      if (before && before.classification !== ProxyClassification.Working) {
        const result = await this.probeAndRecord(
          candidate.endpoint,
          this.config.sweepTimeoutMs,
          signal,
        );
        if (result === null) break;

        summary.probed += 1;
        if (result) {
          summary.working += 1;
          if (before.classification === ProxyClassification.Failed) {
            summary.recovered += 1;
          }
        } else {
          summary.failed += 1;
        }
      }
    }

    return summary;
  }

  startSweep(): void {
    if (this.sweep || this.lifetime.signal.aborted) {
      return;
    }

    this.logger.log('Background sweep started');
    this.sweep = this.sweepLoop(this.lifetime.signal).catch((error: unknown) => {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Background sweep stopped: ${reason}`);
    });
  }

  async stopSweep(): Promise<void> {
    this.lifetime.abort();
    if (this.sweep) {
      await this.sweep;
      this.sweep = null;
      this.logger.log('Background sweep stopped');
    }
  }

  private async sweepLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const summary = await this.runSweepPass(signal);
      if (summary.probed > 0) {
        this.logger.log(
          `Sweep pass: probed ${summary.probed}, ${summary.working} working (${summary.recovered} recovered), ${summary.failed} failed`,
        );
      }
      await delay(this.config.sweepIdleMs, signal);
    }
  }

  /**
   * Probes and feeds the outcome to the store; `null` when the probe was
   * interrupted by shutdown and nothing was recorded.
   */
  private async probeAndRecord(
    endpoint: ProxyEndpoint,
    timeoutMs: number,
    signal: AbortSignal = this.lifetime.signal,
  ): Promise<boolean | null> {
    const ok = await this.probe(endpoint, timeoutMs, signal);
    if (signal.aborted) {
      return null;
    }
    this.store.recordOutcome(
      endpoint,
      ok,
      'probe',
      ok ? undefined : 'probe failed',
    );
    return ok;
  }
}
