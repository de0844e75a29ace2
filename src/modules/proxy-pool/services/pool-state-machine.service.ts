import { Injectable, Logger } from '@nestjs/common';
import { ProxyPoolConfig } from '../proxy-pool.config';
import {
  OutcomeSource,
  ProxyClassification,
  ProxyRecordState,
} from '../types/proxy-record';

export interface OutcomeReport {
  readonly success: boolean;
  readonly source: OutcomeSource;
}

export interface ClassificationCounts {
  working: number;
  failed: number;
  untested: number;
}

/**
 * # Pool state machine
 *
 * Owns the working / failed / untested buckets and is the only writer of
 * `ProxyRecordState.classification`.
 *
 * Rules:
 * - a probe is authoritative: success means Working, failure means Failed;
 * - a live failure evicts a non-Failed proxy once it has at least
 *   `minSampleSize` attempts and a ratio strictly below `evictionFloor`;
 * - live traffic never moves a Failed proxy back, only a probe does.
 *
 * Every report is applied synchronously, so reports land whole and in
 * arrival order.
 */
@Injectable()
export class PoolStateMachine {
  private readonly logger = new Logger(PoolStateMachine.name);

  private readonly admitted: ProxyRecordState[] = [];

  private readonly buckets: Record<ProxyClassification, Set<string>> = {
    [ProxyClassification.Untested]: new Set(),
    [ProxyClassification.Working]: new Set(),
    [ProxyClassification.Failed]: new Set(),
  };

  private selectableCache: readonly ProxyRecordState[] | null = null;

  constructor(private readonly config: ProxyPoolConfig) {}

  /**
   * Registers a freshly created record; it starts Untested
   */
  admit(record: ProxyRecordState): void {
    this.admitted.push(record);
    this.buckets[record.classification].add(record.key);
    this.selectableCache = null;
  }

  /**
   * Re-evaluates a record after its counters were updated
   */
  apply(record: ProxyRecordState, report: OutcomeReport): ProxyClassification {
    const next = this.nextClassification(record, report);
    if (next !== record.classification) {
      this.transition(record, next, report);
    }
    return record.classification;
  }

  /**
   * Working and Untested records in seed order. Rebuilt only after a
   * transition.
   */
  selectable(): readonly ProxyRecordState[] {
    if (!this.selectableCache) {
      this.selectableCache = this.admitted.filter(
        (record) => record.classification !== ProxyClassification.Failed,
      );
    }
    return this.selectableCache;
  }

  inBucket(classification: ProxyClassification): ProxyRecordState[] {
    const keys = this.buckets[classification];
    return this.admitted.filter((record) => keys.has(record.key));
  }

  counts(): ClassificationCounts {
    return {
      working: this.buckets[ProxyClassification.Working].size,
      failed: this.buckets[ProxyClassification.Failed].size,
      untested: this.buckets[ProxyClassification.Untested].size,
    };
  }

  private nextClassification(
    record: ProxyRecordState,
    report: OutcomeReport,
  ): ProxyClassification {
    if (report.source === 'probe') {
      return report.success
        ? ProxyClassification.Working
        : ProxyClassification.Failed;
    }

    if (record.classification === ProxyClassification.Failed) {
      return ProxyClassification.Failed;
    }

    const sampled = record.attemptCount >= this.config.minSampleSize;
    if (
      !report.success &&
      sampled &&
      record.successRatio < this.config.evictionFloor
    ) {
      return ProxyClassification.Failed;
    }

    return record.classification;
  }

  private transition(
    record: ProxyRecordState,
    to: ProxyClassification,
    report: OutcomeReport,
  ): void {
    const from = record.classification;
    this.buckets[from].delete(record.key);
    this.buckets[to].add(record.key);
    record.classification = to;
    this.selectableCache = null;

    const ratio = `${record.successCount}/${record.attemptCount}`;
    if (to === ProxyClassification.Failed && report.source === 'live') {
      this.logger.warn(
        `Proxy evicted (${from} -> ${to}, success ${ratio}): ${record.key}`,
      );
    } else if (from === ProxyClassification.Failed) {
      this.logger.log(`Proxy recovered by probe: ${record.key}`);
    } else {
      this.logger.debug(
        `Proxy ${from} -> ${to} after ${report.source} (success ${ratio}): ${record.key}`,
      );
    }
  }
}
