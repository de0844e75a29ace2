import { Injectable, Logger } from '@nestjs/common';
import { endpointKey, ProxyEndpoint } from '../types/proxy-endpoint';
import {
  OutcomeSource,
  ProxyRecord,
  ProxyRecordState,
} from '../types/proxy-record';
import { PoolStateMachine } from './pool-state-machine.service';

/**
 * # Proxy record store
 *
 * Candidate set keyed by endpoint address, plus per-proxy counters.
 * Records live for the whole process; the address set only grows.
 */
@Injectable()
export class ProxyRecordStore {
  private readonly logger = new Logger(ProxyRecordStore.name);

  private readonly records = new Map<string, ProxyRecordState>();

  constructor(private readonly stateMachine: PoolStateMachine) {}

  /**
   * Adds unseen endpoints in order; duplicates by address are ignored.
   * Returns how many were new.
   */
  addCandidates(endpoints: readonly ProxyEndpoint[]): number {
    let added = 0;
    for (const endpoint of endpoints) {
      const key = endpointKey(endpoint);
      if (!this.records.has(key)) {
        const record = new ProxyRecordState(endpoint, this.records.size);
        this.records.set(key, record);
        this.stateMachine.admit(record);
        added += 1;
      }
    }
    return added;
  }

  get(endpoint: ProxyEndpoint): ProxyRecord | null {
    return this.records.get(endpointKey(endpoint))?.snapshot() ?? null;
  }

  list(): ProxyRecord[] {
    return Array.from(this.records.values(), (record) => record.snapshot());
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Counts one outcome and lets the state machine re-classify.
   * Unknown endpoints are ignored.
   */
  recordOutcome(
    endpoint: ProxyEndpoint,
    success: boolean,
    source: OutcomeSource = 'live',
    error?: string,
  ): ProxyRecord | null {
    const record = this.records.get(endpointKey(endpoint));
    if (!record) {
      this.logger.debug(`Outcome for unknown proxy ignored: ${endpointKey(endpoint)}`);
      return null;
    }

    record.attemptCount += 1;
    if (success) {
      record.successCount += 1;
      record.lastError = null;
    } else {
      record.lastError = error ?? null;
    }
    record.lastOutcomeAt = new Date();

    this.stateMachine.apply(record, { success, source });
    return record.snapshot();
  }
}
