import { endpointKey, ProxyEndpoint } from './proxy-endpoint';

export enum ProxyClassification {
  Untested = 'untested',
  Working = 'working',
  Failed = 'failed',
}

export type OutcomeSource = 'probe' | 'live';

/**
 * Read-only view of a proxy's state at one moment
 */
export interface ProxyRecord {
  readonly key: string;
  readonly endpoint: ProxyEndpoint;
  readonly classification: ProxyClassification;
  readonly successCount: number;
  readonly attemptCount: number;
  readonly successRatio: number;
  readonly lastError: string | null;
  readonly lastOutcomeAt: Date | null;
}

/**
 * Mutable state behind a {@link ProxyRecord}.
 *
 * Counters belong to the record store, `classification` to the pool state
 * machine; nothing else writes here.
 */
export class ProxyRecordState {
  public classification = ProxyClassification.Untested;

  public successCount = 0;

  public attemptCount = 0;

  public lastError: string | null = null;

  public lastOutcomeAt: Date | null = null;

  public readonly key: string;

  constructor(
    public readonly endpoint: ProxyEndpoint,
    public readonly ordinal: number,
  ) {
    this.key = endpointKey(endpoint);
  }

  /** 1.0 until the first outcome, so fresh proxies are not penalised */
  get successRatio(): number {
    return this.attemptCount === 0 ? 1 : this.successCount / this.attemptCount;
  }

  snapshot(): ProxyRecord {
    return Object.freeze({
      key: this.key,
      endpoint: this.endpoint,
      classification: this.classification,
      successCount: this.successCount,
      attemptCount: this.attemptCount,
      successRatio: this.successRatio,
      lastError: this.lastError,
      lastOutcomeAt: this.lastOutcomeAt,
    });
  }
}
