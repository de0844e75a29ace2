import { LinkedAbort } from '@common/abort/linked-abort';
import { HeaderSet, randomBrowserHeaders } from '@common/http/browser-headers';
import { delay, randomBetween } from '@common/time';
import { HttpTransport } from '@infra/http-transport/http-transport';
import {
  AttemptConnectionError,
  AttemptError,
  AttemptNonSuccessStatusError,
} from '@infra/http-transport/transport.errors';
import { ProxyRecordStore } from '@modules/proxy-pool/services/proxy-record.store';
import { ProxySelectorService } from '@modules/proxy-pool/services/proxy-selector.service';
import { TrafficCountersService } from '@modules/proxy-pool/services/traffic-counters.service';
import { ProxyEndpoint } from '@modules/proxy-pool/types/proxy-endpoint';
import { Injectable, Logger } from '@nestjs/common';
import { DispatchConfig } from '../dispatch.config';
import {
  DispatchAttempt,
  DispatchFailure,
  DispatchOptions,
  DispatchResult,
  DispatchSuccess,
} from '../types/dispatch-result';

interface CallState {
  readonly url: string;
  readonly headers: HeaderSet;
  readonly budget: LinkedAbort;
  readonly budgetMs: number;
  readonly deadline: number;
  attempts: number;
  lastError: AttemptError | null;
  proxyUnavailable: boolean;
}

/**
 * # Dispatch engine
 *
 * Sends a GET through rotating proxies and falls back to one direct
 * attempt. Every proxied outcome is reported to the pool so
 * classification follows live traffic.
 *
 * `fetch` never rejects: the worst case is a failure result.
 */
@Injectable()
export class DispatchEngineService {
  private readonly logger = new Logger(DispatchEngineService.name);

  constructor(
    private readonly config: DispatchConfig,
    private readonly selector: ProxySelectorService,
    private readonly store: ProxyRecordStore,
    private readonly traffic: TrafficCountersService,
    private readonly transport: HttpTransport,
  ) {}

  async fetch(url: string, options: DispatchOptions = {}): Promise<DispatchResult> {
    this.traffic.dispatchStarted();

    const budgetMs = options.timeoutMs ?? this.config.callTimeoutMs;
    const state: CallState = {
      url,
      headers: options.headers ?? {},
      budget: new LinkedAbort(options.signal, budgetMs),
      budgetMs,
      deadline: Date.now() + budgetMs,
      attempts: 0,
      lastError: null,
      proxyUnavailable: false,
    };

    try {
      return await this.run(state, options.maxAttempts ?? this.config.maxAttempts);
    } finally {
      state.budget.dispose();
    }
  }

  private async run(state: CallState, maxAttempts: number): Promise<DispatchResult> {
    const { signal } = state.budget;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (signal.aborted) {
        return this.cancelled(state);
      }

      // one attempt timeout of the budget is kept for the direct fallback
      const reserve = this.config.attemptTimeoutMs;
      if (state.attempts > 0 && this.remainingMs(state) < 2 * reserve) {
        this.logger.warn(
          `Call budget nearly spent after ${state.attempts} attempt(s), going direct`,
        );
        break;
      }

      const record = this.selector.next();
      if (!record) {
        state.proxyUnavailable = true;
        this.logger.warn('No working proxies available, degrading to direct');
        break;
      }

      const { outcome } = await this.attempt(state, record.endpoint);
      if (outcome.kind === 'cancelled') {
        return this.cancelled(state);
      }
      if (outcome.kind === 'succeeded') {
        this.store.recordOutcome(record.endpoint, true, 'live');
        return this.succeeded(state, outcome.statusCode, outcome.body, record.key);
      }

      this.store.recordOutcome(record.endpoint, false, 'live', outcome.error.message);
      state.lastError = outcome.error;
      this.logger.warn(
        `Attempt ${attempt}/${maxAttempts} through ${record.key} failed: ${outcome.error.message}`,
      );

      const backoff = randomBetween(this.config.backoffMinMs, this.config.backoffMaxMs);
      await delay(
        Math.min(backoff, Math.max(0, this.remainingMs(state) - reserve)),
        signal,
      );
    }

    if (signal.aborted) {
      return this.cancelled(state);
    }

    const { outcome } = await this.attempt(state, null);
    if (outcome.kind === 'cancelled') {
      return this.cancelled(state);
    }
    if (outcome.kind === 'succeeded') {
      return this.succeeded(state, outcome.statusCode, outcome.body, null);
    }

    state.lastError = outcome.error;
    return this.exhausted(state);
  }

  // eslint-disable-next-line class-methods-use-this
  private remainingMs(state: CallState): number {
    return state.deadline - Date.now();
  }

  private async attempt(
    state: CallState,
    proxy: ProxyEndpoint | null,
  ): Promise<DispatchAttempt> {
    const timeoutMs = this.config.attemptTimeoutMs;
    state.attempts += 1;
    this.traffic.attemptIssued();

    try {
      const response = await this.transport.send({
        url: state.url,
        proxy,
        headers: { ...randomBrowserHeaders(), ...state.headers },
        timeoutMs,
        signal: state.budget.signal,
      });

      if (response.statusCode === 200) {
        this.traffic.attemptSucceeded();
        return {
          url: state.url,
          proxy,
          timeoutMs,
          outcome: { kind: 'succeeded', statusCode: 200, body: response.body },
        };
      }

      this.traffic.attemptFailed();
      return {
        url: state.url,
        proxy,
        timeoutMs,
        outcome: {
          kind: 'failed',
          error: new AttemptNonSuccessStatusError(response.statusCode),
        },
      };
    } catch (error) {
      this.traffic.attemptFailed();
      if (state.budget.signal.aborted) {
        return { url: state.url, proxy, timeoutMs, outcome: { kind: 'cancelled' } };
      }

      return {
        url: state.url,
        proxy,
        timeoutMs,
        outcome: {
          kind: 'failed',
          error:
            error instanceof AttemptError
              ? error
              : new AttemptConnectionError(
                  error instanceof Error ? error.message : String(error),
                ),
        },
      };
    }
  }

  private succeeded(
    state: CallState,
    statusCode: number,
    body: Buffer,
    proxy: string | null,
  ): DispatchSuccess {
    if (!proxy) {
      this.logger.log(`Direct connection succeeded for ${state.url}`);
    }

    return Object.freeze({
      success: true,
      statusCode,
      body,
      via: proxy ? 'proxy' : 'direct',
      proxy,
      attempts: state.attempts,
      proxyUnavailable: state.proxyUnavailable,
    });
  }

  private exhausted(state: CallState): DispatchFailure {
    const { lastError } = state;
    const message = `All ${state.attempts} attempt(s) failed${
      lastError ? `: ${lastError.message}` : ''
    }`;
    this.logger.error(`${state.url}: ${message}`);

    return Object.freeze({
      success: false,
      errorKind: 'AllAttemptsExhausted',
      statusCode:
        lastError instanceof AttemptNonSuccessStatusError ? lastError.statusCode : null,
      lastError,
      message,
      attempts: state.attempts,
      proxyUnavailable: state.proxyUnavailable,
    });
  }

  private cancelled(state: CallState): DispatchFailure {
    const message =
      state.budget.cause === 'timeout'
        ? `Call budget of ${state.budgetMs}ms exceeded`
        : 'Cancelled by caller';
    this.logger.warn(`${state.url}: ${message}`);

    return Object.freeze({
      success: false,
      errorKind: 'DispatchCancelled',
      statusCode: null,
      lastError: state.lastError,
      message,
      attempts: state.attempts,
      proxyUnavailable: state.proxyUnavailable,
    });
  }
}
