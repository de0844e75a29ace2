import { HeaderSet } from '@common/http/browser-headers';
import { AttemptError } from '@infra/http-transport/transport.errors';
import { ProxyEndpoint } from '@modules/proxy-pool/types/proxy-endpoint';

export type DispatchRoute = 'proxy' | 'direct';

export type DispatchFailureKind = 'AllAttemptsExhausted' | 'DispatchCancelled';

export interface DispatchOptions {
  /** Proxied attempts before the direct fallback */
  maxAttempts?: number;
  signal?: AbortSignal;
  /** Budget of the whole call */
  timeoutMs?: number;
  /** Merged over the randomized browser headers */
  headers?: HeaderSet;
}

export type AttemptOutcome =
  | { readonly kind: 'succeeded'; readonly statusCode: number; readonly body: Buffer }
  | { readonly kind: 'failed'; readonly error: AttemptError }
  | { readonly kind: 'cancelled' };

/**
 * One outbound request of a dispatch call, through a proxy or direct
 */
export interface DispatchAttempt {
  readonly url: string;
  readonly proxy: ProxyEndpoint | null;
  readonly timeoutMs: number;
  readonly outcome: AttemptOutcome;
}

export interface DispatchSuccess {
  readonly success: true;
  readonly statusCode: number;
  readonly body: Buffer;
  readonly via: DispatchRoute;
  /** Address of the proxy that answered, `null` for direct */
  readonly proxy: string | null;
  readonly attempts: number;
  /** No selectable proxy was left at some point of the call */
  readonly proxyUnavailable: boolean;
}

export interface DispatchFailure {
  readonly success: false;
  readonly errorKind: DispatchFailureKind;
  /** Status of the last answered attempt, when it was a non-200 answer */
  readonly statusCode: number | null;
  readonly lastError: AttemptError | null;
  readonly message: string;
  readonly attempts: number;
  readonly proxyUnavailable: boolean;
}

export type DispatchResult = DispatchSuccess | DispatchFailure;
