import { HeaderSet } from '@common/http/browser-headers';
import { ProxyEndpoint } from '@modules/proxy-pool/types/proxy-endpoint';

export interface OutboundRequest {
  readonly url: string;
  /** `null` for a direct connection */
  readonly proxy: ProxyEndpoint | null;
  readonly headers: HeaderSet;
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
}

export interface OutboundResponse {
  readonly statusCode: number;
  readonly body: Buffer;
}

/**
 * # Outbound GET, optionally through a proxy
 *
 * Resolves with any HTTP response, whatever its status. Rejects with
 * `AttemptTimeoutError` when `timeoutMs` elapses, `AttemptCancelledError`
 * when `signal` aborts, and `AttemptConnectionError` for everything else.
 */
export abstract class HttpTransport {
  abstract send(request: OutboundRequest): Promise<OutboundResponse>;
}
