import { LinkedAbort } from '@common/abort/linked-abort';
import {
  endpointKey,
  endpointUrl,
  ProxyEndpoint,
} from '@modules/proxy-pool/types/proxy-endpoint';
import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Dispatcher, fetch, ProxyAgent } from 'undici';
import { HttpTransport, OutboundRequest, OutboundResponse } from './http-transport';
import {
  AttemptCancelledError,
  AttemptConnectionError,
  AttemptTimeoutError,
} from './transport.errors';

function describeFailure(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  // undici reports "fetch failed" and puts the socket error in `cause`
  const { cause } = error;
  if (cause instanceof Error && cause.message) {
    return `${error.message} (${cause.message})`;
  }
  return error.message;
}

/**
 * Undici-backed transport. Agents are kept per proxy address and target
 * scheme so connections to a proxy are pooled across attempts.
 *
 * Plain `http://` targets are forwarded to the proxy as absolute-form
 * requests; `https://` targets go through a CONNECT tunnel.
 */
@Injectable()
export class UndiciHttpTransport extends HttpTransport implements OnModuleDestroy {
  private readonly logger = new Logger(UndiciHttpTransport.name);

  private readonly agents = new Map<string, ProxyAgent>();

  async send(request: OutboundRequest): Promise<OutboundResponse> {
    const abort = new LinkedAbort(request.signal, request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: 'GET',
        headers: request.headers,
        dispatcher: this.dispatcherFor(request.proxy, request.url),
        signal: abort.signal,
        redirect: 'follow',
      });
      const body = Buffer.from(await response.arrayBuffer());

      return { statusCode: response.status, body };
    } catch (error) {
      if (abort.cause === 'timeout') {
        throw new AttemptTimeoutError(request.timeoutMs);
      }
      if (abort.cause === 'cancelled') {
        throw new AttemptCancelledError();
      }
      throw new AttemptConnectionError(describeFailure(error));
    } finally {
      abort.dispose();
    }
  }

  async onModuleDestroy(): Promise<void> {
    const agents = Array.from(this.agents.values());
    this.agents.clear();
    await Promise.all(agents.map((agent) => agent.close()));
    this.logger.debug(`Closed ${agents.length} proxy agent(s)`);
  }

  private dispatcherFor(
    proxy: ProxyEndpoint | null,
    url: string,
  ): Dispatcher | undefined {
    if (!proxy) {
      return undefined;
    }

    const tunnel = !/^http:\/\//i.test(url);
    const key = `${endpointKey(proxy)} ${tunnel ? 'tunnel' : 'forward'}`;
    let agent = this.agents.get(key);
    if (!agent) {
      agent = new ProxyAgent({ uri: endpointUrl(proxy), proxyTunnel: tunnel });
      this.agents.set(key, agent);
    }
    return agent;
  }
}
