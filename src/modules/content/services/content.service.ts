import { HeaderSet } from '@common/http/browser-headers';
import { DispatchEngineService } from '@modules/dispatch/services/dispatch-engine.service';
import { DispatchSuccess } from '@modules/dispatch/types/dispatch-result';
import { Injectable, Logger } from '@nestjs/common';
import { ContentConfig } from '../content.config';
import { ContentUnavailableAppError } from '../errors/content-unavailable.app-error';
import {
  ContentSource,
  ReadResponse,
  SearchResponse,
} from '../types/content-response';

/**
 * # Content gateway
 *
 * Turns search and read requests into upstream URLs and fetches them
 * through the dispatch engine.
 */
@Injectable()
export class ContentService {
  private readonly logger = new Logger(ContentService.name);

  constructor(
    private readonly config: ContentConfig,
    private readonly dispatch: DispatchEngineService,
  ) {}

  async search(query: string): Promise<SearchResponse> {
    this.logger.log(`Search request for: ${query}`);
    const params = new URLSearchParams({ q: query });
    const answer = await this.fetch(
      'search',
      `${this.config.searchUrl}?${params.toString()}`,
    );
    return { ...this.describe('search', answer), query };
  }

  async read(url: string): Promise<ReadResponse> {
    this.logger.log(`Read request for: ${url}`);
    const answer = await this.fetch('reader', `${this.config.readerUrl}${url}`);
    return { ...this.describe('reader', answer), url };
  }

  private async fetch(
    source: ContentSource,
    target: string,
  ): Promise<DispatchSuccess> {
    const result = await this.dispatch.fetch(target, {
      headers: this.authHeaders(),
    });
    if (!result.success) {
      throw new ContentUnavailableAppError(source, target, result);
    }
    return result;
  }

  private authHeaders(): HeaderSet {
    return this.config.apiKey
      ? { Authorization: `Bearer ${this.config.apiKey}` }
      : {};
  }

  // eslint-disable-next-line class-methods-use-this
  private describe(source: ContentSource, answer: DispatchSuccess) {
    return {
      success: true as const,
      content: answer.body.toString('utf8'),
      statusCode: answer.statusCode,
      source,
      via: answer.via,
      timestamp: new Date().toISOString(),
    };
  }
}
