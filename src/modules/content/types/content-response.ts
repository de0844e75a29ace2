import { DispatchRoute } from '@modules/dispatch/types/dispatch-result';

export type ContentSource = 'search' | 'reader';

interface ContentResponse {
  readonly success: true;
  /** Upstream body decoded as UTF-8 */
  readonly content: string;
  readonly statusCode: number;
  readonly source: ContentSource;
  readonly via: DispatchRoute;
  readonly timestamp: string;
}

export interface SearchResponse extends ContentResponse {
  readonly query: string;
}

export interface ReadResponse extends ContentResponse {
  readonly url: string;
}
