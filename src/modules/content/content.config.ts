import { ConfigFragment } from '@common/config/config-fragment';
import { stringOr } from '@common/config/env-transformers';
import { UseEnv } from '@common/config/use-env.decorator';
import { IsOptional, IsString, IsUrl } from 'class-validator';

/**
 * Upstream content service reached through the dispatch engine
 */
export class ContentConfig extends ConfigFragment {
  /**
   * Reader endpoint; the target URL is appended as is.
   * Example: "https://r.jina.ai/"
   */
  @IsUrl({ require_protocol: true, require_tld: false })
  @UseEnv('CONTENT_READER_URL', stringOr('https://r.jina.ai/'))
  public readonly readerUrl!: string;

  /**
   * Search endpoint; the query goes in the `q` parameter
   */
  @IsUrl({ require_protocol: true, require_tld: false })
  @UseEnv('CONTENT_SEARCH_URL', stringOr('https://s.jina.ai/'))
  public readonly searchUrl!: string;

  /**
   * Sent as a bearer token when set
   */
  @IsString()
  @IsOptional()
  @UseEnv('CONTENT_API_KEY')
  public readonly apiKey?: string;
}
