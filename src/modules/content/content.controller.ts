import { ApiEntry } from '@common/http/api-entry.decorator';
import { Body, Controller } from '@nestjs/common';
import { ReadDto, SearchDto } from './dto';
import { ContentService } from './services/content.service';
import { ReadResponse, SearchResponse } from './types/content-response';

@Controller()
export class ContentController {
  constructor(private readonly content: ContentService) {}

  @ApiEntry({ path: 'search' })
  search(@Body() dto: SearchDto): Promise<SearchResponse> {
    return this.content.search(dto.query);
  }

  @ApiEntry({ path: 'read' })
  read(@Body() dto: ReadDto): Promise<ReadResponse> {
    return this.content.read(dto.url);
  }
}
