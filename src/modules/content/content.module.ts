import { Module } from '@nestjs/common';
import { DispatchModule } from '@modules/dispatch/dispatch.module';
import { ContentConfig } from './content.config';
import { ContentController } from './content.controller';
import { ContentService } from './services/content.service';

@Module({
  imports: [DispatchModule],
  providers: [ContentConfig, ContentService],
  controllers: [ContentController],
})
export class ContentModule {}
