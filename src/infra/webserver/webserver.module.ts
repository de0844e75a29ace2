import { ApiExceptionFilter } from '@common/http/api-exception.filter';
import { WebserverSetupService } from '@infra/webserver/webserver-setup.service';
import { WebserverConfig } from '@infra/webserver/webserver.config';
import { Global, Module } from '@nestjs/common';
import { HealthController } from './health.controller';

@Global()
@Module({
  providers: [WebserverConfig, WebserverSetupService, ApiExceptionFilter],
  exports: [WebserverSetupService],
  controllers: [HealthController],
})
export class WebserverModule {}
