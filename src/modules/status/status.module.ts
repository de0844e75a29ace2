import { Module } from '@nestjs/common';
import { ProxyPoolModule } from '@modules/proxy-pool/proxy-pool.module';
import { StatusController } from './status.controller';
import { StatusService } from './services/status.service';

@Module({
  imports: [ProxyPoolModule],
  providers: [StatusService],
  controllers: [StatusController],
})
export class StatusModule {}
