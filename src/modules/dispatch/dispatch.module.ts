import { Module } from '@nestjs/common';
import { ProxyPoolModule } from '@modules/proxy-pool/proxy-pool.module';
import { DispatchConfig } from './dispatch.config';
import { DispatchEngineService } from './services/dispatch-engine.service';

@Module({
  imports: [ProxyPoolModule],
  providers: [DispatchConfig, DispatchEngineService],
  exports: [DispatchEngineService],
})
export class DispatchModule {}
