import { Module } from '@nestjs/common';
import { ProxyPoolConfig } from './proxy-pool.config';
import { HealthProberService } from './services/health-prober.service';
import { PoolReporterService } from './services/pool-reporter.service';
import { PoolStateMachine } from './services/pool-state-machine.service';
import { ProxyPoolService } from './services/proxy-pool.service';
import { ProxyRecordStore } from './services/proxy-record.store';
import { ProxySelectorService } from './services/proxy-selector.service';
import { TrafficCountersService } from './services/traffic-counters.service';

/**
 * # Proxy pool: candidates, classification, selection and probing.
 *
 * Needs `HttpTransport` (global) and `ScheduleModule.forRoot()` in the root.
 */
@Module({
  providers: [
    ProxyPoolConfig,
    PoolStateMachine,
    ProxyRecordStore,
    ProxySelectorService,
    TrafficCountersService,
    ProxyPoolService,
    HealthProberService,
    PoolReporterService,
  ],
  exports: [
    ProxyPoolService,
    ProxyRecordStore,
    ProxySelectorService,
    TrafficCountersService,
    HealthProberService,
  ],
})
export class ProxyPoolModule {}
