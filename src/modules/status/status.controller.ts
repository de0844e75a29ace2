import { Controller, Get } from '@nestjs/common';
import { StatusService } from './services/status.service';
import {
  HealthReport,
  ServiceDescription,
  StatsReport,
} from './types/service-stats';

@Controller()
export class StatusController {
  constructor(private readonly status: StatusService) {}

  @Get()
  home(): ServiceDescription {
    return this.status.describe();
  }

  @Get('health')
  health(): HealthReport {
    return this.status.health();
  }

  @Get('stats')
  stats(): StatsReport {
    return this.status.report();
  }
}
