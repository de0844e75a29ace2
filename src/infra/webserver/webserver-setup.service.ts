import { INestApplication, Injectable, Logger } from '@nestjs/common';
import { ApiExceptionFilter } from '@common/http/api-exception.filter';
import { WebserverConfig } from '@infra/webserver/webserver.config';
import { getAppName } from '@common/env';

@Injectable()
export class WebserverSetupService {
  constructor(
    private readonly config: WebserverConfig,
    private readonly exceptionFilter: ApiExceptionFilter,
  ) {}

  /**
   * Global HTTP behaviour, shared by `main.ts` and the e2e app
   */
  public configure(app: INestApplication): void {
    app.useGlobalFilters(this.exceptionFilter);
  }

  public async setup(app: INestApplication): Promise<void> {
    this.configure(app);
    await app.listen(this.config.port);

    const msg = `Serving ${getAppName()} on ${this.config.publicUrl}`;
    new Logger('Webserver').log(msg);
  }
}
