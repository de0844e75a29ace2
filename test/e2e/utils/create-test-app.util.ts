import { HttpTransport } from '@infra/http-transport/http-transport';
import { WebserverSetupService } from '@infra/webserver/webserver-setup.service';
import { INestApplication } from '@nestjs/common';
// eslint-disable-next-line import/no-extraneous-dependencies
import { Test, TestingModule } from '@nestjs/testing';
import { FakeHttpTransport } from '@test/utils/fake-http-transport';
import { AppModule } from '../../../src/app.module';

export interface TestAppContext {
  app: INestApplication;
  module: TestingModule;
  transport: FakeHttpTransport;
}

/**
 * Boots the whole application with the outbound transport replaced by
 * `transport`. Reply queues set on it before the call are seen by the
 * fast-start pass.
 */
export async function createTestApp(
  transport: FakeHttpTransport = new FakeHttpTransport(),
): Promise<TestAppContext> {
  const moduleFixture = await Test.createTestingModule({
    imports: [AppModule],
  })
    .overrideProvider(HttpTransport)
    .useValue(transport)
    .compile();

  const app = moduleFixture.createNestApplication({ logger: false });
  app.get(WebserverSetupService).configure(app);
  await app.init();

  return {
    app,
    module: moduleFixture,
    transport,
  };
}

/**
 * Closes the test application, which also stops the background sweep
 */
export async function closeTestApp(context: TestAppContext): Promise<void> {
  if (context.app) {
    await context.app.close();
  }
}
