import { Global, Module } from '@nestjs/common';
import { HttpTransport } from './http-transport';
import { UndiciHttpTransport } from './undici-http-transport.service';

/**
 * # Outbound HTTP for the whole application
 *
 * Tests swap the transport with `overrideProvider(HttpTransport)`.
 */
@Global()
@Module({
  providers: [{ provide: HttpTransport, useClass: UndiciHttpTransport }],
  exports: [HttpTransport],
})
export class HttpTransportModule {}
