import { HttpTransportModule } from '@infra/http-transport/http-transport.module';
import { WebserverModule } from '@infra/webserver/webserver.module';
import { ContentModule } from '@modules/content/content.module';
import { StatusModule } from '@modules/status/status.module';
import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';

@Module({
  imports: [
    // Infra
    ScheduleModule.forRoot(),
    HttpTransportModule,
    WebserverModule,

    // Features
    ContentModule,
    StatusModule,
  ],
})
export class AppModule {}
