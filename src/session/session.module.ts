import { Module } from '@nestjs/common';
import { ConnectionModule } from '../connection/connection.module';
import { EventsModule } from '../events/events.module';
import { RequestsModule } from '../requests/requests.module';
import { SessionService } from './session.service';

@Module({
  imports: [RequestsModule, ConnectionModule, EventsModule],
  providers: [SessionService],
  exports: [SessionService],
})
export class SessionModule {}
