import { Module } from '@nestjs/common';
import { EventsModule } from '../events/events.module';
import { TransportModule } from '../transport/transport.module';
import { ConnectionService } from './connection.service';

@Module({
  imports: [TransportModule, EventsModule],
  providers: [ConnectionService],
  exports: [ConnectionService],
})
export class ConnectionModule {}
