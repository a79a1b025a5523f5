import { Module } from '@nestjs/common';
import { ConnectionModule } from '../connection/connection.module';
import { EventsModule } from '../events/events.module';
import { SessionModule } from '../session/session.module';
import { SubscriptionsModule } from '../subscriptions/subscriptions.module';
import { ReconnectService } from './reconnect.service';

@Module({
  imports: [ConnectionModule, SessionModule, SubscriptionsModule, EventsModule],
  providers: [ReconnectService],
  exports: [ReconnectService],
})
export class ReconnectModule {}
