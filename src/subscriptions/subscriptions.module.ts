import { Module } from '@nestjs/common';
import { ConnectionModule } from '../connection/connection.module';
import { EventsModule } from '../events/events.module';
import { RequestsModule } from '../requests/requests.module';
import { SubscriptionsService } from './subscriptions.service';

@Module({
  imports: [RequestsModule, ConnectionModule, EventsModule],
  providers: [SubscriptionsService],
  exports: [SubscriptionsService],
})
export class SubscriptionsModule {}
