import { DynamicModule, Module } from '@nestjs/common';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { SessionClient } from './client/session-client.service';
import { ClientConfigModule } from './config/client-config.module';
import { ClientModuleOptions } from './config/client-options';
import { ConnectionModule } from './connection/connection.module';
import { EventsModule } from './events/events.module';
import { ReconnectModule } from './reconnect/reconnect.module';
import { RequestsModule } from './requests/requests.module';
import { SessionModule } from './session/session.module';
import { SubscriptionsModule } from './subscriptions/subscriptions.module';

@Module({})
export class ClientModule {
  /**
   * Wire up a {@link SessionClient}. Settings not given here are read from
   * the `SESSION_*` environment variables.
   */
  static forRoot(options: ClientModuleOptions = {}): DynamicModule {
    return {
      module: ClientModule,
      imports: [
        ClientConfigModule.forRoot(options),
        EventEmitterModule.forRoot(),
        EventsModule,
        ConnectionModule,
        RequestsModule,
        SubscriptionsModule,
        SessionModule,
        ReconnectModule,
      ],
      providers: [SessionClient],
      exports: [SessionClient, EventsModule],
    };
  }
}
