import { Module } from '@nestjs/common';
import { TRANSPORT_FACTORY } from './transport.types';
import { WsTransportFactory } from './ws-transport';

@Module({
  providers: [{ provide: TRANSPORT_FACTORY, useClass: WsTransportFactory }],
  exports: [TRANSPORT_FACTORY],
})
export class TransportModule {}
