import { Module } from '@nestjs/common';
import { ConnectionModule } from '../connection/connection.module';
import { RequestCorrelator } from './request-correlator.service';

@Module({
  imports: [ConnectionModule],
  providers: [RequestCorrelator],
  exports: [RequestCorrelator],
})
export class RequestsModule {}
