import { Module } from '@nestjs/common';

import { BridgeService } from './bridge.service';
import { EnrichmentModule } from '../enrichment/enrichment.module';
import { GpsModule } from '../gps/gps.module';
import { PublisherModule } from '../publisher/publisher.module';
import { SerialModule } from '../serial/serial.module';

@Module({
  imports: [SerialModule, GpsModule, EnrichmentModule, PublisherModule],
  providers: [BridgeService],
  exports: [BridgeService],
})
export class BridgeModule {}
