import { Module } from '@nestjs/common';

import { EnrichmentService } from './enrichment.service';
import { GpsModule } from '../gps/gps.module';

@Module({
  imports: [GpsModule],
  providers: [EnrichmentService],
  exports: [EnrichmentService],
})
export class EnrichmentModule {}
