import { Module } from '@nestjs/common';

import { GpsdPositionService } from './gpsd-position.service';
import { POSITION_SOURCE } from './gps.types';

@Module({
  providers: [GpsdPositionService, { provide: POSITION_SOURCE, useExisting: GpsdPositionService }],
  exports: [POSITION_SOURCE],
})
export class GpsModule {}
