import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { autoDetect } from '@serialport/bindings-cpp';

import { ReconnectingStreamService } from './reconnecting-stream.service';
import { SerialLineReader } from './serial-line-reader';
import { LINE_READER } from './serial.types';

@Module({
  providers: [
    {
      provide: LINE_READER,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        new SerialLineReader(autoDetect(), configService.get<number>('serial.readTimeoutMs', 1000)),
    },
    ReconnectingStreamService,
  ],
  exports: [ReconnectingStreamService],
})
export class SerialModule {}
