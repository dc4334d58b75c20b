import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  ContactLockState,
  EnrichedEvent,
  EnrichResult,
  ParseError,
  SensorEvent,
} from './enrichment.types';
import {
  alertStatus,
  classifyContactLock,
  decodeSensorEvent,
  eventType,
  NODE_ALERT,
  NODE_MESSAGE,
} from './sensor-event';
import { POSITION_SOURCE, PositionSource } from '../gps/gps.types';

const CONTACT_LOCK_MESSAGES: Record<ContactLockState, string> = {
  acquired: 'New FPV drone detected',
  updated: 'FPV drone still in view',
  lost: 'FPV drone signal lost',
};

@Injectable()
export class EnrichmentService {
  private readonly logger = new Logger(EnrichmentService.name);

  constructor(@Inject(POSITION_SOURCE) private readonly positionSource: PositionSource) {}

  enrich(line: string): EnrichResult {
    let decoded: SensorEvent;
    try {
      decoded = decodeSensorEvent(line);
    } catch (error) {
      if (error instanceof ParseError) {
        return { ok: false, error };
      }
      throw error;
    }

    let contact: ContactLockState | undefined;
    const type = eventType(decoded);
    if (type === NODE_MESSAGE) {
      this.logger.log('Boot message received');
    } else if (type === NODE_ALERT) {
      contact = classifyContactLock(alertStatus(decoded));
      if (contact) {
        this.logger.log(CONTACT_LOCK_MESSAGES[contact]);
      }
    }

    const fix = this.positionSource.currentFix();
    const event: EnrichedEvent = Object.freeze({
      ...decoded,
      gps_lat: fix.lat,
      gps_lon: fix.lon,
    });

    return { ok: true, event, fix, contact };
  }
}
