import { ParseError } from './enrichment.types';
import { alertStatus, classifyContactLock, decodeSensorEvent, eventType } from './sensor-event';

describe('sensor-event', () => {
  describe('decodeSensorEvent', () => {
    it('decodes a JSON object', () => {
      expect(decodeSensorEvent('{"type":"nodeMsg","node":"AH01"}')).toEqual({
        type: 'nodeMsg',
        node: 'AH01',
      });
    });

    it.each(['not valid json', '{"type":', '[1,2,3]', '42', 'null'])(
      'rejects %p with a ParseError',
      (line) => {
        expect(() => decodeSensorEvent(line)).toThrow(ParseError);
      },
    );

    it('keeps the offending line on the error', () => {
      expect(() => decodeSensorEvent('{broken')).toThrow(
        expect.objectContaining({ name: 'ParseError', line: '{broken' }),
      );
    });
  });

  describe('eventType', () => {
    it('reads the type discriminator', () => {
      expect(eventType({ type: 'nodeAlert' })).toBe('nodeAlert');
    });

    it('treats a missing or non-string type as empty', () => {
      expect(eventType({})).toBe('');
      expect(eventType({ type: 7 })).toBe('');
    });
  });

  describe('alertStatus', () => {
    it('reads msg.stat', () => {
      expect(alertStatus({ msg: { stat: 'LOCK UPDATE ch 3' } })).toBe('LOCK UPDATE ch 3');
    });

    it('yields an empty status when the structure is absent', () => {
      expect(alertStatus({})).toBe('');
      expect(alertStatus({ msg: 'NEW CONTACT LOCK' })).toBe('');
      expect(alertStatus({ msg: null })).toBe('');
      expect(alertStatus({ msg: { stat: 3 } })).toBe('');
    });
  });

  describe('classifyContactLock', () => {
    it('recognises each lock transition', () => {
      expect(classifyContactLock('NEW CONTACT LOCK on 5.8GHz')).toBe('acquired');
      expect(classifyContactLock('LOCK UPDATE rssi -61')).toBe('updated');
      expect(classifyContactLock('LOST CONTACT LOCK after 12s')).toBe('lost');
    });

    it('takes the first marker when several are present', () => {
      expect(classifyContactLock('NEW CONTACT LOCK / LOCK UPDATE')).toBe('acquired');
      expect(classifyContactLock('LOCK UPDATE then LOST CONTACT LOCK')).toBe('updated');
    });

    it('returns undefined for unrelated statuses', () => {
      expect(classifyContactLock('SCANNING')).toBeUndefined();
      expect(classifyContactLock('')).toBeUndefined();
    });
  });
});
