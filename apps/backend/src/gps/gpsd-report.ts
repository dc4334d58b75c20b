import { PositionFix } from './gps.types';

export const WATCH_COMMAND = '?WATCH={"enable":true,"json":true}\n';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCoordinate(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Extracts a fix from one gpsd JSON report. Only TPV reports carrying both
 * coordinates qualify; SKY, VERSION, DEVICES and partial TPVs yield nothing.
 */
export function parseTpvReport(line: string): PositionFix | undefined {
  let report: unknown;
  try {
    report = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (!isRecord(report) || report.class !== 'TPV') {
    return undefined;
  }
  const { lat, lon } = report;
  if (!isCoordinate(lat) || !isCoordinate(lon)) {
    return undefined;
  }
  return { lat, lon };
}
