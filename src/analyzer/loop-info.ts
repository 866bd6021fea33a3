import { createLogger } from '../utils/logger.js';
import { CAPTURES, PHRASES, datastoreKey } from './patterns.js';

const log = createLogger('loop-info');

export interface LoopInfo {
  /** Completed report loops; the first report opens the first loop */
  loopCount: number;
  /** Seconds between the first two reports, -1 when not measured */
  loopIntervalSeconds: number;
  /** The datastore line the measurement was keyed on, empty when absent */
  key: string;
}

const NOT_MEASURED: LoopInfo = { loopCount: 0, loopIntervalSeconds: -1, key: '' };

/**
 * Count report loops and measure the time between the first two.
 */
export function loopInfo(text: string): LoopInfo {
  const lines = text.split('\n');
  const first = lines.find(
    (line) =>
      line.includes(PHRASES.REPORT_FOR_CONFIG) && line.includes(PHRASES.PLACING_IN_DATASTORE)
  );
  const configName = first ? CAPTURES.REPORT_CONFIG.exec(first)?.[1] : undefined;
  if (configName === undefined) {
    return NOT_MEASURED;
  }

  const key = datastoreKey(configName);
  const reports = lines.filter((line) => line.includes(key));
  const loopCount = reports.length - 1;
  if (loopCount <= 0) {
    return { loopCount: 0, loopIntervalSeconds: -1, key };
  }

  const start = secondsOfDay(reports[0] ?? '');
  const next = secondsOfDay(reports[1] ?? '');
  if (start === null || next === null) {
    log.warn({ key }, 'Report lines carry no HH:MM:SS timestamp, loop interval not measured');
    return { loopCount, loopIntervalSeconds: -1, key };
  }

  return { loopCount, loopIntervalSeconds: next - start, key };
}

/**
 * First HH:MM:SS on the line as seconds since midnight.
 */
export function secondsOfDay(line: string): number | null {
  const match = CAPTURES.CLOCK_TIME.exec(line);
  if (!match) {
    return null;
  }
  const [, hours = '0', minutes = '0', seconds = '0'] = match;
  return Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);
}
