/**
 * Log Analyzer
 *
 * Turns one rhsm.log snapshot into the facts test cases assert on. Every
 * field is derived independently from the in-memory text; a field whose
 * input is missing or garbled falls back to its default and the rest of
 * the record is still produced.
 */

import {
  emptyMappings,
  isLocalMode,
  type AnalysisResult,
  type Mappings,
  type RunContext,
  type RunObservations,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { loopInfo } from './loop-info.js';
import { extractMappings, findHypervisorId } from './mappings.js';
import { matchingLines, messageSearch } from './message-search.js';
import { CAPTURES, LOG_MARKERS } from './patterns.js';
import { sendCount } from './send-count.js';

const log = createLogger('analyzer');

export type AnalysisContext = Pick<RunContext, 'mode' | 'registerBackend' | 'selfGuestId'>;

/**
 * Analyze a log snapshot.
 *
 * @param rawText - Full rhsm.log content
 * @param context - Mode and backend the run used
 * @param observations - Host facts gathered after polling; offline replays omit them
 */
export function analyze(
  rawText: string,
  context: AnalysisContext,
  observations?: Partial<RunObservations>
): AnalysisResult {
  const { mode, registerBackend, selfGuestId } = context;
  const loops = safely('loop', { loopCount: 0, loopIntervalSeconds: -1, key: '' }, () =>
    loopInfo(rawText)
  );
  const mappings = safely<Mappings>('mappings', emptyMappings(isLocalMode(mode)), () =>
    extractMappings(rawText, mode)
  );
  const errorLines = safely<string[]>('errorLines', [], () =>
    matchingLines(rawText, LOG_MARKERS.ERROR)
  );
  const warningLines = safely<string[]>('warningLines', [], () =>
    matchingLines(rawText, LOG_MARKERS.WARNING)
  );

  const result: AnalysisResult = {
    debug: safely('debug', false, () => messageSearch(rawText, LOG_MARKERS.DEBUG)),
    oneshot: safely('oneshot', false, () => messageSearch(rawText, LOG_MARKERS.ONESHOT)),
    terminated: safely('terminated', false, () => messageSearch(rawText, LOG_MARKERS.TERMINATED)),
    threadCount: observations?.threadCount ?? 0,
    sendCount: safely('sendCount', 0, () => sendCount(rawText, registerBackend, mode)),
    reporterId: safely<string | null>('reporterId', null, () => reporterId(rawText)),
    intervalSeconds: safely<number | null>('intervalSeconds', null, () => intervalSeconds(rawText)),
    loopIntervalSeconds: loops.loopIntervalSeconds,
    loopCount: loops.loopCount,
    mappings,
    hypervisorId: safely('hypervisorId', '', () => findHypervisorId(mappings, selfGuestId)),
    printJson: printJson(observations?.printOutput),
    errorCount: errorLines.length,
    errorLines,
    warningCount: warningLines.length,
    warningLines,
  };

  log.info({ mode, registerBackend, result }, 'Completed the analyzer after run virt-who');
  return result;
}

/**
 * First reporter id the agent announced.
 */
export function reporterId(text: string): string | null {
  const match = CAPTURES.REPORTER_ID.exec(text);
  return match?.[1] !== undefined ? match[1].trim() : null;
}

/**
 * Interval announced when the agent enters its reporting loop.
 */
export function intervalSeconds(text: string): number | null {
  const match = CAPTURES.INTERVAL.exec(text);
  if (match?.[1] === undefined) {
    return null;
  }
  const raw = match[1].trim();
  if (!/^\d+$/.test(raw)) {
    log.warn({ raw }, 'Loop interval is not an integer');
    return null;
  }
  return Number.parseInt(raw, 10);
}

function printJson(output: string | null | undefined): string | null {
  return output !== undefined && output !== null && output !== '' ? output : null;
}

/**
 * Run one field derivation, degrading to its default on an unexpected failure.
 */
function safely<T>(field: string, fallback: T, derive: () => T): T {
  try {
    return derive();
  } catch (error) {
    log.warn({ field, err: error }, 'Field derivation failed, using default');
    return fallback;
  }
}
