/**
 * Send detection.
 *
 * Which marker proves a report reached the subscription backend depends on
 * what the log contains and on who the agent reports to. The choice is a
 * table keyed by branch, backend and locality; the HTTP verb/path strings
 * mirror the agent's connection logging and yield zero matches if that
 * format changes.
 */

import { isLocalMode, type HypervisorMode, type RegisterBackend } from '../types/index.js';
import { messageCount } from './message-search.js';

export type Locality = 'local' | 'remote';

export type SendBranch = 'zero_report' | 'debug_connection' | 'plain';

export interface SendPattern {
  branch: SendBranch;
  pattern: string;
}

export const ZERO_REPORT_PHRASE = '0 hypervisors and 0 guests found';

/** Present when connection-level logging is enabled */
export const DEBUG_CONNECTION_MARKERS = ['virtwho.main DEBUG', 'rhsm.connection DEBUG'] as const;

/** HTTP success lines per backend and locality */
export const DEBUG_SEND_PATTERNS: Record<RegisterBackend, Record<Locality, string>> = {
  satellite: {
    local: 'Response: status=200, request="PUT /rhsm/consumers',
    remote: 'Response: status=200, request="POST /rhsm/hypervisors',
  },
  rhsm: {
    local: 'Response: status=20.*requestUuid.*request="PUT /subscription/consumers',
    remote: 'Response: status=20.*requestUuid.*request="POST /subscription/hypervisors',
  },
};

/** Info-level "sending" lines per locality */
export const PLAIN_SEND_PATTERNS: Record<Locality, string> = {
  local: 'Sending update in guests lists for config',
  remote: 'Sending updated Host-to-guest mapping to',
};

export function localityOf(mode: HypervisorMode): Locality {
  return isLocalMode(mode) ? 'local' : 'remote';
}

/**
 * Pick the marker to count for this log.
 */
export function selectSendPattern(
  text: string,
  registerBackend: RegisterBackend,
  mode: HypervisorMode
): SendPattern {
  if (text.includes(ZERO_REPORT_PHRASE)) {
    return { branch: 'zero_report', pattern: ZERO_REPORT_PHRASE };
  }

  const locality = localityOf(mode);
  if (DEBUG_CONNECTION_MARKERS.some((marker) => text.includes(marker))) {
    return { branch: 'debug_connection', pattern: DEBUG_SEND_PATTERNS[registerBackend][locality] };
  }

  return { branch: 'plain', pattern: PLAIN_SEND_PATTERNS[locality] };
}

/**
 * Number of reports the agent sent.
 */
export function sendCount(
  text: string,
  registerBackend: RegisterBackend,
  mode: HypervisorMode
): number {
  const { pattern } = selectSendPattern(text, registerBackend, mode);
  return messageCount(text, pattern);
}
